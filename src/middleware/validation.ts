import type { Request } from 'express';
import type { z, ZodError, ZodTypeAny } from 'zod';

import { HttpError } from './errorHandler';

type RequestParts = Pick<Request, 'body' | 'query' | 'params'>;

export type ValidationIssue = {
  path: string;
  message: string;
};

// Paths are rooted at the request part, e.g. "query.pageSize" or "params.tailNumber"
export const toValidationIssues = (error: ZodError): ValidationIssue[] =>
  error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));

/**
 * Parses the body, query and params of a request against one schema and
 * returns the typed result. Failures surface as a 400 `HttpError` whose
 * details list every issue.
 */
export const parseRequest = <Schema extends ZodTypeAny>(
  schema: Schema,
  req: RequestParts,
): z.infer<Schema> => {
  const result = schema.safeParse({
    body: req.body,
    query: req.query,
    params: req.params,
  });

  if (!result.success) {
    throw new HttpError('Validation failed', 400, toValidationIssues(result.error));
  }

  return result.data;
};
