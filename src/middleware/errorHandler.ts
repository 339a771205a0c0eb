import type { NextFunction, Request, Response } from 'express';

import { getTelemetryClient } from '../telemetry/appInsights';

export class HttpError extends Error {
  statusCode: number;
  details?: unknown;

  constructor(message: string, statusCode = 500, details?: unknown) {
    super(message);
    this.name = 'HttpError';
    this.statusCode = statusCode;
    this.details = details;
  }
}

export const notFoundHandler = (_req: Request, _res: Response, next: NextFunction) => {
  next(new HttpError('Not Found', 404));
};

export const errorHandler = (err: unknown, _req: Request, res: Response, _next: NextFunction) => {
  const status = err instanceof HttpError ? err.statusCode : 500;
  const message = err instanceof HttpError ? err.message : 'Internal Server Error';

  const payload = {
    message,
    ...(err instanceof HttpError && err.details ? { details: err.details } : {}),
  };

  if (status >= 500) {
    // eslint-disable-next-line no-console
    console.error('[RAB API] Unhandled error', err);
    if (err instanceof Error) {
      getTelemetryClient()?.trackException({ exception: err });
    }
  }

  res.status(status).json(payload);
};
