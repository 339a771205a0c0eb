import type { NextFunction, Request, Response } from 'express';
import { Router } from 'express';
import { z } from 'zod';

import { reshapeByCustomerRole } from '../../cleaning/customers';
import { HttpError } from '../../middleware/errorHandler';
import { parseRequest } from '../../middleware/validation';
import type { AircraftRegistry } from '../../lib/registry';
import { mapAircraftDetail, searchAircraft } from '../../services/aircraftSearch';
import type { RabRefreshService } from '../../services/rabRefreshService';

type AircraftRouterOptions = {
  registry: AircraftRegistry;
  refreshService?: Pick<RabRefreshService, 'getLatestStatus'>;
};

const firstValue = (value: unknown): unknown => {
  if (Array.isArray(value)) {
    return value[0];
  }

  return value;
};

const stringParam = (min: number, max: number) =>
  z.preprocess((value) => {
    const first = firstValue(value);
    if (typeof first !== 'string') {
      return first;
    }

    return first.trim();
  }, z.string().min(min).max(max));

const booleanParam = z.preprocess((value) => {
  const first = firstValue(value);
  if (first === undefined || first === null) {
    return undefined;
  }

  if (typeof first === 'string') {
    const normalized = first.trim().toLowerCase();
    if (['true', '1', 'yes'].includes(normalized)) {
      return true;
    }

    if (['false', '0', 'no'].includes(normalized)) {
      return false;
    }
  }

  return first;
}, z.boolean());

const numericParam = (min: number, max: number) =>
  z.preprocess((value) => {
    const first = firstValue(value);
    if (first === undefined || first === null || first === '') {
      return undefined;
    }

    return first;
  }, z.coerce.number().int().min(min).max(max));

// Brazilian marks are five letters, sometimes written with a hyphen (PR-ABC)
const tailNumberParam = z.preprocess((value) => {
  const first = firstValue(value);
  if (typeof first !== 'string') {
    return first;
  }

  return first.trim().toUpperCase().replace(/-/g, '');
}, z.string().min(1).max(10).regex(/^[A-Z0-9]+$/, 'Tail number must be alphanumeric'));

const searchQuerySchema = z.object({
  tailNumber: tailNumberParam.optional(),
  exact: booleanParam.optional(),
  manufacturer: stringParam(1, 120).optional(),
  owner: stringParam(1, 120).optional(),
  agricultural: booleanParam.optional(),
  page: numericParam(1, 1000).optional(),
  pageSize: numericParam(1, 100).optional(),
});

const searchRequestSchema = z.object({
  query: searchQuerySchema,
  body: z.unknown().optional(),
  params: z.unknown().optional(),
});

const tailNumberRequestSchema = z.object({
  params: z.object({ tailNumber: tailNumberParam }),
  query: z.unknown().optional(),
  body: z.unknown().optional(),
});

type SearchQuery = z.infer<typeof searchQuerySchema>;

const ensureFiltersProvided = (query: SearchQuery) => {
  if (
    query.tailNumber ||
    query.manufacturer ||
    query.owner ||
    query.agricultural !== undefined
  ) {
    return;
  }

  throw new HttpError('At least one search filter is required', 400);
};

export const createAircraftRouter = ({ registry, refreshService }: AircraftRouterOptions) => {
  const router = Router();

  const requireSnapshot = () => {
    const snapshot = registry.getSnapshot();
    if (!snapshot) {
      throw new HttpError('The RAB registry has not been loaded yet', 503);
    }

    return snapshot;
  };

  const findAircraft = (req: Request) => {
    const { params } = parseRequest(tailNumberRequestSchema, req);
    requireSnapshot();

    const record = registry.findByTailNumber(params.tailNumber);

    if (!record) {
      throw new HttpError(`Aircraft ${params.tailNumber} was not found`, 404);
    }

    return record;
  };

  router.get('/refresh-status', (_req: Request, res: Response) => {
    const latest = refreshService?.getLatestStatus() ?? null;

    if (!latest) {
      res.json({
        status: 'NOT_AVAILABLE',
        trigger: null,
        startedAt: null,
        completedAt: null,
        failedAt: null,
        dataVersion: null,
        totals: null,
        errorMessage: null,
      });
      return;
    }

    res.json({
      id: latest.id,
      status: latest.status,
      trigger: latest.trigger,
      startedAt: latest.startedAt.toISOString(),
      completedAt: latest.completedAt ? latest.completedAt.toISOString() : null,
      failedAt: latest.failedAt ? latest.failedAt.toISOString() : null,
      dataVersion: latest.dataVersion,
      totals: latest.totals,
      errorMessage: latest.errorMessage,
    });
  });

  router.get('/', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { query } = parseRequest(searchRequestSchema, req);

      ensureFiltersProvided(query);
      const snapshot = requireSnapshot();

      const page = query.page ?? 1;
      const pageSize = query.pageSize ?? 25;
      const exact = query.exact ?? false;

      const result = searchAircraft(snapshot.table.rows, {
        tailNumber: query.tailNumber ? { value: query.tailNumber, exact } : undefined,
        manufacturer: query.manufacturer,
        owner: query.owner,
        agricultural: query.agricultural,
        page,
        pageSize,
      });

      const totalPages = result.total === 0 ? 0 : Math.ceil(result.total / pageSize);

      res.json({
        data: result.data,
        meta: {
          page,
          pageSize,
          total: result.total,
          totalPages,
        },
        filters: {
          tailNumber: query.tailNumber ? { value: query.tailNumber, exact } : null,
          manufacturer: query.manufacturer ?? null,
          owner: query.owner ?? null,
          agricultural: query.agricultural ?? null,
        },
      });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:tailNumber', (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ data: mapAircraftDetail(findAircraft(req)) });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:tailNumber/customers', (req: Request, res: Response, next: NextFunction) => {
    try {
      const record = findAircraft(req);
      const snapshot = requireSnapshot();
      const customers = reshapeByCustomerRole({ columns: snapshot.table.columns, rows: [record] });

      res.json({
        data: customers.rows.map((row) => ({
          customerType: row['customer_type'],
          name: row['customer_name'] ?? null,
          state: row[`${String(row['customer_type'])}_state`] ?? null,
          taxId: row['tax_id_print'] ?? null,
          taxIdType: row['tax_id_type'] ?? null,
          other: row['other'] ?? null,
        })),
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
};
