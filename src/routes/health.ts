import type { Request, Response } from 'express';
import { Router } from 'express';

import { getAircraftRegistry } from '../lib/registry';

const router = Router();

router.get('/', (_req: Request, res: Response) => {
  const snapshot = getAircraftRegistry().getSnapshot();

  res.json({
    status: 'ok',
    registry: snapshot
      ? { loaded: true, aircraft: snapshot.stats.aircraft, loadedAt: snapshot.loadedAt.toISOString() }
      : { loaded: false, aircraft: 0, loadedAt: null },
  });
});

export default router;
