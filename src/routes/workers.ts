import express from 'express';
import type { RequestHandler, Router } from 'express';
import { z } from 'zod';
import type { WorkerRunRepository } from '../db/store';
import { NotFoundError } from '../errors';
import { asyncHandler } from '../utils/asyncHandler';
import { runWorker } from '../utils/runWorker';
import { parseOrThrow } from '../validators';
import { isWorkerName } from '../workers';
import type { WorkerRegistry } from '../workers';

const LogsQuery = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(20),
  worker: z.string().optional(),
});

export type WorkersRouterDeps = {
  workers: WorkerRegistry;
  runs: WorkerRunRepository;
  requireAuth: RequestHandler;
  requireAdmin: RequestHandler;
};

export function createWorkersRouter(deps: WorkersRouterDeps): Router {
  const router = express.Router();
  const { workers, runs, requireAuth, requireAdmin } = deps;

  router.use(requireAuth, requireAdmin);

  /**
   * GET /api/workers/logs
   * Returns the most recent worker run records.
   * Query params:
   *   ?limit=20    (optional)
   *   ?worker=name (optional)
   */
  router.get(
    '/logs',
    asyncHandler(async (req, res) => {
      const { limit, worker } = parseOrThrow(LogsQuery, req.query);
      const rows = await runs.listRecent(limit, worker);
      res.json({ ok: true, count: rows.length, runs: rows });
    })
  );

  /**
   * POST /api/workers/:name/run
   * Runs one housekeeping worker now and records it like a scheduled run.
   */
  router.post(
    '/:name/run',
    asyncHandler(async (req, res) => {
      const name = req.params.name;
      if (!isWorkerName(name)) throw new NotFoundError(`Unknown worker ${name}`, 'worker_not_found');

      const result = await runWorker(runs, name, workers[name]);
      res.status(result.ok ? 200 : 500).json({ worker: name, ...result });
    })
  );

  return router;
}
