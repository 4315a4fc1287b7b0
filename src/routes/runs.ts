import { Router } from 'express';
import path from 'node:path';
import { promises as fsp } from 'node:fs';
import { z } from 'zod';
import { badRequest, notFound } from '../errors.js';
import { requirePermission } from '../middleware/auth.js';
import type { RunHistory } from '../services/run-history.js';
import type { RunQueue } from '../services/run-queue.js';
import { asyncHandler } from '../utils/async-handler.js';

export type RunsRouterDeps = {
  queue: Pick<RunQueue, 'enqueue'>;
  history: Pick<RunHistory, 'get'>;
  dataDir: string;
  defaultSourcePath: string;
};

const createRunSchema = z.object({
  source: z
    .string()
    .trim()
    .regex(/^[a-zA-Z0-9._-]+\.csv$/, 'expected a .csv file name inside the data directory')
    .optional(),
});

const runParamsSchema = z.object({
  id: z.string().uuid(),
});

export function createRunsRouter(deps: RunsRouterDeps): Router {
  const router = Router();

  router.post(
    '/',
    requirePermission('etl:run'),
    asyncHandler(async (req, res) => {
      const body = createRunSchema.parse(req.body ?? {});
      const sourcePath = body.source ? path.join(deps.dataDir, body.source) : deps.defaultSourcePath;

      try {
        await fsp.access(sourcePath);
      } catch {
        throw badRequest(`source file ${path.basename(sourcePath)} not found`);
      }

      const runId = await deps.queue.enqueue(sourcePath);
      res.status(202).json({
        status: 'queued',
        runId,
        source: path.basename(sourcePath),
      });
    })
  );

  router.get(
    '/:id',
    requirePermission('etl:run'),
    asyncHandler(async (req, res) => {
      const { id } = runParamsSchema.parse(req.params);
      const run = await deps.history.get(id);
      if (!run) {
        throw notFound('run not found');
      }
      res.json(run);
    })
  );

  return router;
}
