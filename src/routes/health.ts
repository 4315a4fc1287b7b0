import { Router } from 'express';
import { asyncHandler } from '../utils/async-handler.js';

export type DatabaseClock = () => Promise<string>;

export function createHealthRouter(databaseTime: DatabaseClock): Router {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (_req, res) => {
      const time = await databaseTime();
      res.json({ status: 'ok', time });
    })
  );

  return router;
}
