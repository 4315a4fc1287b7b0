import express, { type Express } from 'express';
import helmet from 'helmet';
import morgan from 'morgan';
import cors from 'cors';
import { requireAuth } from './middleware/auth.js';
import { errorHandler } from './middleware/error-handler.js';
import { createHealthRouter, type DatabaseClock } from './routes/health.js';
import { createRunsRouter, type RunsRouterDeps } from './routes/runs.js';

export type AppDeps = RunsRouterDeps & {
  databaseTime: DatabaseClock;
  jwtSecret: string | null;
  /** Access log format; null turns request logging off. */
  accessLog?: string | null;
};

export function createApp(deps: AppDeps): Express {
  const app = express();
  app.set('trust proxy', true);
  app.use(helmet());
  app.use(cors());
  app.use(express.json());
  const accessLog = deps.accessLog === undefined ? 'combined' : deps.accessLog;
  if (accessLog) {
    app.use(morgan(accessLog));
  }

  app.use('/api/v1/health', createHealthRouter(deps.databaseTime));

  app.use(requireAuth(deps.jwtSecret));
  app.use('/api/v1/runs', createRunsRouter(deps));

  app.use(errorHandler);
  return app;
}
