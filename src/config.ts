import path from 'node:path';
import { z } from 'zod';

export type ConflictPolicy = 'fail' | 'override';
export type LoadMode = 'upsert' | 'replace';

const envSchema = z.object({
  POSTGRES_HOST: z.string().trim().min(1).default('localhost'),
  POSTGRES_PORT: z.coerce.number().int().min(1).max(65535).default(5432),
  POSTGRES_USER: z.string().trim().min(1).default('etl'),
  POSTGRES_PASSWORD: z.string().default('etlpass'),
  POSTGRES_DB: z.string().trim().min(1).default('shopping'),
  PGCONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  ETL_BATCH_SIZE: z.coerce.number().int().min(1).max(5_000).default(500),
  ETL_BATCH_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  ETL_CONFLICT_POLICY: z.enum(['fail', 'override']).default('fail'),
  ETL_LOAD_MODE: z.enum(['upsert', 'replace']).default('upsert'),
  ETL_DATA_DIR: z.string().trim().min(1).default('data'),
  ETL_SOURCE_FILE: z.string().trim().min(1).default('shopping_trends.csv'),
  API_PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  JWT_SECRET: z.string().min(1).optional(),
});

export type DatabaseConfig = {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  connectTimeoutMs: number;
};

export type PipelineConfig = {
  batchSize: number;
  batchTimeoutMs: number;
  conflictPolicy: ConflictPolicy;
  loadMode: LoadMode;
};

export type AppConfig = {
  database: DatabaseConfig;
  pipeline: PipelineConfig;
  /** Directory the API may read source files from. */
  dataDir: string;
  /** Default source when a run names none. */
  sourcePath: string;
  apiPort: number;
  jwtSecret: string | null;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // empty strings from docker-compose interpolation count as unset
  const defined = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  const parsed = envSchema.parse(defined);
  return {
    database: {
      host: parsed.POSTGRES_HOST,
      port: parsed.POSTGRES_PORT,
      user: parsed.POSTGRES_USER,
      password: parsed.POSTGRES_PASSWORD,
      database: parsed.POSTGRES_DB,
      connectTimeoutMs: parsed.PGCONNECT_TIMEOUT_MS,
    },
    pipeline: {
      batchSize: parsed.ETL_BATCH_SIZE,
      batchTimeoutMs: parsed.ETL_BATCH_TIMEOUT_MS,
      conflictPolicy: parsed.ETL_CONFLICT_POLICY,
      loadMode: parsed.ETL_LOAD_MODE,
    },
    dataDir: path.resolve(parsed.ETL_DATA_DIR),
    sourcePath: path.resolve(parsed.ETL_DATA_DIR, parsed.ETL_SOURCE_FILE),
    apiPort: parsed.API_PORT,
    jwtSecret: parsed.JWT_SECRET ?? null,
  };
}
