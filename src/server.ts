import 'dotenv/config';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { closePool, getPool, query } from './db.js';
import { PgRunHistory } from './services/run-history.js';
import { RunQueue } from './services/run-queue.js';
import { readCsvRecords } from './sources/csv-source.js';
import { pgStoreConnector } from './store/pg-store.js';

const config = loadConfig();
const history = new PgRunHistory();
const queue = new RunQueue({
  history,
  connect: pgStoreConnector(getPool(), { statementTimeoutMs: config.pipeline.batchTimeoutMs }),
  pipeline: config.pipeline,
  openSource: readCsvRecords,
});

const app = createApp({
  queue,
  history,
  dataDir: config.dataDir,
  defaultSourcePath: config.sourcePath,
  jwtSecret: config.jwtSecret,
  databaseTime: async () => {
    const now = await query<{ now: Date }>('select now()');
    return now.rows[0].now.toISOString();
  },
});

// recovered runs must be queued before a request can add one
queue.initialize().then(
  () => {
    app.listen(config.apiPort, () => {
      console.log(`[api] up on :${config.apiPort}`);
    });
  },
  (error: unknown) => {
    console.error('[etl] could not initialize the run queue', error);
    process.exitCode = 1;
    closePool().catch((closeError: unknown) => {
      console.error('[etl] could not close the database pool', closeError);
    });
  }
);
