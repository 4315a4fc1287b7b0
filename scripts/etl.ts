// One-shot run: CSV file -> Dim_Customer, Dim_Item, Fact_Purchase.
//   npm run etl -- [path/to/shopping_trends.csv]
import 'dotenv/config';
import path from 'node:path';
import { loadConfig } from '../src/config.js';
import { closePool, getPool } from '../src/db.js';
import { runPipeline } from '../src/services/pipeline-runner.js';
import { readCsvRecords } from '../src/sources/csv-source.js';
import { pgStoreConnector } from '../src/store/pg-store.js';
import { createLogger } from '../src/utils/logger.js';

async function main(): Promise<number> {
  const config = loadConfig();
  const sourcePath = process.argv[2] ? path.resolve(process.argv[2]) : config.sourcePath;
  const logger = createLogger('etl');
  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.warn('SIGINT received, stopping after the current batch');
    controller.abort();
  });

  logger.info(`Reading records from ${sourcePath}`);
  try {
    const report = await runPipeline(
      readCsvRecords(sourcePath),
      pgStoreConnector(getPool(), { statementTimeoutMs: config.pipeline.batchTimeoutMs }),
      { ...config.pipeline, signal: controller.signal, logger }
    );
    console.log(JSON.stringify(report, null, 2));
    return report.status === 'Completed' ? 0 : 1;
  } finally {
    await closePool();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('[etl] fatal', error);
    process.exitCode = 1;
  }
);
