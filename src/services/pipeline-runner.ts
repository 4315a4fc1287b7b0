import type { PipelineConfig } from '../config.js';
import { PipelineError, RunAbortedError, errorMessage, isRecordError } from '../errors.js';
import type { StoreConnector } from '../store/relational-store.js';
import {
  emptyCounts,
  type FlatRecord,
  type KeyReference,
  type PurchaseRow,
  type RecordSource,
  type Rejection,
  type RunReport,
  type RunStage,
  type TableCounts,
} from '../types.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { extractDimensions, mergeAccepted } from './dimension-extractor.js';
import { FactBuilder } from './fact-builder.js';
import { resolveKeys } from './key-resolver.js';
import { LoadOrchestrator } from './load-orchestrator.js';

export type RunOptions = PipelineConfig & {
  signal?: AbortSignal;
  logger?: Logger;
};

function throwIfAborted(signal: AbortSignal | undefined, stage: RunStage): void {
  if (signal?.aborted) {
    throw new RunAbortedError(`aborted during ${stage}`);
  }
}

async function collect(source: RecordSource, signal: AbortSignal | undefined): Promise<FlatRecord[]> {
  const records: FlatRecord[] = [];
  for await (const record of source) {
    throwIfAborted(signal, 'Extracting');
    records.push(record);
  }
  return records;
}

/**
 * Runs one extract-transform-load pass from `source` into the store that
 * `connect` opens. Record-level problems end up in the report's rejections;
 * anything fatal ends the run in `Failed` with the stage it reached. The
 * store connection is released on every path.
 */
export async function runPipeline(
  source: RecordSource,
  connect: StoreConnector,
  options: RunOptions
): Promise<RunReport> {
  const logger = options.logger ?? silentLogger;
  const startedAt = new Date().toISOString();
  const rejected = new Map<number, Rejection>();
  const warnings: string[] = [];
  let stage: RunStage = 'NotStarted';
  let totalRecords = 0;
  let counts: TableCounts = emptyCounts();
  let storeCounts: TableCounts | null = null;

  const enter = (next: RunStage) => {
    stage = next;
    logger.info(`Stage ${next}`);
  };

  const reject = (recordIndex: number, error: unknown) => {
    if (!isRecordError(error)) throw error;
    rejected.set(recordIndex, { kind: error.kind, key: error.key, reason: error.message, recordIndex });
    logger.warn(`Rejected record ${recordIndex} (${error.kind}): ${error.message}`);
  };

  const finish = (status: RunReport['status'], error: RunReport['error']): RunReport => ({
    status,
    stage,
    totalRecords,
    counts,
    storeCounts,
    rejections: [...rejected.values()].sort((a, b) => a.recordIndex - b.recordIndex),
    warnings,
    error,
    startedAt,
    finishedAt: new Date().toISOString(),
  });

  let orchestrator: LoadOrchestrator | null = null;
  try {
    const store = await connect();
    try {
      enter('Extracting');
      const records = await collect(source, options.signal);
      totalRecords = records.length;
      const extraction = extractDimensions(records);
      extraction.rejected.forEach((error, recordIndex) => reject(recordIndex, error));
      logger.info(
        `Extracted ${totalRecords} records: ${extraction.customers.size} customer keys, ${extraction.items.size} item keys`
      );

      enter('Resolving');
      throwIfAborted(options.signal, stage);
      const references = new Map<number, KeyReference>();
      records.forEach((record, recordIndex) => {
        if (rejected.has(recordIndex)) return;
        try {
          references.set(recordIndex, resolveKeys(record, extraction));
        } catch (error) {
          reject(recordIndex, error);
        }
      });

      enter('Building');
      throwIfAborted(options.signal, stage);
      const builder = new FactBuilder();
      const facts: PurchaseRow[] = [];
      const accepted: number[] = [];
      references.forEach((reference, recordIndex) => {
        try {
          facts.push(builder.build(records[recordIndex], reference, recordIndex));
          accepted.push(recordIndex);
        } catch (error) {
          reject(recordIndex, error);
        }
      });
      logger.info(`Built ${builder.acceptedCount} fact rows, rejected ${rejected.size} records`);

      const dimensions = mergeAccepted(extraction, accepted, { conflictPolicy: options.conflictPolicy, logger });
      warnings.push(...dimensions.warnings);

      orchestrator = new LoadOrchestrator(store, {
        batchSize: options.batchSize,
        batchTimeoutMs: options.batchTimeoutMs,
        loadMode: options.loadMode,
        signal: options.signal,
        logger,
        onPhase: enter,
      });
      storeCounts = await orchestrator.load({
        customers: [...dimensions.customers.values()],
        items: [...dimensions.items.values()],
        facts,
      });
      counts = { ...orchestrator.committed };
    } finally {
      await store.close();
    }

    enter('Completed');
    return finish('Completed', null);
  } catch (error) {
    if (orchestrator) {
      counts = { ...orchestrator.committed };
      storeCounts = orchestrator.storeCounts;
    }
    const kind = error instanceof PipelineError ? error.kind : 'Unexpected';
    logger.error(`Run failed during ${stage} (${kind}): ${errorMessage(error)}`);
    return finish('Failed', { kind, message: errorMessage(error) });
  }
}
