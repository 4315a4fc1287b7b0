import type { LoadMode } from '../config.js';
import {
  CommitFailureError,
  PipelineError,
  ReconciliationError,
  RunAbortedError,
  StoreUnavailableError,
  errorMessage,
} from '../errors.js';
import type { RelationalStore } from '../store/relational-store.js';
import {
  LOAD_ORDER,
  emptyCounts,
  type CustomerRow,
  type ItemRow,
  type PurchaseRow,
  type TableCounts,
  type TableName,
  type TableRows,
} from '../types.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';

export type LoadPlan = {
  customers: readonly CustomerRow[];
  items: readonly ItemRow[];
  facts: readonly PurchaseRow[];
};

export type LoadPhase = 'LoadingDimensions' | 'LoadingFacts';

export type LoadOptions = {
  batchSize: number;
  batchTimeoutMs: number;
  loadMode: LoadMode;
  signal?: AbortSignal;
  logger?: Logger;
  onPhase?: (phase: LoadPhase) => void;
};

export function chunk<T>(rows: readonly T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let index = 0; index < rows.length; index += size) {
    batches.push(rows.slice(index, index + size));
  }
  return batches;
}

/**
 * Writes a star schema in two phases: every dimension batch commits before
 * the first fact batch is issued, so foreign keys hold on a cold store.
 * Writes are upserts on the primary key and each batch is its own
 * transaction; a failure leaves only whole committed batches behind.
 */
export class LoadOrchestrator {
  /** Rows committed so far in this run, per table. */
  readonly committed: TableCounts = emptyCounts();
  /** Counts read back from the store once loading finished. */
  storeCounts: TableCounts | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly store: RelationalStore,
    private readonly options: LoadOptions
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  /** Loads the plan and resolves to the row counts the store reports afterwards. */
  async load(plan: LoadPlan): Promise<TableCounts> {
    await this.prepare();

    this.options.onPhase?.('LoadingDimensions');
    await this.writeTable('Dim_Customer', plan.customers);
    await this.writeTable('Dim_Item', plan.items);

    this.options.onPhase?.('LoadingFacts');
    await this.writeTable('Fact_Purchase', plan.facts);

    return this.reconcile();
  }

  private async prepare(): Promise<void> {
    try {
      await this.store.createSchemaIfAbsent();
      if (this.options.loadMode === 'replace') {
        this.logger.info('Load mode replace: clearing Fact_Purchase, Dim_Item and Dim_Customer');
        await this.store.clearTables();
      }
    } catch (error) {
      if (error instanceof PipelineError) throw error;
      throw new StoreUnavailableError(`could not prepare schema: ${errorMessage(error)}`, error);
    }
  }

  private async writeTable<T extends TableName>(table: T, rows: readonly TableRows[T][]): Promise<void> {
    const batches = chunk(rows, this.options.batchSize);
    this.logger.info(`Loading ${rows.length} rows into ${table} in ${batches.length} batch(es)`);

    for (const [index, batch] of batches.entries()) {
      if (this.options.signal?.aborted) {
        throw new RunAbortedError(`aborted before ${table} batch ${index + 1}`);
      }
      let written: number;
      try {
        written = await withTimeout(
          this.store.upsertRows(table, batch),
          this.options.batchTimeoutMs,
          `commit did not finish within ${this.options.batchTimeoutMs}ms`,
          (late) => this.logger.warn(`${table} batch ${index + 1} failed after its timeout: ${errorMessage(late)}`)
        );
      } catch (error) {
        throw new CommitFailureError(table, index + 1, errorMessage(error), error);
      }
      this.committed[table] += written;
    }
  }

  private async reconcile(): Promise<TableCounts> {
    const storeCounts = emptyCounts();
    for (const table of LOAD_ORDER) {
      try {
        storeCounts[table] = await this.store.rowCount(table);
      } catch (error) {
        throw new StoreUnavailableError(`could not count ${table}: ${errorMessage(error)}`, error);
      }
    }
    this.storeCounts = storeCounts;
    for (const table of LOAD_ORDER) {
      if (storeCounts[table] !== this.committed[table]) {
        throw new ReconciliationError(table, this.committed[table], storeCounts[table]);
      }
    }
    return storeCounts;
  }
}
