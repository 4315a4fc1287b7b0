import type { PipelineConfig } from '../config.js';
import { errorMessage } from '../errors.js';
import type { StoreConnector } from '../store/relational-store.js';
import type { RecordSource } from '../types.js';
import { createLogger, type LogEntry } from '../utils/logger.js';
import { runPipeline } from './pipeline-runner.js';
import type { QueuedRun, RunHistory } from './run-history.js';

export type RunQueueDeps = {
  history: RunHistory;
  connect: StoreConnector;
  pipeline: PipelineConfig;
  openSource: (sourcePath: string) => RecordSource;
};

/**
 * Runs queued pipeline runs one at a time, in the order they were accepted.
 * Status, report and log lines are written to the run history.
 */
export class RunQueue {
  private readonly jobs: QueuedRun[] = [];
  /** Ids ever taken into this queue; a run is never started twice. */
  private readonly seen = new Set<string>();
  private processing: Promise<void> | null = null;
  private initialized = false;

  constructor(private readonly deps: RunQueueDeps) {}

  async initialize(): Promise<void> {
    if (this.initialized) return;
    this.initialized = true;
    await this.deps.history.ensureSchema();
    const queued = await this.deps.history.recoverQueued();
    if (queued.length) {
      console.log(`[etl] resuming ${queued.length} queued run(s)`);
      queued.forEach((job) => this.accept(job));
      this.kick();
    }
  }

  async enqueue(sourcePath: string): Promise<string> {
    const id = await this.deps.history.create(sourcePath);
    this.accept({ id, sourcePath });
    this.kick();
    return id;
  }

  /** Resolves once the queue has drained. */
  async idle(): Promise<void> {
    while (this.processing) {
      await this.processing;
    }
  }

  private accept(job: QueuedRun): void {
    if (this.seen.has(job.id)) return;
    this.seen.add(job.id);
    this.jobs.push(job);
  }

  private kick(): void {
    if (this.processing) return;
    this.processing = this.processQueue().finally(() => {
      this.processing = null;
    });
  }

  private async processQueue(): Promise<void> {
    while (this.jobs.length) {
      const job = this.jobs.shift();
      if (!job) continue;
      try {
        await this.runJob(job);
      } catch (error) {
        const message = errorMessage(error);
        console.error(`[etl] run ${job.id} failed: ${message}`);
        await this.deps.history.markFailed(job.id, message).catch((markError: unknown) => {
          console.error(`[etl] could not record failure of run ${job.id}: ${errorMessage(markError)}`);
        });
      }
    }
  }

  private async runJob(job: QueuedRun): Promise<void> {
    const { history } = this.deps;
    const entries: LogEntry[] = [];
    const logger = createLogger(`etl ${job.id.slice(0, 8)}`, (entry) => entries.push(entry));

    await history.markRunning(job.id);
    logger.info(`Reading records from ${job.sourcePath}`);
    try {
      const report = await runPipeline(this.deps.openSource(job.sourcePath), this.deps.connect, {
        ...this.deps.pipeline,
        logger,
      });
      await history.markFinished(job.id, report);
    } finally {
      // log rows are best-effort; the run's status stands without them
      await history.appendLogs(job.id, entries).catch((logError: unknown) => {
        console.error(`[etl] could not store log of run ${job.id}: ${errorMessage(logError)}`);
      });
    }
  }
}
