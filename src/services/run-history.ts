import { query, withTransaction } from '../db.js';
import type { RunReport } from '../types.js';
import type { LogEntry, LogLevel } from '../utils/logger.js';

export type RunStatus = 'queued' | 'running' | 'completed' | 'failed';

export type QueuedRun = {
  id: string;
  sourcePath: string;
};

export type RunRecord = {
  id: string;
  sourcePath: string;
  status: RunStatus;
  createdAt: string;
  startedAt: string | null;
  finishedAt: string | null;
  report: RunReport | null;
  error: string | null;
  logs: LogEntry[];
};

/** Where queued and finished runs are kept. */
export interface RunHistory {
  ensureSchema(): Promise<void>;
  create(sourcePath: string): Promise<string>;
  markRunning(id: string): Promise<void>;
  markFinished(id: string, report: RunReport): Promise<void>;
  markFailed(id: string, message: string): Promise<void>;
  appendLogs(id: string, entries: readonly LogEntry[]): Promise<void>;
  /** Puts runs interrupted by a restart back in the queue and lists everything queued. */
  recoverQueued(): Promise<QueuedRun[]>;
  get(id: string): Promise<RunRecord | null>;
}

type RunRow = {
  id: string;
  source_path: string;
  status: RunStatus;
  created_at: Date;
  started_at: Date | null;
  finished_at: Date | null;
  report: RunReport | null;
  error_message: string | null;
};

type LogRow = {
  level: LogLevel;
  message: string;
  created_at: Date;
};

function iso(value: Date | null): string | null {
  return value ? value.toISOString() : null;
}

export class PgRunHistory implements RunHistory {
  async ensureSchema(): Promise<void> {
    await query(`create extension if not exists pgcrypto`);
    await query(`
      create table if not exists etl_run (
        id uuid primary key default gen_random_uuid(),
        source_path text not null,
        status text not null default 'queued' check (status in ('queued','running','completed','failed')),
        created_at timestamptz not null default now(),
        started_at timestamptz,
        finished_at timestamptz,
        report jsonb,
        error_message text
      )
    `);
    await query(`
      create table if not exists etl_run_log (
        id bigserial primary key,
        run_id uuid not null references etl_run(id) on delete cascade,
        level text not null default 'info',
        message text not null,
        created_at timestamptz not null default now()
      )
    `);
    await query(`create index if not exists idx_etl_run_status on etl_run(status)`);
    await query(`create index if not exists idx_etl_run_log_run on etl_run_log(run_id, created_at)`);
  }

  async create(sourcePath: string): Promise<string> {
    const { rows } = await query<{ id: string }>(
      `insert into etl_run (source_path, status) values ($1, 'queued') returning id`,
      [sourcePath]
    );
    return rows[0].id;
  }

  async markRunning(id: string): Promise<void> {
    await query(`update etl_run set status = 'running', started_at = now() where id = $1`, [id]);
  }

  async markFinished(id: string, report: RunReport): Promise<void> {
    await query(
      `update etl_run
       set status = $2, finished_at = now(), report = $3::jsonb, error_message = $4
       where id = $1`,
      [id, report.status === 'Completed' ? 'completed' : 'failed', JSON.stringify(report), report.error?.message ?? null]
    );
  }

  async markFailed(id: string, message: string): Promise<void> {
    await query(`update etl_run set status = 'failed', finished_at = now(), error_message = $2 where id = $1`, [
      id,
      message,
    ]);
  }

  async appendLogs(id: string, entries: readonly LogEntry[]): Promise<void> {
    if (!entries.length) return;
    await withTransaction(async (client) => {
      for (const entry of entries) {
        await query(
          `insert into etl_run_log (run_id, level, message, created_at) values ($1, $2, $3, $4)`,
          [id, entry.level, entry.message, entry.createdAt],
          client
        );
      }
    });
  }

  async recoverQueued(): Promise<QueuedRun[]> {
    await query(`update etl_run set status = 'queued', started_at = null where status = 'running'`);
    const { rows } = await query<{ id: string; source_path: string }>(
      `select id, source_path from etl_run where status = 'queued' order by created_at`
    );
    return rows.map((row) => ({ id: row.id, sourcePath: row.source_path }));
  }

  async get(id: string): Promise<RunRecord | null> {
    const { rows } = await query<RunRow>(
      `select id, source_path, status, created_at, started_at, finished_at, report, error_message
       from etl_run where id = $1`,
      [id]
    );
    const record = rows[0];
    if (!record) return null;

    const logRows = await query<LogRow>(
      `select level, message, created_at from etl_run_log where run_id = $1 order by id`,
      [id]
    );

    return {
      id: record.id,
      sourcePath: record.source_path,
      status: record.status,
      createdAt: record.created_at.toISOString(),
      startedAt: iso(record.started_at),
      finishedAt: iso(record.finished_at),
      report: record.report,
      error: record.error_message,
      logs: logRows.rows.map((log) => ({
        level: log.level,
        message: log.message,
        createdAt: log.created_at.toISOString(),
      })),
    };
  }
}
