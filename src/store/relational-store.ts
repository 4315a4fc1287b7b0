import type { TableName, TableRows } from '../types.js';

/**
 * What the load orchestrator needs from a relational store. Implementations
 * enforce the primary and foreign keys declared in `./schema.ts`.
 */
export interface RelationalStore {
  createSchemaIfAbsent(): Promise<void>;
  /**
   * Insert-or-replace one batch keyed on the table's primary key. The batch
   * commits as a unit or not at all. Resolves to the number of rows written.
   */
  upsertRows<T extends TableName>(table: T, rows: readonly TableRows[T][]): Promise<number>;
  rowCount(table: TableName): Promise<number>;
  /** Empties all three tables in one transaction, facts first. */
  clearTables(): Promise<void>;
  /** Releases the underlying connection. Safe to call more than once. */
  close(): Promise<void>;
}

/** Acquires the single store connection a run works through. */
export type StoreConnector = () => Promise<RelationalStore>;
