import type { Pool, PoolClient } from 'pg';
import { withTransaction } from '../db.js';
import { StoreUnavailableError, errorMessage } from '../errors.js';
import type { TableName, TableRows } from '../types.js';
import type { RelationalStore, StoreConnector } from './relational-store.js';
import { CREATE_TABLE_STATEMENTS, PRIMARY_KEYS, TABLE_COLUMNS } from './schema.js';

export type PgStoreOptions = {
  /** Applied as `statement_timeout` inside every write transaction. */
  statementTimeoutMs: number;
};

export function buildUpsertStatement<T extends TableName>(
  table: T,
  rows: readonly TableRows[T][]
): { text: string; values: unknown[] } {
  const columns = TABLE_COLUMNS[table];
  const keys: readonly string[] = PRIMARY_KEYS[table];
  const values: unknown[] = [];
  const tuples = rows.map((row) => {
    const placeholders = columns.map((column) => {
      values.push(row[column]);
      return `$${values.length}`;
    });
    return `(${placeholders.join(', ')})`;
  });
  const updates = columns
    .filter((column) => !keys.includes(column))
    .map((column) => `${column} = excluded.${column}`);

  const text = `insert into ${table} (${columns.join(', ')})
     values ${tuples.join(', ')}
     on conflict (${keys.join(', ')}) do update set
       ${updates.join(',\n       ')}`;
  return { text, values };
}

export class PgStore implements RelationalStore {
  private client: PoolClient | null;
  /** Writes still running; set when a batch outlives the caller's timeout. */
  private inFlight = 0;

  private constructor(
    client: PoolClient,
    private readonly options: PgStoreOptions
  ) {
    this.client = client;
  }

  static async connect(pool: Pool, options: PgStoreOptions): Promise<PgStore> {
    let client: PoolClient;
    try {
      client = await pool.connect();
    } catch (error) {
      throw new StoreUnavailableError(`could not connect to PostgreSQL: ${errorMessage(error)}`, error);
    }
    return new PgStore(client, options);
  }

  private get connection(): PoolClient {
    if (!this.client) {
      throw new StoreUnavailableError('store connection already released');
    }
    return this.client;
  }

  async createSchemaIfAbsent(): Promise<void> {
    await withTransaction(async (client) => {
      for (const statement of CREATE_TABLE_STATEMENTS) {
        await client.query(statement);
      }
    }, this.connection);
  }

  async upsertRows<T extends TableName>(table: T, rows: readonly TableRows[T][]): Promise<number> {
    if (!rows.length) return 0;
    const { text, values } = buildUpsertStatement(table, rows);
    this.inFlight += 1;
    try {
      await withTransaction(async (client) => {
        await client.query(`select set_config('statement_timeout', $1, true)`, [String(this.options.statementTimeoutMs)]);
        await client.query(text, values);
      }, this.connection);
    } finally {
      this.inFlight -= 1;
    }
    return rows.length;
  }

  async rowCount(table: TableName): Promise<number> {
    const { rows } = await this.connection.query<{ count: string }>(`select count(*) as count from ${table}`);
    return Number(rows[0]?.count ?? 0);
  }

  async clearTables(): Promise<void> {
    await withTransaction(async (client) => {
      await client.query('truncate Fact_Purchase, Dim_Item, Dim_Customer');
    }, this.connection);
  }

  async close(): Promise<void> {
    if (!this.client) return;
    const client = this.client;
    this.client = null;
    // a connection with a query still running must not go back to the pool
    client.release(this.inFlight > 0);
  }
}

export function pgStoreConnector(pool: Pool, options: PgStoreOptions): StoreConnector {
  return () => PgStore.connect(pool, options);
}
