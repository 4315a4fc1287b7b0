import type { ConflictPolicy } from '../config.js';
import { ConsistencyViolationError, ValidationError } from '../errors.js';
import { TABLE_COLUMNS, VARCHAR_LIMITS } from '../store/schema.js';
import type { CustomerRow, FlatRecord, ItemRow } from '../types.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { normalizeString, parseInteger, readInteger, readText } from './fields.js';

export type DimensionSets = {
  customers: Map<string, CustomerRow>;
  items: Map<string, ItemRow>;
};

/** Dimension rows a single record describes, as built from its own fields. */
export type RecordDimensions = {
  customer: CustomerRow | null;
  item: ItemRow | null;
};

export type ExtractionResult = DimensionSets & {
  /** Rows built from each record that passed validation, by record index. */
  byRecord: Map<number, RecordDimensions>;
  /** Records whose dimension attributes failed validation, by record index. */
  rejected: Map<number, ValidationError>;
};

export type MergeOptions = {
  conflictPolicy: ConflictPolicy;
  logger?: Logger;
};

export type MergedDimensions = DimensionSets & {
  warnings: string[];
};

export function customerKeyOf(customerId: number): string {
  return String(customerId);
}

export function itemKeyOf(itemName: string, category: string): string {
  return JSON.stringify([itemName, category]);
}

export type CustomerRef = { key: string; customerId: number };
export type ItemRef = { key: string; itemName: string; category: string };

/** Null when the record carries no usable customer identifier. */
export function readCustomerRef(record: FlatRecord): CustomerRef | null {
  const raw = normalizeString(record.customer_id);
  const customerId = raw === null ? null : parseInteger(raw);
  return customerId === null ? null : { key: customerKeyOf(customerId), customerId };
}

/** Null when either half of the (item name, category) key is missing or too long. */
export function readItemRef(record: FlatRecord): ItemRef | null {
  const itemName = normalizeString(record.item_name);
  const category = normalizeString(record.category);
  if (itemName === null || category === null) return null;
  if (itemName.length > VARCHAR_LIMITS.item_name || category.length > VARCHAR_LIMITS.category) return null;
  return { key: itemKeyOf(itemName, category), itemName, category };
}

function buildCustomer(record: FlatRecord, { key, customerId }: CustomerRef): CustomerRow {
  return {
    customer_id: customerId,
    age: readInteger(record, 'age', key, { min: 0 }),
    gender: readText(record, 'gender', key, VARCHAR_LIMITS.gender),
    location: readText(record, 'location', key, VARCHAR_LIMITS.location),
    subscription_status: readText(record, 'subscription_status', key, VARCHAR_LIMITS.subscription_status),
    frequency_of_purchases: readText(record, 'frequency_of_purchases', key, VARCHAR_LIMITS.frequency_of_purchases),
  };
}

function buildItem(record: FlatRecord, { key, itemName, category }: ItemRef): ItemRow {
  return {
    item_name: itemName,
    category,
    size: readText(record, 'size', key, VARCHAR_LIMITS.size),
    color: readText(record, 'color', key, VARCHAR_LIMITS.color),
    season: readText(record, 'season', key, VARCHAR_LIMITS.season),
  };
}

type Merge<T extends CustomerRow | ItemRow> = {
  dimension: 'Dim_Customer' | 'Dim_Item';
  columns: readonly (keyof T & string)[];
  map: Map<string, T>;
  key: string;
  row: T;
  recordIndex: number;
};

/**
 * Builds both dimension sets in one pass, keeping the first occurrence of
 * each natural key, and remembers the rows every record describes. The sets
 * only answer which keys exist; `mergeAccepted` decides the final rows.
 */
export function extractDimensions(records: readonly FlatRecord[]): ExtractionResult {
  const customers = new Map<string, CustomerRow>();
  const items = new Map<string, ItemRow>();
  const byRecord = new Map<number, RecordDimensions>();
  const rejected = new Map<number, ValidationError>();

  records.forEach((record, recordIndex) => {
    const customerRef = readCustomerRef(record);
    const itemRef = readItemRef(record);

    let customer: CustomerRow | null;
    let item: ItemRow | null;
    try {
      customer = customerRef && buildCustomer(record, customerRef);
      item = itemRef && buildItem(record, itemRef);
    } catch (error) {
      if (error instanceof ValidationError) {
        rejected.set(recordIndex, error);
        return;
      }
      throw error;
    }

    byRecord.set(recordIndex, { customer, item });
    if (customerRef && customer && !customers.has(customerRef.key)) customers.set(customerRef.key, customer);
    if (itemRef && item && !items.has(itemRef.key)) items.set(itemRef.key, item);
  });

  return { customers, items, byRecord, rejected };
}

/**
 * Folds the rows of the records that produced a fact, in record order, into
 * the dimension sets to load. The first occurrence of a natural key defines
 * the entity and every later one is compared against it; a disagreement is a
 * consistency violation handled by `conflictPolicy`. Rejected records never
 * reach this step, so they neither change a row nor fail the run.
 */
export function mergeAccepted(
  extraction: ExtractionResult,
  acceptedIndexes: Iterable<number>,
  options: MergeOptions
): MergedDimensions {
  const logger = options.logger ?? silentLogger;
  const customers = new Map<string, CustomerRow>();
  const items = new Map<string, ItemRow>();
  const warnings: string[] = [];

  const merge = <T extends CustomerRow | ItemRow>({ dimension, columns, map, key, row, recordIndex }: Merge<T>) => {
    const existing = map.get(key);
    if (!existing) {
      map.set(key, row);
      return;
    }
    const fields = columns.filter((column) => existing[column] !== row[column]);
    if (!fields.length) return;

    for (const field of fields) {
      const violation = new ConsistencyViolationError(dimension, key, field, existing[field], row[field], recordIndex);
      if (options.conflictPolicy === 'fail') {
        throw violation;
      }
      const warning = `${violation.message}; keeping the later value`;
      warnings.push(warning);
      logger.warn(warning);
    }
    map.set(key, row);
  };

  const ordered = [...acceptedIndexes].sort((a, b) => a - b);
  for (const recordIndex of ordered) {
    const rows = extraction.byRecord.get(recordIndex);
    if (rows?.customer) {
      merge({
        dimension: 'Dim_Customer',
        columns: TABLE_COLUMNS.Dim_Customer,
        map: customers,
        key: customerKeyOf(rows.customer.customer_id),
        row: rows.customer,
        recordIndex,
      });
    }
    if (rows?.item) {
      merge({
        dimension: 'Dim_Item',
        columns: TABLE_COLUMNS.Dim_Item,
        map: items,
        key: itemKeyOf(rows.item.item_name, rows.item.category),
        row: rows.item,
        recordIndex,
      });
    }
  }

  return { customers, items, warnings };
}
