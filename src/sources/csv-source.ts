import { constants, createReadStream } from 'node:fs';
import { access } from 'node:fs/promises';
import { createInterface } from 'node:readline';
import { FLAT_FIELDS, type FlatField, type FlatRecord } from '../types.js';

const HEADER_ALIASES: Record<string, FlatField> = {
  item_purchased: 'item_name',
};

const FIELD_NAMES: ReadonlySet<string> = new Set(FLAT_FIELDS);

function isFlatField(value: string): value is FlatField {
  return FIELD_NAMES.has(value);
}

/**
 * `Purchase Amount (USD)` becomes `purchase_amount_usd`, `Item Purchased`
 * becomes `item_name`. Returns null for columns the pipeline does not read.
 */
export function normalizeHeader(header: string): FlatField | null {
  const snake = header
    .replace(/^\uFEFF/, '')
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9_]+/g, '_')
    .replace(/^_+|_+$/g, '');
  const name = HEADER_ALIASES[snake] ?? snake;
  return isFlatField(name) ? name : null;
}

/** Splits one CSV record. Quoted fields may contain commas, doubled quotes and newlines. */
export function parseCsvLine(line: string): string[] {
  const fields: string[] = [];
  let current = '';
  let quoted = false;
  for (let index = 0; index < line.length; index += 1) {
    const char = line[index];
    if (quoted) {
      if (char === '"' && line[index + 1] === '"') {
        current += '"';
        index += 1;
      } else if (char === '"') {
        quoted = false;
      } else {
        current += char;
      }
    } else if (char === '"') {
      quoted = true;
    } else if (char === ',') {
      fields.push(current);
      current = '';
    } else {
      current += char;
    }
  }
  fields.push(current);
  return fields;
}

function hasOpenQuote(text: string): boolean {
  let count = 0;
  for (const char of text) {
    if (char === '"') count += 1;
  }
  return count % 2 === 1;
}

/**
 * Turns a stream of physical lines into flat records. When the header has no
 * `purchase_transaction_id` column, each record gets its 0-based data row index.
 */
export async function* parseCsvRecords(lines: AsyncIterable<string> | Iterable<string>): AsyncGenerator<FlatRecord> {
  let columns: Array<FlatField | null> | null = null;
  let assignTransactionId = false;
  let pending = '';
  let rowIndex = 0;

  for await (const line of lines) {
    pending = pending ? `${pending}\n${line}` : line;
    if (hasOpenQuote(pending)) continue;
    const text = pending;
    pending = '';
    if (!text.trim()) continue;

    const values = parseCsvLine(text);
    if (!columns) {
      columns = values.map(normalizeHeader);
      assignTransactionId = !columns.includes('purchase_transaction_id');
      continue;
    }

    const record: FlatRecord = {};
    columns.forEach((column, index) => {
      if (column) record[column] = values[index] ?? null;
    });
    if (assignTransactionId) {
      record.purchase_transaction_id = String(rowIndex);
    }
    rowIndex += 1;
    yield record;
  }

  if (pending.trim()) {
    throw new Error('CSV ends inside a quoted field');
  }
}

/** Lazy, single-pass record source over a CSV file. */
export async function* readCsvRecords(filePath: string): AsyncGenerator<FlatRecord> {
  await access(filePath, constants.R_OK);
  const input = createReadStream(filePath, { encoding: 'utf8' });
  const lines = createInterface({ input, crlfDelay: Infinity });
  try {
    yield* parseCsvRecords(lines);
  } finally {
    lines.close();
    input.destroy();
  }
}
