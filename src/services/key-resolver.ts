import { MissingDimensionReferenceError } from '../errors.js';
import type { FlatRecord, KeyReference } from '../types.js';
import { normalizeString } from './fields.js';
import { readCustomerRef, readItemRef, type DimensionSets } from './dimension-extractor.js';

function describeItem(record: FlatRecord): string {
  const name = normalizeString(record.item_name) ?? '<missing>';
  const category = normalizeString(record.category) ?? '<missing>';
  return JSON.stringify([name, category]);
}

/**
 * Resolves the customer and item a fact row must reference. Throws
 * MissingDimensionReferenceError when either key is absent from the record or
 * has no extracted dimension row.
 */
export function resolveKeys(record: FlatRecord, sets: DimensionSets): KeyReference {
  const customerRef = readCustomerRef(record);
  if (!customerRef || !sets.customers.has(customerRef.key)) {
    throw new MissingDimensionReferenceError('Dim_Customer', customerRef?.key ?? normalizeString(record.customer_id) ?? '<missing>');
  }

  const itemRef = readItemRef(record);
  if (!itemRef || !sets.items.has(itemRef.key)) {
    throw new MissingDimensionReferenceError('Dim_Item', itemRef?.key ?? describeItem(record));
  }

  return {
    customerId: customerRef.customerId,
    itemName: itemRef.itemName,
    category: itemRef.category,
  };
}
