import { DuplicateFactKeyError } from '../errors.js';
import { VARCHAR_LIMITS } from '../store/schema.js';
import type { FlatRecord, KeyReference, PurchaseRow } from '../types.js';
import { readDecimal, readInteger, readText, readYesNo, type DecimalBounds } from './fields.js';

/** numeric(10,2) */
export const AMOUNT_BOUNDS: DecimalBounds = { minCents: 0, maxCents: 9_999_999_999 };
/** numeric(3,2), ratings run 0 to 5 */
export const RATING_BOUNDS: DecimalBounds = { minCents: 0, maxCents: 500 };

/**
 * Projects flat records onto Fact_Purchase rows. One builder lives for one
 * run: it remembers every transaction id it has accepted so a repeat is
 * rejected as DuplicateFactKey.
 */
export class FactBuilder {
  private readonly seen = new Set<number>();

  build(record: FlatRecord, ref: KeyReference, recordIndex: number): PurchaseRow {
    const transactionId = readInteger(record, 'purchase_transaction_id', `record ${recordIndex}`, { required: true });
    const key = String(transactionId);
    if (this.seen.has(transactionId)) {
      throw new DuplicateFactKeyError(transactionId);
    }

    const row: PurchaseRow = {
      purchase_transaction_id: transactionId,
      customer_id: ref.customerId,
      item_name: ref.itemName,
      category: ref.category,
      purchase_amount_usd: readDecimal(record, 'purchase_amount_usd', key, { ...AMOUNT_BOUNDS, required: true }),
      review_rating: readDecimal(record, 'review_rating', key, RATING_BOUNDS),
      payment_method: readText(record, 'payment_method', key, VARCHAR_LIMITS.payment_method),
      shipping_type: readText(record, 'shipping_type', key, VARCHAR_LIMITS.shipping_type),
      discount_applied: readYesNo(record, 'discount_applied', key),
      promo_code_used: readYesNo(record, 'promo_code_used', key),
      previous_purchases: readInteger(record, 'previous_purchases', key, { required: true }),
      preferred_payment_method: readText(record, 'preferred_payment_method', key, VARCHAR_LIMITS.preferred_payment_method),
    };

    this.seen.add(transactionId);
    return row;
  }

  get acceptedCount(): number {
    return this.seen.size;
  }
}
