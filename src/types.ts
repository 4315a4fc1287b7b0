import type { PipelineErrorKind, RecordErrorKind } from './errors.js';

export const FLAT_FIELDS = [
  'purchase_transaction_id',
  'customer_id',
  'age',
  'gender',
  'location',
  'subscription_status',
  'frequency_of_purchases',
  'item_name',
  'category',
  'size',
  'color',
  'season',
  'purchase_amount_usd',
  'review_rating',
  'payment_method',
  'shipping_type',
  'discount_applied',
  'promo_code_used',
  'previous_purchases',
  'preferred_payment_method',
] as const;

export type FlatField = (typeof FLAT_FIELDS)[number];

/** One row of the denormalized source, field values as read. */
export type FlatRecord = Partial<Record<FlatField, string | null>>;

export type RecordSource = AsyncIterable<FlatRecord> | Iterable<FlatRecord>;

export type CustomerRow = {
  customer_id: number;
  age: number | null;
  gender: string | null;
  location: string | null;
  subscription_status: string | null;
  frequency_of_purchases: string | null;
};

export type ItemRow = {
  item_name: string;
  category: string;
  size: string | null;
  color: string | null;
  season: string | null;
};

export type YesNo = 'Yes' | 'No';

export type PurchaseRow = {
  purchase_transaction_id: number;
  customer_id: number;
  item_name: string;
  category: string;
  purchase_amount_usd: string;
  review_rating: string | null;
  payment_method: string | null;
  shipping_type: string | null;
  discount_applied: YesNo;
  promo_code_used: YesNo;
  previous_purchases: number;
  preferred_payment_method: string | null;
};

export type TableRows = {
  Dim_Customer: CustomerRow;
  Dim_Item: ItemRow;
  Fact_Purchase: PurchaseRow;
};

export type TableName = keyof TableRows;

/** Dimensions first: the order rows must be written in. */
export const LOAD_ORDER: readonly TableName[] = ['Dim_Customer', 'Dim_Item', 'Fact_Purchase'];

export type TableCounts = Record<TableName, number>;

export type KeyReference = {
  customerId: number;
  itemName: string;
  category: string;
};

export type Rejection = {
  kind: RecordErrorKind;
  key: string;
  reason: string;
  recordIndex: number;
};

export type RunStage =
  | 'NotStarted'
  | 'Extracting'
  | 'Resolving'
  | 'Building'
  | 'LoadingDimensions'
  | 'LoadingFacts'
  | 'Completed'
  | 'Failed';

export type RunReport = {
  status: 'Completed' | 'Failed';
  /** Last stage entered; for a failed run, the stage that failed. */
  stage: RunStage;
  totalRecords: number;
  counts: TableCounts;
  storeCounts: TableCounts | null;
  rejections: Rejection[];
  warnings: string[];
  error: { kind: PipelineErrorKind | 'Unexpected'; message: string } | null;
  startedAt: string;
  finishedAt: string;
};

export function emptyCounts(): TableCounts {
  return { Dim_Customer: 0, Dim_Item: 0, Fact_Purchase: 0 };
}
