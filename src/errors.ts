export class HttpError extends Error {
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(statusCode: number, message: string, details?: unknown) {
    super(message);
    this.statusCode = statusCode;
    this.details = details;
  }
}

export function notFound(message = 'not found'): HttpError {
  return new HttpError(404, message);
}

export function badRequest(message: string, details?: unknown): HttpError {
  return new HttpError(400, message, details);
}

export function unauthorized(message = 'unauthorized'): HttpError {
  return new HttpError(401, message);
}

export function forbidden(message = 'forbidden'): HttpError {
  return new HttpError(403, message);
}

export type RecordErrorKind = 'ValidationError' | 'DuplicateFactKey' | 'MissingDimensionReference';

export type RunErrorKind =
  | 'ConsistencyViolation'
  | 'StoreUnavailable'
  | 'CommitFailure'
  | 'Reconciliation'
  | 'RunAborted';

export type PipelineErrorKind = RecordErrorKind | RunErrorKind;

export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;
  /** Natural or primary key of the offending entity, rendered for reports. */
  readonly key: string;

  constructor(key: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.key = key;
    this.name = new.target.name;
  }
}

/** Malformed or out-of-range field on a single record. */
export class ValidationError extends PipelineError {
  readonly kind = 'ValidationError';
  readonly field: string;

  constructor(key: string, field: string, message: string) {
    super(key, `${field}: ${message}`);
    this.field = field;
  }
}

export class DuplicateFactKeyError extends PipelineError {
  readonly kind = 'DuplicateFactKey';

  constructor(transactionId: number) {
    super(String(transactionId), `purchase_transaction_id ${transactionId} already seen in this run`);
  }
}

export class MissingDimensionReferenceError extends PipelineError {
  readonly kind = 'MissingDimensionReference';
  readonly dimension: 'Dim_Customer' | 'Dim_Item';

  constructor(dimension: 'Dim_Customer' | 'Dim_Item', key: string) {
    super(key, `${dimension} has no row for key ${key}`);
    this.dimension = dimension;
  }
}

export class ConsistencyViolationError extends PipelineError {
  readonly kind = 'ConsistencyViolation';
  readonly dimension: 'Dim_Customer' | 'Dim_Item';
  readonly field: string;
  readonly recordIndex: number;

  constructor(
    dimension: 'Dim_Customer' | 'Dim_Item',
    key: string,
    field: string,
    previous: unknown,
    next: unknown,
    recordIndex: number
  ) {
    super(
      key,
      `${dimension} ${key}: ${field} is ${JSON.stringify(previous)} but record ${recordIndex} has ${JSON.stringify(next)}`
    );
    this.dimension = dimension;
    this.field = field;
    this.recordIndex = recordIndex;
  }
}

export class StoreUnavailableError extends PipelineError {
  readonly kind = 'StoreUnavailable';

  constructor(message: string, cause?: unknown) {
    super('store', message, { cause });
  }
}

export class CommitFailureError extends PipelineError {
  readonly kind = 'CommitFailure';
  readonly table: string;
  readonly batch: number;

  constructor(table: string, batch: number, message: string, cause?: unknown) {
    super(`${table}#${batch}`, `${table} batch ${batch} failed: ${message}`, { cause });
    this.table = table;
    this.batch = batch;
  }
}

export class ReconciliationError extends PipelineError {
  readonly kind = 'Reconciliation';

  constructor(table: string, committed: number, stored: number) {
    super(table, `${table} committed ${committed} rows but store reports ${stored}`);
  }
}

export class RunAbortedError extends PipelineError {
  readonly kind = 'RunAborted';

  constructor(reason = 'run aborted') {
    super('run', reason);
  }
}

export function isRecordError(error: unknown): error is ValidationError | DuplicateFactKeyError | MissingDimensionReferenceError {
  return (
    error instanceof ValidationError ||
    error instanceof DuplicateFactKeyError ||
    error instanceof MissingDimensionReferenceError
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
