/**
 * Import error taxonomy.
 *
 * None of these escape the orchestrator: each is caught and recorded on the
 * ImportReport, either as the top-level error or against a single row.
 */

export type ImportErrorCode =
  | 'CLASSIFICATION_FAILURE'
  | 'DECODE_FAILURE'
  /** Row skipped before matching: no title, or a report trailer line */
  | 'ROW_INVALID'
  | 'STORE_WRITE_FAILURE'
  | 'DUPLICATE_KEY_CONFLICT';

export class ImportError extends Error {
  readonly code: ImportErrorCode;

  constructor(code: ImportErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ImportError';
    this.code = code;
  }
}

/** The file is neither a listing export nor an order export. */
export class ClassificationFailure extends ImportError {
  constructor(message: string, code: ImportErrorCode = 'CLASSIFICATION_FAILURE') {
    super(code, message);
    this.name = 'ClassificationFailure';
  }
}

/** Neither encoding produced usable text. */
export class DecodeFailure extends ClassificationFailure {
  constructor(message: string) {
    super(message, 'DECODE_FAILURE');
    this.name = 'DecodeFailure';
  }
}

export class StoreWriteFailure extends ImportError {
  constructor(message: string, cause?: unknown) {
    super('STORE_WRITE_FAILURE', message, cause === undefined ? undefined : { cause });
    this.name = 'StoreWriteFailure';
  }
}

/** The store holds more than one item for a key that must be unique. */
export class DuplicateKeyConflict extends ImportError {
  readonly key: string;
  readonly value: string;
  readonly itemIds: number[];

  constructor(key: string, value: string, itemIds: number[]) {
    super('DUPLICATE_KEY_CONFLICT', `duplicate ${key} in store`);
    this.name = 'DuplicateKeyConflict';
    this.key = key;
    this.value = value;
    this.itemIds = itemIds;
  }
}
