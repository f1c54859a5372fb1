/** Machine-readable codes carried by conversion errors. */
export type ConversionErrorCode = 'CONFIG_CONFLICT' | 'DESTINATION_COLLISION' | 'INFERENCE_FAILED' | 'ROW_DECODE_FAILED';

/** Base class for failures raised by the converter itself (as opposed to Node I/O errors). */
export abstract class ConversionError extends Error {
  abstract readonly code: ConversionErrorCode;
}

/** Type directives contradict each other. Raised before any file is touched. */
export class ConfigConflictError extends ConversionError {
  readonly code = 'CONFIG_CONFLICT';
  readonly name = 'ConfigConflictError';

  /** Column named more than once, when the conflict is about a column rather than a default. */
  readonly column?: string;

  constructor(message: string, column?: string) {
    super(message);
    this.column = column;
  }
}

/** The staging file appeared between the existence check and the exclusive create. */
export class DestinationCollisionError extends ConversionError {
  readonly code = 'DESTINATION_COLLISION';
  readonly name = 'DestinationCollisionError';
  readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    super(`${path} already exists`, options);
    this.path = path;
  }
}

/** The sampled prefix of a CSV source is malformed. */
export class InferenceError extends ConversionError {
  readonly code = 'INFERENCE_FAILED';
  readonly name = 'InferenceError';
  /** One-based record number of the offending row, header included. */
  readonly row: number;

  constructor(message: string, row: number) {
    super(`row ${String(row)}: ${message}`);
    this.row = row;
  }
}

/** A row on the second pass cannot be decoded with the final schema. */
export class RowDecodeError extends ConversionError {
  readonly code = 'ROW_DECODE_FAILED';
  readonly name = 'RowDecodeError';
  /** One-based record number of the offending row, header included. */
  readonly row: number;
  readonly column?: string;

  constructor(message: string, row: number, column?: string) {
    super(column === undefined ? `row ${String(row)}: ${message}` : `row ${String(row)}, column \`${column}': ${message}`);
    this.row = row;
    this.column = column;
  }
}

/** Normalise anything thrown into an `Error`. */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
