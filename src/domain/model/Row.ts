/** A decoded cell. Empty CSV fields decode to `null`; `int64` cells decode to `bigint`. */
export type CellValue = string | number | bigint | boolean | Date | null;

/** A decoded row keyed by column name. */
export interface ParsedRow {
  readonly [column: string]: CellValue;
}

/** Consecutive rows decoded together and handed to the writer in one call. */
export type RowBatch = readonly ParsedRow[];
