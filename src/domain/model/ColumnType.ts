/** Numeric column types a directive may request. */
export type NumericType = 'int32' | 'int64' | 'float32' | 'float64';

/** Integer widths usable as the default for inferred integer columns. */
export type IntegerType = Extract<NumericType, 'int32' | 'int64'>;

/** Float widths usable as the default for inferred float columns. */
export type FloatType = Extract<NumericType, 'float32' | 'float64'>;

/**
 * Logical type of a column.
 *
 * Inference only produces `int64` and `float64` for numbers; the narrower
 * widths appear through overrides and defaults.
 */
export type ColumnType = NumericType | 'boolean' | 'utf8' | 'date' | 'timestamp' | 'null';

/** Type inference assigns to integer columns before any narrowing. */
export const GENERIC_INT_TYPE = 'int64' satisfies IntegerType;

/** Type inference assigns to float columns before any narrowing. */
export const GENERIC_FLOAT_TYPE = 'float64' satisfies FloatType;

/** Built-in default for integer columns without an override. */
export const DEFAULT_INT_TYPE: IntegerType = 'int64';

/** Built-in default for float columns without an override. */
export const DEFAULT_FLOAT_TYPE: FloatType = 'float32';
