import type { FloatType, IntegerType, NumericType } from './ColumnType.js';

/** Column names (or a wildcard) requested for each numeric type. */
export interface TypeDirectives {
  readonly int32?: readonly string[];
  readonly int64?: readonly string[];
  readonly float32?: readonly string[];
  readonly float64?: readonly string[];
}

/** Directive values meaning "make this type the category default" instead of naming a column. */
export const WILDCARD_SENTINELS: readonly string[] = ['*', '__all__'];

export function isWildcard(name: string): boolean {
  return WILDCARD_SENTINELS.includes(name);
}

/** Explicit per-column types, keyed by exact column name. */
export type TypeOverrides = ReadonlyMap<string, NumericType>;

/** Types applied to inferred numeric columns that have no override. */
export interface DefaultWidths {
  readonly int: IntegerType;
  readonly float: FloatType;
}

/** Consolidated directives, shared read-only by every file of a run. */
export interface ConsolidatedTypes {
  readonly overrides: TypeOverrides;
  readonly defaults: DefaultWidths;
}
