import type { NumericType } from '../model/ColumnType.js';
import { DEFAULT_FLOAT_TYPE, DEFAULT_INT_TYPE } from '../model/ColumnType.js';
import type { ConsolidatedTypes, TypeDirectives } from '../model/TypeDirectives.js';
import { isWildcard } from '../model/TypeDirectives.js';
import { ConfigConflictError } from '../errors/ConversionErrors.js';

/** Lists in the order they are applied. Only the first one may repeat a column name. */
const PROCESSING_ORDER: readonly (keyof TypeDirectives & NumericType)[] = ['int32', 'int64', 'float32', 'float64'];

/**
 * Merge the four directive lists into one override map and the two category defaults.
 *
 * A wildcard (`*` or `__all__`) sets the default for its category. Giving a
 * wildcard in both integer lists, or in both float lists, is a conflict.
 *
 * Names in `int32` are inserted unconditionally, so repeating a name there is
 * harmless. Every later list rejects a name that is already mapped, whichever
 * list mapped it.
 */
export function consolidateTypes(directives: TypeDirectives): ConsolidatedTypes {
  const overrides = new Map<string, NumericType>();
  let defaultInt = DEFAULT_INT_TYPE;
  let defaultFloat = DEFAULT_FLOAT_TYPE;

  if (PROCESSING_ORDER.every((type) => (directives[type] ?? []).length === 0)) {
    return { overrides, defaults: { int: defaultInt, float: defaultFloat } };
  }

  const hasWildcard = (type: NumericType): boolean => (directives[type] ?? []).some(isWildcard);

  if (hasWildcard('int32') && hasWildcard('int64')) {
    throw new ConfigConflictError("int32 and int64 can't both be the default type for integers");
  }
  if (hasWildcard('float32') && hasWildcard('float64')) {
    throw new ConfigConflictError("float32 and float64 can't both be the default type for floats");
  }

  for (const [position, type] of PROCESSING_ORDER.entries()) {
    for (const column of directives[type] ?? []) {
      if (isWildcard(column)) {
        if (type === 'int32' || type === 'int64') {
          defaultInt = type;
        } else {
          defaultFloat = type;
        }
        continue;
      }

      if (position > 0 && overrides.has(column)) {
        throw new ConfigConflictError(`Data type for column \`${column}' was specified multiple times`, column);
      }
      overrides.set(column, type);
    }
  }

  return { overrides, defaults: { int: defaultInt, float: defaultFloat } };
}

/** Human-readable rendering of consolidated directives, for debug logging. */
export function describeTypes(types: ConsolidatedTypes): string {
  const columns = [...types.overrides].map(([column, type]) => `${column}=${type}`);
  const explicit = columns.length > 0 ? columns.join(', ') : 'none';
  return `overrides: ${explicit}; default int: ${types.defaults.int}; default float: ${types.defaults.float}`;
}
