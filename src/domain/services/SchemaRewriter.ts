import type { ColumnField, ColumnSchema } from '../model/ColumnSchema.js';
import { GENERIC_FLOAT_TYPE, GENERIC_INT_TYPE } from '../model/ColumnType.js';
import type { ConsolidatedTypes } from '../model/TypeDirectives.js';

/**
 * Apply consolidated directives to an inferred schema.
 *
 * An exact-name override wins. Otherwise the generic `int64` and `float64`
 * placeholders take the category defaults, and every other type passes
 * through. Order and nullability are kept.
 */
export function rewriteSchema(schema: ColumnSchema, types: ConsolidatedTypes): ColumnSchema {
  const fields = schema.fields.map((field): ColumnField => {
    const override = types.overrides.get(field.name);
    if (override !== undefined) {
      return { ...field, type: override };
    }
    switch (field.type) {
      case GENERIC_INT_TYPE:
        return { ...field, type: types.defaults.int };
      case GENERIC_FLOAT_TYPE:
        return { ...field, type: types.defaults.float };
      default:
        return field;
    }
  });
  return { fields };
}
