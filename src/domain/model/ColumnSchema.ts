import type { ColumnType } from './ColumnType.js';

/** A single column as read from the CSV header. */
export interface ColumnField {
  /** Header name. Case-sensitive. */
  readonly name: string;
  readonly type: ColumnType;
  readonly nullable: boolean;
}

/** Ordered column list. Field order follows the source header. */
export interface ColumnSchema {
  readonly fields: readonly ColumnField[];
}

/** Result of sampling the first pass of a source. */
export interface InferredSchema {
  readonly schema: ColumnSchema;
  /** Number of data rows (header excluded) that were sampled. */
  readonly sampledRows: number;
  /** Number of decoded bytes consumed while sampling. */
  readonly sampledBytes: number;
}

/** Render a schema as the pretty-printed JSON document used by `--print-schema`. */
export function formatSchema(schema: ColumnSchema): string {
  const document = {
    fields: schema.fields.map((field) => ({
      name: field.name,
      data_type: field.type,
      nullable: field.nullable,
    })),
    metadata: {},
  };
  return JSON.stringify(document, null, 2);
}
