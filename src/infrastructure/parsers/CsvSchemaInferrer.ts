import type { ColumnField, InferredSchema } from '../../domain/model/ColumnSchema.js';
import type { ByteSource } from '../../domain/ports/ByteSource.js';
import type { SchemaInferrer } from '../../domain/ports/SchemaInferrer.js';
import { InferenceError } from '../../domain/errors/ConversionErrors.js';
import type { ValueKind } from './csvValues.js';
import { classifyValue, mergeKinds } from './csvValues.js';
import { readCsvRecords } from './csvRecords.js';

/** Rows sampled from each source to infer its schema. */
export const MAX_READ_RECORDS = 8192;

/**
 * Infers column names from the header row and column types from up to
 * `maxRows` data rows. Every inferred column is nullable.
 */
export class CsvSchemaInferrer implements SchemaInferrer {
  async infer(source: ByteSource, maxRows: number = MAX_READ_RECORDS): Promise<InferredSchema> {
    let header: readonly string[] | null = null;
    let kinds: Set<ValueKind>[] = [];
    let sampledRows = 0;
    let sampledBytes = 0;

    for await (const record of readCsvRecords(source, { onChunk: (n) => { sampledBytes += n; } })) {
      if (header === null) {
        header = record.fields;
        kinds = header.map(() => new Set<ValueKind>());
        if (maxRows <= 0) break;
        continue;
      }

      if (record.fields.length !== header.length) {
        throw new InferenceError(
          `expected ${String(header.length)} fields, found ${String(record.fields.length)}`,
          record.row,
        );
      }
      record.fields.forEach((value, index) => {
        const kind = classifyValue(value);
        if (kind !== null) kinds[index]?.add(kind);
      });

      sampledRows++;
      if (sampledRows >= maxRows) break;
    }

    if (header === null) {
      throw new InferenceError('missing header row', 1);
    }

    const fields = header.map(
      (name, index): ColumnField => ({
        name,
        type: mergeKinds(kinds[index] ?? new Set()),
        nullable: true,
      }),
    );
    return { schema: { fields }, sampledRows, sampledBytes };
  }
}
