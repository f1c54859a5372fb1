import type { ColumnSchema } from '../../domain/model/ColumnSchema.js';
import type { ParsedRow, RowBatch, CellValue } from '../../domain/model/Row.js';
import type { ByteSource } from '../../domain/ports/ByteSource.js';
import type { RowReader } from '../../domain/ports/RowReader.js';
import { RowDecodeError } from '../../domain/errors/ConversionErrors.js';
import { CellDecodeError, decodeCell } from './csvValues.js';
import { readCsvRecords } from './csvRecords.js';

/** Rows per batch handed to the writer. */
export const DEFAULT_BATCH_SIZE = 1024;

/**
 * Decodes every data row of a source with a final schema. Columns are matched
 * by position; the header row is skipped, not re-validated.
 */
export class CsvRowReader implements RowReader {
  async *readBatches(source: ByteSource, schema: ColumnSchema, batchSize: number = DEFAULT_BATCH_SIZE): AsyncIterable<RowBatch> {
    const fields = schema.fields;
    let batch: ParsedRow[] = [];
    let headerSkipped = false;

    for await (const record of readCsvRecords(source)) {
      if (!headerSkipped) {
        headerSkipped = true;
        continue;
      }

      if (record.fields.length !== fields.length) {
        throw new RowDecodeError(
          `expected ${String(fields.length)} fields, found ${String(record.fields.length)}`,
          record.row,
        );
      }

      const row: Record<string, CellValue> = {};
      fields.forEach((field, index) => {
        const value = record.fields[index] ?? '';
        try {
          row[field.name] = decodeCell(value, field.type);
        } catch (error) {
          if (error instanceof CellDecodeError) {
            throw new RowDecodeError(error.message, record.row, field.name);
          }
          throw error;
        }
      });
      batch.push(row);

      if (batch.length >= batchSize) {
        yield batch;
        batch = [];
      }
    }

    if (batch.length > 0) yield batch;
  }
}
