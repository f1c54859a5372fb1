import { Writable } from 'node:stream';
import { ParquetSchema, ParquetWriter } from '@dsnp/parquetjs';
import type { ColumnSchema } from '../../domain/model/ColumnSchema.js';
import type { ColumnType } from '../../domain/model/ColumnType.js';
import type { RowBatch } from '../../domain/model/Row.js';
import type { ByteSink } from '../../domain/ports/ByteSink.js';
import type { ColumnarWriter, ColumnarWriterFactory, ColumnarWriterOptions } from '../../domain/ports/ColumnarWriter.js';
import { toError } from '../../domain/errors/ConversionErrors.js';

/** Parquet types the converter writes. */
export type ParquetColumnType = 'INT32' | 'INT64' | 'FLOAT' | 'DOUBLE' | 'BOOLEAN' | 'UTF8' | 'DATE' | 'TIMESTAMP_MILLIS';

/** Parquet physical/logical type for each column type. Columns with no sampled values are written as text. */
export const PARQUET_TYPES: Readonly<Record<ColumnType, ParquetColumnType>> = {
  int32: 'INT32',
  int64: 'INT64',
  float32: 'FLOAT',
  float64: 'DOUBLE',
  boolean: 'BOOLEAN',
  utf8: 'UTF8',
  date: 'DATE',
  timestamp: 'TIMESTAMP_MILLIS',
  null: 'UTF8',
};

/** Every column chunk is DEFLATE-compressed. */
export const PARQUET_COMPRESSION = 'GZIP';

/** Build the Parquet schema for a final column schema. All columns are optional. */
export function toParquetSchema(schema: ColumnSchema): ParquetSchema {
  const definition: Record<string, { type: ParquetColumnType; optional: boolean; compression: typeof PARQUET_COMPRESSION }> = {};
  for (const field of schema.fields) {
    definition[field.name] = {
      type: PARQUET_TYPES[field.type],
      optional: field.nullable,
      compression: PARQUET_COMPRESSION,
    };
  }
  return new ParquetSchema(definition);
}

/** Writable over a `ByteSink`. Ending the stream flushes the sink but does not commit it. */
function sinkStream(sink: ByteSink): Writable {
  return new Writable({
    write(chunk: Buffer, _encoding, callback) {
      sink.write(chunk).then(
        () => callback(),
        (error: unknown) => callback(toError(error)),
      );
    },
    final(callback) {
      sink.flush().then(
        () => callback(),
        (error: unknown) => callback(toError(error)),
      );
    },
  });
}

/** Columnar writer adapter over parquetjs. */
export class ParquetRowWriter implements ColumnarWriter {
  private rowCount = 0;

  private constructor(
    private readonly writer: ParquetWriter,
    private readonly failure: { error?: Error },
  ) {}

  static async open(schema: ColumnSchema, sink: ByteSink, options?: ColumnarWriterOptions): Promise<ParquetRowWriter> {
    const output = sinkStream(sink);
    const failure: { error?: Error } = {};
    // The writer also sees these through its write callbacks; keep the first for close().
    output.on('error', (error) => {
      failure.error ??= error;
    });
    const writer = await ParquetWriter.openStream(
      toParquetSchema(schema),
      output,
      options?.rowGroupSize === undefined ? {} : { rowGroupSize: options.rowGroupSize },
    );
    return new ParquetRowWriter(writer, failure);
  }

  get rowsWritten(): number {
    return this.rowCount;
  }

  async writeBatch(rows: RowBatch): Promise<void> {
    for (const row of rows) {
      await this.writer.appendRow(row);
      this.rowCount++;
    }
  }

  async close(): Promise<void> {
    await this.writer.close();
    if (this.failure.error) throw this.failure.error;
  }
}

/** Default writer factory used by the converter. */
export const parquetWriterFactory: ColumnarWriterFactory = {
  open: (schema, sink, options) => ParquetRowWriter.open(schema, sink, options),
};
