import type { ColumnSchema } from '../model/ColumnSchema.js';
import type { RowBatch } from '../model/Row.js';
import type { ByteSink } from './ByteSink.js';

/** Encoder for one output file. */
export interface ColumnarWriter {
  writeBatch(rows: RowBatch): Promise<void>;
  /** Write the footer and flush everything into the sink. Does not commit the sink. */
  close(): Promise<void>;
}

export interface ColumnarWriterOptions {
  /** Rows per row group. Writer default when omitted. */
  readonly rowGroupSize?: number;
}

/** Port for opening an encoder over a sink. */
export interface ColumnarWriterFactory {
  open(schema: ColumnSchema, sink: ByteSink, options?: ColumnarWriterOptions): Promise<ColumnarWriter>;
}
