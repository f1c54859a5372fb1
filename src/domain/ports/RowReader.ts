import type { ColumnSchema } from '../model/ColumnSchema.js';
import type { RowBatch } from '../model/Row.js';
import type { ByteSource } from './ByteSource.js';

/** Port for decoding a whole source into typed rows using a final schema. */
export interface RowReader {
  /** Lazily yield batches of at most `batchSize` rows. The header row is not yielded. */
  readBatches(source: ByteSource, schema: ColumnSchema, batchSize: number): AsyncIterable<RowBatch>;
}
