import type { InferredSchema } from '../model/ColumnSchema.js';
import type { ByteSource } from './ByteSource.js';

/** Port for inferring column names and types from the first rows of a source. */
export interface SchemaInferrer {
  /** Sample at most `maxRows` data rows (header excluded). */
  infer(source: ByteSource, maxRows: number): Promise<InferredSchema>;
}
