import type { ConsolidatedTypes } from '../domain/model/TypeDirectives.js';
import type { ByteSource } from '../domain/ports/ByteSource.js';
import type { StagingSink } from '../domain/ports/ByteSink.js';
import type { ColumnarWriterFactory } from '../domain/ports/ColumnarWriter.js';
import type { RowReader } from '../domain/ports/RowReader.js';
import type { SchemaInferrer } from '../domain/ports/SchemaInferrer.js';
import type { EventBus } from './EventBus.js';

/**
 * Settings and collaborators shared by every file of a run.
 *
 * Internal: built by `Converter` and handed to each `ConvertFile`. Nothing in
 * it changes once the run starts.
 */
export interface ConversionContext {
  readonly eventBus: EventBus;
  readonly types: ConsolidatedTypes;
  readonly printSchema: boolean;
  readonly removeInput: boolean;
  readonly sampleRows: number;
  readonly batchSize: number;
  readonly rowGroupSize: number | undefined;
  readonly inferrer: SchemaInferrer;
  readonly rowReader: RowReader;
  readonly writerFactory: ColumnarWriterFactory;
  readonly openSource: (filePath: string) => Promise<ByteSource>;
  readonly createSink: (tempPath: string) => Promise<StagingSink>;
}
