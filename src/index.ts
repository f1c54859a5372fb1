// Main entry point
export { Converter } from './Converter.js';
export type { ConverterConfig } from './Converter.js';

// Domain model
export type { ColumnType, NumericType, IntegerType, FloatType } from './domain/model/ColumnType.js';
export {
  DEFAULT_INT_TYPE,
  DEFAULT_FLOAT_TYPE,
  GENERIC_INT_TYPE,
  GENERIC_FLOAT_TYPE,
} from './domain/model/ColumnType.js';
export type { ColumnField, ColumnSchema, InferredSchema } from './domain/model/ColumnSchema.js';
export { formatSchema } from './domain/model/ColumnSchema.js';
export type { TypeDirectives, TypeOverrides, DefaultWidths, ConsolidatedTypes } from './domain/model/TypeDirectives.js';
export { WILDCARD_SENTINELS, isWildcard } from './domain/model/TypeDirectives.js';
export type { CellValue, ParsedRow, RowBatch } from './domain/model/Row.js';
export type {
  FileOutcome,
  SkippedOutcome,
  PrintedOutcome,
  ConvertedOutcome,
  FailedOutcome,
  SkipReason,
  ConversionStage,
  RunSummary,
} from './domain/model/FileOutcome.js';
export type { OutputPaths } from './domain/model/OutputPaths.js';
export { deriveOutputPaths, stripCsvSuffix, CSV_SUFFIXES, PARQUET_SUFFIX, TEMP_PREFIX } from './domain/model/OutputPaths.js';

// Domain services
export { consolidateTypes, describeTypes } from './domain/services/TypeDirectiveConsolidator.js';
export { rewriteSchema } from './domain/services/SchemaRewriter.js';

// Errors
export type { ConversionErrorCode } from './domain/errors/ConversionErrors.js';
export {
  ConversionError,
  ConfigConflictError,
  DestinationCollisionError,
  InferenceError,
  RowDecodeError,
} from './domain/errors/ConversionErrors.js';

// Ports (for custom implementations)
export type { ByteSource } from './domain/ports/ByteSource.js';
export type { ByteSink, StagingSink } from './domain/ports/ByteSink.js';
export type { SchemaInferrer } from './domain/ports/SchemaInferrer.js';
export type { RowReader } from './domain/ports/RowReader.js';
export type { ColumnarWriter, ColumnarWriterFactory, ColumnarWriterOptions } from './domain/ports/ColumnarWriter.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  FileStartedEvent,
  FileSkippedEvent,
  FileSchemaEvent,
  FileConvertedEvent,
  FileFailedEvent,
  InputRemovedEvent,
  InputRemoveFailedEvent,
  CleanupFailedEvent,
} from './domain/events/DomainEvents.js';
export { EventBus } from './application/EventBus.js';
export type { HandlerErrorListener } from './application/EventBus.js';

// Infrastructure adapters
export { RewindableSource, detectSourceEncoding } from './infrastructure/sources/RewindableSource.js';
export type { RewindableSourceOptions, SourceEncoding } from './infrastructure/sources/RewindableSource.js';
export { AtomicFileSink } from './infrastructure/sinks/AtomicFileSink.js';
export { CsvSchemaInferrer, MAX_READ_RECORDS } from './infrastructure/parsers/CsvSchemaInferrer.js';
export { CsvRowReader, DEFAULT_BATCH_SIZE } from './infrastructure/parsers/CsvRowReader.js';
export { ParquetRowWriter, parquetWriterFactory, toParquetSchema } from './infrastructure/writers/ParquetRowWriter.js';
