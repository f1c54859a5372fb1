import type { ConsolidatedTypes, TypeDirectives } from './domain/model/TypeDirectives.js';
import type { FileOutcome, RunSummary } from './domain/model/FileOutcome.js';
import { summarizeOutcomes } from './domain/model/FileOutcome.js';
import type { EventType, EventPayload, DomainEvent } from './domain/events/DomainEvents.js';
import type { ByteSource } from './domain/ports/ByteSource.js';
import type { StagingSink } from './domain/ports/ByteSink.js';
import type { ColumnarWriterFactory } from './domain/ports/ColumnarWriter.js';
import type { RowReader } from './domain/ports/RowReader.js';
import type { SchemaInferrer } from './domain/ports/SchemaInferrer.js';
import { consolidateTypes } from './domain/services/TypeDirectiveConsolidator.js';
import type { HandlerErrorListener } from './application/EventBus.js';
import { EventBus } from './application/EventBus.js';
import type { ConversionContext } from './application/ConversionContext.js';
import { ConvertFile } from './application/usecases/ConvertFile.js';
import { RewindableSource } from './infrastructure/sources/RewindableSource.js';
import { AtomicFileSink } from './infrastructure/sinks/AtomicFileSink.js';
import { CsvSchemaInferrer, MAX_READ_RECORDS } from './infrastructure/parsers/CsvSchemaInferrer.js';
import { CsvRowReader, DEFAULT_BATCH_SIZE } from './infrastructure/parsers/CsvRowReader.js';
import { parquetWriterFactory } from './infrastructure/writers/ParquetRowWriter.js';

/** Configuration for a conversion run. */
export interface ConverterConfig {
  /** Column type directives. Validated in the constructor. */
  readonly directives?: TypeDirectives;
  /** Infer and report schemas without writing anything. Default: `false`. */
  readonly printSchema?: boolean;
  /** Delete each input after it has been converted. Default: `false`. */
  readonly removeInput?: boolean;
  /** Data rows sampled for inference. Default: `8192`. */
  readonly sampleRows?: number;
  /** Rows decoded per batch on the second pass. Default: `1024`. */
  readonly batchSize?: number;
  /** Rows per Parquet row group. Writer default when omitted. */
  readonly rowGroupSize?: number;
  /** Called with anything an event subscriber throws. */
  readonly onHandlerError?: HandlerErrorListener;
  /** Schema inference. Default: `CsvSchemaInferrer`. */
  readonly inferrer?: SchemaInferrer;
  /** Second-pass decoding. Default: `CsvRowReader`. */
  readonly rowReader?: RowReader;
  /** Output encoding. Default: Parquet via parquetjs. */
  readonly writerFactory?: ColumnarWriterFactory;
  /** Opens inputs. Default: `RewindableSource.open`. */
  readonly openSource?: (filePath: string) => Promise<ByteSource>;
  /** Creates staging files. Default: `AtomicFileSink.create`. */
  readonly createSink?: (tempPath: string) => Promise<StagingSink>;
}

/**
 * Facade for converting CSV files to Parquet.
 *
 * Directives are consolidated once, in the constructor, so a conflict throws
 * `ConfigConflictError` before any file is touched. Files are then converted
 * one at a time, in order.
 *
 * @example
 * ```typescript
 * const converter = new Converter({ directives: { int32: ['id'], float64: ['*'] } });
 * converter.on('file:skipped', (e) => console.warn(e.filePath, e.reason));
 * const summary = await converter.convert(['trips.csv', 'fares.csv.gz']);
 * if (summary.failed) process.exitCode = 1;
 * ```
 */
export class Converter {
  private readonly ctx: ConversionContext;

  constructor(config?: ConverterConfig) {
    this.ctx = {
      eventBus: new EventBus(config?.onHandlerError),
      types: consolidateTypes(config?.directives ?? {}),
      printSchema: config?.printSchema ?? false,
      removeInput: config?.removeInput ?? false,
      sampleRows: config?.sampleRows ?? MAX_READ_RECORDS,
      batchSize: config?.batchSize ?? DEFAULT_BATCH_SIZE,
      rowGroupSize: config?.rowGroupSize,
      inferrer: config?.inferrer ?? new CsvSchemaInferrer(),
      rowReader: config?.rowReader ?? new CsvRowReader(),
      writerFactory: config?.writerFactory ?? parquetWriterFactory,
      openSource: config?.openSource ?? ((filePath) => RewindableSource.open(filePath)),
      createSink: config?.createSink ?? ((tempPath) => AtomicFileSink.create(tempPath)),
    };
  }

  /** Overrides and defaults every file of this run is converted with. */
  get types(): ConsolidatedTypes {
    return this.ctx.types;
  }

  /** Subscribe to a specific domain event type. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  /** Subscribe to all domain events. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.onAny(handler);
    return this;
  }

  /** Unsubscribe a wildcard handler. */
  offAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.offAny(handler);
    return this;
  }

  /** Convert one file. Resolves to its terminal outcome. */
  convertFile(filePath: string): Promise<FileOutcome> {
    return new ConvertFile(this.ctx).execute(filePath);
  }

  /**
   * Convert files sequentially. Skipped files do not stop the run; the first
   * failed file does, and later files are not attempted.
   */
  async convert(filePaths: readonly string[]): Promise<RunSummary> {
    const outcomes: FileOutcome[] = [];
    for (const filePath of filePaths) {
      const outcome = await this.convertFile(filePath);
      outcomes.push(outcome);
      if (outcome.status === 'failed') break;
    }
    return summarizeOutcomes(outcomes);
  }
}
