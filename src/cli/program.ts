import { Command } from 'commander';
import { Converter } from '../Converter.js';
import type { ConverterConfig } from '../Converter.js';
import { formatSchema } from '../domain/model/ColumnSchema.js';
import type { TypeDirectives } from '../domain/model/TypeDirectives.js';
import type { SkippedOutcome } from '../domain/model/FileOutcome.js';
import type { FileSkippedEvent } from '../domain/events/DomainEvents.js';
import { ConfigConflictError } from '../domain/errors/ConversionErrors.js';
import { describeTypes } from '../domain/services/TypeDirectiveConsolidator.js';

/** The subset of a pino logger the CLI writes to. */
export interface CliLogger {
  debug(object: object, message: string): void;
  info(object: object, message: string): void;
  warn(object: object, message: string): void;
  error(object: object, message: string): void;
}

/** Parsed command-line options. */
export interface CliOptions {
  readonly i32?: string[];
  readonly i64?: string[];
  readonly f32?: string[];
  readonly f64?: string[];
  readonly printSchema?: boolean;
  readonly rm?: boolean;
}

export interface CliIo {
  readonly logger: CliLogger;
  /** Receives `--print-schema` output. */
  readonly stdout: (text: string) => void;
}

/**
 * Commander argument parser for comma-separated column lists. Names are kept
 * verbatim, surrounding spaces included.
 * Repeated flags accumulate.
 */
export function collectColumns(value: string, previous: string[] | undefined): string[] {
  const columns = value.split(',').filter((column) => column.length > 0);
  return [...(previous ?? []), ...columns];
}

export function toDirectives(options: CliOptions): TypeDirectives {
  return { int32: options.i32, int64: options.i64, float32: options.f32, float64: options.f64 };
}

/** One-line diagnostic for a skipped file. */
export function describeSkip(skip: Pick<SkippedOutcome | FileSkippedEvent, 'filePath' | 'reason' | 'path'>): string {
  switch (skip.reason) {
    case 'not-found':
      return `${skip.filePath} not found`;
    case 'not-a-file':
      return `${skip.filePath} is not a file -- skipping`;
    case 'unsupported-extension':
      return `${skip.filePath} is not a csv[.gz] file -- skipping`;
    case 'output-exists':
      return `${skip.path} already exists -- skipping`;
    case 'temp-exists':
      return `Temporary file ${skip.path} already exists -- skipping`;
  }
}

/** Route converter events to the logger and schema documents to stdout. */
export function attachReporting(converter: Converter, io: CliIo, printSchema: boolean): void {
  const { logger } = io;
  converter.on('file:skipped', (event) => logger.warn({ file: event.filePath, reason: event.reason }, describeSkip(event)));
  converter.on('file:started', (event) => logger.info({ file: event.filePath }, 'converting'));
  converter.on('file:schema', (event) => {
    if (printSchema) {
      io.stdout(`${event.filePath}:\n${formatSchema(event.schema)}\n\n`);
    } else {
      logger.debug({ file: event.filePath, sampledRows: event.sampledRows }, 'schema inferred');
    }
  });
  converter.on('file:converted', (event) =>
    logger.info({ file: event.filePath, output: event.outputPath, rows: event.rowCount }, 'converted'),
  );
  converter.on('file:failed', (event) => logger.error({ file: event.filePath, stage: event.stage }, event.error));
  converter.on('input:removed', (event) => logger.debug({ file: event.filePath }, 'removed input'));
  converter.on('input:remove-failed', (event) =>
    logger.warn({ file: event.filePath }, `Can't remove original file ${event.filePath}: ${event.error}`),
  );
  converter.on('cleanup:failed', (event) =>
    logger.warn({ file: event.filePath, path: event.path }, `Can't clean up ${event.path}: ${event.error}`),
  );
}

/**
 * Run a conversion for parsed CLI arguments. Resolves to the process exit
 * code: `0` when every file was converted, printed or skipped, `1` on a
 * directive conflict or a failed file.
 */
export async function runConversion(files: readonly string[], options: CliOptions, io: CliIo): Promise<number> {
  const printSchema = options.printSchema ?? false;
  const config: ConverterConfig = {
    directives: toDirectives(options),
    printSchema,
    removeInput: options.rm ?? false,
    onHandlerError: (error, event) => io.logger.warn({ event: event.type, err: error }, 'event handler failed'),
  };

  let converter: Converter;
  try {
    converter = new Converter(config);
  } catch (error) {
    if (error instanceof ConfigConflictError) {
      io.logger.error({ code: error.code }, error.message);
      return 1;
    }
    throw error;
  }

  io.logger.debug({}, describeTypes(converter.types));
  attachReporting(converter, io, printSchema);

  const summary = await converter.convert(files);
  io.logger.debug(
    { converted: summary.converted, skipped: summary.skipped, printed: summary.printed },
    summary.failed ? 'run aborted' : 'run finished',
  );
  return summary.failed ? 1 : 0;
}

/**
 * Build the commander program. `onExitCode` receives the result of the run;
 * the binary sets `process.exitCode` with it.
 */
export function createCLI(io: CliIo, onExitCode: (code: number) => void): Command {
  const program = new Command();

  program
    .name('parquetize')
    .version('0.1.0')
    .description('CSV to Apache Parquet converter')
    .argument('<CSV-FILES...>', 'input .csv[.gz] files')
    .option(
      '--i32 <columns>',
      'comma separated list of int32 columns; use "*" or "__all__" to make int32 the default for integer columns',
      collectColumns,
    )
    .option('--i64 <columns>', 'comma separated list of int64 columns; int64 is the default for integer columns', collectColumns)
    .option('--f32 <columns>', 'comma separated list of float32 columns; float32 is the default for float columns', collectColumns)
    .option(
      '--f64 <columns>',
      'comma separated list of float64 columns; use "*" or "__all__" to make float64 the default for float columns',
      collectColumns,
    )
    .option('-p, --print-schema', 'print the inferred Parquet schema and exit')
    .option('--rm', 'remove input files after conversion')
    .action(async (files: string[], options: CliOptions) => {
      onExitCode(await runConversion(files, options, io));
    });

  return program;
}
