import { lstat, rm, stat } from 'node:fs/promises';
import type { ColumnSchema } from '../../domain/model/ColumnSchema.js';
import type { ConversionStage, FileOutcome, SkipReason, SkippedOutcome } from '../../domain/model/FileOutcome.js';
import type { OutputPaths } from '../../domain/model/OutputPaths.js';
import { deriveOutputPaths } from '../../domain/model/OutputPaths.js';
import type { ByteSource } from '../../domain/ports/ByteSource.js';
import type { StagingSink } from '../../domain/ports/ByteSink.js';
import { rewriteSchema } from '../../domain/services/SchemaRewriter.js';
import { toError } from '../../domain/errors/ConversionErrors.js';
import type { ConversionContext } from '../ConversionContext.js';

type GuardResult = SkippedOutcome | { readonly status: 'ready'; readonly paths: OutputPaths };

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await lstat(path);
    return true;
  } catch (error) {
    if (errorCode(error) === 'ENOENT') return false;
    throw error;
  }
}

/**
 * Use case: convert a single CSV file.
 *
 * Runs the entry guards, infers the schema over a first pass, applies the
 * consolidated overrides, then either stops (print-schema mode) or rewinds the
 * source and streams every row into a staging sink that is committed by
 * rename. Always resolves to a terminal `FileOutcome`; it does not reject.
 */
export class ConvertFile {
  constructor(private readonly ctx: ConversionContext) {}

  async execute(filePath: string): Promise<FileOutcome> {
    let stage: ConversionStage = 'check-guards';
    let source: ByteSource | null = null;
    let sink: StagingSink | null = null;

    try {
      const guard = await this.checkEntryGuards(filePath);
      if (guard.status === 'skipped') {
        this.ctx.eventBus.emit({
          type: 'file:skipped',
          filePath,
          reason: guard.reason,
          path: guard.path,
          timestamp: Date.now(),
        });
        return guard;
      }
      const { paths } = guard;

      this.ctx.eventBus.emit({ type: 'file:started', filePath, timestamp: Date.now() });

      stage = 'infer-schema';
      source = await this.ctx.openSource(filePath);
      const inferred = await this.ctx.inferrer.infer(source, this.ctx.sampleRows);

      stage = 'rewrite-schema';
      const schema = rewriteSchema(inferred.schema, this.ctx.types);
      this.ctx.eventBus.emit({
        type: 'file:schema',
        filePath,
        schema,
        sampledRows: inferred.sampledRows,
        timestamp: Date.now(),
      });

      if (this.ctx.printSchema) {
        stage = 'print-only';
        await source.close();
        return { status: 'printed', filePath, schema };
      }

      stage = 'open-sink';
      sink = await this.ctx.createSink(paths.tempPath);

      stage = 'stream-rows';
      source = await source.rewind();
      const rowCount = await this.streamRows(source, schema, sink);
      await source.close();

      stage = 'commit';
      await sink.commit(paths.outputPath);
      this.ctx.eventBus.emit({
        type: 'file:converted',
        filePath,
        outputPath: paths.outputPath,
        rowCount,
        timestamp: Date.now(),
      });

      const inputRemoved = this.ctx.removeInput ? await this.removeInput(filePath) : false;
      return { status: 'converted', filePath, outputPath: paths.outputPath, schema, rowCount, inputRemoved };
    } catch (error) {
      const failure = toError(error);
      this.ctx.eventBus.emit({
        type: 'file:failed',
        filePath,
        stage,
        error: failure.message,
        timestamp: Date.now(),
      });
      return { status: 'failed', filePath, stage, error: failure };
    } finally {
      if (sink) {
        const cleanupError = await sink.discard();
        if (cleanupError) this.reportCleanupFailure(filePath, sink.tempPath, cleanupError);
      }
      if (source) {
        await source.close().catch((error: unknown) => {
          this.reportCleanupFailure(filePath, filePath, toError(error));
        });
      }
    }
  }

  /**
   * Existence and naming checks, in order. Advisory only: a staging file that
   * appears after these checks makes the exclusive create fail in `open-sink`.
   */
  private async checkEntryGuards(filePath: string): Promise<GuardResult> {
    const skip = (reason: SkipReason, path = filePath): SkippedOutcome => ({ status: 'skipped', filePath, reason, path });

    let isFile: boolean;
    try {
      isFile = (await stat(filePath)).isFile();
    } catch (error) {
      const code = errorCode(error);
      if (code === 'ENOENT' || code === 'ENOTDIR') return skip('not-found');
      throw error;
    }
    if (!isFile) return skip('not-a-file');

    const paths = deriveOutputPaths(filePath);
    if (paths === null) return skip('unsupported-extension');

    // Print-schema mode never writes, so existing outputs do not matter.
    if (!this.ctx.printSchema) {
      if (await pathExists(paths.outputPath)) return skip('output-exists', paths.outputPath);
      if (await pathExists(paths.tempPath)) return skip('temp-exists', paths.tempPath);
    }

    return { status: 'ready', paths };
  }

  private async streamRows(source: ByteSource, schema: ColumnSchema, sink: StagingSink): Promise<number> {
    const writer = await this.ctx.writerFactory.open(schema, sink, { rowGroupSize: this.ctx.rowGroupSize });
    let rowCount = 0;
    for await (const batch of this.ctx.rowReader.readBatches(source, schema, this.ctx.batchSize)) {
      await writer.writeBatch(batch);
      rowCount += batch.length;
    }
    await writer.close();
    return rowCount;
  }

  /** Delete a converted input. Failure is reported, not thrown. */
  private async removeInput(filePath: string): Promise<boolean> {
    try {
      await rm(filePath);
    } catch (error) {
      this.ctx.eventBus.emit({
        type: 'input:remove-failed',
        filePath,
        error: toError(error).message,
        timestamp: Date.now(),
      });
      return false;
    }
    this.ctx.eventBus.emit({ type: 'input:removed', filePath, timestamp: Date.now() });
    return true;
  }

  private reportCleanupFailure(filePath: string, path: string, error: Error): void {
    this.ctx.eventBus.emit({
      type: 'cleanup:failed',
      filePath,
      path,
      error: error.message,
      timestamp: Date.now(),
    });
  }
}
