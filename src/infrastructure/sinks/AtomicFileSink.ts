import { rmSync } from 'node:fs';
import { open, rename, rm } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import type { ByteSink } from '../../domain/ports/ByteSink.js';
import { DestinationCollisionError, toError } from '../../domain/errors/ConversionErrors.js';

type SinkState = 'open' | 'committed' | 'discarded';

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Output file staged under a temporary name.
 *
 * The destination only ever appears through `commit()`, which syncs and then
 * renames. Until then the bytes live at `tempPath`, and `discard()` removes
 * them. Callers pair the two as `try { ...; await sink.commit(dest) } finally
 * { await sink.discard() }`.
 *
 * Node.js only.
 */
export class AtomicFileSink implements ByteSink {
  /** Sinks that were created and neither committed nor discarded. */
  private static readonly live = new Set<AtomicFileSink>();

  private state: SinkState = 'open';
  private offset = 0;
  private pending: Promise<void> = Promise.resolve();
  private failure: Error | undefined;
  private handleClosed = false;

  private constructor(
    private readonly handle: FileHandle,
    readonly tempPath: string,
  ) {}

  /**
   * Create `tempPath` exclusively. An existing file rejects with
   * `DestinationCollisionError`; any other failure rejects with the I/O error.
   */
  static async create(tempPath: string): Promise<AtomicFileSink> {
    let handle: FileHandle;
    try {
      handle = await open(tempPath, 'wx');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'EEXIST') {
        throw new DestinationCollisionError(tempPath, { cause: error });
      }
      throw error;
    }
    const sink = new AtomicFileSink(handle, tempPath);
    AtomicFileSink.live.add(sink);
    return sink;
  }

  /**
   * Remove every live staging file synchronously. Meant for signal handlers,
   * where pending `finally` blocks will not run. Returns the errors it hit.
   */
  static discardAllSync(): Error[] {
    const errors: Error[] = [];
    for (const sink of AtomicFileSink.live) {
      sink.state = 'discarded';
      try {
        rmSync(sink.tempPath, { force: true });
      } catch (error) {
        errors.push(toError(error));
      }
    }
    AtomicFileSink.live.clear();
    return errors;
  }

  /** Number of staging files currently owned by live sinks. */
  static liveCount(): number {
    return AtomicFileSink.live.size;
  }

  get committed(): boolean {
    return this.state === 'committed';
  }

  /** Append `bytes`. Writes are positioned when called, so concurrent calls still land in call order. */
  async write(bytes: Uint8Array): Promise<void> {
    this.assertOpen();
    const position = this.offset;
    this.offset += bytes.length;
    const write = this.pending.then(() => {
      if (this.failure) throw this.failure;
      return this.writeFully(bytes, position);
    });
    this.pending = write.catch((error: unknown) => {
      this.failure ??= toError(error);
    });
    await write;
  }

  /** Wait for every pending write. Rejects with the first write failure. */
  async flush(): Promise<void> {
    this.assertOpen();
    await this.pending;
    if (this.failure) throw this.failure;
  }

  /** Bytes accepted so far. */
  get size(): number {
    return this.offset;
  }

  /**
   * Sync everything to storage, then rename the staging file to `finalPath`.
   * On failure the staging file is left for `discard()`.
   */
  async commit(finalPath: string): Promise<void> {
    await this.flush();
    await this.handle.sync();
    await this.closeHandle();
    await rename(this.tempPath, finalPath);
    this.state = 'committed';
    AtomicFileSink.live.delete(this);
  }

  /**
   * Remove the staging file unless the sink was committed. Never throws: the
   * cleanup error, if any, is returned so a failure that is already propagating
   * is not masked.
   */
  async discard(): Promise<Error | undefined> {
    if (this.state !== 'open') return undefined;
    this.state = 'discarded';
    AtomicFileSink.live.delete(this);

    let cleanupError: Error | undefined;
    await this.pending;
    try {
      await this.closeHandle();
    } catch (error) {
      cleanupError = toError(error);
    }
    try {
      await rm(this.tempPath, { force: true });
    } catch (error) {
      cleanupError = toError(error);
    }
    return cleanupError;
  }

  private async writeFully(bytes: Uint8Array, position: number): Promise<void> {
    let written = 0;
    while (written < bytes.length) {
      const { bytesWritten } = await this.handle.write(bytes, written, bytes.length - written, position + written);
      written += bytesWritten;
    }
  }

  private async closeHandle(): Promise<void> {
    if (this.handleClosed) return;
    this.handleClosed = true;
    await this.handle.close();
  }

  private assertOpen(): void {
    if (this.state !== 'open') {
      throw new Error(`AtomicFileSink: ${this.tempPath} has already been ${this.state}.`);
    }
  }
}
