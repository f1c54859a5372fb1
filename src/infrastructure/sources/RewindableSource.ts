import { open } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import { Readable } from 'node:stream';
import { createGunzip } from 'node:zlib';
import type { Gunzip } from 'node:zlib';
import type { ByteSource } from '../../domain/ports/ByteSource.js';

/** How the bytes of a file are stored. */
export type SourceEncoding = 'plain' | 'gzip';

export interface RewindableSourceOptions {
  /** Chunk size in bytes for raw reads and for `chunks()`. Default: 65536 (64KB). */
  readonly highWaterMark?: number;
}

const DEFAULT_HIGH_WATER_MARK = 65536;

/** Choose the encoding from the file name: anything ending in `.gz` is gzip. */
export function detectSourceEncoding(filePath: string): SourceEncoding {
  return filePath.endsWith('.gz') ? 'gzip' : 'plain';
}

/** One pass over the file. Replaced wholesale on rewind. */
interface ByteReader {
  read(buffer: Uint8Array): Promise<number>;
  /** Stop reading. Leaves the file handle open. */
  release(): void;
}

/** Positional reads straight from the handle. */
class PlainReader implements ByteReader {
  private position = 0;

  constructor(private readonly handle: FileHandle) {}

  async read(buffer: Uint8Array): Promise<number> {
    if (buffer.length === 0) return 0;
    const { bytesRead } = await this.handle.read(buffer, 0, buffer.length, this.position);
    this.position += bytesRead;
    return bytesRead;
  }

  release(): void {
    this.position = 0;
  }
}

/**
 * Decompressing reader. The gunzip stream cannot seek, so each pass builds a
 * new one over raw positional reads that start at byte 0.
 */
class GzipReader implements ByteReader {
  private readonly compressed: Readable;
  private readonly gunzip: Gunzip;
  private readonly decoded: AsyncIterator<Buffer>;
  private pending: Buffer = Buffer.alloc(0);
  private ended = false;

  constructor(handle: FileHandle, highWaterMark: number) {
    const raw = new PlainReader(handle);
    this.compressed = Readable.from(rawChunks(raw, highWaterMark), { objectMode: false });
    this.gunzip = createGunzip({ chunkSize: highWaterMark });
    this.compressed.on('error', (error) => this.gunzip.destroy(error));
    this.compressed.pipe(this.gunzip);
    this.decoded = this.gunzip[Symbol.asyncIterator]();
  }

  async read(buffer: Uint8Array): Promise<number> {
    if (buffer.length === 0) return 0;
    while (this.pending.length === 0) {
      if (this.ended) return 0;
      const next = await this.decoded.next();
      if (next.done) {
        this.ended = true;
        return 0;
      }
      this.pending = next.value;
    }

    const count = Math.min(buffer.length, this.pending.length);
    this.pending.copy(buffer, 0, 0, count);
    this.pending = this.pending.subarray(count);
    return count;
  }

  release(): void {
    this.compressed.unpipe(this.gunzip);
    this.compressed.destroy();
    this.gunzip.destroy();
    this.pending = Buffer.alloc(0);
    this.ended = true;
  }
}

async function* rawChunks(reader: ByteReader, size: number): AsyncGenerator<Buffer> {
  for (;;) {
    const buffer = Buffer.alloc(size);
    const bytesRead = await reader.read(buffer);
    if (bytesRead === 0) return;
    yield buffer.subarray(0, bytesRead);
  }
}

/**
 * Byte source over a plain or gzip-compressed file that can be restarted from
 * byte 0.
 *
 * `rewind()` consumes the instance it is called on: the returned source owns
 * the file handle and the old one rejects further reads. Node.js only.
 */
export class RewindableSource implements ByteSource {
  private consumed = false;
  private closed = false;

  private constructor(
    private readonly handle: FileHandle,
    private readonly reader: ByteReader,
    readonly filePath: string,
    readonly encoding: SourceEncoding,
    private readonly highWaterMark: number,
  ) {}

  /** Open `filePath`, choosing the decoder from its suffix. Rejects with the I/O error if the file cannot be opened. */
  static async open(filePath: string, options?: RewindableSourceOptions): Promise<RewindableSource> {
    const highWaterMark = options?.highWaterMark ?? DEFAULT_HIGH_WATER_MARK;
    const encoding = detectSourceEncoding(filePath);
    const handle = await open(filePath, 'r');
    return new RewindableSource(handle, RewindableSource.createReader(handle, encoding, highWaterMark), filePath, encoding, highWaterMark);
  }

  private static createReader(handle: FileHandle, encoding: SourceEncoding, highWaterMark: number): ByteReader {
    return encoding === 'gzip' ? new GzipReader(handle, highWaterMark) : new PlainReader(handle);
  }

  async read(buffer: Uint8Array): Promise<number> {
    this.assertReadable();
    return this.reader.read(buffer);
  }

  async *chunks(): AsyncIterable<Buffer> {
    this.assertReadable();
    for (;;) {
      const buffer = Buffer.alloc(this.highWaterMark);
      const bytesRead = await this.read(buffer);
      if (bytesRead === 0) return;
      yield buffer.subarray(0, bytesRead);
    }
  }

  async rewind(): Promise<RewindableSource> {
    this.assertReadable();
    this.consumed = true;
    this.reader.release();
    return new RewindableSource(
      this.handle,
      RewindableSource.createReader(this.handle, this.encoding, this.highWaterMark),
      this.filePath,
      this.encoding,
      this.highWaterMark,
    );
  }

  /** Close the file handle. Safe to call on a rewound (consumed) instance and more than once. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.reader.release();
    if (this.consumed) return;
    await this.handle.close();
  }

  private assertReadable(): void {
    if (this.closed) {
      throw new Error(`RewindableSource: ${this.filePath} is closed.`);
    }
    if (this.consumed) {
      throw new Error(`RewindableSource: ${this.filePath} has been rewound. Read from the source returned by rewind().`);
    }
  }
}
