/**
 * Port for a byte stream that can be read twice.
 *
 * Inference reads a prefix, then the source is rewound so the row reader sees
 * the same bytes from the start.
 */
export interface ByteSource {
  /** Fill `buffer` from the current position. Resolves to `0` at end of stream. */
  read(buffer: Uint8Array): Promise<number>;
  /** Yield the remaining bytes chunk by chunk. */
  chunks(): AsyncIterable<Buffer>;
  /** Consume this reader and return a fresh one positioned at byte 0. */
  rewind(): Promise<ByteSource>;
  /** Release the underlying handle. */
  close(): Promise<void>;
}
