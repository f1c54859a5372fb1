import Papa from 'papaparse';
import { Readable } from 'node:stream';
import type { ByteSource } from '../../domain/ports/ByteSource.js';

/** One tokenized CSV record. */
export interface CsvRecord {
  readonly fields: readonly string[];
  /** One-based record number; the header is record 1. */
  readonly row: number;
}

export interface CsvRecordOptions {
  /** Called with the size of every raw chunk handed to the tokenizer. */
  readonly onChunk?: (byteLength: number) => void;
}

async function* decodeText(chunks: AsyncIterable<Buffer>, onChunk?: (byteLength: number) => void): AsyncGenerator<string> {
  const decoder = new TextDecoder('utf-8');
  for await (const chunk of chunks) {
    onChunk?.(chunk.length);
    const text = decoder.decode(chunk, { stream: true });
    if (text.length > 0) yield text;
  }
  const tail = decoder.decode();
  if (tail.length > 0) yield tail;
}

function toFields(value: unknown, row: number): string[] {
  if (Array.isArray(value) && value.every((field): field is string => typeof field === 'string')) {
    return value;
  }
  throw new Error(`CSV tokenizer produced a non-text record at row ${String(row)}`);
}

/**
 * Tokenize a source with PapaParse in Node stream mode: comma-delimited, no
 * header handling, empty lines skipped, no dynamic typing.
 *
 * Breaking out of the loop stops reading the source; the source itself is not
 * closed.
 */
export async function* readCsvRecords(source: ByteSource, options?: CsvRecordOptions): AsyncGenerator<CsvRecord> {
  const input = Readable.from(decodeText(source.chunks(), options?.onChunk));
  const tokenizer = Papa.parse(Papa.NODE_STREAM_INPUT, {
    delimiter: ',',
    header: false,
    skipEmptyLines: true,
    dynamicTyping: false,
  });
  input.on('error', (error) => tokenizer.destroy(error));
  input.pipe(tokenizer);

  let row = 0;
  try {
    for await (const value of tokenizer) {
      row++;
      yield { fields: toFields(value, row), row };
    }
  } finally {
    input.unpipe(tokenizer);
    input.destroy();
    tokenizer.destroy();
  }
}
