import { describe, it, expect, afterAll } from 'vitest';
import { ParquetReader } from '@dsnp/parquetjs';
import { ParquetRowWriter, toParquetSchema } from '../../../src/infrastructure/writers/ParquetRowWriter.js';
import { AtomicFileSink } from '../../../src/infrastructure/sinks/AtomicFileSink.js';
import type { ColumnSchema } from '../../../src/domain/model/ColumnSchema.js';
import { TempDir } from '../../helpers/files.js';
import { readParquetRows, readParquetTypes } from '../../helpers/parquet.js';

const dir = new TempDir('writer');

afterAll(() => {
  dir.cleanup();
});

const schema: ColumnSchema = {
  fields: [
    { name: 'id', type: 'int32', nullable: true },
    { name: 'total', type: 'int64', nullable: true },
    { name: 'ratio', type: 'float32', nullable: true },
    { name: 'price', type: 'float64', nullable: true },
    { name: 'name', type: 'utf8', nullable: true },
    { name: 'active', type: 'boolean', nullable: true },
    { name: 'day', type: 'date', nullable: true },
    { name: 'at', type: 'timestamp', nullable: true },
    { name: 'nothing', type: 'null', nullable: true },
  ],
};

describe('toParquetSchema', () => {
  it('should map every column to an optional GZIP-compressed Parquet field', () => {
    const fields = toParquetSchema(schema).fields;

    expect(Object.keys(fields)).toEqual(['id', 'total', 'ratio', 'price', 'name', 'active', 'day', 'at', 'nothing']);
    expect(fields.id?.primitiveType).toBe('INT32');
    expect(fields.total?.primitiveType).toBe('INT64');
    expect(fields.ratio?.primitiveType).toBe('FLOAT');
    expect(fields.price?.primitiveType).toBe('DOUBLE');
    expect(fields.name?.originalType).toBe('UTF8');
    expect(fields.active?.primitiveType).toBe('BOOLEAN');
    expect(fields.day?.originalType).toBe('DATE');
    expect(fields.at?.originalType).toBe('TIMESTAMP_MILLIS');
    expect(fields.nothing?.originalType).toBe('UTF8');
    expect(Object.values(fields).every((field) => field.repetitionType === 'OPTIONAL')).toBe(true);
    expect(Object.values(fields).every((field) => field.compression === 'GZIP')).toBe(true);
  });
});

describe('ParquetRowWriter', () => {
  it('should write rows that read back with the same values', async () => {
    const sink = await AtomicFileSink.create(dir.file('.tmp.rows.parquet'));
    const writer = await ParquetRowWriter.open(schema, sink, { rowGroupSize: 2 });

    await writer.writeBatch([
      {
        id: 1,
        total: 9223372036854775807n,
        ratio: 1.5,
        price: 19.99,
        name: 'alice',
        active: true,
        day: new Date(Date.UTC(2024, 0, 1)),
        at: new Date(Date.UTC(2024, 0, 1, 12, 30, 0)),
        nothing: null,
      },
      { id: 2, total: null, ratio: null, price: null, name: null, active: false, day: null, at: null, nothing: null },
    ]);
    await writer.writeBatch([
      { id: 3, total: -1n, ratio: 0.25, price: 0, name: 'carol', active: null, day: null, at: null, nothing: null },
    ]);
    await writer.close();
    await sink.commit(dir.file('rows.parquet'));

    expect(writer.rowsWritten).toBe(3);
    expect((await readParquetTypes(dir.file('rows.parquet'))).at).toBe('TIMESTAMP_MILLIS');
    const rows = await readParquetRows(dir.file('rows.parquet'), ['id', 'total', 'ratio', 'price', 'name', 'active', 'day']);
    expect(rows).toEqual([
      {
        id: 1,
        total: 9223372036854775807n,
        ratio: 1.5,
        price: 19.99,
        name: 'alice',
        active: true,
        day: new Date(Date.UTC(2024, 0, 1)),
      },
      { id: 2, active: false },
      { id: 3, total: -1n, ratio: 0.25, price: 0, name: 'carol' },
    ]);
  });

  it('should produce a readable file with no rows', async () => {
    const sink = await AtomicFileSink.create(dir.file('.tmp.empty.parquet'));
    const writer = await ParquetRowWriter.open({ fields: [{ name: 'a', type: 'null', nullable: true }] }, sink);
    await writer.close();
    await sink.commit(dir.file('empty.parquet'));

    const reader = await ParquetReader.openFile(dir.file('empty.parquet'));
    expect(Object.keys(reader.getSchema().fields)).toEqual(['a']);
    await reader.close();
  });
});
