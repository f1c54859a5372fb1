import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { deriveOutputPaths, stripCsvSuffix } from '../../../src/domain/model/OutputPaths.js';
import { formatSchema } from '../../../src/domain/model/ColumnSchema.js';
import { summarizeOutcomes } from '../../../src/domain/model/FileOutcome.js';

describe('stripCsvSuffix', () => {
  it('should strip .csv and .csv.gz', () => {
    expect(stripCsvSuffix('trips.csv')).toBe('trips');
    expect(stripCsvSuffix('trips.csv.gz')).toBe('trips');
  });

  it('should return null for other names', () => {
    expect(stripCsvSuffix('trips.tsv')).toBeNull();
    expect(stripCsvSuffix('trips.gz')).toBeNull();
    expect(stripCsvSuffix('trips.CSV')).toBeNull();
  });
});

describe('deriveOutputPaths', () => {
  it('should place output and temp file next to the input', () => {
    expect(deriveOutputPaths(join('data', 'trips.csv.gz'))).toEqual({
      outputPath: join('data', 'trips.parquet'),
      tempPath: join('data', '.tmp.trips.parquet'),
    });
  });

  it('should work for a bare file name', () => {
    expect(deriveOutputPaths('fares.csv')).toEqual({
      outputPath: 'fares.parquet',
      tempPath: '.tmp.fares.parquet',
    });
  });

  it('should return null for unsupported names', () => {
    expect(deriveOutputPaths('notes.txt')).toBeNull();
  });
});

describe('formatSchema', () => {
  it('should render fields as pretty JSON', () => {
    const text = formatSchema({ fields: [{ name: 'a', type: 'int64', nullable: true }] });

    expect(JSON.parse(text)).toEqual({
      fields: [{ name: 'a', data_type: 'int64', nullable: true }],
      metadata: {},
    });
    expect(text.split('\n')[1]).toBe('  "fields": [');
  });
});

describe('summarizeOutcomes', () => {
  it('should count outcomes by status and keep the failure', () => {
    const error = new Error('boom');
    const summary = summarizeOutcomes([
      { status: 'skipped', filePath: 'a.txt', reason: 'unsupported-extension', path: 'a.txt' },
      { status: 'printed', filePath: 'b.csv', schema: { fields: [] } },
      { status: 'failed', filePath: 'c.csv', stage: 'infer-schema', error },
    ]);

    expect(summary.skipped).toBe(1);
    expect(summary.printed).toBe(1);
    expect(summary.converted).toBe(0);
    expect(summary.failed?.error).toBe(error);
  });
});
