import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { rmSync } from 'node:fs';
import { attachReporting, collectColumns, createCLI, describeSkip, runConversion, toDirectives } from '../../../src/cli/program.js';
import { Converter } from '../../../src/Converter.js';
import type { CliIo } from '../../../src/cli/program.js';
import { TempDir } from '../../helpers/files.js';

function createIo() {
  const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  const stdout = vi.fn();
  const io: CliIo = { logger, stdout };
  return { io, logger, stdout };
}

let dir: TempDir;

beforeEach(() => {
  dir = new TempDir('cli');
});

afterEach(() => {
  dir.cleanup();
});

describe('collectColumns', () => {
  it('should split on commas and drop empty names', () => {
    expect(collectColumns('a,b,,c', undefined)).toEqual(['a', 'b', 'c']);
  });

  it('should keep spaces that are part of a column name', () => {
    expect(collectColumns('a, b', undefined)).toEqual(['a', ' b']);
  });

  it('should accumulate repeated flags', () => {
    expect(collectColumns('c', ['a', 'b'])).toEqual(['a', 'b', 'c']);
  });
});

describe('toDirectives', () => {
  it('should map flags onto the four categories', () => {
    expect(toDirectives({ i32: ['a'], f64: ['*'] })).toEqual({
      int32: ['a'],
      int64: undefined,
      float32: undefined,
      float64: ['*'],
    });
  });
});

describe('describeSkip', () => {
  it.each([
    ['not-found', 'in.csv not found'],
    ['not-a-file', 'in.csv is not a file -- skipping'],
    ['unsupported-extension', 'in.csv is not a csv[.gz] file -- skipping'],
    ['output-exists', 'out.parquet already exists -- skipping'],
    ['temp-exists', 'Temporary file out.parquet already exists -- skipping'],
  ] as const)('should describe %s', (reason, message) => {
    expect(describeSkip({ filePath: 'in.csv', reason, path: 'out.parquet' })).toBe(message);
  });
});

describe('runConversion', () => {
  it('should return 1 and log the conflict for contradictory directives', async () => {
    const { io, logger } = createIo();
    const input = dir.write('a.csv', 'a\n1\n');

    const code = await runConversion([input], { i32: ['*'], i64: ['__all__'] }, io);

    expect(code).toBe(1);
    expect(logger.error).toHaveBeenCalledWith(
      { code: 'CONFIG_CONFLICT' },
      "int32 and int64 can't both be the default type for integers",
    );
    expect(dir.list()).toEqual(['a.csv']);
  });

  it('should print the schema of every file to stdout', async () => {
    const { io, stdout } = createIo();
    const input = dir.write('s.csv', 'a\n1\n');

    const code = await runConversion([input], { printSchema: true }, io);

    expect(code).toBe(0);
    expect(stdout).toHaveBeenCalledWith(
      `${input}:\n{\n  "fields": [\n    {\n      "name": "a",\n      "data_type": "int64",\n      "nullable": true\n    }\n  ],\n  "metadata": {}\n}\n\n`,
    );
    expect(dir.list()).toEqual(['s.csv']);
  });

  it('should warn about skipped files and still succeed', async () => {
    const { io, logger } = createIo();
    const missing = dir.file('missing.csv');

    const code = await runConversion([missing], {}, io);

    expect(code).toBe(0);
    expect(logger.warn).toHaveBeenCalledWith({ file: missing, reason: 'not-found' }, `${missing} not found`);
  });

  it('should return 1 and log the first failure', async () => {
    const { io, logger } = createIo();
    const bad = dir.write('bad.csv', '');

    const code = await runConversion([bad], {}, io);

    expect(code).toBe(1);
    expect(logger.error).toHaveBeenCalledWith({ file: bad, stage: 'infer-schema' }, 'row 1: missing header row');
  });

  it('should convert and remove inputs with rm', async () => {
    const { io, logger } = createIo();
    const input = dir.write('r.csv', 'a\n1\n');

    const code = await runConversion([input], { rm: true }, io);

    expect(code).toBe(0);
    expect(dir.list()).toEqual(['r.parquet']);
    expect(logger.info).toHaveBeenCalledWith({ file: input, output: dir.file('r.parquet'), rows: 1 }, 'converted');
  });
});

describe('attachReporting', () => {
  it('should warn about an input that could not be removed and keep the run successful', async () => {
    const { io, logger } = createIo();
    const input = dir.write('kept.csv', 'a\n1\n');
    const converter = new Converter({ removeInput: true });
    converter.on('file:converted', (event) => rmSync(event.filePath));
    attachReporting(converter, io, false);

    const summary = await converter.convert([input]);

    expect(summary.failed).toBeUndefined();
    expect(logger.warn).toHaveBeenCalledWith(
      { file: input },
      expect.stringContaining(`Can't remove original file ${input}: ENOENT`),
    );
    expect(logger.error).not.toHaveBeenCalled();
  });
});

describe('createCLI', () => {
  it('should parse repeated column flags and report the exit code', async () => {
    const { io, stdout } = createIo();
    const onExitCode = vi.fn();
    const input = dir.write('t.csv', 'a,b,c\n1,2,3\n');

    await createCLI(io, onExitCode).parseAsync(['--i32', 'a,b', '--i32', 'c', '-p', input], { from: 'user' });

    expect(onExitCode).toHaveBeenCalledWith(0);
    const printed = String(stdout.mock.calls[0]?.[0]);
    const document: unknown = JSON.parse(printed.slice(`${input}:\n`.length));
    expect(document).toEqual({
      fields: [
        { name: 'a', data_type: 'int32', nullable: true },
        { name: 'b', data_type: 'int32', nullable: true },
        { name: 'c', data_type: 'int32', nullable: true },
      ],
      metadata: {},
    });
  });

  it('should convert files given as arguments', async () => {
    const { io } = createIo();
    const onExitCode = vi.fn();
    const input = dir.write('u.csv', 'x\n1.5\n');

    await createCLI(io, onExitCode).parseAsync(['--f64', '*', input], { from: 'user' });

    expect(onExitCode).toHaveBeenCalledWith(0);
    expect(dir.list()).toEqual(['u.csv', 'u.parquet']);
  });
});
