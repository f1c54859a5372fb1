import { describe, it, expect, afterAll } from 'vitest';
import { readFileSync } from 'node:fs';
import { AtomicFileSink } from '../../../src/infrastructure/sinks/AtomicFileSink.js';
import { DestinationCollisionError } from '../../../src/domain/errors/ConversionErrors.js';
import { TempDir } from '../../helpers/files.js';

const dir = new TempDir('sink');

afterAll(() => {
  dir.cleanup();
});

const bytes = (text: string): Buffer => Buffer.from(text, 'utf-8');

describe('AtomicFileSink', () => {
  describe('create()', () => {
    it('should create the staging file and nothing else', async () => {
      const sink = await AtomicFileSink.create(dir.file('.tmp.create.parquet'));

      expect(dir.exists('.tmp.create.parquet')).toBe(true);
      expect(sink.committed).toBe(false);
      await sink.discard();
    });

    it('should reject with DestinationCollisionError when the path exists', async () => {
      const existing = dir.write('.tmp.taken.parquet', 'keep me');

      await expect(AtomicFileSink.create(existing)).rejects.toThrow(DestinationCollisionError);
      expect(readFileSync(existing, 'utf-8')).toBe('keep me');
    });

    it('should pass other I/O errors through', async () => {
      const promise = AtomicFileSink.create(dir.file('no-such-dir/.tmp.x.parquet'));

      await expect(promise).rejects.toThrow('ENOENT');
      await expect(promise).rejects.not.toBeInstanceOf(DestinationCollisionError);
    });
  });

  describe('commit()', () => {
    it('should publish writes in call order under the final name', async () => {
      const sink = await AtomicFileSink.create(dir.file('.tmp.ordered.parquet'));

      await Promise.all([sink.write(bytes('PAR1')), sink.write(bytes('-body-')), sink.write(bytes('PAR1'))]);
      expect(sink.size).toBe(14);
      await sink.commit(dir.file('ordered.parquet'));

      expect(readFileSync(dir.file('ordered.parquet'), 'utf-8')).toBe('PAR1-body-PAR1');
      expect(dir.exists('.tmp.ordered.parquet')).toBe(false);
      expect(sink.committed).toBe(true);
    });

    it('should make discard a no-op afterwards', async () => {
      const sink = await AtomicFileSink.create(dir.file('.tmp.kept.parquet'));
      await sink.write(bytes('data'));
      await sink.commit(dir.file('kept.parquet'));

      expect(await sink.discard()).toBeUndefined();
      expect(readFileSync(dir.file('kept.parquet'), 'utf-8')).toBe('data');
    });

    it('should reject writes after commit', async () => {
      const sink = await AtomicFileSink.create(dir.file('.tmp.closed.parquet'));
      await sink.commit(dir.file('closed.parquet'));

      await expect(sink.write(bytes('late'))).rejects.toThrow('has already been committed');
    });
  });

  describe('discard()', () => {
    it('should remove the staging file and never create the final file', async () => {
      const sink = await AtomicFileSink.create(dir.file('.tmp.dropped.parquet'));
      await sink.write(bytes('partial'));

      expect(await sink.discard()).toBeUndefined();
      expect(dir.exists('.tmp.dropped.parquet')).toBe(false);
      expect(dir.exists('dropped.parquet')).toBe(false);
    });

    it('should be safe to call twice', async () => {
      const sink = await AtomicFileSink.create(dir.file('.tmp.twice.parquet'));

      expect(await sink.discard()).toBeUndefined();
      expect(await sink.discard()).toBeUndefined();
      await expect(sink.flush()).rejects.toThrow('has already been discarded');
    });

    it('should clean up after a failed commit', async () => {
      const sink = await AtomicFileSink.create(dir.file('.tmp.failed.parquet'));
      await sink.write(bytes('data'));

      await expect(sink.commit(dir.file('missing-dir/failed.parquet'))).rejects.toThrow('ENOENT');
      expect(dir.exists('.tmp.failed.parquet')).toBe(true);

      expect(await sink.discard()).toBeUndefined();
      expect(dir.exists('.tmp.failed.parquet')).toBe(false);
    });
  });

  describe('discardAllSync()', () => {
    it('should remove every live staging file', async () => {
      const before = AtomicFileSink.liveCount();
      const first = await AtomicFileSink.create(dir.file('.tmp.live-1.parquet'));
      const second = await AtomicFileSink.create(dir.file('.tmp.live-2.parquet'));
      expect(AtomicFileSink.liveCount()).toBe(before + 2);

      expect(AtomicFileSink.discardAllSync()).toEqual([]);

      expect(AtomicFileSink.liveCount()).toBe(0);
      expect(dir.exists('.tmp.live-1.parquet')).toBe(false);
      expect(dir.exists('.tmp.live-2.parquet')).toBe(false);
      expect(await first.discard()).toBeUndefined();
      expect(await second.discard()).toBeUndefined();
    });
  });
});
