import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import { Readable } from 'stream';
import { IOFailureError, TooLargeError } from '../errors.js';
import { publishFile, publishStream } from '../storage/atomic-file.js';
import { makeTempDir, removeTempDir, streamOf } from './helpers.js';

describe('atomic file publishing', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  describe('publishStream', () => {
    it('writes every chunk and returns the byte count', async () => {
      const dest = join(dir, 'nested', 'file.bin');
      const written = await publishStream(dest, streamOf(Buffer.from('abc'), Buffer.from('defg')), {
        maxBytes: 100,
      });

      expect(written).toBe(7);
      expect((await readFile(dest)).toString()).toBe('abcdefg');
      expect(await readdir(join(dir, 'nested'))).toEqual(['file.bin']);
    });

    it('aborts with TooLarge once the stream exceeds the limit', async () => {
      const dest = join(dir, 'big.bin');
      const source = streamOf(Buffer.alloc(6), Buffer.alloc(6));

      await expect(publishStream(dest, source, { maxBytes: 10 })).rejects.toBeInstanceOf(TooLargeError);
      expect(await readdir(dir)).toEqual([]);
    });

    it('keeps the previous file when a replacement fails', async () => {
      const dest = join(dir, 'deck.bin');
      await publishStream(dest, streamOf(Buffer.from('first')), { maxBytes: 100 });

      const failing = new Readable({
        read() {
          this.push(Buffer.from('partial'));
          this.destroy(new Error('connection reset'));
        },
      });
      await expect(publishStream(dest, failing, { maxBytes: 100 })).rejects.toBeInstanceOf(IOFailureError);

      expect((await readFile(dest)).toString()).toBe('first');
      expect(await readdir(dir)).toEqual(['deck.bin']);
    });

    it('fails with IOFailure when the stream stalls past the timeout', async () => {
      const dest = join(dir, 'slow.bin');
      const stalled = new Readable({ read() {} });

      const pending = publishStream(dest, stalled, { maxBytes: 100, timeoutMs: 50 });
      await expect(pending).rejects.toBeInstanceOf(IOFailureError);
      await expect(pending).rejects.toThrow('Upload timed out before the file was fully received.');
      expect(await readdir(dir)).toEqual([]);
    });
  });

  describe('publishFile', () => {
    it('writes bytes at the destination', async () => {
      const dest = join(dir, 'out', 'deck.pptx');
      await publishFile(dest, new Uint8Array([1, 2, 3]));
      expect([...(await readFile(dest))]).toEqual([1, 2, 3]);
      expect(await readdir(join(dir, 'out'))).toEqual(['deck.pptx']);
    });
  });
});
