/**
 * Atomic publish: write to a temporary sibling, then rename into place.
 *
 * A reader of the final path sees either the previous file or the complete
 * new one, never a partial write.
 */

import { createWriteStream } from 'fs';
import { mkdir, rename, rm, stat, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { randomUUID } from 'crypto';
import type { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { DeckError, IOFailureError, TooLargeError } from '../errors.js';
import { partialPath } from './paths.js';

export interface StreamPublishOptions {
  /** Abort with TooLargeError once more than this many bytes arrive */
  maxBytes: number;
  /** Abort with IOFailureError if the stream has not finished in time; 0 disables */
  timeoutMs?: number;
}

async function discard(tempPath: string): Promise<void> {
  try {
    await rm(tempPath, { force: true });
  } catch (err) {
    console.warn(`[atomic-file] Failed to remove temporary file ${tempPath}:`, err);
  }
}

function toIOFailure(err: unknown, destPath: string): DeckError {
  if (err instanceof DeckError) return err;
  if (err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError')) {
    return new IOFailureError('Upload timed out before the file was fully received.', { cause: err });
  }
  const detail = err instanceof Error ? err.message : 'unknown error';
  return new IOFailureError(`Could not store ${destPath}: ${detail}`, { cause: err });
}

/**
 * Stream `source` to `destPath`. Returns the number of bytes written.
 * On any failure the temporary file is removed and nothing appears at
 * `destPath`; failures are DeckErrors (TooLarge or IOFailure).
 */
export async function publishStream(
  destPath: string,
  source: Readable,
  options: StreamPublishOptions,
): Promise<number> {
  const tempPath = partialPath(destPath, randomUUID());
  let received = 0;

  const limit = async function* (chunks: AsyncIterable<Uint8Array | string>): AsyncGenerator<Uint8Array> {
    for await (const chunk of chunks) {
      const bytes = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
      received += bytes.length;
      if (received > options.maxBytes) {
        throw new TooLargeError(received, options.maxBytes);
      }
      yield bytes;
    }
  };

  try {
    await mkdir(dirname(destPath), { recursive: true });
    const signal = options.timeoutMs ? AbortSignal.timeout(options.timeoutMs) : undefined;
    await pipeline(source, limit, createWriteStream(tempPath, { flags: 'w' }), { signal });

    const written = (await stat(tempPath)).size;
    if (written !== received) {
      throw new IOFailureError(`Short write: received ${received} bytes but stored ${written}.`);
    }
    await rename(tempPath, destPath);
    return written;
  } catch (err) {
    source.destroy();
    await discard(tempPath);
    throw toIOFailure(err, destPath);
  }
}

/**
 * Write `data` to `destPath` atomically. Failures become IOFailureError.
 */
export async function publishFile(destPath: string, data: Uint8Array): Promise<void> {
  const tempPath = partialPath(destPath, randomUUID());
  try {
    await mkdir(dirname(destPath), { recursive: true });
    await writeFile(tempPath, data);
    await rename(tempPath, destPath);
  } catch (err) {
    await discard(tempPath);
    throw toIOFailure(err, destPath);
  }
}
