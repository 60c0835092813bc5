import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { Readable } from 'stream';
import sharp from 'sharp';
import { loadConfig, type AppConfig } from '../config.js';

export async function makeTempDir(prefix = 'deckhand-test-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/** A solid-colour PNG; at the default 96 dpi it is width/96 by height/96 inches. */
export async function pngBytes(width: number, height: number): Promise<Buffer> {
  return sharp({
    create: { width, height, channels: 3, background: { r: 40, g: 90, b: 160 } },
  })
    .png()
    .toBuffer();
}

export function streamOf(...chunks: Uint8Array[]): Readable {
  return Readable.from(chunks.map((chunk) => Buffer.from(chunk)));
}

export const TEST_TOKEN = 'test-secret-token-0001';

/** Configuration rooted in a temp directory. */
export function testConfig(root: string, overrides: Record<string, string> = {}): AppConfig {
  return loadConfig({
    DECKHAND_API_TOKEN: TEST_TOKEN,
    DECKHAND_UPLOAD_DIR: join(root, 'uploads'),
    DECKHAND_OUTPUT_DIR: join(root, 'decks'),
    DECKHAND_TEMPLATES_DIR: join(root, 'templates'),
    ...overrides,
  });
}
