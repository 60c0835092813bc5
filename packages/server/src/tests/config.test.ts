import { describe, it, expect } from 'vitest';
import { join, resolve } from 'path';
import { ConfigError, DEFAULT_MAX_UPLOAD_BYTES, loadConfig, PROJECT_ROOT } from '../config.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({});

    expect(config).toMatchObject({
      host: '127.0.0.1',
      port: 8000,
      maxUploadBytes: DEFAULT_MAX_UPLOAD_BYTES,
      uploadDir: join(PROJECT_ROOT, 'storage', 'uploads'),
      outputDir: join(PROJECT_ROOT, 'storage', 'decks'),
      templatesDir: join(PROJECT_ROOT, 'templates'),
      uploadTimeoutMs: 600_000,
      sessionTtlMs: 1_800_000,
      sweepIntervalMs: 60_000,
      maxQueuedEvents: 4,
      generatedToken: true,
    });
    expect(DEFAULT_MAX_UPLOAD_BYTES).toBe(500 * 1024 * 1024);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('generates a fresh token per load when none is configured', () => {
    const a = loadConfig({});
    const b = loadConfig({});
    expect(a.apiToken).toMatch(/^[A-Za-z0-9_-]{43}$/);
    expect(a.apiToken).not.toBe(b.apiToken);
  });

  it('reads overrides', () => {
    const config = loadConfig({
      DECKHAND_HOST: '0.0.0.0',
      DECKHAND_PORT: '9001',
      DECKHAND_API_TOKEN: 'test-secret-token-0001',
      DECKHAND_MAX_UPLOAD_BYTES: '1048576',
      DECKHAND_UPLOAD_DIR: 'relative/uploads',
      DECKHAND_UPLOAD_TIMEOUT_MS: '0',
      DECKHAND_MAX_QUEUED_EVENTS: ' 2 ',
    });

    expect(config).toMatchObject({
      host: '0.0.0.0',
      port: 9001,
      apiToken: 'test-secret-token-0001',
      generatedToken: false,
      maxUploadBytes: 1_048_576,
      uploadDir: resolve('relative/uploads'),
      uploadTimeoutMs: 0,
      maxQueuedEvents: 2,
    });
  });

  it('ignores unrelated variables', () => {
    expect(loadConfig({ PATH: '/usr/bin', HOME: '/root' }).port).toBe(8000);
  });

  it('lists every invalid variable', () => {
    let error: unknown;
    try {
      loadConfig({ DECKHAND_PORT: 'abc', DECKHAND_API_TOKEN: 'short' });
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(ConfigError);
    if (!(error instanceof ConfigError)) return;
    expect(error.issues).toEqual([
      'DECKHAND_PORT: must be a non-negative integer',
      'DECKHAND_API_TOKEN: must be at least 16 characters',
    ]);
    expect(error.message).toBe(
      'Invalid configuration:\n' +
        '  DECKHAND_PORT: must be a non-negative integer\n' +
        '  DECKHAND_API_TOKEN: must be at least 16 characters',
    );
  });

  it('rejects an upload ceiling of zero', () => {
    expect(() => loadConfig({ DECKHAND_MAX_UPLOAD_BYTES: '0' })).toThrow(ConfigError);
  });

  it('rejects out-of-range ports', () => {
    expect(() => loadConfig({ DECKHAND_PORT: '70000' })).toThrow(ConfigError);
  });
});
