/**
 * Server configuration: parsed once from the environment at process start.
 */

import { randomBytes } from 'crypto';
import { join, dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const __dirname = dirname(fileURLToPath(import.meta.url));

/**
 * Project root directory (packages/server/src → project root).
 */
export const PROJECT_ROOT = join(__dirname, '..', '..', '..');

export const DEFAULT_MAX_UPLOAD_BYTES = 500 * 1024 * 1024; // 500 MiB

export interface AppConfig {
  host: string;
  port: number;
  apiToken: string;
  /** True when no token was configured and one was generated for this process */
  generatedToken: boolean;
  maxUploadBytes: number;
  uploadDir: string;
  outputDir: string;
  templatesDir: string;
  /** 0 disables the ingest stream timeout */
  uploadTimeoutMs: number;
  sessionTtlMs: number;
  sweepIntervalMs: number;
  maxQueuedEvents: number;
}

const intFromEnv = (fallback: number, min = 0) =>
  z
    .string()
    .trim()
    .regex(/^\d+$/, 'must be a non-negative integer')
    .transform((value) => parseInt(value, 10))
    .pipe(z.number().int().min(min))
    .optional()
    .transform((value) => value ?? fallback);

const pathFromEnv = (fallback: string) =>
  z
    .string()
    .trim()
    .min(1)
    .optional()
    .transform((value) => resolve(value ?? fallback));

const envSchema = z.object({
  DECKHAND_HOST: z.string().trim().min(1).default('127.0.0.1'),
  DECKHAND_PORT: intFromEnv(8000).pipe(z.number().max(65535)),
  DECKHAND_API_TOKEN: z.string().trim().min(16, 'must be at least 16 characters').optional(),
  DECKHAND_MAX_UPLOAD_BYTES: intFromEnv(DEFAULT_MAX_UPLOAD_BYTES, 1),
  DECKHAND_UPLOAD_DIR: pathFromEnv(join(PROJECT_ROOT, 'storage', 'uploads')),
  DECKHAND_OUTPUT_DIR: pathFromEnv(join(PROJECT_ROOT, 'storage', 'decks')),
  DECKHAND_TEMPLATES_DIR: pathFromEnv(join(PROJECT_ROOT, 'templates')),
  DECKHAND_UPLOAD_TIMEOUT_MS: intFromEnv(10 * 60 * 1000),
  DECKHAND_SESSION_TTL_MS: intFromEnv(30 * 60 * 1000, 1),
  DECKHAND_SWEEP_INTERVAL_MS: intFromEnv(60 * 1000, 1),
  DECKHAND_MAX_QUEUED_EVENTS: intFromEnv(4),
});

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Build the configuration from environment variables.
 * Throws ConfigError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const vars = parsed.data;
  return Object.freeze({
    host: vars.DECKHAND_HOST,
    port: vars.DECKHAND_PORT,
    apiToken: vars.DECKHAND_API_TOKEN ?? randomBytes(32).toString('base64url'),
    generatedToken: vars.DECKHAND_API_TOKEN === undefined,
    maxUploadBytes: vars.DECKHAND_MAX_UPLOAD_BYTES,
    uploadDir: vars.DECKHAND_UPLOAD_DIR,
    outputDir: vars.DECKHAND_OUTPUT_DIR,
    templatesDir: vars.DECKHAND_TEMPLATES_DIR,
    uploadTimeoutMs: vars.DECKHAND_UPLOAD_TIMEOUT_MS,
    sessionTtlMs: vars.DECKHAND_SESSION_TTL_MS,
    sweepIntervalMs: vars.DECKHAND_SWEEP_INTERVAL_MS,
    maxQueuedEvents: vars.DECKHAND_MAX_QUEUED_EVENTS,
  });
}
