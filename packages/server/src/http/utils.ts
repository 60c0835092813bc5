/**
 * Shared HTTP helpers: JSON responses, error responses, body parsing.
 */

import type { IncomingMessage, ServerResponse } from 'http';
import type { FailureCode } from '@deckhand/shared';
import { ValidationError } from '../errors.js';

/** Largest JSON body accepted on the control routes. */
export const MAX_JSON_BODY_BYTES = 64 * 1024;

export function sendJson(res: ServerResponse, data: unknown, status = 200): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(data));
}

export function sendError(res: ServerResponse, error: string, status = 500): void {
  sendJson(res, { error }, status);
}

const STATUS_BY_CODE: Record<FailureCode, number> = {
  ValidationError: 400,
  InvalidCommand: 400,
  TemplateNotFound: 404,
  ResourceNotFound: 404,
  Busy: 409,
  TooLarge: 413,
  CorruptDocument: 422,
  IOFailure: 500,
  Internal: 500,
};

/** HTTP status for a failed boundary operation. */
export function statusFor(code: FailureCode): number {
  return STATUS_BY_CODE[code];
}

/**
 * Read and parse a JSON request body.
 * Throws ValidationError for an empty, oversized or malformed body.
 */
export async function readJsonBody(req: IncomingMessage, limit = MAX_JSON_BODY_BYTES): Promise<unknown> {
  const bodyChunks: Buffer[] = [];
  let total = 0;
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    total += buf.length;
    if (total > limit) {
      throw new ValidationError(`Request body exceeds ${limit} bytes.`);
    }
    bodyChunks.push(buf);
  }

  const body = Buffer.concat(bodyChunks).toString('utf-8').trim();
  if (!body) {
    throw new ValidationError('Empty body');
  }
  try {
    const parsed: unknown = JSON.parse(body);
    return parsed;
  } catch {
    throw new ValidationError('Invalid JSON');
  }
}
