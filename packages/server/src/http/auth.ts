/**
 * Token-based authentication.
 * Every HTTP endpoint except /health requires the configured bearer token.
 */

import { createHash, timingSafeEqual } from 'crypto';
import type { IncomingMessage, ServerResponse } from 'http';

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

/** Constant-time token comparison. */
export function tokenMatches(candidate: string, expected: string): boolean {
  return timingSafeEqual(digest(candidate), digest(expected));
}

/**
 * Validate auth for HTTP requests.
 * Returns true if the request is authorized.
 * Sends 401 and returns false if unauthorized.
 */
export function checkHttpAuth(req: IncomingMessage, res: ServerResponse, url: URL, apiToken: string): boolean {
  // /health is always exempt
  if (url.pathname === '/health') return true;

  const token = extractToken(req, url);
  if (token !== null && tokenMatches(token, apiToken)) return true;

  res.writeHead(401, { 'Content-Type': 'application/json', 'WWW-Authenticate': 'Bearer' });
  res.end(JSON.stringify({ error: 'Unauthorized' }));
  return false;
}

/** Extract token from Authorization header or query param. */
function extractToken(req: IncomingMessage, url: URL): string | null {
  const authHeader = req.headers.authorization;
  if (authHeader?.startsWith('Bearer ')) {
    return authHeader.slice(7);
  }
  return url.searchParams.get('token');
}
