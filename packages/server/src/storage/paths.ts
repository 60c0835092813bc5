/**
 * Path derivation and validation for stored artifacts.
 */

import { createHash } from 'crypto';
import { basename, dirname, join, normalize, relative, isAbsolute } from 'path';

const OWNER_SEGMENT_RE = /^[A-Za-z0-9_-]{1,64}$/;
const MAX_FILE_NAME = 120;

/**
 * Validate and resolve a file path within a base directory.
 * Returns the resolved absolute path, or null if the path escapes the base.
 */
export function safePath(baseDir: string, filePath: string): string | null {
  if (isAbsolute(filePath)) return null;
  const normalizedPath = normalize(join(baseDir, filePath));
  const rel = relative(baseDir, normalizedPath);
  if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) {
    return null;
  }
  return normalizedPath;
}

function sha256Hex(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

/**
 * Directory name for an owner. Plain ids are used as-is; anything else is
 * replaced by a hash so it cannot introduce separators or traversal.
 */
export function ownerSegment(ownerId: string): string {
  return OWNER_SEGMENT_RE.test(ownerId) ? ownerId : `u-${sha256Hex(ownerId).slice(0, 24)}`;
}

/**
 * Reduce an untrusted file name to a safe basename.
 * Returns an empty string when nothing usable is left.
 */
export function safeFileName(name: string): string {
  const base = basename(name.replace(/\\/g, '/'));
  const cleaned = base
    .replace(/[^\w.\- ]+/g, '_')
    .replace(/\s+/g, '_')
    .replace(/^\.+/, '');
  return cleaned.slice(-MAX_FILE_NAME);
}

/**
 * Deterministic destination for an upload: the same (owner, name) pair
 * always maps to the same path, distinct pairs never collide.
 */
export function artifactPath(uploadRoot: string, ownerId: string, declaredName: string): string {
  const digest = sha256Hex(`${ownerId}\0${declaredName}`).slice(0, 12);
  return join(uploadRoot, ownerSegment(ownerId), `${digest}-${safeFileName(declaredName)}`);
}

/** Temporary sibling used while a file is being written. */
export function partialPath(finalPath: string, token: string): string {
  return join(dirname(finalPath), `.${basename(finalPath)}.${token}.part`);
}
