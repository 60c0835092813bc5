/**
 * Typed failures raised by the slide, storage and session layers.
 *
 * Every DeckError is recoverable at the session boundary: the state machine
 * turns it into a reply and keeps the session in its last well-defined state.
 */

import type { ErrorCode } from '@deckhand/shared';

export class DeckError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class TooLargeError extends DeckError {
  constructor(readonly size: number, readonly limit: number) {
    super('TooLarge', `File is too large (${size} bytes). Maximum size: ${formatMiB(limit)}`);
  }
}

export class CorruptDocumentError extends DeckError {
  constructor(detail: string, options?: { cause?: unknown }) {
    super('CorruptDocument', `Not a readable presentation: ${detail}`, options);
  }
}

export class UnreadableImageError extends DeckError {
  constructor(readonly imageName: string, options?: { cause?: unknown }) {
    super('CorruptDocument', `Image "${imageName}" is not a readable image.`, options);
  }
}

export class TemplateNotFoundError extends DeckError {
  constructor(readonly templateName: string) {
    super('TemplateNotFound', `Template "${templateName}" not found.`);
  }
}

export class ResourceNotFoundError extends DeckError {
  constructor(readonly resource: string, detail = 'not found', options?: { cause?: unknown }) {
    super('ResourceNotFound', `Image "${resource}" ${detail}.`, options);
  }
}

export class ValidationError extends DeckError {
  constructor(message: string) {
    super('ValidationError', message);
  }
}

export class IOFailureError extends DeckError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('IOFailure', message, options);
  }
}

export class BusyError extends DeckError {
  constructor(readonly userId: string) {
    super('Busy', 'Still working on your previous request. Please wait a moment and try again.');
  }
}

function formatMiB(bytes: number): string {
  return `${Math.floor(bytes / (1024 * 1024))} MB`;
}
