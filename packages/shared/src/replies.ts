/**
 * What the assistant sends back through the chat transport.
 */

import type { SessionState } from './events.js';

export interface ChatButton {
  text: string;
  data: string;
}

export interface Reply {
  text: string;
  /** Button rows, rendered as an inline keyboard by the transport */
  buttons?: ChatButton[][];
  /** Session state after the event was handled */
  state: SessionState;
}

// ============ Errors ============

export const ERROR_CODES = [
  'TooLarge',
  'CorruptDocument',
  'TemplateNotFound',
  'ResourceNotFound',
  'ValidationError',
  'IOFailure',
  'Busy',
] as const;

export type ErrorCode = (typeof ERROR_CODES)[number];

/** Error codes plus the two outcomes that are not core failures. */
export type FailureCode = ErrorCode | 'InvalidCommand' | 'Internal';

export interface BoundaryError {
  code: FailureCode;
  message: string;
}

// ============ Results ============

export type BoundaryResult<T> =
  | { ok: true; value: T; reply: Reply }
  | { ok: false; error: BoundaryError; reply: Reply };

export interface SlideCountSummary {
  slideCount: number;
}

export interface StoredImageSummary {
  /** Name to pass as `imagePath` when adding an image slide */
  name: string;
}

/** What an upload became: a loaded deck, or an image kept for later slides. */
export type UploadSummary =
  | ({ kind: 'deck' } & SlideCountSummary)
  | ({ kind: 'image' } & StoredImageSummary);

export interface SavedDeckSummary {
  path: string;
  slideCount: number;
}

export interface MenuResponse {
  reply: Reply;
}

export interface TemplateSummary {
  name: string;
  title: string;
  description: string;
  slideCount: number;
}

export interface SessionSnapshot {
  userId: string;
  state: SessionState;
  slideCount: number | null;
  titles: string[];
  sourcePath: string | null;
  savedPath: string | null;
  lastActivity: number;
}
