/**
 * Session types for per-user presentation sessions.
 */

import { slideTitles, type Deck, type DeckState, type SessionSnapshot } from '@deckhand/shared';

/** Unique session identifier. */
export type SessionId = string;

export interface SessionBase {
  userId: string;
  sessionId: SessionId;
  /** Base name used when the deck is saved */
  deckName: string;
  /** Last uploaded artifact for this session, if any */
  sourcePath: string | null;
  /** Last saved output, if any */
  savedPath: string | null;
  lastActivity: number;
}

/** Sessions outside idle/awaiting_upload always own a deck. */
export type Session = SessionBase &
  (
    | { state: 'idle' | 'awaiting_upload'; deck: null }
    | { state: DeckState; deck: Deck }
  );

export const DEFAULT_DECK_NAME = 'presentation';

/** Generate a unique session ID. */
export function generateSessionId(): SessionId {
  return `ses-${Date.now()}-${Math.random().toString(36).slice(2, 9)}`;
}

export function newSession(userId: string, now = Date.now()): Session {
  return {
    userId,
    sessionId: generateSessionId(),
    state: 'idle',
    deck: null,
    deckName: DEFAULT_DECK_NAME,
    sourcePath: null,
    savedPath: null,
    lastActivity: now,
  };
}

export function toSnapshot(session: Session): SessionSnapshot {
  return {
    userId: session.userId,
    state: session.state,
    slideCount: session.deck ? session.deck.slides.length : null,
    titles: session.deck ? slideTitles(session.deck) : [],
    sourcePath: session.sourcePath,
    savedPath: session.savedPath,
    lastActivity: session.lastActivity,
  };
}
