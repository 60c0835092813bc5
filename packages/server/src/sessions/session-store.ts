/**
 * SessionStore: the single mapping from user id to session.
 *
 * Sessions are created and destroyed only here. Each user has at most one
 * transition in flight; further events for that user queue behind it up to a
 * limit and are rejected with BusyError beyond it. Locks are per user, so a
 * slow upload never delays anyone else.
 */

import { BusyError } from '../errors.js';
import { newSession, type Session } from './types.js';
import { UserLock } from './user-lock.js';

/** The session a transition commits, plus the value returned to the caller. */
export interface Transition<T> {
  session: Session;
  value: T;
}

export interface UpdateOptions {
  /** Fail with BusyError instead of queueing behind an in-flight transition */
  rejectIfBusy?: boolean;
}

export interface SessionStoreOptions {
  /** Events allowed to wait behind the in-flight one for the same user */
  maxQueuedEvents: number;
  /** Called for every reclaimed session, after it has been removed */
  onReclaim?: (session: Session) => Promise<void>;
  now?: () => number;
}

export class SessionStore {
  private sessions = new Map<string, Session>();
  private lock = new UserLock();
  private sweeper: NodeJS.Timeout | null = null;
  private readonly now: () => number;

  constructor(private readonly options: SessionStoreOptions) {
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * The user's session, created in the idle state on first use.
   */
  getOrCreate(userId: string): Session {
    const existing = this.sessions.get(userId);
    if (existing) return existing;

    const session = newSession(userId, this.now());
    this.sessions.set(userId, session);
    return session;
  }

  peek(userId: string): Session | undefined {
    return this.sessions.get(userId);
  }

  /**
   * Whether a transition is in flight for the user.
   */
  isBusy(userId: string): boolean {
    return this.lock.isHeld(userId);
  }

  /**
   * Run one transition for the user with exclusive access to their session.
   *
   * The session returned by `fn` is committed only when `fn` resolves; if it
   * throws, the stored session is left exactly as it was.
   */
  async update<T>(
    userId: string,
    fn: (current: Session) => Promise<Transition<T>>,
    options: UpdateOptions = {},
  ): Promise<T> {
    if (this.lock.isHeld(userId)) {
      const queueFull = this.lock.getWaitingCount(userId) >= this.options.maxQueuedEvents;
      if (options.rejectIfBusy || queueFull) {
        throw new BusyError(userId);
      }
    }

    await this.lock.acquire(userId);
    try {
      const current = this.getOrCreate(userId);
      const { session, value } = await fn(current);
      this.sessions.set(userId, { ...session, userId, lastActivity: this.now() });
      return value;
    } finally {
      this.lock.release(userId);
    }
  }

  /**
   * Remove sessions idle for longer than `olderThanMs`. Sessions with a
   * transition in flight are kept. Returns the number reclaimed.
   */
  async expireIdle(olderThanMs: number, now = this.now()): Promise<number> {
    const reclaimed: Session[] = [];
    for (const [userId, session] of this.sessions) {
      if (this.lock.isHeld(userId)) continue;
      if (now - session.lastActivity <= olderThanMs) continue;
      this.sessions.delete(userId);
      reclaimed.push(session);
    }

    if (reclaimed.length === 0) return 0;
    console.log(`[SessionStore] Reclaimed ${reclaimed.length} idle session(s)`);

    const { onReclaim } = this.options;
    if (onReclaim) {
      const results = await Promise.allSettled(reclaimed.map((session) => onReclaim(session)));
      results.forEach((result, i) => {
        if (result.status === 'rejected') {
          console.error(`[SessionStore] Cleanup failed for ${reclaimed[i].userId}:`, result.reason);
        }
      });
    }
    return reclaimed.length;
  }

  /**
   * Periodically reclaim sessions idle for longer than `ttlMs`.
   */
  startSweeper(ttlMs: number, intervalMs: number): void {
    this.stopSweeper();
    this.sweeper = setInterval(() => {
      this.expireIdle(ttlMs).catch((err) => {
        console.error('[SessionStore] Expiry sweep failed:', err);
      });
    }, intervalMs);
    this.sweeper.unref();
  }

  stopSweeper(): void {
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = null;
    }
  }

  /**
   * Drop every session and reject queued events. Called during shutdown.
   */
  clear(): void {
    this.stopSweeper();
    this.lock.clearWaiting();
    this.sessions.clear();
  }
}
