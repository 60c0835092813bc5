import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { BusyError } from '../errors.js';
import { SessionStore, type Session, type Transition } from '../sessions/index.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve = () => {};
  const promise = new Promise<void>((r) => {
    resolve = () => r();
  });
  return { promise, resolve };
}

function awaitingUpload(current: Session): Session {
  return { ...current, state: 'awaiting_upload', deck: null };
}

describe('SessionStore', () => {
  let clock: number;
  let store: SessionStore;

  beforeEach(() => {
    clock = 1_000;
    store = new SessionStore({ maxQueuedEvents: 2, now: () => clock });
  });

  afterEach(() => {
    store.clear();
    vi.restoreAllMocks();
  });

  describe('getOrCreate', () => {
    it('creates an idle session on first use', () => {
      const session = store.getOrCreate('alice');
      expect(session.state).toBe('idle');
      expect(session.deck).toBeNull();
      expect(session.lastActivity).toBe(1_000);
      expect(store.getOrCreate('alice')).toBe(session);
      expect(store.size).toBe(1);
    });
  });

  describe('update', () => {
    it('commits the returned session and stamps activity', async () => {
      store.getOrCreate('alice');
      clock = 5_000;

      const value = await store.update('alice', async (current) => ({ session: awaitingUpload(current), value: 42 }));

      expect(value).toBe(42);
      expect(store.peek('alice')?.state).toBe('awaiting_upload');
      expect(store.peek('alice')?.lastActivity).toBe(5_000);
      expect(store.isBusy('alice')).toBe(false);
    });

    it('leaves the session untouched when the transition throws', async () => {
      const before = store.getOrCreate('alice');

      await expect(
        store.update('alice', async () => {
          throw new Error('boom');
        }),
      ).rejects.toThrow('boom');

      expect(store.peek('alice')).toBe(before);
      expect(store.isBusy('alice')).toBe(false);
    });

    it('runs transitions for one user strictly one after another', async () => {
      const gate = deferred();
      const seen: string[] = [];

      const first = store.update('alice', async (current): Promise<Transition<null>> => {
        seen.push(current.state);
        await gate.promise;
        return { session: awaitingUpload(current), value: null };
      });
      const second = store.update('alice', async (current) => {
        seen.push(current.state);
        return { session: current, value: null };
      });

      await new Promise((r) => setTimeout(r, 10));
      expect(seen).toEqual(['idle']);
      expect(store.isBusy('alice')).toBe(true);

      gate.resolve();
      await Promise.all([first, second]);
      expect(seen).toEqual(['idle', 'awaiting_upload']);
    });

    it('rejects with Busy when asked not to queue', async () => {
      const gate = deferred();
      const first = store.update('alice', async (current) => {
        await gate.promise;
        return { session: current, value: 'first' };
      });

      await expect(
        store.update('alice', async (current) => ({ session: current, value: 'second' }), { rejectIfBusy: true }),
      ).rejects.toBeInstanceOf(BusyError);

      gate.resolve();
      expect(await first).toBe('first');
    });

    it('rejects with Busy once the queue is full', async () => {
      const gate = deferred();
      const hold = async (current: Session): Promise<Transition<string>> => {
        await gate.promise;
        return { session: current, value: 'done' };
      };

      const running = store.update('alice', hold);
      const queued = [store.update('alice', hold), store.update('alice', hold)];

      await expect(store.update('alice', hold)).rejects.toBeInstanceOf(BusyError);

      gate.resolve();
      expect(await Promise.all([running, ...queued])).toEqual(['done', 'done', 'done']);
    });

    it('does not make other users wait', async () => {
      const gate = deferred();
      const slow = store.update('alice', async (current) => {
        await gate.promise;
        return { session: current, value: null };
      });

      const value = await store.update('bob', async (current) => ({ session: awaitingUpload(current), value: 'bob' }));
      expect(value).toBe('bob');
      expect(store.isBusy('alice')).toBe(true);

      gate.resolve();
      await slow;
    });
  });

  describe('expireIdle', () => {
    it('reclaims sessions idle past the threshold', async () => {
      vi.spyOn(console, 'log').mockImplementation(() => {});
      const reclaimed: string[] = [];
      store = new SessionStore({
        maxQueuedEvents: 2,
        now: () => clock,
        onReclaim: async (session) => {
          reclaimed.push(session.userId);
        },
      });

      store.getOrCreate('old');
      clock = 9_000;
      store.getOrCreate('fresh');

      expect(await store.expireIdle(5_000, 10_000)).toBe(1);
      expect(reclaimed).toEqual(['old']);
      expect(store.peek('old')).toBeUndefined();
      expect(store.peek('fresh')).toBeDefined();
    });

    it('keeps sessions with a transition in flight', async () => {
      const gate = deferred();
      store.getOrCreate('alice');
      const running = store.update('alice', async (current) => {
        await gate.promise;
        return { session: current, value: null };
      });

      expect(await store.expireIdle(0, 1_000_000)).toBe(0);
      expect(store.peek('alice')).toBeDefined();

      gate.resolve();
      await running;
    });

    it('logs cleanup failures and still removes the session', async () => {
      vi.spyOn(console, 'log').mockImplementation(() => {});
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      store = new SessionStore({
        maxQueuedEvents: 2,
        now: () => clock,
        onReclaim: async () => {
          throw new Error('disk gone');
        },
      });

      store.getOrCreate('alice');
      expect(await store.expireIdle(10, 5_000)).toBe(1);
      expect(store.peek('alice')).toBeUndefined();
      expect(errorSpy).toHaveBeenCalledTimes(1);
    });
  });
});
