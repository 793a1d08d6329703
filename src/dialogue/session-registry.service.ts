import { Injectable, Logger } from '@nestjs/common';
import { SessionContext } from './session-context';

export const SESSION_IDLE_MS = 30 * 60 * 1000;
const SWEEP_INTERVAL_MS = 60 * 1000;

interface SessionEntry {
  session: SessionContext;
  /** Settles when the last queued turn has finished. */
  tail: Promise<void>;
  pending: number;
  lastSeen: number;
}

/**
 * One session per user. Turns for the same user run strictly one after
 * another; sessions idle for longer than SESSION_IDLE_MS are dropped.
 */
@Injectable()
export class SessionRegistryService {
  private readonly logger = new Logger(SessionRegistryService.name);
  private readonly sessions = new Map<string, SessionEntry>();
  private lastSweep = 0;

  get(userId: string): SessionContext {
    return this.entry(userId).session;
  }

  /** Queues `turn` behind any turn still running for this user. */
  run<T>(userId: string, turn: (session: SessionContext) => Promise<T>): Promise<T> {
    const entry = this.entry(userId);
    entry.pending++;

    const result = entry.tail.then(() => turn(entry.session));
    // the caller gets the rejection; the queue only waits for settlement
    entry.tail = result.then(
      () => undefined,
      () => undefined,
    );

    return result.finally(() => {
      entry.pending--;
      entry.lastSeen = Date.now();
    });
  }

  reset(userId: string): void {
    this.sessions.delete(userId);
  }

  private entry(userId: string): SessionEntry {
    const now = Date.now();
    this.evictIdle(now);

    let entry = this.sessions.get(userId);
    if (!entry) {
      entry = { session: new SessionContext(userId), tail: Promise.resolve(), pending: 0, lastSeen: now };
      this.sessions.set(userId, entry);
      this.logger.log(`New session for ${userId}`);
    }
    entry.lastSeen = now;
    return entry;
  }

  private evictIdle(now: number): void {
    if (now - this.lastSweep < SWEEP_INTERVAL_MS) return;
    this.lastSweep = now;

    let evicted = 0;
    for (const [userId, entry] of this.sessions) {
      if (entry.pending === 0 && now - entry.lastSeen > SESSION_IDLE_MS) {
        this.sessions.delete(userId);
        evicted++;
      }
    }
    if (evicted > 0) this.logger.log(`Evicted ${evicted} idle session(s), ${this.sessions.size} left`);
  }
}
