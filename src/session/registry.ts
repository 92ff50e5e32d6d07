// src/session/registry.ts
import type { Logger } from 'pino';
import { SessionNotFoundError } from '../pipeline/errors';
import type { PipelineDeps } from '../pipeline/types';
import type { RunRecorder } from '../records/types';
import { SessionContext } from './session';

export class SessionRegistry {
  private readonly sessions = new Map<string, SessionContext>();
  private readonly log: Logger;

  constructor(
    private readonly deps: PipelineDeps,
    private readonly recorder: RunRecorder,
    private readonly now: () => Date = () => new Date(),
  ) {
    this.log = deps.logger.child({ component: 'sessions' });
  }

  get size(): number {
    return this.sessions.size;
  }

  create(): SessionContext {
    const session = new SessionContext(this.deps, { recorder: this.recorder, now: this.now });
    this.sessions.set(session.id, session);
    this.log.debug({ sessionId: session.id }, 'session created');
    return session;
  }

  get(id: string): SessionContext {
    const session = this.sessions.get(id);
    if (!session) throw new SessionNotFoundError(id);
    return session;
  }

  /** `newSession()` issues a new id, so the context moves to the new key. */
  reset(id: string): SessionContext {
    const session = this.get(id);
    const nextId = session.newSession();
    this.sessions.delete(id);
    this.sessions.set(nextId, session);
    return session;
  }

  delete(id: string): boolean {
    return this.sessions.delete(id);
  }

  /** Drops sessions idle longer than `ttlMs`; busy ones are kept. Returns how many went. */
  sweep(ttlMs: number): number {
    const cutoff = this.now().getTime() - ttlMs;
    let removed = 0;
    for (const [id, session] of this.sessions) {
      if (!session.busy && session.lastActivity < cutoff) {
        this.sessions.delete(id);
        removed++;
      }
    }
    if (removed) this.log.info({ removed, remaining: this.sessions.size }, 'idle sessions evicted');
    return removed;
  }
}
