import type { StateProgram, StateProgramFactory } from '../../shared/types/stateProgram';
import type { ReplicationSink } from '../../shared/types/replication';
import {
  SessionAlreadyExistsError,
  SessionLimitReachedError,
  SessionNotFoundError,
  type ProgramError,
} from '../../shared/errors';
import { ProgramSession, type AdmissionGuard } from './ProgramSession';
import { SuspendedEventTimer } from './timers/SuspendedEventTimer';
import { config } from '../config';
import { logger } from '../utils/logger';

export interface ProgramSessionManagerOptions<T, S extends StateProgram<T>> {
  /** Defaults to `config.sessions.maxSessions`. */
  maxSessions?: number;
  sinkFor?: (sessionId: string) => ReplicationSink<T> | undefined;
  admit?: AdmissionGuard<T, S>;
  timerFor?: (sessionId: string) => SuspendedEventTimer;
  now?: () => number;
  /** Passed to every session as its event log bound. */
  maxLoggedEvents?: number;
  onSessionError?: (sessionId: string, error: ProgramError) => void;
}

/**
 * Owns the lifecycle of every session of one program type: creates instances
 * through the factory, hands out live sessions and tears them down.
 */
export class ProgramSessionManager<T, S extends StateProgram<T>> {
  private readonly sessions: Map<string, ProgramSession<T, S>> = new Map();
  private readonly maxSessions: number;

  constructor(
    private readonly factory: StateProgramFactory<S>,
    private readonly options: ProgramSessionManagerOptions<T, S> = {}
  ) {
    this.maxSessions = options.maxSessions ?? config.sessions.maxSessions;
  }

  /**
   * Create and start a session with a fresh program instance.
   *
   * @throws SessionAlreadyExistsError when the id is taken
   * @throws SessionLimitReachedError when `maxSessions` sessions are live
   * @throws ProgramInvariantError when the program fails its first
   *   suspended-event query; the id stays free
   */
  createSession(sessionId: string): ProgramSession<T, S> {
    if (this.sessions.has(sessionId)) {
      throw new SessionAlreadyExistsError(sessionId);
    }
    if (this.sessions.size >= this.maxSessions) {
      throw new SessionLimitReachedError(this.maxSessions, { sessionId });
    }

    const session = new ProgramSession<T, S>({
      sessionId,
      program: this.factory.create(),
      sink: this.options.sinkFor?.(sessionId),
      admit: this.options.admit,
      timer: this.options.timerFor?.(sessionId) ?? new SuspendedEventTimer(),
      now: this.options.now,
      maxLoggedEvents: this.options.maxLoggedEvents,
      onError: (error) => this.options.onSessionError?.(sessionId, error),
    });

    // A session that fails while starting is never registered.
    session.start();
    this.sessions.set(sessionId, session);
    logger.debug('Session created', { sessionId, sessionCount: this.sessions.size });
    return session;
  }

  getSession(sessionId: string): ProgramSession<T, S> | undefined {
    return this.sessions.get(sessionId);
  }

  /**
   * @throws SessionNotFoundError when no live session has this id
   */
  requireSession(sessionId: string): ProgramSession<T, S> {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    return session;
  }

  getOrCreateSession(sessionId: string): ProgramSession<T, S> {
    return this.sessions.get(sessionId) ?? this.createSession(sessionId);
  }

  /**
   * Close and forget a session. Returns false when there was none.
   */
  closeSession(sessionId: string): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) return false;

    session.close();
    this.sessions.delete(sessionId);
    logger.debug('Session removed', { sessionId, sessionCount: this.sessions.size });
    return true;
  }

  closeAll(): void {
    for (const sessionId of Array.from(this.sessions.keys())) {
      this.closeSession(sessionId);
    }
  }

  getSessionCount(): number {
    return this.sessions.size;
  }

  getSessionIds(): string[] {
    return Array.from(this.sessions.keys());
  }
}
