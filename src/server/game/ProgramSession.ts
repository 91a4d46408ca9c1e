import type winston from 'winston';
import type { PlayerId, StateProgram, TransitionEvent } from '../../shared/types/stateProgram';
import type { ReplicatedEvent, ReplicationSink } from '../../shared/types/replication';
import {
  asFiredEvent,
  createPlayerEvent,
  querySuspendedEvent,
} from '../../shared/engine/transitionEvent';
import {
  createEmptySlot,
  resolveSuspendedEventSlot,
  type SuspendedEventSlot,
} from '../../shared/stateMachines/suspendedEventSlot';
import { PlayerIdSchema } from '../../shared/validation/transitionSchemas';
import {
  ProgramError,
  ProgramInvariantError,
  ReplicationGapError,
  SessionClosedError,
  TransitionRejectedError,
  wrapError,
} from '../../shared/errors';
import { SuspendedEventTimer } from './timers/SuspendedEventTimer';
import { createSessionLogger } from '../utils/logger';

/** Fired events later than this are logged as late. */
const LATE_FIRE_WARNING_MS = 1000;

export type SessionStatus = 'idle' | 'running' | 'closed' | 'failed';

export type AdmissionDecision = { allowed: true } | { allowed: false; reason: string };

/**
 * Validation run before a player's transition enters the ordered stream.
 * Once admitted, a transition is applied on every replica, so this is the
 * only place a transition can still be refused.
 */
export type AdmissionGuard<T, S> = (
  state: Readonly<S>,
  player: PlayerId,
  transition: T
) => AdmissionDecision;

export interface ProgramSessionOptions<T, S extends StateProgram<T>> {
  sessionId: string;
  /** Fresh or restored program instance; the session owns it from now on. */
  program: S;
  sink?: ReplicationSink<T>;
  admit?: AdmissionGuard<T, S>;
  timer?: SuspendedEventTimer;
  now?: () => number;
  /** Sequence number of the last event already applied to a restored program. */
  startSeq?: number;
  /**
   * Most recent events kept for {@link ProgramSession.getEventsSince}. Older
   * entries are dropped. Unbounded when unset.
   */
  maxLoggedEvents?: number;
  /** Called for errors raised outside a caller's stack (timer fires, sink failures). */
  onError?: (error: ProgramError) => void;
}

/**
 * Authoritative host for one program instance.
 *
 * Every event goes through the same pipeline: stamp, apply, record, publish,
 * then ask the program for its suspended event and fold the answer into the
 * single scheduling slot. When the slot's timer fires, the event is fed back
 * through the same pipeline with no originator.
 *
 * All calls for one session happen on the event loop one at a time; nothing
 * here awaits, so apply and the suspended-event query for one event are never
 * interleaved with another event.
 */
export class ProgramSession<T, S extends StateProgram<T>> {
  readonly sessionId: string;

  private readonly program: S;
  private readonly sink: ReplicationSink<T> | undefined;
  private readonly admit: AdmissionGuard<T, S> | undefined;
  private readonly timer: SuspendedEventTimer;
  private readonly now: () => number;
  private readonly onError: ((error: ProgramError) => void) | undefined;
  private readonly logger: winston.Logger;

  private status: SessionStatus = 'idle';
  private seq: number;
  private firstLoggedSeq: number;
  private readonly maxLoggedEvents: number;
  private droppedEvents = 0;
  private readonly eventLog: ReplicatedEvent<T>[] = [];
  private slot: SuspendedEventSlot<T> = createEmptySlot<T>();

  constructor(options: ProgramSessionOptions<T, S>) {
    this.sessionId = options.sessionId;
    this.program = options.program;
    this.sink = options.sink;
    this.admit = options.admit;
    this.timer = options.timer ?? new SuspendedEventTimer();
    this.now = options.now ?? (() => Date.now());
    this.onError = options.onError;
    this.seq = options.startSeq ?? 0;
    this.firstLoggedSeq = this.seq + 1;
    this.maxLoggedEvents = options.maxLoggedEvents ?? Number.POSITIVE_INFINITY;
    this.logger = createSessionLogger(this.sessionId);
  }

  /**
   * Begin accepting transitions and arm the program's initial suspended
   * event, if any. For a restored program this re-derives the pending event
   * from its state. Subsequent calls are no-ops.
   */
  start(): void {
    if (this.status !== 'idle') return;
    this.status = 'running';
    this.logger.info('Session started', { seq: this.seq });
    this.refreshSuspendedEvent();
  }

  /**
   * Admit a player's transition into the ordered stream and apply it.
   *
   * @throws SessionClosedError when the session was closed or failed
   * @throws TransitionRejectedError when the player id is invalid or the
   *   admission guard refuses the transition
   */
  submit(player: PlayerId, transition: T): ReplicatedEvent<T> {
    if (this.status === 'idle') {
      this.start();
    }
    if (this.status !== 'running') {
      throw new SessionClosedError(this.sessionId, this.status);
    }

    if (!PlayerIdSchema.safeParse(player).success) {
      throw new TransitionRejectedError(this.sessionId, 'invalid player id', { player });
    }

    const decision: AdmissionDecision = this.admit
      ? this.admit(this.program, player, transition)
      : { allowed: true };
    if (!decision.allowed) {
      this.logger.warn('Transition rejected', { player, reason: decision.reason });
      throw new TransitionRejectedError(this.sessionId, decision.reason, { player });
    }

    // The stream owns its own copy; the caller may reuse the object.
    return this.commit(createPlayerEvent(player, structuredClone(transition), this.now()));
  }

  /**
   * Stop the session and drop any armed timer. The program state stays
   * readable. Subsequent calls are no-ops.
   */
  close(): void {
    if (this.status === 'closed' || this.status === 'failed') return;
    this.status = 'closed';
    this.clearSlot();
    this.logger.info('Session closed', { seq: this.seq });
  }

  getStatus(): SessionStatus {
    return this.status;
  }

  getState(): Readonly<S> {
    return this.program;
  }

  /** Sequence number of the last applied event (0 before any). */
  getSequence(): number {
    return this.seq;
  }

  /** The event currently armed to fire, or null. */
  getSuspendedEvent(): TransitionEvent<T> | null {
    return this.slot.kind === 'armed' ? this.slot.event : null;
  }

  /**
   * Events applied by this session with a sequence number above `afterSeq`,
   * in order. Used to bring late or lagging followers up to date.
   *
   * The log is the session's catch-up store. It holds every event applied
   * since the session was created, or only the last `maxLoggedEvents`.
   *
   * @throws ReplicationGapError when events after `afterSeq` were already
   *   dropped from the log; the follower must be rebuilt from a snapshot
   */
  getEventsSince(afterSeq: number): ReplicatedEvent<T>[] {
    if (this.droppedEvents > 0 && afterSeq + 1 < this.firstLoggedSeq) {
      throw new ReplicationGapError(this.sessionId, afterSeq + 1, this.firstLoggedSeq, {
        retained: this.eventLog.length,
      });
    }
    const offset = Math.max(0, afterSeq - this.firstLoggedSeq + 1);
    return this.eventLog.slice(offset);
  }

  /** Sequence number of the oldest event still in the log. */
  getFirstLoggedSequence(): number {
    return this.firstLoggedSeq;
  }

  private commit(event: TransitionEvent<T>): ReplicatedEvent<T> {
    try {
      this.program.apply(event);
    } catch (error) {
      throw this.fail('apply threw', error, { originator: event.originator });
    }

    this.seq += 1;
    const envelope: ReplicatedEvent<T> = { sessionId: this.sessionId, seq: this.seq, event };
    this.eventLog.push(envelope);
    if (this.eventLog.length > this.maxLoggedEvents) {
      this.eventLog.shift();
      this.firstLoggedSeq += 1;
      this.droppedEvents += 1;
    }
    this.logger.debug('Transition applied', {
      seq: this.seq,
      originator: event.originator,
      timestamp: event.timestamp,
    });

    this.publish(envelope);
    this.refreshSuspendedEvent();
    return envelope;
  }

  private publish(envelope: ReplicatedEvent<T>): void {
    if (!this.sink) return;
    try {
      this.sink.publish(envelope);
    } catch (error) {
      // The event is applied and logged; followers recover it through
      // getEventsSince.
      const wrapped = wrapError(error, { sessionId: this.sessionId, seq: envelope.seq });
      this.logger.error('Failed to publish replicated event', {
        seq: envelope.seq,
        error: wrapped,
      });
      this.onError?.(wrapped);
    }
  }

  private refreshSuspendedEvent(): void {
    let answer: TransitionEvent<T> | null;
    try {
      answer = querySuspendedEvent<T>(this.program);
    } catch (error) {
      throw this.fail('suspendedEvent threw', error);
    }

    const { slot, change } = resolveSuspendedEventSlot(this.slot, answer, this.seq);
    this.slot = slot;

    if (slot.kind === 'armed' && (change === 'armed' || change === 'replaced')) {
      this.timer.arm(slot.event.timestamp, () => this.fireSuspendedEvent());
    } else if (change === 'cleared') {
      this.timer.disarm();
    }

    if (change !== 'idle' && change !== 'unchanged') {
      this.logger.debug('Suspended event updated', {
        change,
        seq: this.seq,
        fireAt: slot.kind === 'armed' ? slot.event.timestamp : null,
      });
    }
  }

  private fireSuspendedEvent(): void {
    if (this.status !== 'running' || this.slot.kind !== 'armed') return;

    const event = asFiredEvent(structuredClone(this.slot.event));
    // Empty the slot before applying so an identical follow-up answer arms a
    // new timer instead of counting as unchanged.
    this.slot = createEmptySlot<T>();

    const lateByMs = this.now() - event.timestamp;
    if (lateByMs > LATE_FIRE_WARNING_MS) {
      this.logger.warn('Suspended event fired late', { lateByMs, fireAt: event.timestamp });
    }

    try {
      this.commit(event);
    } catch (error) {
      // commit has already marked the session failed and logged the cause.
      this.onError?.(wrapError(error, { sessionId: this.sessionId }));
    }
  }

  private fail(detail: string, cause: unknown, context: Record<string, unknown> = {}): ProgramInvariantError {
    this.status = 'failed';
    this.clearSlot();
    const error = new ProgramInvariantError(this.sessionId, detail, {
      ...context,
      seq: this.seq,
      cause: cause instanceof Error ? cause.message : String(cause),
    });
    this.logger.error('Session failed', { error, cause });
    return error;
  }

  private clearSlot(): void {
    this.slot = createEmptySlot<T>();
    this.timer.disarm();
  }
}
