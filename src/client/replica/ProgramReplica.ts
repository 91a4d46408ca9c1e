import type { StateProgram, StateProgramFactory } from '../../shared/types/stateProgram';
import type { ReplicatedEvent } from '../../shared/types/replication';
import { hashState } from '../../shared/engine/fingerprint';
import { ReplicationGapError, ReplicationSessionMismatchError } from '../../shared/errors';

export interface ProgramReplicaOptions<S extends StateProgram<unknown>> {
  sessionId: string;
  /** Creates the initial instance; must be the same factory the server uses. */
  factory: StateProgramFactory<S>;
}

/**
 * Follower copy of a session's program.
 *
 * Applies the replicated stream strictly in sequence order and nothing else.
 * Fired suspended events reach the follower as ordinary stream entries with
 * no originator; the follower never asks its program for a suspended event,
 * so it consumes the stream the same way whatever produced each event.
 */
export class ProgramReplica<T, S extends StateProgram<T>> {
  readonly sessionId: string;

  private readonly program: S;
  private lastSeq = 0;

  constructor(options: ProgramReplicaOptions<S>) {
    this.sessionId = options.sessionId;
    this.program = options.factory.create();
  }

  /**
   * Apply the next event of the stream.
   *
   * Returns false for an event already applied (a redelivered duplicate).
   *
   * @throws ReplicationSessionMismatchError for another session's event
   * @throws ReplicationGapError when events were skipped; the caller must
   *   fetch the missing range before continuing
   */
  receive(envelope: ReplicatedEvent<T>): boolean {
    if (envelope.sessionId !== this.sessionId) {
      throw new ReplicationSessionMismatchError(this.sessionId, envelope.sessionId);
    }

    const expectedSeq = this.lastSeq + 1;
    if (envelope.seq < expectedSeq) {
      return false;
    }
    if (envelope.seq > expectedSeq) {
      throw new ReplicationGapError(this.sessionId, expectedSeq, envelope.seq);
    }

    this.program.apply(envelope.event);
    this.lastSeq = envelope.seq;
    return true;
  }

  /**
   * Apply a batch in order; returns how many events were new.
   */
  receiveAll(envelopes: Iterable<ReplicatedEvent<T>>): number {
    let applied = 0;
    for (const envelope of envelopes) {
      if (this.receive(envelope)) {
        applied += 1;
      }
    }
    return applied;
  }

  getState(): Readonly<S> {
    return this.program;
  }

  getLastSequence(): number {
    return this.lastSeq;
  }

  getStateHash(): string {
    return hashState(this.program);
  }
}
