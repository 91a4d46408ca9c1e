import type { TransitionEvent } from './stateProgram';

/**
 * Transport envelope for one event of a session's total order.
 *
 * `seq` starts at 1 and grows by exactly one per applied event, fired
 * suspended events included, so followers can detect gaps and duplicates.
 */
export interface ReplicatedEvent<T> {
  sessionId: string;
  seq: number;
  event: TransitionEvent<T>;
}

/**
 * Outbound side of the replication transport. The authoritative driver
 * publishes every applied event, in order, exactly once.
 */
export interface ReplicationSink<T> {
  publish(envelope: ReplicatedEvent<T>): void;
}
