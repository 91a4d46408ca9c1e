import type { TransitionEvent } from '../types/stateProgram';
import { fingerprintState } from '../engine/fingerprint';

/**
 * Explicit model of the single scheduling slot an authoritative host keeps
 * for one program instance.
 *
 * The program itself never stores timer state; after every apply the host
 * asks it for the current suspended event and folds the answer into this
 * slot. Each answer fully supersedes the previous one, so the slot is a pure
 * function of (previous slot, latest answer).
 */

export type SuspendedEventSlot<T> =
  | {
      kind: 'empty';
    }
  | {
      kind: 'armed';
      event: TransitionEvent<T>;
      /** Canonical fingerprint of `event`, used to detect identical answers. */
      fingerprint: string;
      /** Sequence number of the last event applied when this answer was first seen. */
      armedAtSeq: number;
    };

/**
 * What a new answer did to the slot.
 *
 * - `armed`: nothing was pending, now an event is
 * - `replaced`: a different event supersedes the pending one
 * - `cleared`: the pending event was cancelled
 * - `unchanged`: the same event was returned again
 * - `idle`: nothing was pending and nothing is
 */
export type SuspendedEventSlotChange = 'armed' | 'replaced' | 'cleared' | 'unchanged' | 'idle';

export interface SuspendedEventSlotUpdate<T> {
  slot: SuspendedEventSlot<T>;
  change: SuspendedEventSlotChange;
}

export function createEmptySlot<T>(): SuspendedEventSlot<T> {
  return { kind: 'empty' };
}

export function resolveSuspendedEventSlot<T>(
  previous: SuspendedEventSlot<T>,
  answer: TransitionEvent<T> | null,
  seq: number
): SuspendedEventSlotUpdate<T> {
  if (answer === null) {
    return {
      slot: createEmptySlot<T>(),
      change: previous.kind === 'armed' ? 'cleared' : 'idle',
    };
  }

  const fingerprint = fingerprintState(answer);

  if (previous.kind === 'armed' && previous.fingerprint === fingerprint) {
    return { slot: previous, change: 'unchanged' };
  }

  return {
    slot: {
      kind: 'armed',
      event: answer,
      fingerprint,
      armedAtSeq: seq,
    },
    change: previous.kind === 'armed' ? 'replaced' : 'armed',
  };
}
