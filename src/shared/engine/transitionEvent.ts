import type { PlayerId, StateProgram, TransitionEvent } from '../types/stateProgram';

/**
 * Build an event submitted by a player.
 */
export function createPlayerEvent<T>(
  originator: PlayerId,
  transition: T,
  timestamp: number
): TransitionEvent<T> {
  return { originator, timestamp, transition };
}

/**
 * Build an event originated by the program itself, to be fired at
 * `timestamp`. Such events never carry a player.
 */
export function createSuspendedEvent<T>(transition: T, timestamp: number): TransitionEvent<T> {
  return { originator: null, timestamp, transition };
}

/**
 * True when the event was produced by a fired suspended event rather than by
 * a player.
 */
export function isProgramOriginated<T>(event: TransitionEvent<T>): boolean {
  return event.originator === null;
}

/**
 * Normalise a suspended event for firing: the originator is always cleared,
 * whatever the program returned.
 */
export function asFiredEvent<T>(event: TransitionEvent<T>): TransitionEvent<T> {
  return {
    originator: null,
    timestamp: event.timestamp,
    transition: event.transition,
  };
}

/**
 * Ask a program for its suspended event, applying the default (`null`) for
 * programs that do not implement the query.
 */
export function querySuspendedEvent<T>(program: StateProgram<T>): TransitionEvent<T> | null {
  return program.suspendedEvent?.() ?? null;
}
