import { z } from 'zod';
import type { StateProgram, StateProgramFactory, TransitionEvent } from '../types/stateProgram';
import { createSuspendedEvent } from '../engine/transitionEvent';

export const COUNTDOWN_START = 3;
export const DEFAULT_COUNTDOWN_INTERVAL_MS = 1000;

export const CountdownTransitionSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('decrement') }),
  z.object({ type: z.literal('reset') }),
]);

export type CountdownTransition = z.infer<typeof CountdownTransitionSchema>;

/**
 * Counts down from {@link COUNTDOWN_START} once per interval, driven entirely
 * by its own suspended events.
 *
 * Only the clock may decrement; a player `decrement` is a no-op. Anyone may
 * `reset`, which restarts the countdown from the reset time.
 *
 * The zero-argument form counts from the epoch, which suits clock-free tests.
 * On a wall clock those deadlines are long past, so hosts create instances
 * through {@link CountdownProgramFactory} with the session's start time.
 */
export class CountdownProgram implements StateProgram<CountdownTransition> {
  remaining = COUNTDOWN_START;
  lastTickAt: number;

  constructor(
    startedAt = 0,
    readonly intervalMs: number = DEFAULT_COUNTDOWN_INTERVAL_MS
  ) {
    this.lastTickAt = startedAt;
  }

  apply(event: TransitionEvent<CountdownTransition>): void {
    switch (event.transition.type) {
      case 'decrement':
        if (event.originator !== null || this.remaining === 0) return;
        this.remaining -= 1;
        this.lastTickAt = event.timestamp;
        return;
      case 'reset':
        this.remaining = COUNTDOWN_START;
        this.lastTickAt = event.timestamp;
        return;
    }
  }

  suspendedEvent(): TransitionEvent<CountdownTransition> | null {
    if (this.remaining === 0) return null;
    return createSuspendedEvent<CountdownTransition>(
      { type: 'decrement' },
      this.lastTickAt + this.intervalMs
    );
  }
}

/**
 * Creates countdowns that all start at the same authoritative time. The
 * server and its followers must be given the same `startedAt`.
 */
export class CountdownProgramFactory implements StateProgramFactory<CountdownProgram> {
  constructor(
    private readonly startedAt: number,
    private readonly intervalMs: number = DEFAULT_COUNTDOWN_INTERVAL_MS
  ) {}

  create(): CountdownProgram {
    return new CountdownProgram(this.startedAt, this.intervalMs);
  }
}
