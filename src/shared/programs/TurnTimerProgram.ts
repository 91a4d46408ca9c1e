import { z } from 'zod';
import type { PlayerId, StateProgram, TransitionEvent } from '../types/stateProgram';
import { createSuspendedEvent } from '../engine/transitionEvent';

export const TurnTimerTransitionSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('start'),
    players: z.array(z.string().min(1)).min(1),
    turnMs: z.number().int().positive(),
    matchMs: z.number().int().positive(),
  }),
  z.object({ type: z.literal('end_turn') }),
  z.object({ type: z.literal('turn_timeout'), turn: z.number().int().nonnegative() }),
  z.object({ type: z.literal('match_timeout') }),
]);

export type TurnTimerTransition = z.infer<typeof TurnTimerTransitionSchema>;

export type TurnTimerPhase = 'lobby' | 'playing' | 'finished';

export type TurnTimerRejection = 'NOT_YOUR_TURN' | 'NOT_PLAYING' | 'ALREADY_STARTED' | 'CLOCK_ONLY';

export interface TurnTimerRejectionMarker {
  reason: TurnTimerRejection;
  originator: PlayerId | null;
  at: number;
}

/**
 * Round-robin turns with a per-turn deadline and an overall match deadline.
 *
 * Two future wake-ups can be pending at once; the single suspended-event slot
 * always carries whichever comes first, and the match deadline wins ties.
 * Refused transitions are recorded in {@link lastRejection} rather than
 * thrown, so every replica records the same refusal.
 */
export class TurnTimerProgram implements StateProgram<TurnTimerTransition> {
  phase: TurnTimerPhase = 'lobby';
  players: PlayerId[] = [];
  /** Number of turns started so far; the current turn index is `turn - 1`. */
  turn = 0;
  turnMs = 0;
  turnDeadline = 0;
  matchDeadline = 0;
  timedOutTurns = 0;
  lastRejection: TurnTimerRejectionMarker | null = null;

  get currentPlayer(): PlayerId | null {
    if (this.phase !== 'playing' || this.players.length === 0) return null;
    return this.players[(this.turn - 1) % this.players.length] ?? null;
  }

  apply(event: TransitionEvent<TurnTimerTransition>): void {
    const { transition } = event;
    switch (transition.type) {
      case 'start': {
        if (this.phase !== 'lobby') {
          this.reject('ALREADY_STARTED', event);
          return;
        }
        const players = Array.from(new Set(transition.players));
        if (players.length === 0) {
          this.reject('NOT_PLAYING', event);
          return;
        }
        this.players = players;
        this.turnMs = transition.turnMs;
        this.matchDeadline = event.timestamp + transition.matchMs;
        this.phase = 'playing';
        this.beginTurn(event.timestamp);
        return;
      }
      case 'end_turn':
        if (this.phase !== 'playing') {
          this.reject('NOT_PLAYING', event);
          return;
        }
        if (event.originator === null || event.originator !== this.currentPlayer) {
          this.reject('NOT_YOUR_TURN', event);
          return;
        }
        this.beginTurn(event.timestamp);
        return;
      case 'turn_timeout':
        if (event.originator !== null) {
          this.reject('CLOCK_ONLY', event);
          return;
        }
        // A timeout for a turn that already ended is stale.
        if (this.phase !== 'playing' || transition.turn !== this.turn) return;
        this.timedOutTurns += 1;
        this.beginTurn(event.timestamp);
        return;
      case 'match_timeout':
        if (event.originator !== null) {
          this.reject('CLOCK_ONLY', event);
          return;
        }
        if (this.phase !== 'playing') return;
        this.phase = 'finished';
        return;
    }
  }

  suspendedEvent(): TransitionEvent<TurnTimerTransition> | null {
    if (this.phase !== 'playing') return null;
    if (this.matchDeadline <= this.turnDeadline) {
      return createSuspendedEvent<TurnTimerTransition>({ type: 'match_timeout' }, this.matchDeadline);
    }
    return createSuspendedEvent<TurnTimerTransition>(
      { type: 'turn_timeout', turn: this.turn },
      this.turnDeadline
    );
  }

  private beginTurn(at: number): void {
    this.turn += 1;
    this.turnDeadline = at + this.turnMs;
  }

  private reject(reason: TurnTimerRejection, event: TransitionEvent<TurnTimerTransition>): void {
    this.lastRejection = { reason, originator: event.originator, at: event.timestamp };
  }
}
