/**
 * ReplayEngine - deterministic replay of a recorded transition log.
 *
 * Creates a fresh program from a factory and applies recorded
 * {@link TransitionEvent}s in order, recording a state hash after every step.
 * Two replays of the same log must produce the same hash trail; comparing
 * trails pinpoints the first step at which two replicas diverged.
 *
 * The replay engine never consults `suspendedEvent`: fired suspended events
 * are already part of the recorded log, exactly as a follower replica sees
 * them.
 *
 * @module ReplayEngine
 */

import type { StateProgram, StateProgramFactory, TransitionEvent } from '../types/stateProgram';
import { hashState } from '../engine/fingerprint';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Result of applying a single event during replay.
 */
export interface ReplayStepResult {
  /** 1-based index of the event in the replayed log */
  step: number;

  /** State hash after applying the event */
  stateHash: string;
}

export interface ReplayEngineOptions<S extends StateProgram<unknown>> {
  factory: StateProgramFactory<S>;

  /** Optional hook called after each applied event */
  debugHook?: (step: number, state: S) => void;
}

// ═══════════════════════════════════════════════════════════════════════════
// REPLAY ENGINE
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Usage:
 * ```typescript
 * const engine = new ReplayEngine<CountdownTransition, CountdownProgram>({
 *   factory: new DefaultStateProgramFactory(CountdownProgram),
 * });
 * engine.applyAll(recordedEvents);
 * console.log(engine.getStateHash());
 * ```
 */
export class ReplayEngine<T, S extends StateProgram<T>> {
  private readonly state: S;
  private readonly hashTrail: string[] = [];
  private readonly debugHook: ((step: number, state: S) => void) | undefined;

  constructor(options: ReplayEngineOptions<S>) {
    this.state = options.factory.create();
    this.debugHook = options.debugHook;
  }

  applyEvent(event: TransitionEvent<T>): ReplayStepResult {
    this.state.apply(event);
    const stateHash = hashState(this.state);
    this.hashTrail.push(stateHash);
    const step = this.hashTrail.length;
    this.debugHook?.(step, this.state);
    return { step, stateHash };
  }

  applyAll(events: Iterable<TransitionEvent<T>>): ReplayStepResult[] {
    const results: ReplayStepResult[] = [];
    for (const event of events) {
      results.push(this.applyEvent(event));
    }
    return results;
  }

  getState(): S {
    return this.state;
  }

  getStateHash(): string {
    return hashState(this.state);
  }

  getStepCount(): number {
    return this.hashTrail.length;
  }

  /** State hashes after each applied event, in order. */
  getHashTrail(): readonly string[] {
    return this.hashTrail;
  }
}

/**
 * Replay a complete log on a fresh instance and return the final state.
 */
export function replayTransitionLog<T, S extends StateProgram<T>>(
  factory: StateProgramFactory<S>,
  events: Iterable<TransitionEvent<T>>
): { state: S; stateHash: string; steps: number } {
  const engine = new ReplayEngine<T, S>({ factory });
  engine.applyAll(events);
  return {
    state: engine.getState(),
    stateHash: engine.getStateHash(),
    steps: engine.getStepCount(),
  };
}
