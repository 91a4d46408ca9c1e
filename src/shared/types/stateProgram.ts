/**
 * Core contracts for deterministic, replicable state.
 *
 * A {@link StateMachine} is the minimal apply-in-place contract. A
 * {@link StateProgram} narrows it to transitions wrapped in
 * {@link TransitionEvent} metadata and may declare a single future
 * transition that the authoritative host should fire on its behalf.
 *
 * Everything in this module is host-agnostic: the same implementations run on
 * the server and on every client replica.
 */

/**
 * Identifier of an external actor (a player) that submitted a transition.
 */
export type PlayerId = string;

/**
 * A deterministic mutation command. Transitions are plain data; applying the
 * same transition to equal states must produce equal states on every replica.
 */
export type Transition = unknown;

/**
 * Minimal deterministic state machine.
 *
 * `apply` mutates the receiver in place and must be total: a transition that
 * is invalid in domain terms resolves to a defined no-op or an in-state error
 * marker, never a thrown error. Once a transition has been broadcast there is
 * no way to roll it back on the other replicas.
 */
export interface StateMachine<T = Transition> {
  apply(transition: T): void;
}

/**
 * A transition enriched with replication metadata.
 */
export interface TransitionEvent<T = Transition> {
  /**
   * Player that caused the event, or `null` when the event was synthesized
   * from a fired suspended event.
   */
  originator: PlayerId | null;
  /**
   * Authoritative time in ms since epoch. For player events this is when the
   * server admitted the event; for suspended events it is when the event is
   * meant to fire. Programs must read time from here and never from a clock.
   */
  timestamp: number;
  transition: T;
}

/**
 * A {@link StateMachine} driven by {@link TransitionEvent}s, usable directly by
 * the authoritative session driver and follower replicas.
 */
export interface StateProgram<T = Transition> extends StateMachine<TransitionEvent<T>> {
  /**
   * The single transition, if any, that should be applied automatically at a
   * future time.
   *
   * The authoritative driver calls this once after every apply (and once when
   * a session starts). `null` cancels any previously suspended event; an event
   * replaces it. Only one event can be suspended at a time, so a program that
   * wants several wake-ups must return the chronologically next one each time.
   *
   * When the event fires it is applied with `originator: null`. Follower
   * replicas never call this method; they receive the fired event through the
   * ordered replication stream like any other.
   *
   * Programs that omit this method never suspend events.
   */
  suspendedEvent?(): TransitionEvent<T> | null;
}

/**
 * Creates fresh, independent {@link StateProgram} instances, one per session.
 *
 * Factories may keep their own state (for example an instance counter) but
 * must not share mutable state between the instances they create.
 */
export interface StateProgramFactory<S extends StateProgram<unknown>> {
  create(): S;
}
