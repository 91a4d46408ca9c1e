import type {
  StateMachine,
  StateProgram,
  StateProgramFactory,
  TransitionEvent,
} from '../types/stateProgram';

/**
 * Lifts a plain {@link StateMachine} into a {@link StateProgram}.
 *
 * Event metadata (originator and timestamp) is stripped before the transition
 * reaches the inner machine, so the inner state can never depend on who caused
 * a change. Container programs never suspend events: plain machines that need
 * timers must implement {@link StateProgram} themselves.
 */
export class StateMachineContainerProgram<T, SM extends StateMachine<T> = StateMachine<T>>
  implements StateProgram<T>
{
  constructor(public readonly inner: SM) {}

  apply(event: TransitionEvent<T>): void {
    this.inner.apply(event.transition);
  }
}

/**
 * Zero-argument constructor, the TypeScript stand-in for "default
 * constructible".
 */
export type DefaultConstructor<S> = new () => S;

/**
 * Creates a {@link StateMachineContainerProgram} around a freshly constructed
 * machine for every session.
 */
export class StateMachineContainerProgramFactory<T, SM extends StateMachine<T>>
  implements StateProgramFactory<StateMachineContainerProgram<T, SM>>
{
  constructor(private readonly machineType: DefaultConstructor<SM>) {}

  create(): StateMachineContainerProgram<T, SM> {
    return new StateMachineContainerProgram<T, SM>(new this.machineType());
  }
}

/**
 * Creates a freshly constructed program for every session, unchanged.
 *
 * Together with {@link StateMachineContainerProgramFactory} this lets session
 * code stay generic over whether an application schedules events or not.
 */
export class DefaultStateProgramFactory<S extends StateProgram<unknown>>
  implements StateProgramFactory<S>
{
  constructor(private readonly programType: DefaultConstructor<S>) {}

  create(): S {
    return new this.programType();
  }
}
