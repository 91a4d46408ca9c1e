import { z } from 'zod';
import type { StateMachine } from '../types/stateProgram';

export const CounterTransitionSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('add'), amount: z.number() }),
  z.object({ type: z.literal('reset') }),
]);

export type CounterTransition = z.infer<typeof CounterTransitionSchema>;

/**
 * Plain state machine with no notion of players or time. Hosted through
 * {@link StateMachineContainerProgram}.
 */
export class CounterMachine implements StateMachine<CounterTransition> {
  value = 0;
  /** Number of `add` transitions ignored because the amount was not an integer. */
  ignored = 0;

  apply(transition: CounterTransition): void {
    switch (transition.type) {
      case 'add':
        if (!Number.isSafeInteger(transition.amount)) {
          this.ignored += 1;
          return;
        }
        this.value += transition.amount;
        return;
      case 'reset':
        this.value = 0;
        return;
    }
  }
}
