import {
  asFiredEvent,
  createPlayerEvent,
  createSuspendedEvent,
  isProgramOriginated,
  querySuspendedEvent,
} from '../../../src/shared/engine/transitionEvent';
import { CountdownProgram } from '../../../src/shared/programs/CountdownProgram';
import type { StateProgram, TransitionEvent } from '../../../src/shared/types/stateProgram';

describe('transition events', () => {
  it('records the submitting player on player events', () => {
    const event = createPlayerEvent('alice', { type: 'end_turn' }, 42);

    expect(event).toEqual({ originator: 'alice', timestamp: 42, transition: { type: 'end_turn' } });
    expect(isProgramOriginated(event)).toBe(false);
  });

  it('leaves the originator empty on program events', () => {
    const event = createSuspendedEvent({ type: 'decrement' }, 1000);

    expect(event).toEqual({ originator: null, timestamp: 1000, transition: { type: 'decrement' } });
    expect(isProgramOriginated(event)).toBe(true);
  });

  describe('asFiredEvent', () => {
    it('clears an originator the program should not have set', () => {
      const answer: TransitionEvent<string> = {
        originator: 'mallory',
        timestamp: 7,
        transition: 'tick',
      };

      const fired = asFiredEvent(answer);

      expect(fired).toEqual({ originator: null, timestamp: 7, transition: 'tick' });
      expect(answer.originator).toBe('mallory');
      expect(fired).not.toBe(answer);
    });
  });

  describe('querySuspendedEvent', () => {
    it('defaults to no suspended event for programs without the query', () => {
      const program: StateProgram<string> = { apply: () => undefined };

      expect(querySuspendedEvent(program)).toBeNull();
    });

    it('returns what the program answers', () => {
      const program = new CountdownProgram(250);

      expect(querySuspendedEvent(program)).toEqual({
        originator: null,
        timestamp: 1250,
        transition: { type: 'decrement' },
      });
    });
  });
});
