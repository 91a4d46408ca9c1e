import {
  CountdownProgram,
  CountdownProgramFactory,
} from '../../../src/shared/programs/CountdownProgram';
import { asFiredEvent, querySuspendedEvent } from '../../../src/shared/engine/transitionEvent';

describe('CountdownProgram', () => {
  function fireNext(program: CountdownProgram): void {
    const next = querySuspendedEvent(program);
    if (!next) {
      throw new Error('expected a suspended event');
    }
    program.apply(asFiredEvent(next));
  }

  it('suspends its first decrement one interval after start', () => {
    const program = new CountdownProgram();

    expect(program.remaining).toBe(3);
    expect(program.suspendedEvent()).toEqual({
      originator: null,
      timestamp: 1000,
      transition: { type: 'decrement' },
    });
  });

  it('returns equal answers when queried repeatedly without an apply', () => {
    const program = new CountdownProgram();

    expect(program.suspendedEvent()).toEqual(program.suspendedEvent());
  });

  it('counts down to zero through its own events and then stops', () => {
    const program = new CountdownProgram();

    fireNext(program);
    expect(program.remaining).toBe(2);
    expect(program.suspendedEvent()?.timestamp).toBe(2000);

    fireNext(program);
    fireNext(program);
    expect(program.remaining).toBe(0);
    expect(program.lastTickAt).toBe(3000);
    expect(program.suspendedEvent()).toBeNull();
  });

  it('restarts from the reset time', () => {
    const program = new CountdownProgram();
    fireNext(program);
    fireNext(program);
    expect(program.remaining).toBe(1);

    program.apply({ originator: 'p1', timestamp: 2500, transition: { type: 'reset' } });

    expect(program.remaining).toBe(3);
    expect(program.suspendedEvent()).toEqual({
      originator: null,
      timestamp: 3500,
      transition: { type: 'decrement' },
    });
  });

  it('ignores decrements submitted by players', () => {
    const program = new CountdownProgram();

    program.apply({ originator: 'p1', timestamp: 500, transition: { type: 'decrement' } });

    expect(program.remaining).toBe(3);
    expect(program.lastTickAt).toBe(0);
  });

  it('ignores decrements once finished', () => {
    const program = new CountdownProgram();
    fireNext(program);
    fireNext(program);
    fireNext(program);

    program.apply({ originator: null, timestamp: 9000, transition: { type: 'decrement' } });

    expect(program.remaining).toBe(0);
    expect(program.lastTickAt).toBe(3000);
  });

  it('honours a custom start time and interval', () => {
    const program = new CountdownProgram(100, 50);

    expect(program.suspendedEvent()?.timestamp).toBe(150);
  });

  it('reaches the same state on two instances fed the same events', () => {
    const a = new CountdownProgram();
    const b = new CountdownProgram();
    const events = [
      { originator: null, timestamp: 1000, transition: { type: 'decrement' as const } },
      { originator: 'p2', timestamp: 1200, transition: { type: 'reset' as const } },
      { originator: null, timestamp: 2200, transition: { type: 'decrement' as const } },
    ];

    for (const event of events) {
      a.apply(event);
      b.apply(event);
    }

    expect(a).toEqual(b);
    expect(a.remaining).toBe(2);
    expect(a.suspendedEvent()).toEqual(b.suspendedEvent());
  });

  describe('CountdownProgramFactory', () => {
    it('starts every instance at the given time', () => {
      const factory = new CountdownProgramFactory(1_700_000_000_000, 250);

      const first = factory.create();
      const second = factory.create();
      first.apply({ originator: 'p1', timestamp: 1_700_000_000_100, transition: { type: 'reset' } });

      expect(first).not.toBe(second);
      expect(second.lastTickAt).toBe(1_700_000_000_000);
      expect(second.suspendedEvent()?.timestamp).toBe(1_700_000_000_250);
      expect(first.suspendedEvent()?.timestamp).toBe(1_700_000_000_350);
    });

    it('uses the default interval when none is given', () => {
      expect(new CountdownProgramFactory(5000).create().suspendedEvent()?.timestamp).toBe(6000);
    });
  });
});
