import { TurnTimerProgram } from '../../../src/shared/programs/TurnTimerProgram';

describe('TurnTimerProgram', () => {
  function startedProgram(turnMs = 100, matchMs = 1000): TurnTimerProgram {
    const program = new TurnTimerProgram();
    program.apply({
      originator: 'alice',
      timestamp: 0,
      transition: { type: 'start', players: ['alice', 'bob'], turnMs, matchMs },
    });
    return program;
  }

  it('has nothing pending in the lobby', () => {
    const program = new TurnTimerProgram();

    expect(program.phase).toBe('lobby');
    expect(program.currentPlayer).toBeNull();
    expect(program.suspendedEvent()).toBeNull();
  });

  it('starts the first turn and suspends its timeout', () => {
    const program = startedProgram();

    expect(program.phase).toBe('playing');
    expect(program.turn).toBe(1);
    expect(program.currentPlayer).toBe('alice');
    expect(program.turnDeadline).toBe(100);
    expect(program.matchDeadline).toBe(1000);
    expect(program.suspendedEvent()).toEqual({
      originator: null,
      timestamp: 100,
      transition: { type: 'turn_timeout', turn: 1 },
    });
  });

  it('refuses to end another player turn', () => {
    const program = startedProgram();

    program.apply({ originator: 'bob', timestamp: 50, transition: { type: 'end_turn' } });

    expect(program.turn).toBe(1);
    expect(program.lastRejection).toEqual({ reason: 'NOT_YOUR_TURN', originator: 'bob', at: 50 });
  });

  it('moves to the next player when the current one ends the turn', () => {
    const program = startedProgram();

    program.apply({ originator: 'alice', timestamp: 60, transition: { type: 'end_turn' } });

    expect(program.turn).toBe(2);
    expect(program.currentPlayer).toBe('bob');
    expect(program.suspendedEvent()).toEqual({
      originator: null,
      timestamp: 160,
      transition: { type: 'turn_timeout', turn: 2 },
    });
  });

  it('ignores a timeout for a turn that already ended', () => {
    const program = startedProgram();
    program.apply({ originator: 'alice', timestamp: 60, transition: { type: 'end_turn' } });

    program.apply({ originator: null, timestamp: 100, transition: { type: 'turn_timeout', turn: 1 } });

    expect(program.turn).toBe(2);
    expect(program.timedOutTurns).toBe(0);
    expect(program.lastRejection).toBeNull();
  });

  it('advances on a timeout of the current turn', () => {
    const program = startedProgram();
    program.apply({ originator: 'alice', timestamp: 60, transition: { type: 'end_turn' } });

    program.apply({ originator: null, timestamp: 160, transition: { type: 'turn_timeout', turn: 2 } });

    expect(program.timedOutTurns).toBe(1);
    expect(program.turn).toBe(3);
    expect(program.currentPlayer).toBe('alice');
    expect(program.turnDeadline).toBe(260);
  });

  it('lets the match deadline win a tie with the turn deadline', () => {
    const program = startedProgram(500, 500);

    expect(program.suspendedEvent()).toEqual({
      originator: null,
      timestamp: 500,
      transition: { type: 'match_timeout' },
    });

    program.apply({ originator: null, timestamp: 500, transition: { type: 'match_timeout' } });

    expect(program.phase).toBe('finished');
    expect(program.suspendedEvent()).toBeNull();
  });

  it('accepts clock transitions only from the clock', () => {
    const program = startedProgram();

    program.apply({ originator: 'bob', timestamp: 10, transition: { type: 'turn_timeout', turn: 1 } });
    expect(program.lastRejection).toEqual({ reason: 'CLOCK_ONLY', originator: 'bob', at: 10 });

    program.apply({ originator: 'alice', timestamp: 20, transition: { type: 'match_timeout' } });
    expect(program.lastRejection).toEqual({ reason: 'CLOCK_ONLY', originator: 'alice', at: 20 });
    expect(program.phase).toBe('playing');
    expect(program.turn).toBe(1);
  });

  it('cannot be started twice', () => {
    const program = startedProgram();

    program.apply({
      originator: 'bob',
      timestamp: 30,
      transition: { type: 'start', players: ['bob'], turnMs: 10, matchMs: 10 },
    });

    expect(program.lastRejection).toEqual({ reason: 'ALREADY_STARTED', originator: 'bob', at: 30 });
    expect(program.players).toEqual(['alice', 'bob']);
  });

  it('drops duplicate players', () => {
    const program = new TurnTimerProgram();

    program.apply({
      originator: 'alice',
      timestamp: 0,
      transition: { type: 'start', players: ['alice', 'bob', 'alice'], turnMs: 10, matchMs: 100 },
    });

    expect(program.players).toEqual(['alice', 'bob']);
  });

  it('stays in the lobby when started without players', () => {
    const program = new TurnTimerProgram();

    program.apply({
      originator: 'alice',
      timestamp: 5,
      transition: { type: 'start', players: [], turnMs: 10, matchMs: 100 },
    });

    expect(program.phase).toBe('lobby');
    expect(program.lastRejection).toEqual({ reason: 'NOT_PLAYING', originator: 'alice', at: 5 });
  });

  it('refuses to end a turn outside play', () => {
    const program = new TurnTimerProgram();

    program.apply({ originator: 'alice', timestamp: 1, transition: { type: 'end_turn' } });

    expect(program.lastRejection).toEqual({ reason: 'NOT_PLAYING', originator: 'alice', at: 1 });
  });
});
