import { describe, it, expect } from 'vitest';
import {
  applyMove,
  cloneBoard,
  currentPlayer,
  evaluateOutcome,
  filledCount,
  initState,
  isLegal,
  resetGame,
  toggleTurn,
  winningLines,
} from '../board.js';
import { IllegalMoveError } from '../errors.js';
import { defaultConfig } from '../variants.js';
import { stateFromRows } from './helpers.js';

describe('winningLines', () => {
  it.each([1, 2, 3, 4, 5, 6])('builds 2N+2 lines of N distinct cells for N=%i', (n) => {
    const lines = winningLines(n);
    expect(lines).toHaveLength(2 * n + 2);

    const hits = new Map<string, number>();
    for (const line of lines) {
      const keys = new Set(line.map(({ r, c }) => `${r}:${c}`));
      expect(keys.size).toBe(n);
      for (const key of keys) hits.set(key, (hits.get(key) ?? 0) + 1);
    }

    expect(hits.size).toBe(n * n);
    for (const count of hits.values()) {
      expect(count).toBeGreaterThanOrEqual(2);
    }
  });

  it('orders rows, columns, then both diagonals', () => {
    const lines = winningLines(3);
    expect(lines[0]).toEqual([
      { r: 0, c: 0 },
      { r: 0, c: 1 },
      { r: 0, c: 2 },
    ]);
    expect(lines[3]).toEqual([
      { r: 0, c: 0 },
      { r: 1, c: 0 },
      { r: 2, c: 0 },
    ]);
    expect(lines[6]).toEqual([
      { r: 0, c: 0 },
      { r: 1, c: 1 },
      { r: 2, c: 2 },
    ]);
    expect(lines[7]).toEqual([
      { r: 0, c: 2 },
      { r: 1, c: 1 },
      { r: 2, c: 0 },
    ]);
  });

  it('is frozen', () => {
    const lines = winningLines(3);
    expect(Object.isFrozen(lines)).toBe(true);
    expect(Object.isFrozen(lines[0])).toBe(true);
  });
});

describe('evaluateOutcome', () => {
  it('reports a row win once the third mark lands', () => {
    const state = stateFromRows(['XX.', 'OO.', '...']);
    expect(evaluateOutcome(state)).toEqual({ status: 'in_progress' });

    expect(applyMove(state, { r: 0, c: 2, player: 'X' })).toBe('X');
    expect(evaluateOutcome(state)).toEqual({
      status: 'win',
      winner: 'X',
      line: [
        { r: 0, c: 0 },
        { r: 0, c: 1 },
        { r: 0, c: 2 },
      ],
    });
  });

  it('reports a column win for O', () => {
    const state = stateFromRows(['XOX', '.O.', 'XO.']);
    expect(evaluateOutcome(state)).toEqual({
      status: 'win',
      winner: 'O',
      line: [
        { r: 0, c: 1 },
        { r: 1, c: 1 },
        { r: 2, c: 1 },
      ],
    });
  });

  it('reports an anti-diagonal win on a 4x4 board', () => {
    const state = stateFromRows(['XX.O', 'X.O.', '.O..', 'O.XX']);
    expect(evaluateOutcome(state)).toEqual({
      status: 'win',
      winner: 'O',
      line: [
        { r: 0, c: 3 },
        { r: 1, c: 2 },
        { r: 2, c: 1 },
        { r: 3, c: 0 },
      ],
    });
  });

  it('reports a tie on a full board without a line', () => {
    const state = stateFromRows(['XOX', 'XOO', 'OXX']);
    expect(evaluateOutcome(state)).toEqual({ status: 'tie' });
  });

  it('returns the same result when called twice', () => {
    const state = stateFromRows(['X.O', '.X.', 'O..']);
    const first = evaluateOutcome(state);
    expect(evaluateOutcome(state)).toEqual(first);
    expect(first).toEqual({ status: 'in_progress' });
  });
});

describe('applyMove', () => {
  it('writes the cell and records the move', () => {
    const state = initState(defaultConfig());
    applyMove(state, { r: 1, c: 2, player: 'X' });
    expect(state.board[1][2]).toBe('X');
    expect(state.moves).toEqual([{ r: 1, c: 2, player: 'X' }]);
    expect(filledCount(state.board)).toBe(1);
  });

  it('rejects an occupied cell and leaves the state unchanged', () => {
    const state = initState(defaultConfig());
    applyMove(state, { r: 0, c: 0, player: 'X' });
    const before = cloneBoard(state.board);

    expect(() => applyMove(state, { r: 0, c: 0, player: 'O' })).toThrow(IllegalMoveError);
    expect(state.board).toEqual(before);
    expect(state.moves).toHaveLength(1);
  });

  it.each([
    [3, 0],
    [0, -1],
    [0.5, 0],
  ])('rejects off-board coordinates (%s, %s)', (r, c) => {
    const state = initState(defaultConfig());
    expect(() => applyMove(state, { r, c, player: 'X' })).toThrow('coordinates are off the board');
    expect(state.moves).toEqual([]);
  });

  it('leaves turn order to the caller', () => {
    const state = initState(defaultConfig());
    expect(applyMove(state, { r: 0, c: 0, player: 'O' })).toBe('O');
    expect(currentPlayer(state).mark).toBe('X');
  });

  it('rejects any move once the game is won', () => {
    const state = stateFromRows(['XXX', 'OO.', '...']);
    const before = cloneBoard(state.board);

    expect(isLegal(state, { r: 2, c: 2 })).toBe(false);
    expect(() => applyMove(state, { r: 2, c: 2, player: 'O' })).toThrow(
      'Illegal move at (2, 2): the game is already over'
    );
    expect(state.board).toEqual(before);
  });
});

describe('isLegal', () => {
  it('accepts an empty in-range cell of a live game', () => {
    const state = stateFromRows(['X..', '...', '...']);
    expect(isLegal(state, { r: 1, c: 1 })).toBe(true);
    expect(isLegal(state, { r: 0, c: 0 })).toBe(false);
    expect(isLegal(state, { r: 0, c: 3 })).toBe(false);
  });
});

describe('turns and reset', () => {
  it('cycles over the configured players', () => {
    const state = initState(defaultConfig());
    expect(currentPlayer(state).mark).toBe('X');
    expect(toggleTurn(state).mark).toBe('O');
    expect(toggleTurn(state).mark).toBe('X');
  });

  it('clears a finished game without touching the lines', () => {
    const state = stateFromRows(['XXX', 'OO.', '...']);
    const lines = state.lines;
    resetGame(state);

    expect(evaluateOutcome(state)).toEqual({ status: 'in_progress' });
    expect(state.board).toEqual([
      [null, null, null],
      [null, null, null],
      [null, null, null],
    ]);
    expect(state.moves).toEqual([]);
    expect(state.lines).toBe(lines);
  });

  it('keeps the turn cursor unless asked to rewind it', () => {
    const state = initState(defaultConfig());
    toggleTurn(state);

    resetGame(state);
    expect(currentPlayer(state).mark).toBe('O');

    resetGame(state, { resetTurn: true });
    expect(currentPlayer(state).mark).toBe('X');
  });
});
