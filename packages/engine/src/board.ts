import { IllegalMoveError } from './errors.js';
import type { Cell, Coord, EngineConfig, GameState, Line, Mark, Move, Outcome, PlayerProfile } from './types.js';

export function createBoard(n: number): Cell[][] {
  return Array.from({ length: n }, () => Array<Cell>(n).fill(null));
}

export function cloneBoard(b: Cell[][]): Cell[][] {
  return b.map((row) => row.slice());
}

export function inBounds(n: number, r: number, c: number): boolean {
  return Number.isInteger(r) && Number.isInteger(c) && r >= 0 && c >= 0 && r < n && c < n;
}

export function emptyCells(board: Cell[][]): Coord[] {
  const n = board.length;
  const out: Coord[] = [];
  for (let r = 0; r < n; r++) {
    for (let c = 0; c < n; c++) {
      if (board[r][c] === null) out.push({ r, c });
    }
  }
  return out;
}

export function filledCount(board: Cell[][]): number {
  return board.length * board.length - emptyCells(board).length;
}

/**
 * Rows, then columns, then the main diagonal and the anti-diagonal
 * (top-right to bottom-left). The result is frozen.
 */
export function winningLines(n: number): readonly Line[] {
  const lines: Line[] = [];
  for (let r = 0; r < n; r++) {
    lines.push(Object.freeze(Array.from({ length: n }, (_, c) => ({ r, c }))));
  }
  for (let c = 0; c < n; c++) {
    lines.push(Object.freeze(Array.from({ length: n }, (_, r) => ({ r, c }))));
  }
  lines.push(Object.freeze(Array.from({ length: n }, (_, i) => ({ r: i, c: i }))));
  lines.push(Object.freeze(Array.from({ length: n }, (_, i) => ({ r: i, c: n - 1 - i }))));
  return Object.freeze(lines);
}

export function nextPlayer(p: Mark): Mark {
  return p === 'X' ? 'O' : 'X';
}

export function initState(config: EngineConfig): GameState {
  return {
    board: createBoard(config.boardSize),
    config,
    lines: winningLines(config.boardSize),
    turn: 0,
    moves: [],
  };
}

export function currentPlayer(state: GameState): PlayerProfile {
  return state.config.players[state.turn];
}

export function toggleTurn(state: GameState): PlayerProfile {
  state.turn = (state.turn + 1) % state.config.players.length;
  return currentPlayer(state);
}

export function checkWinner(board: Cell[][], lines: readonly Line[]): Outcome {
  for (const line of lines) {
    const first = board[line[0].r][line[0].c];
    if (first !== null && line.every(({ r, c }) => board[r][c] === first)) {
      return { status: 'win', winner: first, line };
    }
  }
  // Tie if no empties
  if (board.every((row) => row.every((cell) => cell !== null))) {
    return { status: 'tie' };
  }
  return { status: 'in_progress' };
}

export function evaluateOutcome(state: GameState): Outcome {
  return checkWinner(state.board, state.lines);
}

export function isLegal(state: GameState, move: Coord): boolean {
  return (
    inBounds(state.board.length, move.r, move.c) &&
    state.board[move.r][move.c] === null &&
    evaluateOutcome(state).status === 'in_progress'
  );
}

/**
 * Checks range, terminal state and occupancy only. Turn order is enforced by
 * the session's `attemptMove`, which also owns the turn cursor.
 */
export function applyMove(state: GameState, move: Move): Mark {
  const { r, c, player } = move;
  if (!inBounds(state.board.length, r, c)) {
    throw new IllegalMoveError(move, 'coordinates are off the board');
  }
  if (evaluateOutcome(state).status !== 'in_progress') {
    throw new IllegalMoveError(move, 'the game is already over');
  }
  if (state.board[r][c] !== null) {
    throw new IllegalMoveError(move, 'the cell is occupied');
  }
  state.board[r][c] = player;
  state.moves.push({ r, c, player });
  return player;
}

/**
 * Clears every cell and the move history. The winning lines are kept, and the
 * turn cursor is only rewound when `resetTurn` is set.
 */
export function resetGame(state: GameState, opts: { resetTurn?: boolean } = {}): void {
  for (const row of state.board) {
    row.fill(null);
  }
  state.moves = [];
  if (opts.resetTurn) {
    state.turn = 0;
  }
}
