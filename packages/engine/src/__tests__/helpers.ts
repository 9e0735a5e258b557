import { cloneBoard, initState } from '../board.js';
import type { GameState } from '../types.js';
import { defaultConfig } from '../variants.js';

// Rows use 'X', 'O' and '.' for an empty cell.
export function stateFromRows(rows: string[]): GameState {
  const state = initState({ ...defaultConfig(), boardSize: rows.length });
  rows.forEach((row, r) => {
    [...row].forEach((ch, c) => {
      if (ch === 'X' || ch === 'O') state.board[r][c] = ch;
    });
  });
  return state;
}

export function cloneState(state: GameState): GameState {
  return { ...state, board: cloneBoard(state.board), moves: [...state.moves] };
}
