import type { GameState, Mark } from '../types.js';
import { nextPlayer } from '../board.js';

/**
 * Static open-line count: +1 for every line holding `forPlayer` and no
 * opponent mark, -1 for the reverse. Contested and empty lines score 0.
 */
export function evaluate(state: GameState, forPlayer: Mark): number {
  const opponent = nextPlayer(forPlayer);
  let score = 0;

  for (const line of state.lines) {
    let mine = false;
    let theirs = false;
    for (const { r, c } of line) {
      const v = state.board[r][c];
      if (v === forPlayer) mine = true;
      else if (v === opponent) theirs = true;
    }
    if (mine && !theirs) score++;
    else if (theirs && !mine) score--;
  }

  return score;
}
