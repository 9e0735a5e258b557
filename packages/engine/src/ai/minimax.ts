import type { Cell, Coord, GameState, Mark, Move } from '../types.js';
import { emptyCells, evaluateOutcome, nextPlayer } from '../board.js';
import { NoLegalMoveError } from '../errors.js';
import { createLogger } from '../log.js';
import { DEFAULT_BASE_DEPTH, DEFAULT_DEPTH_GROWTH } from '../variants.js';
import { evaluate } from './heuristics.js';

const log = createLogger('ai');

const WIN_SCORE = 10;

export interface SearchOpts {
  /** Fixed depth bound; skips depth scaling when set. */
  maxDepth?: number;
  baseDepth?: number;
  depthGrowth?: number;
  /** Empty cells to scale the depth by. Defaults to the board's count. */
  cellsRemaining?: number;
}

export interface SearchStats {
  nodes: number;
}

export interface SearchResult {
  move: Move;
  score: number;
  depth: number;
  nodes: number;
}

/**
 * Depth bound grows with the share of filled cells: shallow in the opening,
 * effectively exhaustive near the end.
 */
export function searchDepth(
  totalCells: number,
  cellsRemaining: number,
  baseDepth = DEFAULT_BASE_DEPTH,
  depthGrowth = DEFAULT_DEPTH_GROWTH
): number {
  return baseDepth + Math.floor(((totalCells - cellsRemaining) / totalCells) * depthGrowth);
}

// The cell is cleared again on every exit path, including pruning breaks and throws.
function withPlacement<T>(board: Cell[][], at: Coord, mark: Mark, fn: () => T): T {
  board[at.r][at.c] = mark;
  try {
    return fn();
  } finally {
    board[at.r][at.c] = null;
  }
}

export function minimax(
  state: GameState,
  forPlayer: Mark,
  maximizing: boolean,
  alpha: number,
  beta: number,
  maxDepth: number,
  depth = 0,
  stats: SearchStats = { nodes: 0 }
): number {
  stats.nodes++;

  const outcome = evaluateOutcome(state);
  if (depth === maxDepth || outcome.status !== 'in_progress') {
    if (outcome.status === 'win') {
      return outcome.winner === forPlayer ? WIN_SCORE - depth : -WIN_SCORE + depth;
    }
    if (outcome.status === 'tie') {
      return 0;
    }
    return evaluate(state, forPlayer);
  }

  const mark = maximizing ? forPlayer : nextPlayer(forPlayer);
  let best = maximizing ? -Infinity : Infinity;

  for (const cell of emptyCells(state.board)) {
    const score = withPlacement(state.board, cell, mark, () =>
      minimax(state, forPlayer, !maximizing, alpha, beta, maxDepth, depth + 1, stats)
    );
    if (maximizing) {
      best = Math.max(best, score);
      alpha = Math.max(alpha, best);
    } else {
      best = Math.min(best, score);
      beta = Math.min(beta, best);
    }
    if (beta <= alpha) {
      break;
    }
  }

  return best;
}

export function searchBestMove(state: GameState, forPlayer: Mark, opts: SearchOpts = {}): SearchResult {
  const candidates = emptyCells(state.board);
  if (candidates.length === 0) {
    throw new NoLegalMoveError();
  }

  const totalCells = state.board.length * state.board.length;
  const depth =
    opts.maxDepth ??
    searchDepth(totalCells, opts.cellsRemaining ?? candidates.length, opts.baseDepth, opts.depthGrowth);
  const stats: SearchStats = { nodes: 0 };

  // Row-major scan with a strict comparison: the first cell wins ties.
  let best = candidates[0];
  let bestScore = -Infinity;
  for (const cell of candidates) {
    const score = withPlacement(state.board, cell, forPlayer, () =>
      minimax(state, forPlayer, false, -Infinity, Infinity, depth, 0, stats)
    );
    if (score > bestScore) {
      bestScore = score;
      best = cell;
    }
  }

  const move: Move = { r: best.r, c: best.c, player: forPlayer };
  log.debug('search complete', { move, score: bestScore, depth, nodes: stats.nodes });
  return { move, score: bestScore, depth, nodes: stats.nodes };
}

export function bestMove(state: GameState, forPlayer: Mark, opts: SearchOpts = {}): Move {
  return searchBestMove(state, forPlayer, opts).move;
}
