import { z } from 'zod';
import type { Coord, EngineConfig, GameState, Move, Outcome } from './types.js';
import {
  applyMove,
  currentPlayer,
  emptyCells,
  evaluateOutcome,
  initState,
  resetGame,
  toggleTurn,
} from './board.js';
import { bestMove } from './ai/minimax.js';
import { IllegalMoveError, ValidationError, NoLegalMoveError } from './errors.js';
import { createLogger } from './log.js';
import { MarkSchema, formatIssues, resolveConfig } from './variants.js';

const log = createLogger('engine');

export const MoveRequest = z.object({
  r: z.number().int(),
  c: z.number().int(),
  player: MarkSchema.optional(),
});
export type MoveRequest = z.infer<typeof MoveRequest>;

export function createSession(overrides: Partial<EngineConfig> = {}): GameState {
  return initState(resolveConfig(overrides));
}

/**
 * Submits a move for the player whose turn it is. The turn passes to the
 * other player only while the game stays in progress.
 */
export function attemptMove(state: GameState, request: MoveRequest): Outcome {
  const parsed = MoveRequest.safeParse(request);
  if (!parsed.success) {
    throw new ValidationError(`Invalid move request: ${formatIssues(parsed.error)}`);
  }
  const { r, c } = parsed.data;
  const expected = currentPlayer(state).mark;
  const player = parsed.data.player ?? expected;
  if (player !== expected) {
    throw new IllegalMoveError({ r, c, player }, `it is ${expected}'s turn`);
  }

  applyMove(state, { r, c, player });
  const outcome = evaluateOutcome(state);
  log.debug('move applied', { r, c, player, outcome: outcome.status });
  if (outcome.status === 'in_progress') {
    toggleTurn(state);
  }
  return outcome;
}

/**
 * Picks the AI's reply. `cellsRemaining` only feeds depth scaling; a value
 * that disagrees with the board is replaced by the board's own count.
 */
export function requestAiMove(state: GameState, cellsRemaining?: number): Coord {
  if (evaluateOutcome(state).status !== 'in_progress') {
    throw new NoLegalMoveError('the game is already over');
  }
  const actual = emptyCells(state.board).length;
  if (cellsRemaining !== undefined && cellsRemaining !== actual) {
    log.warn('cellsRemaining disagrees with the board, using the board count', {
      cellsRemaining,
      actual,
    });
  }
  const { aiPlayer, baseDepth, depthGrowth } = state.config;
  const move = bestMove(state, aiPlayer, { baseDepth, depthGrowth, cellsRemaining: actual });
  return { r: move.r, c: move.c };
}

/** Requests the AI's move and plays it through `attemptMove`. */
export function playAiTurn(state: GameState, cellsRemaining?: number): { move: Move; outcome: Outcome } {
  const { r, c } = requestAiMove(state, cellsRemaining);
  const player = state.config.aiPlayer;
  const outcome = attemptMove(state, { r, c, player });
  return { move: { r, c, player }, outcome };
}

/** Clears the board for another round with X to move. */
export function newRound(state: GameState): void {
  resetGame(state, { resetTurn: true });
}
