export * from './types.js';
export * from './errors.js';
export {
  defaultConfig,
  validateConfig,
  resolveConfig,
  configFromEnv,
  EngineConfigSchema,
  MarkSchema,
} from './variants.js';
export {
  initState as createGame,
  applyMove,
  isLegal,
  evaluateOutcome,
  checkWinner,
  resetGame,
  toggleTurn,
  currentPlayer,
  winningLines,
  emptyCells,
  cloneBoard,
} from './board.js';
export { createSession, attemptMove, requestAiMove, playAiTurn, newRound, MoveRequest } from './session.js';
export { bestMove, searchBestMove, searchDepth, minimax } from './ai/minimax.js';
export type { SearchOpts, SearchResult, SearchStats } from './ai/minimax.js';
export { evaluate } from './ai/heuristics.js';
