import type { Coord, Move } from './types.js';

export type EngineErrorCode = 'ILLEGAL_MOVE' | 'NO_LEGAL_MOVE' | 'INVALID_INPUT';

export class EngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class IllegalMoveError extends EngineError {
  readonly move: Coord | Move;

  constructor(move: Coord | Move, reason: string) {
    super('ILLEGAL_MOVE', `Illegal move at (${move.r}, ${move.c}): ${reason}`);
    this.move = move;
  }
}

export class NoLegalMoveError extends EngineError {
  constructor(reason = 'no empty cell left to search') {
    super('NO_LEGAL_MOVE', `No legal move available: ${reason}`);
  }
}

export class ValidationError extends EngineError {
  constructor(reason: string) {
    super('INVALID_INPUT', reason);
  }
}
