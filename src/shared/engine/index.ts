// =============================================================================
// TIC-TAC-TOE ENGINE - PUBLIC API
// =============================================================================
// Hosts (the console adapter, tests) import from this file only.
//
// The functional operations below take the engine instance as their state
// argument and delegate to it; they exist so hosts can treat the game as
// plain state plus operations without reaching for the class directly.
// =============================================================================

import type { BoardView, Outcome, Piece } from '../types/game';
import type { MoveResult } from './errors';
import { GameEngine } from './GameEngine';

// =============================================================================
// CORE TYPES
// =============================================================================

export type {
  Board,
  BoardIndex,
  BoardView,
  GameStatus,
  MoveRecord,
  Outcome,
  Piece,
  Position,
  Tile,
} from '../types/game';
export {
  BOARD_SIZE,
  BOARD_INDICES,
  FIRST_PIECE,
  isBoardIndex,
  oppositePiece,
  winningOutcomeFor,
} from '../types/game';

// =============================================================================
// ENGINE
// =============================================================================

export { GameEngine } from './GameEngine';
export { OutcomeCell } from './outcomeCell';
export { evaluateVictory } from './victoryLogic';
export type { VictoryResult } from './victoryLogic';
export { getLinesThroughPivot, getLineWinner, isBoardFull, countOccupiedTiles } from './lineDetection';
export type { CandidateLine, LineKind } from './lineDetection';

// =============================================================================
// ERRORS
// =============================================================================

export {
  EngineError,
  EngineErrorCode,
  RulesViolation,
  InvalidState,
  describeMoveError,
  isEngineError,
  isRulesViolation,
  moveErrorToException,
  wrapEngineError,
} from './errors';
export type { EngineErrorJSON, MoveError, MoveErrorType, MoveResult } from './errors';

// =============================================================================
// NOTATION
// =============================================================================

export { parseMoveToken, formatPosition, formatRowLabel, formatColumnLabel } from './notation';
export type { ParsedMoveToken } from './notation';

// =============================================================================
// FUNCTIONAL OPERATIONS
// =============================================================================

/** Start a new game: empty board, X to move, no outcome. */
export function initialize(): GameEngine {
  return new GameEngine();
}

export function applyMove(state: GameEngine, row: number, col: number): MoveResult {
  return state.applyMove(row, col);
}

export function isFinished(state: GameEngine): boolean {
  return state.isFinished();
}

export function winner(state: GameEngine): Outcome | null {
  return state.getWinner();
}

export function currentPiece(state: GameEngine): Piece {
  return state.getCurrentPiece();
}

export function boardView(state: GameEngine): BoardView {
  return state.getBoardView();
}
