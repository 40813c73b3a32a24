/**
 * Engine Domain Errors - move rejections and structured engine exceptions
 *
 * Two layers live here:
 *
 * - **MoveError**: the value returned by `applyMove` when a caller asks for
 *   an illegal move. These are ordinary, recoverable outcomes of user input
 *   and are never thrown by the engine.
 * - **EngineError** and subclasses: exceptions for hosts that need to turn a
 *   MoveError into a throwable (e.g. a host that guarantees a move can never
 *   be rejected), and for internal invariant violations.
 *
 * Usage:
 * ```typescript
 * const result = engine.applyMove(row, col);
 * if (!result.valid) {
 *   if (result.error.type === 'TILE_OCCUPIED') {
 *     console.log(describeMoveError(result.error));
 *   } else {
 *     throw moveErrorToException(result.error);
 *   }
 * }
 * ```
 *
 * @module EngineErrors
 */

import type { BoardIndex, Piece } from '../types/game';

// =============================================================================
// MOVE REJECTIONS
// =============================================================================

export type MoveError =
  | { type: 'GAME_ALREADY_OVER' }
  | { type: 'INVALID_POSITION'; row: number; col: number }
  | { type: 'TILE_OCCUPIED'; piece: Piece; row: BoardIndex; col: BoardIndex };

export type MoveErrorType = MoveError['type'];

export type MoveResult = { valid: true } | { valid: false; error: MoveError };

/**
 * Human-readable description of a rejected move, for logs and diagnostics.
 * Coordinates are reported zero-indexed, as the engine received them.
 */
export function describeMoveError(error: MoveError): string {
  switch (error.type) {
    case 'GAME_ALREADY_OVER':
      return 'Game is already over';
    case 'INVALID_POSITION':
      return `Position (${error.row}, ${error.col}) is outside the board`;
    case 'TILE_OCCUPIED':
      return `Tile (${error.row}, ${error.col}) is already occupied by ${error.piece}`;
  }
}

// =============================================================================
// ERROR CODES
// =============================================================================

/**
 * Engine error codes, prefixed by category:
 * - RULES_*: a requested move breaks the rules of the game
 * - STATE_*: game state is inconsistent
 * - INTERNAL_*: should never happen in correct code
 */
export enum EngineErrorCode {
  /** Move requested after the game reached an outcome */
  RULES_GAME_ALREADY_OVER = 'RULES_GAME_ALREADY_OVER',
  /** Row or column outside the board */
  RULES_INVALID_POSITION = 'RULES_INVALID_POSITION',
  /** Target tile already holds a piece */
  RULES_TILE_OCCUPIED = 'RULES_TILE_OCCUPIED',

  /** Outcome write attempted with a different terminal value */
  STATE_OUTCOME_CONFLICT = 'STATE_OUTCOME_CONFLICT',

  /** Assertion failed - indicates a bug */
  INTERNAL_ASSERTION_FAILED = 'INTERNAL_ASSERTION_FAILED',
}

export const ERROR_CATEGORY_DESCRIPTIONS: Record<string, string> = {
  RULES_: 'Game rule violation',
  STATE_: 'Corrupted or unexpected game state',
  INTERNAL_: 'Internal engine error (bug)',
};

const MOVE_ERROR_CODES: Record<MoveErrorType, EngineErrorCode> = {
  GAME_ALREADY_OVER: EngineErrorCode.RULES_GAME_ALREADY_OVER,
  INVALID_POSITION: EngineErrorCode.RULES_INVALID_POSITION,
  TILE_OCCUPIED: EngineErrorCode.RULES_TILE_OCCUPIED,
};

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all engine exceptions.
 *
 * Provides:
 * - Structured error code for programmatic handling
 * - Context for debugging
 * - Domain indicator for error routing
 */
export class EngineError extends Error {
  /** Error code for programmatic handling */
  readonly code: EngineErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Domain that generated the error (e.g. 'GameEngine', 'ConsoleGame') */
  readonly domain: string;

  /** Timestamp when error occurred */
  readonly timestamp: Date;

  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Engine'
  ) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    this.context = context;
    this.domain = domain;
    this.timestamp = new Date();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, EngineError.prototype);
  }

  /** Get error category from code prefix */
  get category(): string {
    const prefix = this.code.split('_')[0] + '_';
    return ERROR_CATEGORY_DESCRIPTIONS[prefix] ?? 'Unknown error category';
  }

  /** Serialize to a JSON-safe object for logging */
  toJSON(): EngineErrorJSON {
    return {
      error: true,
      type: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      context: this.context,
      category: this.category,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

export interface EngineErrorJSON {
  error: true;
  type: string;
  code: string;
  message: string;
  domain: string;
  context: Record<string, unknown>;
  category: string;
  timestamp: string;
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * A rejected move, in throwable form.
 *
 * The engine itself never throws this; hosts build it with
 * `moveErrorToException` when a rejection means their own logic is broken.
 */
export class RulesViolation extends EngineError {
  /** The rejection this exception was built from */
  readonly moveError: MoveError;

  constructor(moveError: MoveError, domain: string = 'Rules') {
    const { type: _type, ...fields } = moveError;
    super(MOVE_ERROR_CODES[moveError.type], describeMoveError(moveError), fields, domain);
    this.name = 'RulesViolation';
    this.moveError = moveError;
    Object.setPrototypeOf(this, RulesViolation.prototype);
  }
}

/**
 * Error for inconsistent game state, such as a second, different outcome
 * being written for a finished game.
 */
export class InvalidState extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'State'
  ) {
    super(code, message, context, domain);
    this.name = 'InvalidState';
    Object.setPrototypeOf(this, InvalidState.prototype);
  }
}

// =============================================================================
// TYPE GUARDS & UTILITIES
// =============================================================================

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

export function isRulesViolation(error: unknown): error is RulesViolation {
  return error instanceof RulesViolation;
}

export function moveErrorToException(error: MoveError, domain?: string): RulesViolation {
  return new RulesViolation(error, domain);
}

/**
 * Wrap an unknown error in an EngineError.
 *
 * Useful for catching and normalizing errors at domain boundaries.
 */
export function wrapEngineError(
  error: unknown,
  domain: string = 'Engine',
  context: Record<string, unknown> = {}
): EngineError {
  if (isEngineError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return new EngineError(
    EngineErrorCode.INTERNAL_ASSERTION_FAILED,
    message,
    { ...context, originalStack: stack },
    domain
  );
}
