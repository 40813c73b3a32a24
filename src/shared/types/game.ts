/**
 * Shared game types for the tic-tac-toe engine and its console host.
 *
 * The board is a fixed 3x3 grid. Its size is part of the types below
 * (tuples and the BoardIndex union) rather than a runtime parameter, so an
 * out-of-range coordinate is always caught by an explicit check instead of
 * silently reading past the grid.
 */

export const BOARD_SIZE = 3;

/** Valid row/column index on the board. */
export type BoardIndex = 0 | 1 | 2;

export const BOARD_INDICES: readonly BoardIndex[] = [0, 1, 2];

/**
 * A player's marker. 'X' always moves first.
 */
export type Piece = 'X' | 'O';

export const FIRST_PIECE: Piece = 'X';

/** A single cell: empty (null) or holding exactly one piece. */
export type Tile = Piece | null;

export type BoardRow = [Tile, Tile, Tile];
export type Board = [BoardRow, BoardRow, BoardRow];

/**
 * Read-only view of the board handed to callers. The engine hands out
 * frozen copies, so this type and the runtime agree.
 */
export type BoardView = readonly [
  readonly [Tile, Tile, Tile],
  readonly [Tile, Tile, Tile],
  readonly [Tile, Tile, Tile],
];

/** Terminal result of a game. `null` wherever an outcome is optional means "still in progress". */
export type Outcome = 'x_wins' | 'o_wins' | 'tie';

export type GameStatus = 'in_progress' | 'finished';

export interface Position {
  row: BoardIndex;
  col: BoardIndex;
}

export interface MoveRecord {
  /** 1-based index of the move within the game. */
  moveNumber: number;
  piece: Piece;
  position: Position;
}

export function oppositePiece(piece: Piece): Piece {
  return piece === 'X' ? 'O' : 'X';
}

export function winningOutcomeFor(piece: Piece): Outcome {
  return piece === 'X' ? 'x_wins' : 'o_wins';
}

/**
 * Narrow an arbitrary number to a BoardIndex. Rejects negatives, values
 * past the edge, fractions and NaN.
 */
export function isBoardIndex(value: number): value is BoardIndex {
  return Number.isInteger(value) && value >= 0 && value < BOARD_SIZE;
}

export function createEmptyBoard(): Board {
  return [
    [null, null, null],
    [null, null, null],
    [null, null, null],
  ];
}
