import { BOARD_INDICES, BOARD_SIZE, Board, BoardIndex, Piece, Tile } from '../types/game';

export type LineKind = 'row' | 'column' | 'main_diagonal' | 'anti_diagonal';

export interface CandidateLine {
  kind: LineKind;
  tiles: readonly [Tile, Tile, Tile];
}

/**
 * Collect the lines passing through the pivot cell, in evaluation order:
 * row, column, main diagonal, anti-diagonal.
 *
 * Diagonals that do not contain the pivot are left out entirely; they
 * cannot have changed on this move.
 */
export function getLinesThroughPivot(board: Board, row: BoardIndex, col: BoardIndex): CandidateLine[] {
  const lines: CandidateLine[] = [
    { kind: 'row', tiles: [board[row][0], board[row][1], board[row][2]] },
    { kind: 'column', tiles: [board[0][col], board[1][col], board[2][col]] },
  ];

  if (row === col) {
    lines.push({ kind: 'main_diagonal', tiles: [board[0][0], board[1][1], board[2][2]] });
  }

  if (row + col === BOARD_SIZE - 1) {
    lines.push({ kind: 'anti_diagonal', tiles: [board[0][2], board[1][1], board[2][0]] });
  }

  return lines;
}

/**
 * The piece that fills every tile of the line, or null when the line has
 * an empty tile or mixes pieces.
 */
export function getLineWinner(tiles: readonly [Tile, Tile, Tile]): Piece | null {
  const [a, b, c] = tiles;
  if (a !== null && a === b && b === c) {
    return a;
  }
  return null;
}

export function isBoardFull(board: Board): boolean {
  return board.every((boardRow) => boardRow.every((tile) => tile !== null));
}

export function countOccupiedTiles(board: Board): number {
  let count = 0;
  for (const row of BOARD_INDICES) {
    for (const col of BOARD_INDICES) {
      if (board[row][col] !== null) {
        count++;
      }
    }
  }
  return count;
}
