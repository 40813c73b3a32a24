import { BOARD_INDICES, BoardIndex, Position } from '../types/game';

/**
 * Console move notation.
 *
 * A move is written as the 1-based row number followed by the column
 * letter: "1A" is the top-left cell (row 0, col 0) and "3C" the
 * bottom-right one. Column letters are case-insensitive.
 */

const ROW_LABELS = ['1', '2', '3'] as const;
const COLUMN_LABELS = ['A', 'B', 'C'] as const;

export type ParsedMoveToken =
  | { ok: true; position: Position }
  | { ok: false; token: string };

function rowFromLabel(label: string): BoardIndex | null {
  const index = BOARD_INDICES.find((i) => ROW_LABELS[i] === label);
  return index ?? null;
}

function colFromLabel(label: string): BoardIndex | null {
  const upper = label.toUpperCase();
  const index = BOARD_INDICES.find((i) => COLUMN_LABELS[i] === upper);
  return index ?? null;
}

/**
 * Parse a move token such as "2b". Trailing whitespace is ignored; leading
 * whitespace is not. A token of the wrong length or with a bad row digit
 * is echoed back whole. When only the column letter is bad, just that
 * letter is echoed.
 */
export function parseMoveToken(input: string): ParsedMoveToken {
  const token = input.trimEnd();
  if (token.length !== 2) {
    return { ok: false, token };
  }

  const row = rowFromLabel(token[0]);
  if (row === null) {
    return { ok: false, token };
  }

  const col = colFromLabel(token[1]);
  if (col === null) {
    return { ok: false, token: token[1] };
  }

  return { ok: true, position: { row, col } };
}

export function formatRowLabel(row: BoardIndex): string {
  return ROW_LABELS[row];
}

export function formatColumnLabel(col: BoardIndex): string {
  return COLUMN_LABELS[col];
}

/** Format a position as a move token, e.g. { row: 0, col: 2 } -> "1C". */
export function formatPosition(pos: Position): string {
  return `${formatRowLabel(pos.row)}${formatColumnLabel(pos.col)}`;
}
