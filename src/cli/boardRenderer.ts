import {
  BOARD_INDICES,
  BoardView,
  Outcome,
  Piece,
  Tile,
  formatColumnLabel,
  formatRowLabel,
} from '../shared/engine';
import type { GlyphSet } from './config';

const EMPTY_GLYPHS: Record<GlyphSet, string> = {
  unicode: '▢',
  ascii: '.',
};

export function pieceGlyph(piece: Piece): string {
  return piece === 'X' ? 'x' : 'o';
}

export function tileGlyph(tile: Tile, glyphs: GlyphSet = 'unicode'): string {
  return tile === null ? EMPTY_GLYPHS[glyphs] : pieceGlyph(tile);
}

/**
 * Render the board with column letters across the top and row numbers down
 * the side, followed by a blank line:
 *
 * ```
 *    A B C
 *  1 x ▢ ▢
 *  2 ▢ o ▢
 *  3 ▢ ▢ ▢
 * ```
 */
export function renderBoard(view: BoardView, glyphs: GlyphSet = 'unicode'): string {
  const header = '  ' + BOARD_INDICES.map((col) => ` ${formatColumnLabel(col)}`).join('');
  const rows = BOARD_INDICES.map(
    (row) =>
      ` ${formatRowLabel(row)}` +
      BOARD_INDICES.map((col) => ` ${tileGlyph(view[row][col], glyphs)}`).join('')
  );
  return [header, ...rows, '', ''].join('\n');
}

export function describeOutcome(outcome: Outcome): string {
  switch (outcome) {
    case 'x_wins':
      return 'x wins!';
    case 'o_wins':
      return 'o wins!';
    case 'tie':
      return 'Tie!';
  }
}
