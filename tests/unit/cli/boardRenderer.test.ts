import { describeOutcome, pieceGlyph, renderBoard, tileGlyph } from '../../../src/cli/boardRenderer';
import type { BoardView } from '../../../src/shared/engine';

const MIXED: BoardView = [
  ['X', null, null],
  [null, 'O', null],
  [null, null, 'X'],
];

describe('boardRenderer', () => {
  it('should render pieces in lower case', () => {
    expect(pieceGlyph('X')).toBe('x');
    expect(pieceGlyph('O')).toBe('o');
  });

  it('should render empty tiles with the selected glyph set', () => {
    expect(tileGlyph(null)).toBe('▢');
    expect(tileGlyph(null, 'ascii')).toBe('.');
    expect(tileGlyph('O', 'ascii')).toBe('o');
  });

  it('should render the board with labels and a trailing blank line', () => {
    expect(renderBoard(MIXED)).toBe('   A B C\n 1 x ▢ ▢\n 2 ▢ o ▢\n 3 ▢ ▢ x\n\n');
  });

  it('should render ascii boards', () => {
    expect(renderBoard(MIXED, 'ascii')).toBe('   A B C\n 1 x . .\n 2 . o .\n 3 . . x\n\n');
  });

  it('should describe each outcome', () => {
    expect(describeOutcome('x_wins')).toBe('x wins!');
    expect(describeOutcome('o_wins')).toBe('o wins!');
    expect(describeOutcome('tie')).toBe('Tie!');
  });
});
