import {
  countOccupiedTiles,
  getLineWinner,
  getLinesThroughPivot,
  isBoardFull,
} from '../../src/shared/engine/lineDetection';
import { createEmptyBoard } from '../../src/shared/types/game';
import type { Board } from '../../src/shared/types/game';

describe('lineDetection', () => {
  describe('getLinesThroughPivot', () => {
    it('should return only the row and column for an edge cell', () => {
      const lines = getLinesThroughPivot(createEmptyBoard(), 0, 1);

      expect(lines.map((line) => line.kind)).toEqual(['row', 'column']);
    });

    it('should add the main diagonal for a corner on it', () => {
      const lines = getLinesThroughPivot(createEmptyBoard(), 2, 2);

      expect(lines.map((line) => line.kind)).toEqual(['row', 'column', 'main_diagonal']);
    });

    it('should add the anti-diagonal for a corner on it', () => {
      const lines = getLinesThroughPivot(createEmptyBoard(), 0, 2);

      expect(lines.map((line) => line.kind)).toEqual(['row', 'column', 'anti_diagonal']);
    });

    it('should return all four lines for the centre', () => {
      const lines = getLinesThroughPivot(createEmptyBoard(), 1, 1);

      expect(lines.map((line) => line.kind)).toEqual([
        'row',
        'column',
        'main_diagonal',
        'anti_diagonal',
      ]);
    });

    it('should read the tiles of each line from the board', () => {
      const board: Board = [
        ['X', null, 'O'],
        [null, 'X', null],
        ['O', null, 'X'],
      ];

      const lines = getLinesThroughPivot(board, 1, 1);

      expect(lines).toEqual([
        { kind: 'row', tiles: [null, 'X', null] },
        { kind: 'column', tiles: [null, 'X', null] },
        { kind: 'main_diagonal', tiles: ['X', 'X', 'X'] },
        { kind: 'anti_diagonal', tiles: ['O', 'X', 'O'] },
      ]);
    });
  });

  describe('getLineWinner', () => {
    it('should return the piece filling the whole line', () => {
      expect(getLineWinner(['O', 'O', 'O'])).toBe('O');
      expect(getLineWinner(['X', 'X', 'X'])).toBe('X');
    });

    it('should return null for mixed or incomplete lines', () => {
      expect(getLineWinner(['X', 'O', 'X'])).toBeNull();
      expect(getLineWinner(['X', 'X', null])).toBeNull();
      expect(getLineWinner([null, null, null])).toBeNull();
    });
  });

  describe('board helpers', () => {
    it('should count occupied tiles and detect a full board', () => {
      const board = createEmptyBoard();

      expect(countOccupiedTiles(board)).toBe(0);
      expect(isBoardFull(board)).toBe(false);

      board[0][0] = 'X';
      board[2][1] = 'O';
      expect(countOccupiedTiles(board)).toBe(2);

      const full: Board = [
        ['X', 'O', 'X'],
        ['X', 'O', 'O'],
        ['O', 'X', 'X'],
      ];
      expect(countOccupiedTiles(full)).toBe(9);
      expect(isBoardFull(full)).toBe(true);
    });
  });
});
