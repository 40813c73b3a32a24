import { Board, BoardIndex, Outcome, winningOutcomeFor } from '../types/game';
import { LineKind, getLineWinner, getLinesThroughPivot, isBoardFull } from './lineDetection';

export interface VictoryResult {
  isGameOver: boolean;
  outcome?: Outcome;
  /** Line that produced a win; absent for ties and unfinished games. */
  line?: LineKind;
}

/**
 * Side-effect-free outcome evaluator, run once after each placement.
 *
 * Only lines through the just-played cell (the pivot) are inspected. This
 * relies on the invariant that the board only ever gains pieces, one per
 * move, and that no move is accepted once an outcome exists: any line not
 * through the pivot looked the same on the previous move, when it was
 * already known not to be complete. Supporting undo or replay of moves
 * would break that invariant and require a full-board scan here.
 *
 * Candidates are checked in the order row, column, main diagonal,
 * anti-diagonal and the first complete line decides the winner. A single
 * placement can complete two lines only for the same piece, so the order
 * affects the reported `line`, never the outcome.
 */
export function evaluateVictory(board: Board, row: BoardIndex, col: BoardIndex): VictoryResult {
  for (const line of getLinesThroughPivot(board, row, col)) {
    const winner = getLineWinner(line.tiles);
    if (winner !== null) {
      return { isGameOver: true, outcome: winningOutcomeFor(winner), line: line.kind };
    }
  }

  if (isBoardFull(board)) {
    return { isGameOver: true, outcome: 'tie' };
  }

  return { isGameOver: false };
}
