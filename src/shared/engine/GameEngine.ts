import {
  Board,
  BoardView,
  FIRST_PIECE,
  GameStatus,
  MoveRecord,
  Outcome,
  Piece,
  createEmptyBoard,
  isBoardIndex,
  oppositePiece,
} from '../types/game';
import { MoveResult } from './errors';
import { countOccupiedTiles } from './lineDetection';
import { OutcomeCell } from './outcomeCell';
import { evaluateVictory } from './victoryLogic';

/**
 * Tic-tac-toe game state and rules.
 *
 * Each instance owns its board exclusively; nothing outside the engine can
 * reach the live board or history arrays. State changes only through
 * `applyMove`, which either applies a move completely or leaves the state
 * untouched and returns the reason.
 *
 * The engine is synchronous and does no locking. Hosts sharing an instance
 * across concurrent callers must serialise access themselves.
 */
export class GameEngine {
  private readonly board: Board = createEmptyBoard();
  private readonly outcome = new OutcomeCell();
  private readonly moveHistory: MoveRecord[] = [];
  private currentPiece: Piece = FIRST_PIECE;

  public applyMove(row: number, col: number): MoveResult {
    // 1. Finished games accept nothing, whatever the coordinates.
    if (this.outcome.isSettled()) {
      return { valid: false, error: { type: 'GAME_ALREADY_OVER' } };
    }

    // 2. Bounds
    if (!isBoardIndex(row) || !isBoardIndex(col)) {
      return { valid: false, error: { type: 'INVALID_POSITION', row, col } };
    }

    // 3. Occupancy
    const existing = this.board[row][col];
    if (existing !== null) {
      return { valid: false, error: { type: 'TILE_OCCUPIED', piece: existing, row, col } };
    }

    const piece = this.currentPiece;
    this.board[row][col] = piece;
    this.currentPiece = oppositePiece(piece);
    this.moveHistory.push({
      moveNumber: this.moveHistory.length + 1,
      piece,
      position: { row, col },
    });

    const victory = evaluateVictory(this.board, row, col);
    if (victory.isGameOver && victory.outcome !== undefined) {
      this.outcome.settle(victory.outcome);
    }

    return { valid: true };
  }

  public isFinished(): boolean {
    return this.outcome.isSettled();
  }

  public getStatus(): GameStatus {
    return this.isFinished() ? 'finished' : 'in_progress';
  }

  public getWinner(): Outcome | null {
    return this.outcome.get();
  }

  /**
   * Piece that plays next. After the game ends this is the piece that
   * would have moved next; it carries no meaning for the result.
   */
  public getCurrentPiece(): Piece {
    return this.currentPiece;
  }

  /**
   * Frozen snapshot of the board. Mutating the engine afterwards does not
   * change a snapshot already handed out.
   */
  public getBoardView(): BoardView {
    const [r0, r1, r2] = this.board;
    return Object.freeze([
      Object.freeze([r0[0], r0[1], r0[2]] as const),
      Object.freeze([r1[0], r1[1], r1[2]] as const),
      Object.freeze([r2[0], r2[1], r2[2]] as const),
    ] as const);
  }

  public getMoveHistory(): readonly MoveRecord[] {
    return Object.freeze(
      this.moveHistory.map((record) =>
        Object.freeze({ ...record, position: Object.freeze({ ...record.position }) })
      )
    );
  }

  public getOccupiedCount(): number {
    return countOccupiedTiles(this.board);
  }
}
