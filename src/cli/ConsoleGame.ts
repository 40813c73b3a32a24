import readline from 'readline';
import {
  EngineErrorCode,
  GameEngine,
  InvalidState,
  describeMoveError,
  formatPosition,
  moveErrorToException,
  parseMoveToken,
} from '../shared/engine';
import type { GlyphSet } from './config';
import { describeOutcome, pieceGlyph, renderBoard } from './boardRenderer';
import { logger } from './utils/logger';

export interface ConsoleGameOptions {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  /** Stream for rejected input; defaults to `output`. */
  errorOutput?: NodeJS.WritableStream;
  glyphs?: GlyphSet;
  /** Engine to drive; a fresh game when omitted. */
  engine?: GameEngine;
}

export const MOVE_PROMPT = 'Enter move (e.g. 1A): ';

/**
 * One interactive game over a pair of text streams.
 *
 * Each turn prints the board, the piece to move and a prompt, then reads a
 * line. Malformed tokens and occupied tiles are reported on the error
 * stream and the player is asked again; the session ends when the game is
 * decided or the input runs out. Either way the exit code is 0.
 */
export class ConsoleGame {
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;
  private readonly errorOutput: NodeJS.WritableStream;
  private readonly glyphs: GlyphSet;
  private readonly engine: GameEngine;

  constructor(options: ConsoleGameOptions) {
    this.input = options.input;
    this.output = options.output;
    this.errorOutput = options.errorOutput ?? options.output;
    this.glyphs = options.glyphs ?? 'unicode';
    this.engine = options.engine ?? new GameEngine();
  }

  public async run(): Promise<number> {
    const rl = readline.createInterface({ input: this.input, crlfDelay: Infinity, terminal: false });

    logger.info('Game session started', { glyphs: this.glyphs });

    if (this.engine.isFinished()) {
      this.printResult();
      rl.close();
      return 0;
    }

    this.printTurn();

    // Leaving the loop early closes the interface.
    for await (const line of rl) {
      if (this.handleLine(line)) {
        return 0;
      }
    }

    this.output.write('\n');
    logger.info('Input closed before the game finished', {
      moves: this.engine.getMoveHistory().length,
    });
    return 0;
  }

  /**
   * @returns true once the game is over
   */
  private handleLine(line: string): boolean {
    const parsed = parseMoveToken(line);
    if (!parsed.ok) {
      this.errorOutput.write(`Invalid move: '${parsed.token}'. Please try again.\n`);
      this.prompt();
      return false;
    }

    const { row, col } = parsed.position;
    const piece = this.engine.getCurrentPiece();
    const result = this.engine.applyMove(row, col);

    if (!result.valid) {
      const { error } = result;
      // A parsed token is always on the board, and finished games never
      // reach this point.
      if (error.type !== 'TILE_OCCUPIED') {
        throw moveErrorToException(error, 'ConsoleGame');
      }

      logger.info('Move rejected', { reason: describeMoveError(error) });
      this.errorOutput.write(
        `The tile at position ${formatPosition(parsed.position)} already has piece ` +
          `${pieceGlyph(error.piece)} in it!\n`
      );
      this.printTurn();
      return false;
    }

    logger.debug('Move applied', { piece, position: formatPosition(parsed.position) });

    if (this.engine.isFinished()) {
      this.printResult();
      return true;
    }

    this.printTurn();
    return false;
  }

  private printTurn(): void {
    this.output.write(renderBoard(this.engine.getBoardView(), this.glyphs));
    this.output.write(`Current piece: ${pieceGlyph(this.engine.getCurrentPiece())}\n`);
    this.prompt();
  }

  private prompt(): void {
    this.output.write(MOVE_PROMPT);
  }

  private printResult(): void {
    const outcome = this.engine.getWinner();
    if (outcome === null) {
      throw new InvalidState(
        EngineErrorCode.INTERNAL_ASSERTION_FAILED,
        'Finished game has no outcome',
        {},
        'ConsoleGame'
      );
    }

    this.output.write(renderBoard(this.engine.getBoardView(), this.glyphs));
    this.output.write(`${describeOutcome(outcome)}\n`);
    logger.info('Game finished', { outcome, moves: this.engine.getMoveHistory().length });
  }
}
