#!/usr/bin/env node
import { wrapEngineError } from '../shared/engine';
import { ConsoleGame } from './ConsoleGame';
import { config } from './config';
import { logger } from './utils/logger';

async function main(): Promise<void> {
  const game = new ConsoleGame({
    input: process.stdin,
    output: process.stdout,
    errorOutput: process.stderr,
    glyphs: config.display.glyphs,
  });

  process.exitCode = await game.run();
}

main().catch((err: unknown) => {
  logger.error('Console session failed', { error: wrapEngineError(err, 'cli').toJSON() });
  process.exitCode = 1;
});
