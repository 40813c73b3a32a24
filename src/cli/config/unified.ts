/**
 * Unified Application Configuration
 *
 * Parses environment variables, validates them with Zod, and exports a
 * frozen config object for the console host.
 *
 * - `env.ts` defines the raw environment variable schema
 * - `unified.ts` (this file) assembles the typed application config
 * - `index.ts` re-exports everything for convenient imports
 */

import dotenv from 'dotenv';
import {
  GlyphSet,
  LogFormat,
  LogLevel,
  NodeEnv,
  RawEnv,
  getEffectiveNodeEnv,
  isTest,
  loadEnvOrExit,
} from './env';

export interface AppConfig {
  nodeEnv: NodeEnv;
  isTest: boolean;
  logging: {
    level: LogLevel;
    format: LogFormat;
    file: string | undefined;
  };
  display: {
    glyphs: GlyphSet;
  };
}

/**
 * Assemble the typed config from an already-validated environment.
 */
export function buildConfig(env: RawEnv): Readonly<AppConfig> {
  const nodeEnv = getEffectiveNodeEnv(env);
  const file = env.LOG_FILE?.trim() || undefined;

  return Object.freeze({
    nodeEnv,
    isTest: isTest(nodeEnv),
    logging: Object.freeze({
      level: env.LOG_LEVEL,
      format: env.LOG_FORMAT,
      file,
    }),
    display: Object.freeze({
      glyphs: env.TICTACTOE_GLYPHS,
    }),
  });
}

// Load .env into process.env before reading anything from it. Skipped in
// test mode so a developer's .env cannot override test settings.
if (process.env.NODE_ENV !== 'test') {
  dotenv.config();
}

export const config = buildConfig(loadEnvOrExit(process.env));
