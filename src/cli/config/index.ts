/**
 * Configuration Module - Canonical Entry Point
 *
 * Usage:
 *   import { config } from './config';
 *
 * - `env.ts` - Raw environment variable schema definitions
 * - `unified.ts` - Config assembly
 * - `index.ts` (this file) - Canonical re-export point
 */

export { config, buildConfig } from './unified';
export type { AppConfig } from './unified';

export {
  EnvSchema,
  NodeEnvSchema,
  LogLevelSchema,
  LogFormatSchema,
  GlyphSetSchema,
  parseEnv,
  loadEnvOrExit,
  getEffectiveNodeEnv,
  isJestRuntime,
  isTest,
} from './env';

export type { RawEnv, EnvValidationResult, NodeEnv, LogLevel, LogFormat, GlyphSet } from './env';
