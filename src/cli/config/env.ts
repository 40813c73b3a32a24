/**
 * Environment Variable Schema and Validation
 *
 * Defines the Zod schema for every environment variable the console host
 * reads, validates them at startup, and exports the typed result.
 */

import { z } from 'zod';

export const NodeEnvSchema = z.enum(['development', 'production', 'test']);
export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

/**
 * Glyph set for the board. 'ascii' swaps the empty-tile box for a dot on
 * terminals without Unicode support.
 */
export const GlyphSetSchema = z.enum(['unicode', 'ascii']);
export type GlyphSet = z.infer<typeof GlyphSetSchema>;

export const EnvSchema = z.object({
  // ===================================================================
  // ENVIRONMENT
  // ===================================================================

  /** Application environment mode */
  NODE_ENV: NodeEnvSchema.default('development'),

  // ===================================================================
  // LOGGING
  // ===================================================================

  /** Minimum level written by the logger */
  LOG_LEVEL: LogLevelSchema.default('warn'),

  /** Log output format on stderr */
  LOG_FORMAT: LogFormatSchema.default('pretty'),

  /** Additional JSON log file (optional) */
  LOG_FILE: z.string().optional(),

  // ===================================================================
  // DISPLAY
  // ===================================================================

  /** Board glyph set */
  TICTACTOE_GLYPHS: GlyphSetSchema.default('unicode'),
});

export type RawEnv = z.infer<typeof EnvSchema>;

export interface EnvValidationResult {
  success: boolean;
  data?: RawEnv;
  errors?: Array<{ path: string; message: string }>;
}

/**
 * Parse and validate environment variables.
 *
 * @param env - Environment object to parse (defaults to process.env)
 */
export function parseEnv(
  env: Record<string, string | undefined> = process.env
): EnvValidationResult {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    const errors = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));

    return {
      success: false,
      errors: errors.length > 0 ? errors : [{ path: '', message: result.error.message }],
    };
  }

  return {
    success: true,
    data: result.data,
  };
}

/**
 * Load and validate environment variables, exiting on failure.
 *
 * Call once at startup. On failure every issue is printed and the process
 * exits with status 1.
 */
export function loadEnvOrExit(
  env: Record<string, string | undefined> = process.env
): RawEnv {
  const result = parseEnv(env);

  if (!result.success || !result.data) {
    console.error('Invalid environment configuration:');
    for (const error of result.errors ?? []) {
      console.error(`  - ${error.path || 'root'}: ${error.message}`);
    }
    process.exit(1);
  }

  return result.data;
}

/**
 * True inside a Jest worker, even when a .env file set NODE_ENV to
 * something else.
 */
export function isJestRuntime(env: Record<string, string | undefined> = process.env): boolean {
  return env.JEST_WORKER_ID !== undefined;
}

/**
 * Under Jest the effective environment is always 'test', whatever NODE_ENV says.
 */
export function getEffectiveNodeEnv(rawEnv: RawEnv): NodeEnv {
  return isJestRuntime() ? 'test' : rawEnv.NODE_ENV;
}

export function isTest(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'test';
}
