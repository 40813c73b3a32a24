import { buildConfig, isJestRuntime, parseEnv } from '../../../src/cli/config';

describe('environment configuration', () => {
  describe('parseEnv', () => {
    it('should apply defaults for an empty environment', () => {
      expect(parseEnv({})).toEqual({
        success: true,
        data: {
          NODE_ENV: 'development',
          LOG_LEVEL: 'warn',
          LOG_FORMAT: 'pretty',
          TICTACTOE_GLYPHS: 'unicode',
        },
      });
    });

    it('should accept every supported value', () => {
      const result = parseEnv({
        NODE_ENV: 'production',
        LOG_LEVEL: 'debug',
        LOG_FORMAT: 'json',
        LOG_FILE: '/tmp/tictactoe.log',
        TICTACTOE_GLYPHS: 'ascii',
      });

      expect(result.success).toBe(true);
      expect(result.data).toEqual({
        NODE_ENV: 'production',
        LOG_LEVEL: 'debug',
        LOG_FORMAT: 'json',
        LOG_FILE: '/tmp/tictactoe.log',
        TICTACTOE_GLYPHS: 'ascii',
      });
    });

    it('should ignore unrelated variables', () => {
      const result = parseEnv({ HOME: '/home/player', LOG_LEVEL: 'info' });

      expect(result.success).toBe(true);
      expect(result.data?.LOG_LEVEL).toBe('info');
    });

    it('should report every invalid variable by path', () => {
      const result = parseEnv({ LOG_LEVEL: 'verbose', TICTACTOE_GLYPHS: 'emoji' });

      expect(result.success).toBe(false);
      expect(result.data).toBeUndefined();
      expect(result.errors?.map((error) => error.path)).toEqual(['LOG_LEVEL', 'TICTACTOE_GLYPHS']);
    });
  });

  describe('isJestRuntime', () => {
    it('should detect a Jest worker from JEST_WORKER_ID', () => {
      expect(isJestRuntime({ JEST_WORKER_ID: '1' })).toBe(true);
      expect(isJestRuntime({ NODE_ENV: 'test' })).toBe(false);
      expect(isJestRuntime()).toBe(true);
    });
  });

  describe('buildConfig', () => {
    it('should build a frozen config and force test mode under Jest', () => {
      const config = buildConfig({
        NODE_ENV: 'production',
        LOG_LEVEL: 'info',
        LOG_FORMAT: 'json',
        LOG_FILE: undefined,
        TICTACTOE_GLYPHS: 'ascii',
      });

      expect(config).toEqual({
        nodeEnv: 'test',
        isTest: true,
        logging: { level: 'info', format: 'json', file: undefined },
        display: { glyphs: 'ascii' },
      });
      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.logging)).toBe(true);
    });

    it('should trim the log file path and drop a blank one', () => {
      const base = {
        NODE_ENV: 'development',
        LOG_LEVEL: 'warn',
        LOG_FORMAT: 'pretty',
        TICTACTOE_GLYPHS: 'unicode',
      } as const;

      expect(buildConfig({ ...base, LOG_FILE: '  game.log ' }).logging.file).toBe('game.log');
      expect(buildConfig({ ...base, LOG_FILE: '   ' }).logging.file).toBeUndefined();
    });
  });
});
