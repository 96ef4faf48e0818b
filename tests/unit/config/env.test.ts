import { getEffectiveNodeEnv, isTest, loadEnvOrExit, parseEnv } from '../../../src/server/config/env';

describe('parseEnv', () => {
  it('should apply defaults to an empty environment', () => {
    const result = parseEnv({});

    expect(result.success).toBe(true);
    expect(result.data).toEqual({
      NODE_ENV: 'development',
      LOG_LEVEL: 'info',
      LOG_FORMAT: 'pretty',
      SAVES_DIR: 'saves',
      ROBOT_THINK_MIN_MS: 1800,
      ROBOT_THINK_MAX_MS: 2000,
      MAX_REJECTED_DECISIONS: 25,
    });
  });

  it('should coerce numeric variables', () => {
    const result = parseEnv({ GAME_SEED: '42', ROBOT_THINK_MIN_MS: '0', ROBOT_THINK_MAX_MS: '10' });

    expect(result.data).toMatchObject({ GAME_SEED: 42, ROBOT_THINK_MIN_MS: 0, ROBOT_THINK_MAX_MS: 10 });
  });

  it('should report an unknown log level by variable name', () => {
    const result = parseEnv({ LOG_LEVEL: 'verbose' });

    expect(result.success).toBe(false);
    expect(result.errors?.map((error) => error.path)).toEqual(['LOG_LEVEL']);
  });

  it('should refuse a minimum thinking time above the maximum', () => {
    const result = parseEnv({ ROBOT_THINK_MIN_MS: '500', ROBOT_THINK_MAX_MS: '100' });

    expect(result.errors).toEqual([
      { path: 'ROBOT_THINK_MIN_MS', message: 'ROBOT_THINK_MIN_MS must not exceed ROBOT_THINK_MAX_MS' },
    ]);
  });

  it('should reject a negative seed', () => {
    expect(parseEnv({ GAME_SEED: '-1' }).success).toBe(false);
  });
});

describe('getEffectiveNodeEnv', () => {
  it('should report the test environment under Jest', () => {
    const result = parseEnv({ NODE_ENV: 'production' });
    if (!result.data) {
      throw new Error('Expected a valid environment');
    }

    expect(getEffectiveNodeEnv(result.data)).toBe('test');
  });
});

describe('loadEnvOrExit', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should return the parsed environment when it is valid', () => {
    expect(loadEnvOrExit({ SAVES_DIR: 'games', GAME_SEED: '7' })).toMatchObject({ SAVES_DIR: 'games', GAME_SEED: 7 });
  });

  it('should print every problem and exit with status 1', () => {
    const printed = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const exit = jest.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${String(code)}`);
    });

    expect(() => loadEnvOrExit({ LOG_LEVEL: 'verbose' })).toThrow('exit 1');

    expect(exit).toHaveBeenCalledWith(1);
    expect(printed).toHaveBeenCalledWith('Invalid environment configuration:');
    expect(printed.mock.calls[1][0]).toMatch(/^  - LOG_LEVEL: /);
  });
});

describe('isTest', () => {
  it('should only accept the test environment', () => {
    expect(isTest('test')).toBe(true);
    expect(isTest('production')).toBe(false);
  });
});
