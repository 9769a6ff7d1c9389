import path from 'path';
import { ConfigError, DEFAULT_DB_PATH, loadConfig } from '../../src/lib/config';

const baseEnv = (): Record<string, string | undefined> => ({
  RTM_BASE_URL: 'https://jira.example.test/',
  RTM_TOKEN: 'test-secret',
  RTM_PROJECT_KEY: 'PRJ',
  RTM_PROJECT_ID: '10001',
});

describe('loadConfig', () => {
  it('should apply defaults for optional settings', () => {
    expect(loadConfig(baseEnv())).toEqual({
      baseUrl: 'https://jira.example.test',
      username: null,
      token: 'test-secret',
      projectKey: 'PRJ',
      projectId: 10001,
      dbPath: path.join('.rtm-mirror', 'mirror.db'),
      logLevel: 'info',
      retry: { maxRetries: 3, baseDelayMs: 500 },
    });
    expect(DEFAULT_DB_PATH).toBe(path.join('.rtm-mirror', 'mirror.db'));
  });

  it('should read optional settings when present', () => {
    const config = loadConfig({
      ...baseEnv(),
      RTM_USERNAME: ' tester ',
      RTM_DB_PATH: '/tmp/mirror.db',
      RTM_LOG_LEVEL: 'DEBUG',
      RTM_MAX_RETRIES: '0',
      RTM_RETRY_BASE_MS: '50',
    });

    expect(config.username).toBe('tester');
    expect(config.dbPath).toBe('/tmp/mirror.db');
    expect(config.logLevel).toBe('debug');
    expect(config.retry).toEqual({ maxRetries: 0, baseDelayMs: 50 });
  });

  it('should name the missing variable', () => {
    const env = baseEnv();
    delete env.RTM_TOKEN;

    expect(() => loadConfig(env)).toThrow(new ConfigError('RTM_TOKEN is required'));
  });

  it('should treat blank values as missing', () => {
    expect(() => loadConfig({ ...baseEnv(), RTM_PROJECT_KEY: '   ' })).toThrow('RTM_PROJECT_KEY is required');
  });

  it('should reject malformed values', () => {
    expect(() => loadConfig({ ...baseEnv(), RTM_PROJECT_ID: 'abc' })).toThrow(
      'RTM_PROJECT_ID must be a positive integer, got "abc"'
    );
    expect(() => loadConfig({ ...baseEnv(), RTM_BASE_URL: 'not a url' })).toThrow(
      'RTM_BASE_URL is not a valid URL: "not a url"'
    );
    expect(() => loadConfig({ ...baseEnv(), RTM_BASE_URL: 'ftp://jira.example.test' })).toThrow(
      'RTM_BASE_URL must use http or https, got "ftp:"'
    );
    expect(() => loadConfig({ ...baseEnv(), RTM_LOG_LEVEL: 'loud' })).toThrow(
      'RTM_LOG_LEVEL must be one of debug, info, warn, error, silent, got "loud"'
    );
    expect(() => loadConfig({ ...baseEnv(), RTM_MAX_RETRIES: '-1' })).toThrow(
      'RTM_MAX_RETRIES must be a non-negative integer, got "-1"'
    );
  });
});
