import { parseEnv } from '../src/env.js';
import { runManagerConfigFromEnv } from '../src/runner/run-manager.js';

describe('parseEnv', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('fills every setting from defaults', () => {
    const env = parseEnv({});

    expect(env).toMatchObject({
      NODE_ENV: 'development',
      PORT: 3000,
      HOST: '127.0.0.1',
      MAX_BET_PRICE: 1.2,
      DELAY_MIN_SECONDS: 20,
      DELAY_MAX_SECONDS: 37,
      PAUSE_POLL_MS: 5_000,
      LOGIN_ATTEMPTS: 3,
      REAUTH_ON_SESSION_EXPIRY: false,
    });
  });

  it('coerces numbers and boolean flags', () => {
    const env = parseEnv({
      PORT: '8080',
      MAX_BET_PRICE: '2.5',
      REAUTH_ON_SESSION_EXPIRY: 'true',
      ERROR_LOG_DIR: '/var/log/runs',
    });

    expect(env.PORT).toBe(8080);
    expect(env.MAX_BET_PRICE).toBe(2.5);
    expect(env.REAUTH_ON_SESSION_EXPIRY).toBe(true);
    expect(runManagerConfigFromEnv(env)).toMatchObject({
      maxBetPrice: 2.5,
      errorLogDir: '/var/log/runs',
      reauthOnSessionExpiry: true,
    });
  });

  it('rejects an inverted delay range', () => {
    expect(() => parseEnv({ DELAY_MIN_SECONDS: '40', DELAY_MAX_SECONDS: '30' })).toThrow(
      'Environment validation failed',
    );
  });

  it('rejects a malformed flag', () => {
    expect(() => parseEnv({ REAUTH_ON_SESSION_EXPIRY: 'yes' })).toThrow(
      'Environment validation failed',
    );
  });
});
