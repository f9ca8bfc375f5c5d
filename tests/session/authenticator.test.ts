import { join } from 'node:path';
import { Authenticator } from '../../src/session/authenticator.js';
import { SessionStore } from '../../src/session/session-store.js';
import { AuthenticationFailedError } from '../../src/shared/errors.js';
import {
  FakeSession,
  FakeSite,
  GAME_URL,
  LOGIN_PATH,
  PASSWORD,
  SITE_ROOT,
  USERNAME,
} from '../helpers/fake-site.js';
import { makeTempDir, removeDir } from '../helpers/workbook.js';

const CREDENTIALS = { username: USERNAME, password: PASSWORD, gameUrl: GAME_URL };

function sessionId(session: unknown): string | undefined {
  return session instanceof FakeSession ? session.id : undefined;
}

describe('Authenticator', () => {
  let dir: string;
  let site: FakeSite;
  let store: SessionStore;
  let authenticator: Authenticator;

  beforeEach(async () => {
    dir = await makeTempDir();
    site = new FakeSite();
    store = new SessionStore(join(dir, 'session.json'));
    authenticator = new Authenticator(store, site, {
      siteRootUrl: SITE_ROOT,
      loginPath: LOGIN_PATH,
      maxAttempts: 3,
      retryBaseDelayMs: 1,
    });
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('logs in afresh and stores the session when nothing is stored', async () => {
    const session = await authenticator.loginSession(CREDENTIALS);

    expect(sessionId(session)).toBe('s1');
    expect(site.loginAttempts).toBe(1);
    await expect(store.load()).resolves.toMatchObject({ cookieJar: '{"sid":"s1"}' });
  });

  it('reuses a stored session that is still live without logging in', async () => {
    await authenticator.loginSession(CREDENTIALS);

    const again = await new Authenticator(store, site, {
      siteRootUrl: SITE_ROOT,
      loginPath: LOGIN_PATH,
    }).loginSession(CREDENTIALS);

    expect(sessionId(again)).toBe('s1');
    expect(site.loginAttempts).toBe(1);
    expect(site.restoredSessions).toEqual(['s1']);
  });

  it('discards a stored session that fails the liveness check and never reuses it', async () => {
    await authenticator.loginSession(CREDENTIALS);
    site.expireAll();

    const session = await authenticator.loginSession(CREDENTIALS);

    expect(sessionId(session)).toBe('s2');
    expect(site.restoredSessions).toEqual(['s1']);
    expect(site.gameLoads).toEqual(['s1', 's1', 's2']);
    await expect(store.load()).resolves.toMatchObject({ cookieJar: '{"sid":"s2"}' });
  });

  it('fails with the banner text when the credentials are rejected', async () => {
    await expect(
      authenticator.loginSession({ ...CREDENTIALS, password: 'wrong-secret' }),
    ).rejects.toThrow(new AuthenticationFailedError('Invalid username or password'));

    expect(site.loginAttempts).toBe(1);
    await expect(store.load()).resolves.toBeNull();
  });

  it('gives up after the configured attempts and leaves no stored session', async () => {
    site.rejectAllSessions = true;

    const error: unknown = await authenticator.loginSession(CREDENTIALS).catch((e: unknown) => e);

    if (!(error instanceof AuthenticationFailedError)) {
      throw new Error(`Expected AuthenticationFailedError, got ${String(error)}`);
    }
    expect(error.message).toBe('Unable to login to the page');
    expect(error.attempts).toBe(3);
    expect(site.loginAttempts).toBe(3);
    await expect(store.load()).resolves.toBeNull();
  });

  it('checkLogin is false exactly when the page renders the login form', async () => {
    const live = site.loggedInSession();
    const anonymous = site.create();

    await expect(authenticator.checkLogin(live, GAME_URL)).resolves.toBe(true);
    await expect(authenticator.checkLogin(anonymous, GAME_URL)).resolves.toBe(false);
  });
});
