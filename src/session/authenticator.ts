/**
 * Login lifecycle for the betting site.
 *
 * A stored session is reused when it still passes the liveness probe;
 * otherwise the site is logged into afresh. A session that fails the probe is
 * discarded before the next attempt, so it is never handed out again.
 */

import { PageDocument } from '../html/page-document.js';
import { hasLoginForm, readErrorBanner } from '../html/site-markers.js';
import { DEFAULT_LIMITS, SITE } from '../shared/constants.js';
import {
  AuthenticationFailedError,
  SessionNotLiveError,
  errorMessage,
} from '../shared/errors.js';
import { getLogger } from '../shared/logger.js';
import { retry } from '../shared/retry.js';
import type { SessionStore } from './session-store.js';
import type { Credentials, SessionFactory, WebSession } from './types.js';

const log = getLogger('auth', { component: 'authenticator' });

export interface AuthenticatorOptions {
  siteRootUrl?: string;
  /** Login endpoint, relative to `siteRootUrl`. */
  loginPath?: string;
  maxAttempts?: number;
  retryBaseDelayMs?: number;
}

export class Authenticator {
  private readonly siteRootUrl: string;
  private readonly loginUrl: string;
  private readonly maxAttempts: number;
  private readonly retryBaseDelayMs: number;

  constructor(
    private readonly store: SessionStore,
    private readonly sessions: SessionFactory,
    options: AuthenticatorOptions = {},
  ) {
    this.siteRootUrl = options.siteRootUrl ?? SITE.ROOT_URL;
    this.loginUrl = new URL(options.loginPath ?? SITE.LOGIN_PATH, this.siteRootUrl).toString();
    this.maxAttempts = options.maxAttempts ?? DEFAULT_LIMITS.LOGIN_ATTEMPTS;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? DEFAULT_LIMITS.LOGIN_RETRY_BASE_DELAY_MS;
  }

  /**
   * Returns a session that is authenticated for `credentials.gameUrl`.
   *
   * @throws AuthenticationFailedError when the site rejects the credentials,
   *   or when no attempt produced a live session.
   */
  async loginSession(credentials: Credentials): Promise<WebSession> {
    try {
      return await retry(
        async (attempt) => {
          const session = await this.obtainSession(credentials);
          if (await this.checkLogin(session, credentials.gameUrl)) {
            log.info({ attempt }, 'Session is live');
            return session;
          }
          throw new SessionNotLiveError(credentials.gameUrl);
        },
        {
          maxAttempts: this.maxAttempts,
          baseDelayMs: this.retryBaseDelayMs,
          retryableErrors: ['SESSION_NOT_LIVE'],
          onRetry: async (_error, attempt) => {
            log.error({ attempt }, 'Unable to login to the page, retrying with a fresh login');
            await this.store.discard();
          },
        },
      );
    } catch (error) {
      if (error instanceof SessionNotLiveError) {
        await this.store.discard();
        throw new AuthenticationFailedError('Unable to login to the page', this.maxAttempts);
      }
      throw error;
    }
  }

  /**
   * Liveness probe: the target page only renders the login form to
   * visitors without a valid session.
   */
  async checkLogin(session: WebSession, targetUrl: string): Promise<boolean> {
    const response = await session.get(targetUrl);
    const doc = PageDocument.parse(response.body, response.url);
    return !hasLoginForm(doc);
  }

  /**
   * Performs a fresh login and persists the resulting session.
   */
  async login(username: string, password: string): Promise<WebSession> {
    const session = this.sessions.create();

    // Baseline visit so the site hands out its initial cookies.
    await session.get(this.siteRootUrl);
    log.info('Session created');

    const response = await session.post(this.loginUrl, {
      username,
      password,
      'g-recaptcha-response': '',
    });

    const doc = PageDocument.parse(response.body, response.url);
    const banner = readErrorBanner(doc);
    if (banner) {
      log.error({ banner }, 'Unable to login to the page');
      throw new AuthenticationFailedError(banner);
    }

    log.info('Successfully logged in');
    await this.store.save(await session.exportState());
    return session;
  }

  private async obtainSession(credentials: Credentials): Promise<WebSession> {
    const stored = await this.store.load();
    if (stored) {
      try {
        return await this.sessions.restore(stored);
      } catch (error) {
        log.warn({ error: errorMessage(error) }, 'Stored session could not be restored');
        await this.store.discard();
      }
    }
    return this.login(credentials.username, credentials.password);
  }
}
