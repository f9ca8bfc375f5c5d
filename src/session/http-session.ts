/**
 * got-backed implementation of WebSession.
 *
 * Cookies live in a tough-cookie jar so the authenticated state can be
 * serialized between process runs. Transport retries are disabled: a wager
 * request must never be sent twice behind the caller's back.
 */

import got, { type Got } from 'got';
import { CookieJar } from 'tough-cookie';
import { BROWSER_HEADERS, DEFAULT_LIMITS } from '../shared/constants.js';
import { getLogger } from '../shared/logger.js';
import {
  SESSION_STATE_VERSION,
  type FormPayload,
  type PageResponse,
  type SessionFactory,
  type SessionState,
  type WebSession,
} from './types.js';

const log = getLogger('session', { component: 'http-session' });

/**
 * Encodes a payload as application/x-www-form-urlencoded, repeating the key
 * for every value of an array field.
 */
export function encodeForm(form: FormPayload): string {
  const params = new URLSearchParams();
  for (const [name, value] of Object.entries(form)) {
    if (typeof value === 'string') {
      params.append(name, value);
    } else {
      for (const item of value) {
        params.append(name, item);
      }
    }
  }
  return params.toString();
}

export class GotSession implements WebSession {
  private readonly client: Got;

  constructor(
    private readonly jar: CookieJar,
    private readonly headers: Record<string, string>,
    timeoutMs: number = DEFAULT_LIMITS.REQUEST_TIMEOUT_MS,
  ) {
    this.client = got.extend({
      headers,
      timeout: { request: timeoutMs },
      retry: { limit: 0 },
      followRedirect: true,
      cookieJar: {
        getCookieString: (url: string) => this.jar.getCookieString(url),
        setCookie: (rawCookie: string, url: string) =>
          this.jar.setCookie(rawCookie, url, { ignoreError: true }),
      },
    });
  }

  async get(url: string): Promise<PageResponse> {
    const response = await this.client.get(url, { responseType: 'text' });
    log.debug({ url, finalUrl: response.url, statusCode: response.statusCode }, 'GET');
    return { url: response.url, statusCode: response.statusCode, body: response.body };
  }

  async post(url: string, form: FormPayload): Promise<PageResponse> {
    const response = await this.client.post(url, {
      body: encodeForm(form),
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      responseType: 'text',
    });
    log.debug({ url, finalUrl: response.url, statusCode: response.statusCode }, 'POST');
    return { url: response.url, statusCode: response.statusCode, body: response.body };
  }

  async exportState(): Promise<SessionState> {
    const serialized = await this.jar.serialize();
    return {
      version: SESSION_STATE_VERSION,
      savedAt: new Date().toISOString(),
      cookieJar: JSON.stringify(serialized),
      headers: { ...this.headers },
    };
  }
}

export class GotSessionFactory implements SessionFactory {
  constructor(private readonly timeoutMs: number = DEFAULT_LIMITS.REQUEST_TIMEOUT_MS) {}

  create(): WebSession {
    return new GotSession(new CookieJar(), { ...BROWSER_HEADERS }, this.timeoutMs);
  }

  async restore(state: SessionState): Promise<WebSession> {
    const jar = await CookieJar.deserialize(state.cookieJar);
    return new GotSession(jar, { ...state.headers }, this.timeoutMs);
  }
}
