import { z } from 'zod';

export const SESSION_STATE_VERSION = 1;

/**
 * On-disk shape of an authenticated session. `cookieJar` holds the JSON
 * serialization of the cookie jar; `headers` are the default request headers
 * the session was created with.
 */
export const sessionStateSchema = z.object({
  version: z.literal(SESSION_STATE_VERSION),
  savedAt: z.string(),
  cookieJar: z.string().min(1),
  headers: z.record(z.string()),
});

export type SessionState = z.infer<typeof sessionStateSchema>;

/** Form fields to POST; array values are sent as repeated fields. */
export type FormPayload = Record<string, string | readonly string[]>;

export interface PageResponse {
  /** Final URL after redirects; relative links on the page resolve against it. */
  url: string;
  statusCode: number;
  body: string;
}

/**
 * An HTTP client carrying cookies and default headers across requests.
 * Non-2xx responses reject.
 */
export interface WebSession {
  get(url: string): Promise<PageResponse>;
  post(url: string, form: FormPayload): Promise<PageResponse>;
  exportState(): Promise<SessionState>;
}

export interface SessionFactory {
  /** A fresh, unauthenticated session with browser-like headers. */
  create(): WebSession;
  /** Rebuilds a session from stored state; rejects if the state is unusable. */
  restore(state: SessionState): Promise<WebSession>;
}

export interface Credentials {
  username: string;
  password: string;
  gameUrl: string;
}
