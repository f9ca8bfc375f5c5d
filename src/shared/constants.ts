// ---------------------------------------------------------------------------
// Combination & run domain enums
// ---------------------------------------------------------------------------

export const COMBINATION_STATUSES = {
  PENDING: 'pending',
  COMPLETED: 'completed',
} as const;

export type CombinationStatus =
  (typeof COMBINATION_STATUSES)[keyof typeof COMBINATION_STATUSES];

export const RUN_STATES = {
  IDLE: 'idle',
  AUTHENTICATING: 'authenticating',
  RUNNING: 'running',
  PAUSED: 'paused',
  COMPLETED: 'completed',
  STOPPED: 'stopped',
  FAILED: 'failed',
} as const;

export type RunState = (typeof RUN_STATES)[keyof typeof RUN_STATES];

export const RUN_OUTCOMES = {
  COMPLETED: 'completed',
  STOPPED: 'stopped',
  FAILED: 'failed',
} as const;

export type RunOutcome = (typeof RUN_OUTCOMES)[keyof typeof RUN_OUTCOMES];

export const PLAY_PAUSE = {
  PLAY: 'play',
  PAUSE: 'pause',
} as const;

export type PlayPauseState = (typeof PLAY_PAUSE)[keyof typeof PLAY_PAUSE];

// ---------------------------------------------------------------------------
// Wager marks
// ---------------------------------------------------------------------------

/** Position of each outcome mark inside a section's option triple. */
export const MARK_INDEX: ReadonlyMap<string, 0 | 1 | 2> = new Map<string, 0 | 1 | 2>([
  ['1', 0],
  ['X', 1],
  ['x', 1],
  ['2', 2],
]);

// ---------------------------------------------------------------------------
// Default operational limits
// ---------------------------------------------------------------------------

export const DEFAULT_LIMITS = {
  BATCH_SIZE: 6,
  MAX_BET_PRICE: 1.2,
  DELAY_MIN_SECONDS: 20,
  DELAY_MAX_SECONDS: 37,
  PAUSE_POLL_MS: 5_000,
  LOGIN_ATTEMPTS: 3,
  LOGIN_RETRY_BASE_DELAY_MS: 1_000,
  REQUEST_TIMEOUT_MS: 30_000,
} as const;

// ---------------------------------------------------------------------------
// Files written in the working directory
// ---------------------------------------------------------------------------

export const PATHS = {
  SESSION_FILE: 'session.json',
  AUDIT_LOG_FILE: 'confirm_talon_container.html',
  ERROR_LOG_PREFIX: 'error_log-',
  SPREADSHEET_EXTENSION: '.xlsx',
} as const;

// ---------------------------------------------------------------------------
// Remote site
// ---------------------------------------------------------------------------

export const SITE = {
  ROOT_URL: 'https://toto.bg/',
  LOGIN_PATH: 'index.php?lang=1&pid=loginonline',
} as const;

/** Markers the betting site renders; the protocol reads nothing else. */
export const PAGE_MARKERS = {
  ERROR_BANNER: '.error',
  LOGIN_FORM_ID: 'login-form',
  SECTION_CLASS: /area area-\d+/,
  SUBMIT_BUTTON: 'button#submit-bet',
  PRICE_TEXT: '.form-group b',
  CONFIRM_FORM_NAME: 'talon-bet',
  CONFIRM_PASSWORD_FIELD: 'talon_password',
  CONFIRM_CONTAINER: '.confirm_talon_container',
} as const;

export const SPREADSHEET_COLUMNS = {
  COMBINATION: 'Combination',
  STATUS: 'Status',
} as const;

// ---------------------------------------------------------------------------
// Browser-like request headers
// ---------------------------------------------------------------------------

export const BROWSER_HEADERS: Readonly<Record<string, string>> = {
  'Accept':
    'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8,application/signed-exchange;v=b3;q=0.7',
  'Accept-Language': 'en-US,en;q=0.9',
  'Cache-Control': 'max-age=0',
  'Connection': 'keep-alive',
  'Sec-Fetch-Dest': 'document',
  'Sec-Fetch-Mode': 'navigate',
  'Sec-Fetch-Site': 'none',
  'Sec-Fetch-User': '?1',
  'Upgrade-Insecure-Requests': '1',
  'User-Agent':
    'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/130.0.0.0 Safari/537.36',
  'sec-ch-ua': '"Chromium";v="130", "Google Chrome";v="130", "Not?A_Brand";v="99"',
  'sec-ch-ua-mobile': '?0',
  'sec-ch-ua-platform': '"Linux"',
};
