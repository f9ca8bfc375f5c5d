/**
 * Owns the single active run of this process and the operator controls that
 * go with it. The control API talks only to this class.
 */

import { CombinationLedger } from '../ledger/combination-ledger.js';
import { AuditLog } from '../protocol/confirmation-handler.js';
import { FormProtocolClient } from '../protocol/wager-client.js';
import { Authenticator } from '../session/authenticator.js';
import { GotSessionFactory } from '../session/http-session.js';
import { SessionStore } from '../session/session-store.js';
import type { SessionFactory } from '../session/types.js';
import type { Env } from '../env.js';
import type { PlayPauseState, RunState } from '../shared/constants.js';
import { InvalidInputError, RunConflictError, errorMessage } from '../shared/errors.js';
import { getLogger } from '../shared/logger.js';
import { BatchRunner } from './batch-runner.js';
import { OperatorControls } from './operator-controls.js';
import type {
  BatchReport,
  DelayRange,
  Progress,
  RunResult,
  WagerPlacerFactory,
} from './types.js';

const log = getLogger('runner', { component: 'run-manager' });

/** Transcript lines of the active run kept for the control surface. */
const RECENT_LOG_LINES = 50;

export interface RunManagerConfig {
  siteRootUrl: string;
  loginPath: string;
  sessionFile: string;
  auditLogFile: string;
  errorLogDir: string;
  maxBetPrice: number;
  delayMinSeconds: number;
  delayMaxSeconds: number;
  pausePollMs: number;
  loginAttempts: number;
  requestTimeoutMs: number;
  reauthOnSessionExpiry: boolean;
}

export interface RunManagerDeps {
  sessions?: SessionFactory;
  sleep?: (ms: number) => Promise<void>;
  retryBaseDelayMs?: number;
}

export interface StartRunInput {
  username: string;
  password: string;
  gameUrl: string;
  spreadsheetPath: string;
  minDelaySeconds?: number;
  maxDelaySeconds?: number;
  maxBetPrice?: number;
}

export interface RunSnapshot {
  runId: string;
  state: RunState;
  playPause: PlayPauseState;
  stopRequested: boolean;
  progress: Progress;
  processed: number;
  delay: DelayRange;
  lastBatch: BatchReport | null;
  recentLog: string[];
}

interface ActiveRun {
  runner: BatchRunner;
  controls: OperatorControls;
  done: Promise<RunResult>;
  feed: RunFeed;
}

/** What the run has reported so far, as seen by the control surface. */
interface RunFeed {
  lastBatch: BatchReport | null;
  recentLog: string[];
}

export class RunManager {
  private active: ActiveRun | null = null;
  private starting = false;
  private lastResult: RunResult | null = null;
  private readonly sessions: SessionFactory;

  constructor(
    private readonly config: RunManagerConfig,
    private readonly deps: RunManagerDeps = {},
  ) {
    this.sessions = deps.sessions ?? new GotSessionFactory(config.requestTimeoutMs);
  }

  get isActive(): boolean {
    return this.active !== null || this.starting;
  }

  /**
   * Prechecks the spreadsheet and starts a run in the background.
   *
   * @throws RunConflictError when a run is already active
   * @throws InvalidInputError when the spreadsheet cannot be used
   */
  async start(input: StartRunInput): Promise<{ runId: string; progress: Progress }> {
    if (this.isActive) {
      throw new RunConflictError('A run is already in progress');
    }
    this.starting = true;

    try {
      const report = await CombinationLedger.validate(input.spreadsheetPath);
      if (!report.hasCombinationColumn) {
        throw new InvalidInputError(
          `Spreadsheet ${input.spreadsheetPath} cannot be read or has no Combination column`,
          input.spreadsheetPath,
        );
      }

      const controls = new OperatorControls({
        minSeconds: input.minDelaySeconds ?? this.config.delayMinSeconds,
        maxSeconds: input.maxDelaySeconds ?? this.config.delayMaxSeconds,
      });
      const runner = this.createRunner(controls, input.maxBetPrice ?? this.config.maxBetPrice);
      const feed: RunFeed = { lastBatch: null, recentLog: [] };
      runner.on('run:log', (line) => {
        feed.recentLog.push(line);
        if (feed.recentLog.length > RECENT_LOG_LINES) {
          feed.recentLog.shift();
        }
      });
      runner.on('run:batch', (report) => {
        feed.lastBatch = report;
      });

      const done = runner
        .run({
          credentials: {
            username: input.username,
            password: input.password,
            gameUrl: input.gameUrl,
          },
          spreadsheetPath: input.spreadsheetPath,
        })
        .then((result) => {
          this.lastResult = result;
          return result;
        })
        .finally(() => {
          if (this.active?.runner === runner) {
            this.active = null;
          }
        });

      void done.catch((error: unknown) => {
        log.error({ runId: runner.runId, error: errorMessage(error) }, 'Run ended unexpectedly');
      });

      this.active = { runner, controls, done, feed };
      log.info({ runId: runner.runId, progress: report.progress }, 'Run started');
      return { runId: runner.runId, progress: report.progress };
    } finally {
      this.starting = false;
    }
  }

  current(): RunSnapshot | null {
    if (!this.active) {
      return null;
    }
    const { runner, controls } = this.active;
    return {
      runId: runner.runId,
      state: runner.currentState,
      playPause: controls.getPlayPauseState(),
      stopRequested: controls.isStopRequested(),
      progress: controls.progress,
      processed: controls.processed,
      delay: controls.getDelayRange(),
      lastBatch: this.active.feed.lastBatch,
      recentLog: [...this.active.feed.recentLog],
    };
  }

  get lastRunResult(): RunResult | null {
    return this.lastResult;
  }

  pause(): RunSnapshot {
    this.requireActive().controls.pause();
    return this.snapshotOrThrow();
  }

  resume(): RunSnapshot {
    this.requireActive().controls.play();
    return this.snapshotOrThrow();
  }

  stop(): RunSnapshot {
    this.requireActive().controls.stop();
    return this.snapshotOrThrow();
  }

  setDelay(minSeconds: number, maxSeconds: number): DelayRange {
    return this.requireActive().controls.setDelayRange(minSeconds, maxSeconds);
  }

  /** Resolves with the active run's result, or null when no run is active. */
  async waitForCurrent(): Promise<RunResult | null> {
    return this.active ? this.active.done : null;
  }

  /** Requests a stop and waits for the active run to tear down. */
  async shutdown(): Promise<void> {
    if (!this.active) return;
    this.active.controls.stop();
    await this.active.done;
  }

  private createRunner(controls: OperatorControls, maxBetPrice: number): BatchRunner {
    const store = new SessionStore(this.config.sessionFile);
    const authenticator = new Authenticator(store, this.sessions, {
      siteRootUrl: this.config.siteRootUrl,
      loginPath: this.config.loginPath,
      maxAttempts: this.config.loginAttempts,
      ...(this.deps.retryBaseDelayMs !== undefined
        ? { retryBaseDelayMs: this.deps.retryBaseDelayMs }
        : {}),
    });
    const auditLog = new AuditLog(this.config.auditLogFile);
    const createPlacer: WagerPlacerFactory = (session, gameUrl) =>
      new FormProtocolClient(session, gameUrl, { maxBetPrice, auditLog });

    return new BatchRunner(
      {
        authenticator,
        sessionStore: store,
        createPlacer,
        controls,
        pacing: controls,
        sink: controls,
      },
      {
        pausePollMs: this.config.pausePollMs,
        errorLogDir: this.config.errorLogDir,
        reauthOnSessionExpiry: this.config.reauthOnSessionExpiry,
        ...(this.deps.sleep ? { sleep: this.deps.sleep } : {}),
      },
    );
  }

  private requireActive(): ActiveRun {
    if (!this.active) {
      throw new RunConflictError('No run is in progress');
    }
    return this.active;
  }

  private snapshotOrThrow(): RunSnapshot {
    const snapshot = this.current();
    if (!snapshot) {
      throw new RunConflictError('No run is in progress');
    }
    return snapshot;
  }
}

/** Maps validated environment settings onto the run manager's config. */
export function runManagerConfigFromEnv(env: Env): RunManagerConfig {
  return {
    siteRootUrl: env.SITE_ROOT_URL,
    loginPath: env.LOGIN_PATH,
    sessionFile: env.SESSION_FILE,
    auditLogFile: env.AUDIT_LOG_FILE,
    errorLogDir: env.ERROR_LOG_DIR,
    maxBetPrice: env.MAX_BET_PRICE,
    delayMinSeconds: env.DELAY_MIN_SECONDS,
    delayMaxSeconds: env.DELAY_MAX_SECONDS,
    pausePollMs: env.PAUSE_POLL_MS,
    loginAttempts: env.LOGIN_ATTEMPTS,
    requestTimeoutMs: env.REQUEST_TIMEOUT_MS,
    reauthOnSessionExpiry: env.REAUTH_ON_SESSION_EXPIRY,
  };
}
