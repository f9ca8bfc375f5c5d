/**
 * Batch runner - drives one wager run end to end.
 *
 *   idle -> authenticating -> running <-> paused -> completed | stopped | failed
 *
 * Pending combinations are taken from the ledger in fixed-size batches and
 * placed one batch at a time. A batch is committed only after the site has
 * confirmed it. The operator's pause/stop signals are honoured between
 * batches and during the inter-batch delay, never while a batch is in
 * flight. Every failure ends the run; nothing is retried mid-batch.
 */

import { ulid } from 'ulid';
import { CombinationLedger } from '../ledger/combination-ledger.js';
import type { CombinationRecord } from '../ledger/types.js';
import type { BatchReceipt } from '../protocol/types.js';
import type { Authenticator } from '../session/authenticator.js';
import type { SessionStore } from '../session/session-store.js';
import {
  DEFAULT_LIMITS,
  PLAY_PAUSE,
  RUN_OUTCOMES,
  RUN_STATES,
  type RunOutcome,
  type RunState,
} from '../shared/constants.js';
import {
  CancellationToken,
  StopRequestedError,
  createCancellationToken,
} from '../shared/cancellation.js';
import { AppError, SessionExpiredError, errorMessage } from '../shared/errors.js';
import { TypedEventEmitter } from '../shared/events.js';
import { randomBetween, sleep, sleepInSlices } from '../shared/timing.js';
import { formatDuration } from '../shared/utils.js';
import { RunTranscript } from './run-transcript.js';
import type {
  ControlChannel,
  PacingSource,
  Progress,
  ProgressSink,
  RunRequest,
  RunResult,
  WagerPlacer,
  WagerPlacerFactory,
} from './types.js';

export interface BatchRunnerDeps {
  authenticator: Authenticator;
  sessionStore: SessionStore;
  createPlacer: WagerPlacerFactory;
  controls: ControlChannel;
  pacing: PacingSource;
  sink: ProgressSink;
}

export interface BatchRunnerOptions {
  runId?: string;
  batchSize?: number;
  pausePollMs?: number;
  /** Directory the error log of a failed run is written to. */
  errorLogDir?: string;
  /** Re-authenticate and retry the same batch once when the login expires. */
  reauthOnSessionExpiry?: boolean;
  sleep?: (ms: number) => Promise<void>;
}

const TERMINAL_STATES: Record<RunOutcome, RunState> = {
  [RUN_OUTCOMES.COMPLETED]: RUN_STATES.COMPLETED,
  [RUN_OUTCOMES.STOPPED]: RUN_STATES.STOPPED,
  [RUN_OUTCOMES.FAILED]: RUN_STATES.FAILED,
};

export class BatchRunner extends TypedEventEmitter {
  readonly runId: string;

  private readonly batchSize: number;
  private readonly pausePollMs: number;
  private readonly errorLogDir: string;
  private readonly reauthOnSessionExpiry: boolean;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly token: CancellationToken = createCancellationToken();
  private readonly transcript: RunTranscript;

  private state: RunState = RUN_STATES.IDLE;
  private started = false;
  private lastResult: RunResult | null = null;

  constructor(
    private readonly deps: BatchRunnerDeps,
    options: BatchRunnerOptions = {},
  ) {
    super();
    this.runId = options.runId ?? ulid();
    this.batchSize = options.batchSize ?? DEFAULT_LIMITS.BATCH_SIZE;
    this.pausePollMs = options.pausePollMs ?? DEFAULT_LIMITS.PAUSE_POLL_MS;
    this.errorLogDir = options.errorLogDir ?? '.';
    this.reauthOnSessionExpiry = options.reauthOnSessionExpiry ?? false;
    this.sleep = options.sleep ?? sleep;
    this.transcript = new RunTranscript(this.runId, (line) => this.emit('run:log', line));
    this.token.onCancel((reason) => this.transcript.info(reason));
  }

  get currentState(): RunState {
    return this.state;
  }

  get result(): RunResult | null {
    return this.lastResult;
  }

  /**
   * Executes the run to its end. Never rejects: every outcome, failures
   * included, is reported in the returned result.
   */
  async run(request: RunRequest): Promise<RunResult> {
    if (this.started) {
      throw new AppError(`Run ${this.runId} has already been started`, 'RUN_ALREADY_STARTED', 409);
    }
    this.started = true;

    const startedAt = Date.now();
    let ledger: CombinationLedger | null = null;
    let processed = 0;
    let outcome: RunOutcome = RUN_OUTCOMES.FAILED;
    let failure: { message: string; code?: string } | undefined;
    let errorLogPath: string | undefined;
    let result: RunResult;

    try {
      ledger = await CombinationLedger.load(request.spreadsheetPath);
      const loaded = ledger.status();
      this.transcript.info(
        `Loaded ${loaded.total} combinations, ${loaded.completed} already completed`,
      );

      let placer = await this.authenticate(request);
      this.transition(RUN_STATES.RUNNING);

      for (let batchNumber = 1; ; batchNumber++) {
        // A run with nothing left is complete, even if stop arrived meanwhile.
        const batch = ledger.nextBatch(this.batchSize);
        if (batch.length === 0) {
          break;
        }

        await this.controlCheck();

        let receipt: BatchReceipt;
        try {
          receipt = await this.placeBatch(placer, batch, request, batchNumber);
        } catch (error) {
          if (!(error instanceof SessionExpiredError) || !this.reauthOnSessionExpiry) {
            throw error;
          }
          this.transcript.warn('Login expired, logging in again to retry the batch');
          await this.deps.sessionStore.discard();
          placer = await this.authenticate(request);
          this.transition(RUN_STATES.RUNNING);
          receipt = await this.placeBatch(placer, batch, request, batchNumber);
        }

        await ledger.commit(batch);
        processed += batch.length;
        const progress = ledger.status();
        this.reportProgress(progress, processed);
        this.emit('run:batch', {
          batch: batchNumber,
          rows: batch.map((r) => r.row),
          price: receipt.price,
          progress,
        });
        this.transcript.info(
          `Batch ${batchNumber} placed at ${receipt.price}: ${progress.completed}/${progress.total} completed`,
        );

        if (progress.completed < progress.total) {
          await this.delayBeforeNextBatch();
        }
      }

      outcome = RUN_OUTCOMES.COMPLETED;
      this.transcript.info('All combinations have been placed');
    } catch (error) {
      if (error instanceof StopRequestedError) {
        outcome = RUN_OUTCOMES.STOPPED;
      } else {
        outcome = RUN_OUTCOMES.FAILED;
        failure = {
          message: errorMessage(error),
          ...(error instanceof AppError ? { code: error.code } : {}),
        };
        this.transcript.error(`Run failed: ${failure.message}`, {
          code: failure.code,
          stack: error instanceof Error ? error.stack : undefined,
        });
        errorLogPath = await this.saveErrorLog();
      }
    } finally {
      result = this.teardown({
        outcome,
        progress: ledger?.status() ?? { total: 0, completed: 0 },
        processed,
        elapsedMs: Date.now() - startedAt,
        failure,
        errorLogPath,
      });
    }

    return result;
  }

  private async authenticate(request: RunRequest): Promise<WagerPlacer> {
    this.transition(RUN_STATES.AUTHENTICATING);
    const session = await this.deps.authenticator.loginSession(request.credentials);
    this.transcript.info('Logged in');
    return this.deps.createPlacer(session, request.credentials.gameUrl);
  }

  private async placeBatch(
    placer: WagerPlacer,
    batch: readonly CombinationRecord[],
    request: RunRequest,
    batchNumber: number,
  ): Promise<BatchReceipt> {
    this.transcript.info(`Placing batch ${batchNumber} (${batch.length} combinations)`);
    return placer.placeBatch(
      batch.map((r) => r.combination),
      request.credentials.password,
    );
  }

  private reportProgress(progress: Progress, processed: number): void {
    this.deps.sink.onProgress(progress.total, progress.completed);
    this.deps.sink.onProcessedCountUpdate(processed);
    this.emit('run:progress', progress);
    this.emit('run:processed', processed);
  }

  /**
   * Safe point between batches: honours a stop, and blocks while paused,
   * polling every `pausePollMs` until play or stop.
   */
  private async controlCheck(): Promise<void> {
    this.checkStop();
    if (this.deps.controls.getPlayPauseState() !== PLAY_PAUSE.PAUSE) {
      return;
    }

    this.transition(RUN_STATES.PAUSED);
    this.transcript.info('Paused');
    while (this.deps.controls.getPlayPauseState() === PLAY_PAUSE.PAUSE) {
      this.checkStop();
      await this.sleep(this.pausePollMs);
    }
    this.checkStop();
    this.transition(RUN_STATES.RUNNING);
    this.transcript.info('Resumed');
  }

  private async delayBeforeNextBatch(): Promise<void> {
    const { minSeconds, maxSeconds } = this.deps.pacing.getDelayRange();
    const delayMs = Math.round(randomBetween(minSeconds, maxSeconds) * 1000);
    if (delayMs > 0) {
      this.transcript.info(`Waiting ${formatDuration(delayMs)} before the next batch`);
    }

    const aborted = await sleepInSlices(
      delayMs,
      this.pausePollMs,
      () => this.deps.controls.isStopRequested(),
      this.sleep,
    );
    if (aborted) {
      this.checkStop();
    }
  }

  private checkStop(): void {
    if (this.deps.controls.isStopRequested()) {
      this.token.cancel('Stopped by operator');
    }
    this.token.throwIfCancelled();
  }

  private async saveErrorLog(): Promise<string | undefined> {
    try {
      const path = await this.transcript.save(this.errorLogDir);
      this.transcript.info(`Error log saved to ${path}`);
      return path;
    } catch (error) {
      this.transcript.warn(`Unable to save the error log: ${errorMessage(error)}`);
      return undefined;
    }
  }

  private teardown(summary: {
    outcome: RunOutcome;
    progress: Progress;
    processed: number;
    elapsedMs: number;
    failure: { message: string; code?: string } | undefined;
    errorLogPath: string | undefined;
  }): RunResult {
    if (this.lastResult) {
      return this.lastResult;
    }

    const result: RunResult = {
      runId: this.runId,
      outcome: summary.outcome,
      progress: summary.progress,
      processed: summary.processed,
      elapsedMs: summary.elapsedMs,
      ...(summary.failure
        ? { error: summary.failure.message, errorCode: summary.failure.code }
        : {}),
      ...(summary.errorLogPath ? { errorLogPath: summary.errorLogPath } : {}),
    };
    this.lastResult = result;

    this.transition(TERMINAL_STATES[summary.outcome]);
    this.transcript.info(
      `Run ${summary.outcome} after ${formatDuration(summary.elapsedMs)}, ${summary.processed} combinations placed`,
    );
    this.emit('run:finished', result);
    return result;
  }

  private transition(next: RunState): void {
    if (this.state === next) return;
    const previous = this.state;
    this.state = next;
    this.emit('run:state', next, previous);
  }
}
