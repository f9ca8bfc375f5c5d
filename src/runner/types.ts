import type { PlayPauseState, RunOutcome } from '../shared/constants.js';
import type { BatchReceipt } from '../protocol/types.js';
import type { Credentials, WebSession } from '../session/types.js';

export interface Progress {
  total: number;
  completed: number;
}

export interface DelayRange {
  minSeconds: number;
  maxSeconds: number;
}

/** Read by the worker between batches; written by the operator. */
export interface ControlChannel {
  getPlayPauseState(): PlayPauseState;
  isStopRequested(): boolean;
}

/** Written by the worker after every committed batch. */
export interface ProgressSink {
  onProgress(total: number, completed: number): void;
  onProcessedCountUpdate(processed: number): void;
}

/** Consulted before every inter-batch delay, so it can change mid-run. */
export interface PacingSource {
  getDelayRange(): DelayRange;
}

/** Anything that can place one batch of combinations as a single wager. */
export interface WagerPlacer {
  placeBatch(combinations: readonly string[], password: string): Promise<BatchReceipt>;
}

export type WagerPlacerFactory = (session: WebSession, gameUrl: string) => WagerPlacer;

export interface RunRequest {
  credentials: Credentials;
  spreadsheetPath: string;
}

export interface BatchReport {
  /** 1-based batch number within this run. */
  batch: number;
  rows: number[];
  price: number;
  progress: Progress;
}

export interface RunResult {
  runId: string;
  outcome: RunOutcome;
  progress: Progress;
  /** Combinations placed by this run. */
  processed: number;
  elapsedMs: number;
  /** Operator-facing message of the failure, original cause text kept. */
  error?: string;
  errorCode?: string;
  /** Saved transcript of a failed run. */
  errorLogPath?: string;
}
