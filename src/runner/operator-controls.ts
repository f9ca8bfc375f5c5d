import { EventEmitter } from 'eventemitter3';
import { DEFAULT_LIMITS, PLAY_PAUSE, type PlayPauseState } from '../shared/constants.js';
import { ValidationError } from '../shared/errors.js';
import type {
  ControlChannel,
  DelayRange,
  PacingSource,
  Progress,
  ProgressSink,
} from './types.js';

export interface OperatorControlEvents {
  'control:play-pause': (state: PlayPauseState) => void;
  'control:stop': () => void;
  'control:delay': (range: DelayRange) => void;
  progress: (progress: Progress) => void;
  processed: (processed: number) => void;
}

/**
 * In-process operator surface for one run: the control channel the worker
 * polls, the pacing it reads before each delay, and the sink it reports to.
 */
export class OperatorControls
  extends EventEmitter<OperatorControlEvents>
  implements ControlChannel, PacingSource, ProgressSink
{
  private playPause: PlayPauseState = PLAY_PAUSE.PLAY;
  private stopRequested = false;
  private delayRange: DelayRange;
  private lastProgress: Progress = { total: 0, completed: 0 };
  private lastProcessed = 0;

  constructor(
    delayRange: DelayRange = {
      minSeconds: DEFAULT_LIMITS.DELAY_MIN_SECONDS,
      maxSeconds: DEFAULT_LIMITS.DELAY_MAX_SECONDS,
    },
  ) {
    super();
    this.delayRange = validateDelayRange(delayRange.minSeconds, delayRange.maxSeconds);
  }

  // ---- ControlChannel ----

  getPlayPauseState(): PlayPauseState {
    return this.playPause;
  }

  isStopRequested(): boolean {
    return this.stopRequested;
  }

  // ---- PacingSource ----

  getDelayRange(): DelayRange {
    return { ...this.delayRange };
  }

  // ---- ProgressSink ----

  onProgress(total: number, completed: number): void {
    this.lastProgress = { total, completed };
    this.emit('progress', { ...this.lastProgress });
  }

  onProcessedCountUpdate(processed: number): void {
    this.lastProcessed = processed;
    this.emit('processed', processed);
  }

  // ---- Operator actions ----

  play(): void {
    this.setPlayPause(PLAY_PAUSE.PLAY);
  }

  pause(): void {
    this.setPlayPause(PLAY_PAUSE.PAUSE);
  }

  togglePlayPause(): PlayPauseState {
    this.setPlayPause(this.playPause === PLAY_PAUSE.PLAY ? PLAY_PAUSE.PAUSE : PLAY_PAUSE.PLAY);
    return this.playPause;
  }

  stop(): void {
    if (this.stopRequested) return;
    this.stopRequested = true;
    this.emit('control:stop');
  }

  setDelayRange(minSeconds: number, maxSeconds: number): DelayRange {
    this.delayRange = validateDelayRange(minSeconds, maxSeconds);
    this.emit('control:delay', this.getDelayRange());
    return this.getDelayRange();
  }

  get progress(): Progress {
    return { ...this.lastProgress };
  }

  get processed(): number {
    return this.lastProcessed;
  }

  private setPlayPause(state: PlayPauseState): void {
    if (this.playPause === state) return;
    this.playPause = state;
    this.emit('control:play-pause', state);
  }
}

function validateDelayRange(minSeconds: number, maxSeconds: number): DelayRange {
  if (!Number.isFinite(minSeconds) || minSeconds < 0) {
    throw new ValidationError('Minimum delay must be a non-negative number', 'minSeconds', minSeconds);
  }
  if (!Number.isFinite(maxSeconds) || maxSeconds < 0) {
    throw new ValidationError('Maximum delay must be a non-negative number', 'maxSeconds', maxSeconds);
  }
  if (minSeconds > maxSeconds) {
    throw new ValidationError(
      `Minimum delay ${minSeconds}s exceeds maximum delay ${maxSeconds}s`,
      'minSeconds',
      minSeconds,
    );
  }
  return { minSeconds, maxSeconds };
}
