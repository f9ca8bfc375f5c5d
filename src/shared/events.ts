import { EventEmitter } from 'eventemitter3';
import type { RunState } from './constants.js';
import type { BatchReport, Progress, RunResult } from '../runner/types.js';

/**
 * All typed events a wager run emits.
 * Keys are event names; values are the listener signatures.
 */
export interface RunEvents {
  'run:state': (state: RunState, previous: RunState) => void;
  'run:progress': (progress: Progress) => void;
  'run:processed': (processed: number) => void;
  'run:batch': (report: BatchReport) => void;
  'run:log': (line: string) => void;
  'run:finished': (result: RunResult) => void;
}

/**
 * Strongly-typed event emitter for run lifecycle events. Each run owns one,
 * so listeners of a finished run never see events of the next.
 */
export class TypedEventEmitter extends EventEmitter<RunEvents> {}
