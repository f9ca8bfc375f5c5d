import type { CombinationStatus } from '../shared/constants.js';

/** One spreadsheet row: the raw mark sequence and whether it was wagered. */
export interface CombinationRecord {
  /** 0-based data row index (the header row is not counted). */
  readonly row: number;
  /** Comma-separated marks, e.g. "1,X,2,1,x,2". */
  readonly combination: string;
  readonly status: CombinationStatus;
}

export interface LedgerProgress {
  completed: number;
  total: number;
}

export interface ValidationReport {
  progress: LedgerProgress;
  hasCombinationColumn: boolean;
}
