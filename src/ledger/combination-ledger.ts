/**
 * Combination ledger: the spreadsheet of wager combinations and the
 * pending/completed status of each row.
 *
 * The file on disk is the single point of durable progress. A batch is
 * committed by rewriting the whole workbook with every record of the batch
 * marked completed; memory is only updated once that write has succeeded,
 * so a crash mid-run loses at most the batch in flight and a fresh `load`
 * re-derives the pending rows from the last good file.
 */

import { stat } from 'node:fs/promises';
import { extname, resolve } from 'node:path';
import {
  COMBINATION_STATUSES,
  DEFAULT_LIMITS,
  PATHS,
  SPREADSHEET_COLUMNS,
  type CombinationStatus,
} from '../shared/constants.js';
import { InvalidInputError, ValidationError, errorMessage } from '../shared/errors.js';
import { getLogger } from '../shared/logger.js';
import { lockFor } from './path-lock.js';
import { readSheetTable, writeSheetTable, type CellValue, type SheetTable } from './spreadsheet.js';
import type { CombinationRecord, LedgerProgress, ValidationReport } from './types.js';

const log = getLogger('ledger', { component: 'combination-ledger' });

function normaliseStatus(cell: CellValue): CombinationStatus {
  return cell === COMBINATION_STATUSES.COMPLETED
    ? COMBINATION_STATUSES.COMPLETED
    : COMBINATION_STATUSES.PENDING;
}

function countCompleted(statuses: readonly CombinationStatus[]): number {
  return statuses.filter((s) => s === COMBINATION_STATUSES.COMPLETED).length;
}

async function assertSpreadsheetPath(filePath: string): Promise<void> {
  const invalid = new InvalidInputError(`Invalid file path ${filePath}`, filePath);
  try {
    const info = await stat(filePath);
    if (!info.isFile()) {
      throw invalid;
    }
  } catch (error) {
    if (error instanceof InvalidInputError) {
      throw error;
    }
    throw invalid;
  }
  if (extname(filePath) !== PATHS.SPREADSHEET_EXTENSION) {
    throw invalid;
  }
}

export class CombinationLedger {
  private readonly records: CombinationRecord[];
  /** Index into `records` of the first row not yet handed out by nextBatch. */
  private cursor = 0;

  private constructor(
    readonly filePath: string,
    private readonly table: SheetTable,
    private readonly statusColumn: number,
    combinationColumn: number,
  ) {
    this.records = table.rows.map((row, index) => ({
      row: index,
      combination: String(row[combinationColumn] ?? '').trim(),
      status: normaliseStatus(row[statusColumn] ?? null),
    }));
  }

  /**
   * Loads the spreadsheet at `filePath`.
   *
   * Statuses are re-normalised on load: anything other than the completed
   * marker becomes pending, and a sheet without a status column starts with
   * every row pending.
   *
   * @throws InvalidInputError for a missing path, a non-file, a wrong
   *   extension or a sheet without a combination column.
   */
  static async load(filePath: string): Promise<CombinationLedger> {
    const absolute = resolve(filePath);
    await assertSpreadsheetPath(absolute);

    return lockFor(absolute).runExclusive(async () => {
      const table = await readSheetTable(absolute);

      const combinationColumn = table.columns.indexOf(SPREADSHEET_COLUMNS.COMBINATION);
      if (combinationColumn === -1) {
        throw new InvalidInputError(
          `Spreadsheet ${absolute} has no "${SPREADSHEET_COLUMNS.COMBINATION}" column`,
          absolute,
        );
      }

      let statusColumn = table.columns.indexOf(SPREADSHEET_COLUMNS.STATUS);
      if (statusColumn === -1) {
        table.columns.push(SPREADSHEET_COLUMNS.STATUS);
        statusColumn = table.columns.length - 1;
        for (const row of table.rows) {
          row.push(COMBINATION_STATUSES.PENDING);
        }
      } else {
        for (const row of table.rows) {
          row[statusColumn] = normaliseStatus(row[statusColumn] ?? null);
        }
      }

      const ledger = new CombinationLedger(absolute, table, statusColumn, combinationColumn);
      const { completed, total } = ledger.status();
      log.info({ file: absolute, completed, total }, 'Combinations loaded');
      return ledger;
    });
  }

  /**
   * Read-only precheck for the control surface. Never throws: a path that
   * `load` would refuse, or any problem reading the file, reports zero
   * progress and no combination column.
   */
  static async validate(filePath: string): Promise<ValidationReport> {
    const absolute = resolve(filePath);
    return lockFor(absolute).runExclusive(async () => {
      try {
        await assertSpreadsheetPath(absolute);
        const table = await readSheetTable(absolute);
        const statusColumn = table.columns.indexOf(SPREADSHEET_COLUMNS.STATUS);
        const statuses =
          statusColumn === -1
            ? []
            : table.rows.map((row) => normaliseStatus(row[statusColumn] ?? null));

        return {
          progress: { completed: countCompleted(statuses), total: table.rows.length },
          hasCombinationColumn: table.columns.includes(SPREADSHEET_COLUMNS.COMBINATION),
        };
      } catch (error) {
        log.error({ file: absolute, error: errorMessage(error) }, 'Error while reading spreadsheet');
        return { progress: { completed: 0, total: 0 }, hasCombinationColumn: false };
      }
    });
  }

  /**
   * The next `size` pending records in row order that have not been handed
   * out yet. Shorter only for the final batch; empty once exhausted.
   */
  nextBatch(size: number = DEFAULT_LIMITS.BATCH_SIZE): CombinationRecord[] {
    if (!Number.isInteger(size) || size < 1) {
      throw new ValidationError(`Batch size must be a positive integer, got ${size}`, 'size', size);
    }

    const batch: CombinationRecord[] = [];
    while (this.cursor < this.records.length && batch.length < size) {
      const record = this.records[this.cursor];
      this.cursor++;
      if (record && record.status === COMBINATION_STATUSES.PENDING) {
        batch.push(record);
      }
    }
    return batch;
  }

  /**
   * Marks every record of `batch` completed and rewrites the workbook.
   * Either the whole batch is persisted or nothing changes.
   */
  async commit(batch: readonly CombinationRecord[]): Promise<void> {
    const rows = new Set<number>();
    for (const record of batch) {
      const current = this.records[record.row];
      if (!current || current !== record) {
        throw new ValidationError(
          `Row ${record.row} does not belong to ledger ${this.filePath}`,
          'batch',
          record.row,
        );
      }
      if (current.status !== COMBINATION_STATUSES.PENDING) {
        throw new ValidationError(`Row ${record.row} is already completed`, 'batch', record.row);
      }
      if (rows.has(record.row)) {
        throw new ValidationError(`Row ${record.row} appears twice in the batch`, 'batch', record.row);
      }
      rows.add(record.row);
    }

    await lockFor(this.filePath).runExclusive(async () => {
      const nextRows = this.table.rows.map((row, index) => {
        if (!rows.has(index)) {
          return row;
        }
        const copy = [...row];
        copy[this.statusColumn] = COMBINATION_STATUSES.COMPLETED;
        return copy;
      });

      await writeSheetTable(this.filePath, { ...this.table, rows: nextRows });

      this.table.rows = nextRows;
      for (const row of rows) {
        const record = this.records[row];
        if (record) {
          this.records[row] = { ...record, status: COMBINATION_STATUSES.COMPLETED };
        }
      }
    });

    const { completed, total } = this.status();
    log.info({ file: this.filePath, committed: rows.size, completed, total }, 'Batch committed');
  }

  status(): LedgerProgress {
    return {
      completed: countCompleted(this.records.map((r) => r.status)),
      total: this.records.length,
    };
  }

  /** Snapshot of every record in row order. */
  list(): readonly CombinationRecord[] {
    return [...this.records];
  }
}
