import { mkdir, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { PATHS } from '../shared/constants.js';
import { getRunLogger, type Logger } from '../shared/logger.js';

type TranscriptLevel = 'info' | 'warn' | 'error';

/**
 * Operator-visible log of one run. Every line also goes to the structured
 * logger; the collected lines become the error log of a failed run.
 */
export class RunTranscript {
  private readonly lines: string[] = [];
  private readonly log: Logger;

  constructor(
    readonly runId: string,
    private readonly onLine?: (line: string) => void,
  ) {
    this.log = getRunLogger(runId);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.write('error', message, context);
  }

  /**
   * Writes the transcript to `error_log-<epoch ms>.txt` under `directory`.
   *
   * @returns the absolute path written
   */
  async save(directory: string, now: number = Date.now()): Promise<string> {
    const dir = resolve(directory);
    await mkdir(dir, { recursive: true });
    const filePath = join(dir, `${PATHS.ERROR_LOG_PREFIX}${now}.txt`);
    await writeFile(filePath, `${this.lines.join('\n')}\n`, 'utf8');
    return filePath;
  }

  private write(level: TranscriptLevel, message: string, context?: Record<string, unknown>): void {
    const line = `${new Date().toISOString()} [${level.toUpperCase()}] ${message}`;
    this.lines.push(line);
    this.log[level](context ?? {}, message);
    this.onLine?.(line);
  }
}
