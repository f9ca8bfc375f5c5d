/**
 * File-backed persistence of the authenticated session, so a restart can
 * skip the login round-trip while the previous session is still valid.
 */

import { readFile, rm, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { getLogger } from '../shared/logger.js';
import { errorMessage } from '../shared/errors.js';
import { sessionStateSchema, type SessionState } from './types.js';

const log = getLogger('session', { component: 'session-store' });

export class SessionStore {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = resolve(filePath);
  }

  /** Writes `state` to the store file and returns it unchanged. */
  async save(state: SessionState): Promise<SessionState> {
    await writeFile(this.filePath, JSON.stringify(state, null, 2), 'utf-8');
    log.info({ file: this.filePath }, 'Session saved');
    return state;
  }

  /**
   * Reads the stored state. A missing, unreadable or malformed file yields
   * null so the caller falls through to a fresh login.
   */
  async load(): Promise<SessionState | null> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        log.info({ file: this.filePath }, 'No stored session');
      } else {
        log.warn({ file: this.filePath, error: errorMessage(error) }, 'Stored session unreadable');
      }
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      log.warn({ file: this.filePath, error: errorMessage(error) }, 'Stored session is not valid JSON');
      return null;
    }

    const result = sessionStateSchema.safeParse(parsed);
    if (!result.success) {
      log.warn(
        { file: this.filePath, issues: result.error.issues.map((i) => i.message) },
        'Stored session has an unexpected shape',
      );
      return null;
    }

    log.info({ file: this.filePath, savedAt: result.data.savedAt }, 'Session loaded');
    return result.data;
  }

  /** Deletes the store file. Missing files are fine. */
  async discard(): Promise<void> {
    await rm(this.filePath, { force: true });
    log.info({ file: this.filePath }, 'Stored session discarded');
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
