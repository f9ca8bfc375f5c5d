import { appendFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { PageDocument } from '../html/page-document.js';
import { readErrorBanner } from '../html/site-markers.js';
import { PAGE_MARKERS, PATHS } from '../shared/constants.js';
import { BetConfirmationFailedError, errorMessage } from '../shared/errors.js';
import { getLogger } from '../shared/logger.js';

const log = getLogger('protocol', { component: 'confirmation' });

/** Separator written before every container appended to the audit file. */
export const AUDIT_SEPARATOR = '<br><br>';

/**
 * Checks the page returned by the confirmation POST and returns the outer
 * HTML of the site's confirmation container.
 */
export function readConfirmation(doc: PageDocument): string {
  const banner = readErrorBanner(doc);
  if (banner) {
    throw new BetConfirmationFailedError(banner);
  }

  const container = doc.selectOne(PAGE_MARKERS.CONFIRM_CONTAINER);
  if (!container) {
    throw new BetConfirmationFailedError('Unable to find the bet confirmation container');
  }
  return container.outerHtml();
}

/**
 * Append-only HTML log of every confirmed wager.
 */
export class AuditLog {
  readonly filePath: string;

  constructor(filePath: string = PATHS.AUDIT_LOG_FILE) {
    this.filePath = resolve(filePath);
  }

  /**
   * Appends one confirmation. A failed write is logged and swallowed: the
   * wager has already been placed at this point.
   */
  async append(containerHtml: string): Promise<boolean> {
    try {
      await appendFile(this.filePath, `${AUDIT_SEPARATOR}${containerHtml}`, 'utf8');
      return true;
    } catch (error) {
      log.error(
        { file: this.filePath, error: errorMessage(error) },
        'Failed to append bet confirmation to audit log',
      );
      return false;
    }
  }
}
