/**
 * Form protocol client: places one batch of combinations on the betting site.
 *
 *   load -> fill -> submit -> price guard -> extract confirmation -> confirm
 *
 * Every step is a single HTTP round-trip (fill is local) and each failure is
 * surfaced as a typed ProtocolError naming the step. The client never
 * retries: a batch that fails part way is simply not committed.
 */

import { PageDocument } from '../html/page-document.js';
import { hasLoginForm, readErrorBanner } from '../html/site-markers.js';
import { DEFAULT_LIMITS, PAGE_MARKERS } from '../shared/constants.js';
import {
  CombinationFailedError,
  GameLoadFailedError,
  SessionExpiredError,
} from '../shared/errors.js';
import { getLogger } from '../shared/logger.js';
import type { WebSession } from '../session/types.js';
import { AuditLog, readConfirmation } from './confirmation-handler.js';
import { buildPayload } from './form-filler.js';
import { extractConfirmationForm, extractFormUrl, extractSections } from './page-parser.js';
import { guardPrice } from './price-guard.js';
import type { BatchReceipt, GamePage, SubmissionPayload } from './types.js';

const log = getLogger('protocol', { component: 'wager-client' });

export interface WagerClientOptions {
  /** Highest acceptable quoted price per batch. */
  maxBetPrice?: number;
  /** Sections the game page must offer. */
  sectionsPerPage?: number;
  auditLog?: AuditLog;
}

export class FormProtocolClient {
  private readonly maxBetPrice: number;
  private readonly sectionsPerPage: number;
  private readonly auditLog: AuditLog;

  constructor(
    private readonly session: WebSession,
    private readonly gameUrl: string,
    options: WagerClientOptions = {},
  ) {
    this.maxBetPrice = options.maxBetPrice ?? DEFAULT_LIMITS.MAX_BET_PRICE;
    this.sectionsPerPage = options.sectionsPerPage ?? DEFAULT_LIMITS.BATCH_SIZE;
    this.auditLog = options.auditLog ?? new AuditLog();
  }

  /**
   * Places `combinations` as one wager, confirmed with `password`.
   *
   * @throws SessionExpiredError when the game page asks for a login again;
   *   no form has been submitted at that point.
   */
  async placeBatch(combinations: readonly string[], password: string): Promise<BatchReceipt> {
    const game = await this.loadGame();
    const payload = buildPayload(combinations, game.sections, this.sectionsPerPage);

    const submitted = await this.submit(game.formUrl, payload);
    const price = guardPrice(submitted, this.maxBetPrice);
    log.info({ price, ceiling: this.maxBetPrice }, 'Bet price accepted');

    const confirmationHtml = await this.confirm(submitted, password);
    await this.auditLog.append(confirmationHtml);

    log.info({ combinations: combinations.length, price }, 'Batch placed');
    return { combinations: [...combinations], price, confirmationHtml };
  }

  async loadGame(): Promise<GamePage> {
    const response = await this.session.get(this.gameUrl);
    const doc = PageDocument.parse(response.body, response.url);

    const banner = readErrorBanner(doc);
    if (banner) {
      if (hasLoginForm(doc)) {
        throw new SessionExpiredError();
      }
      throw new GameLoadFailedError(banner);
    }

    const sections = extractSections(doc);
    const formUrl = extractFormUrl(doc);
    log.debug({ sections: sections.length, formUrl }, 'Game page loaded');
    return { sections, formUrl };
  }

  async submit(formUrl: string, payload: SubmissionPayload): Promise<PageDocument> {
    const response = await this.session.post(formUrl, payload);
    const doc = PageDocument.parse(response.body, response.url);

    if (!doc.selectOne(PAGE_MARKERS.SUBMIT_BUTTON)) {
      throw new CombinationFailedError(
        readErrorBanner(doc) ?? 'Unable to find the submit button',
      );
    }
    return doc;
  }

  /** Posts the confirmation form and returns the confirmation container HTML. */
  async confirm(submitted: PageDocument, password: string): Promise<string> {
    const form = extractConfirmationForm(submitted);
    const response = await this.session.post(form.actionUrl, {
      ...form.fields,
      [PAGE_MARKERS.CONFIRM_PASSWORD_FIELD]: password,
    });
    return readConfirmation(PageDocument.parse(response.body, response.url));
  }
}
