import type { PageDocument } from '../html/page-document.js';
import { PAGE_MARKERS } from '../shared/constants.js';
import { BetPriceHigherError, UnknownPageStructureError } from '../shared/errors.js';

const PRICE_PATTERN = /\d+\.\d+|\d+/;

/** First integer or decimal number in `text`, or null if there is none. */
export function parsePrice(text: string): number | null {
  const match = PRICE_PATTERN.exec(text);
  return match ? Number(match[0]) : null;
}

/**
 * Reads the quoted price of the submitted wager and rejects it when it is
 * above `ceiling`. A price equal to the ceiling passes.
 *
 * @returns the quoted price
 */
export function guardPrice(doc: PageDocument, ceiling: number): number {
  const text = doc.firstText(PAGE_MARKERS.PRICE_TEXT);
  if (text === null) {
    throw new UnknownPageStructureError('Unable to find the bold price text', 'price');
  }

  const price = parsePrice(text);
  if (price === null) {
    throw new UnknownPageStructureError(`No price found in "${text}"`, 'price');
  }

  if (price > ceiling) {
    throw new BetPriceHigherError(price, ceiling);
  }
  return price;
}
