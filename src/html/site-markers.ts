import { PAGE_MARKERS } from '../shared/constants.js';
import type { PageDocument } from './page-document.js';

/**
 * Text of the site's error banner, or null when the page shows none.
 * An empty banner element counts as no error.
 */
export function readErrorBanner(doc: PageDocument): string | null {
  const text = doc.firstText(PAGE_MARKERS.ERROR_BANNER);
  return text ? text : null;
}

/** The login form is only rendered to visitors without a live session. */
export function hasLoginForm(doc: PageDocument): boolean {
  return doc.findById(PAGE_MARKERS.LOGIN_FORM_ID) !== null;
}
