/**
 * Extraction of the structured parts of the betting pages: the form
 * sections, the form's submission URL and the confirmation form.
 */

import type { PageDocument } from '../html/page-document.js';
import { PAGE_MARKERS } from '../shared/constants.js';
import { UnknownPageStructureError, ValidationError } from '../shared/errors.js';
import { resolveUrl } from '../shared/utils.js';
import type { ConfirmationForm, OptionTriple, Section } from './types.js';

/**
 * Every `area area-N` block of the betting form, in page order. Each block's
 * inputs are grouped in threes; the block is named after its inputs' `name`.
 */
export function extractSections(doc: PageDocument): Section[] {
  return doc.findByClassPattern('div', PAGE_MARKERS.SECTION_CLASS).map((area, index) => {
    const inputs = area.inputs();
    if (inputs.length === 0) {
      throw new UnknownPageStructureError(
        `Input tag is not found in section ${index + 1}`,
        'load',
      );
    }

    // Inputs of a section share one name; the last one wins as on the page.
    let name = '';
    const values: string[] = [];
    for (const input of inputs) {
      name = input.name ?? '';
      values.push(input.value ?? '');
    }

    const triples: OptionTriple[] = [];
    for (let i = 0; i < values.length; i += 3) {
      triples.push([values[i] ?? '', values[i + 1] ?? '', values[i + 2] ?? '']);
    }

    return { name, triples };
  });
}

/** The first form's action, resolved against the page URL. */
export function extractFormUrl(doc: PageDocument): string {
  const form = doc.selectOne('form');
  if (!form) {
    throw new UnknownPageStructureError('No form element found on the game page', 'load');
  }

  const action = form.attr('action');
  if (action === undefined) {
    throw new UnknownPageStructureError('Form action attribute is missing', 'load');
  }

  return resolveUrl(action, doc.url);
}

/**
 * Named inputs and action of the confirmation form shown after a
 * successful submission.
 */
export function extractConfirmationForm(doc: PageDocument): ConfirmationForm {
  const form = doc.findByAttribute('form', 'name', PAGE_MARKERS.CONFIRM_FORM_NAME);
  if (!form) {
    throw new ValidationError(
      'Form is not found to confirm the bet',
      PAGE_MARKERS.CONFIRM_FORM_NAME,
    );
  }

  const fields: Record<string, string> = {};
  for (const input of form.find('input')) {
    const name = input.attr('name');
    if (name) {
      fields[name] = input.attr('value') ?? '';
    }
  }

  return {
    fields,
    actionUrl: resolveUrl(form.attr('action') ?? '', doc.url),
  };
}
