import { MARK_INDEX } from '../shared/constants.js';
import { ValidationError } from '../shared/errors.js';
import type { Section, SubmissionPayload } from './types.js';

/**
 * Splits a combination string into its marks: comma separated, trimmed,
 * empty tokens dropped. "1, X,,2" -> ["1", "X", "2"].
 */
export function splitMarks(combination: string): string[] {
  return combination
    .split(',')
    .map((token) => token.trim())
    .filter((token) => token.length > 0);
}

/**
 * Picks one option value per event of `section` according to the marks of
 * `combination`: "1" the first value of the triple, "X"/"x" the second,
 * "2" the third.
 */
export function fillSection(combination: string, section: Section): string[] {
  const marks = splitMarks(combination);

  if (marks.length !== section.triples.length) {
    throw new ValidationError(
      `The game in website has ${section.triples.length} events but got ${marks.length} marks from the sheet`,
      'combination',
      combination,
    );
  }

  return marks.map((mark, i) => {
    const index = MARK_INDEX.get(mark);
    const triple = section.triples[i];
    if (index === undefined || !triple) {
      throw new ValidationError(
        `Unknown mark "${mark}" at position ${i + 1}; expected 1, X or 2`,
        'combination',
        combination,
      );
    }
    return triple[index];
  });
}

/**
 * Builds the submission payload for a batch: the n-th combination fills the
 * n-th section. The page must offer exactly `expectedSections` sections; a
 * final partial batch leaves the trailing sections empty.
 */
export function buildPayload(
  combinations: readonly string[],
  sections: readonly Section[],
  expectedSections: number,
): SubmissionPayload {
  if (sections.length !== expectedSections) {
    throw new ValidationError(
      `Group and game data length is not equal: expected ${expectedSections} sections, got ${sections.length}`,
      'sections',
      sections.length,
    );
  }
  if (combinations.length > sections.length) {
    throw new ValidationError(
      `Batch of ${combinations.length} combinations exceeds the ${sections.length} sections on the page`,
      'batch',
      combinations.length,
    );
  }

  const payload: SubmissionPayload = {};
  combinations.forEach((combination, i) => {
    const section = sections[i];
    if (section) {
      payload[section.name] = fillSection(combination, section);
    }
  });
  return payload;
}
