import { buildPayload, fillSection, splitMarks } from '../../src/protocol/form-filler.js';
import type { OptionTriple, Section } from '../../src/protocol/types.js';
import { ValidationError } from '../../src/shared/errors.js';

const TRIPLES: OptionTriple[] = [
  ['a', 'b', 'c'],
  ['d', 'e', 'f'],
  ['g', 'h', 'i'],
  ['j', 'k', 'l'],
  ['m', 'n', 'o'],
  ['p', 'q', 'r'],
];

function section(name: string, triples: OptionTriple[] = TRIPLES): Section {
  return { name, triples };
}

describe('splitMarks', () => {
  it('trims tokens and drops empty ones', () => {
    expect(splitMarks(' 1, X,,2 ,')).toEqual(['1', 'X', '2']);
  });
});

describe('fillSection', () => {
  it('maps 1, X/x and 2 to the first, second and third option', () => {
    expect(fillSection('1,X,2,1,x,2', section('col1'))).toEqual(['a', 'e', 'i', 'j', 'n', 'r']);
  });

  it('names both counts when the mark count differs from the events', () => {
    expect(() => fillSection('1,X,2,1,X', section('col1'))).toThrow(
      'The game in website has 6 events but got 5 marks from the sheet',
    );
  });

  it('rejects an unknown mark', () => {
    expect(() => fillSection('1,X,2,1,X,3', section('col1'))).toThrow(ValidationError);
    expect(() => fillSection('1,X,2,1,X,3', section('col1'))).toThrow(/Unknown mark "3" at position 6/);
  });

  it('rejects marks that name built-in object properties', () => {
    const single = section('col1', [['a', 'b', 'c']]);

    expect(() => fillSection('toString', single)).toThrow(
      'Unknown mark "toString" at position 1; expected 1, X or 2',
    );
    expect(() => fillSection('constructor', single)).toThrow(ValidationError);
    expect(() => fillSection('__proto__', single)).toThrow(ValidationError);
  });
});

describe('buildPayload', () => {
  const sections = Array.from({ length: 6 }, (_, i) => section(`col${i + 1}`));

  it('fills one section per combination, in order', () => {
    const payload = buildPayload(['1,1,1,1,1,1', '2,2,2,2,2,2'], sections, 6);

    expect(payload).toEqual({
      col1: ['a', 'd', 'g', 'j', 'm', 'p'],
      col2: ['c', 'f', 'i', 'l', 'o', 'r'],
    });
  });

  it('requires the page to offer exactly the expected number of sections', () => {
    expect(() => buildPayload(['1,1,1,1,1,1'], sections.slice(0, 5), 6)).toThrow(
      'Group and game data length is not equal: expected 6 sections, got 5',
    );
  });

  it('rejects more combinations than sections', () => {
    const seven = Array.from({ length: 7 }, () => '1,1,1,1,1,1');
    expect(() => buildPayload(seven, sections, 6)).toThrow(ValidationError);
  });
});
