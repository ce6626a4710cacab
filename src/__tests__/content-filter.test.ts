import { describe, it, expect } from 'vitest';
import { filterInvalidContent } from '../content-filter.js';

const FINDING = 'Graph attention improves node classification on citation benchmarks.';

describe('filterInvalidContent', () => {
  it('returns empty for blank input', () => {
    expect(filterInvalidContent('')).toBe('');
    expect(filterInvalidContent(' \n ')).toBe('');
  });

  it('drops text made mostly of "nothing found" boilerplate', () => {
    expect(filterInvalidContent('No results found. Nothing found.')).toBe('');
  });

  it('strips boilerplate sentences and keeps the findings', () => {
    expect(filterInvalidContent(`${FINDING} No results found. ${FINDING}`)).toBe(`${FINDING}  ${FINDING}`);
  });

  it('collapses runs of blank lines', () => {
    expect(filterInvalidContent(`${FINDING}\n\n\n\n${FINDING}`)).toBe(`${FINDING}\n\n${FINDING}`);
  });

  it('drops text shorter than the minimum length', () => {
    expect(filterInvalidContent('Too short.')).toBe('');
    expect(filterInvalidContent('Too short.', { minLength: 1 })).toBe('Too short.');
  });
});
