import { indexTokens, normalizeTerm, splitTerms } from '../../../src/corpus/tokenize.js';

describe('normalizeTerm', () => {
  it('lowercases and strips edge punctuation', () => {
    expect(normalizeTerm('Class.')).toBe('class');
    expect(normalizeTerm('(btn-primary)')).toBe('btn-primary');
    expect(normalizeTerm('###')).toBe('');
  });
});

describe('splitTerms', () => {
  it('splits on any whitespace and drops empty terms', () => {
    expect(splitTerms('  Use the\tbtn\n class. ')).toEqual(['use', 'the', 'btn', 'class']);
  });
});

describe('indexTokens', () => {
  it('keeps only terms at least minLength characters long', () => {
    expect(indexTokens('Hello, world! tiny café-au-lait', 5)).toEqual(['hello', 'world', 'café-au-lait']);
  });

  it('keeps repeated tokens', () => {
    expect(indexTokens('layout grid layout', 5)).toEqual(['layout', 'layout']);
  });
});
