import { describe, expect, it } from 'vitest';
import { scoreTfidf, summarizeText, tokenizeText, type TfidfParams } from '../engine/text-analysis.js';

const defaults: TfidfParams = { topTerms: 30, minDf: 1, maxDf: 0, stopwords: 'english' };

describe('tokenizeText', () => {
  it('should lower-case, split on non-word characters and drop English stopwords', () => {
    expect(tokenizeText('The Cat-sat on_the MAT, twice!')).toEqual(['cat', 'sat', 'on_the', 'mat', 'twice']);
  });

  it('should keep stopwords when disabled', () => {
    expect(tokenizeText('the cat', 'none')).toEqual(['the', 'cat']);
  });
});

describe('summarizeText', () => {
  it('should collapse whitespace and leave short text alone', () => {
    expect(summarizeText('  alpha \n\t beta ', 20)).toBe('alpha beta');
  });

  it('should cut at a word boundary and append an ellipsis', () => {
    expect(summarizeText('alpha beta gamma', 12)).toBe('alpha beta...');
    expect(summarizeText('alpha beta gamma', 10)).toBe('alpha beta...');
  });

  it('should cut inside a word that has no earlier boundary', () => {
    expect(summarizeText('abcdefghij', 4)).toBe('abcd...');
  });
});

describe('scoreTfidf', () => {
  const corpus = ['cat dog', 'cat cat fish'];
  const rareIdf = Math.log(3 / 2) + 1;

  it('should sum tf-idf over query terms', () => {
    const [first, second] = scoreTfidf(corpus, ['Cat'], defaults);
    expect(first).toBeCloseTo(0.5);
    expect(second).toBeCloseTo(2 / 3);
  });

  it('should score zero for an empty document', () => {
    expect(scoreTfidf(['', 'cat'], ['cat'], defaults)[0]).toBe(0);
  });

  it('should rank top terms by score then term', () => {
    const [first, second] = scoreTfidf(corpus, [], defaults);
    expect(first).toEqual([
      ['dog', expect.closeTo(0.5 * rareIdf, 6)],
      ['cat', expect.closeTo(0.5, 6)],
    ]);
    expect(second).toEqual([
      ['cat', expect.closeTo(2 / 3, 6)],
      ['fish', expect.closeTo(rareIdf / 3, 6)],
    ]);
  });

  it('should break score ties alphabetically and honour TOP_TERMS', () => {
    expect(scoreTfidf(['pear apple'], [], { ...defaults, topTerms: 1 })).toEqual([[['apple', expect.closeTo(0.5, 6)]]]);
  });

  it('should keep only terms within the document-frequency bounds', () => {
    const [first] = scoreTfidf(corpus, [], { ...defaults, minDf: 2 });
    expect(first).toEqual([['cat', expect.closeTo(0.5, 6)]]);

    const [, second] = scoreTfidf(corpus, [], { ...defaults, maxDf: 1 });
    expect(second).toEqual([['fish', expect.closeTo(rareIdf / 3, 6)]]);
  });
});
