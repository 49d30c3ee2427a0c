/**
 * Text analysis behind SUMMARIZE(*) and TFIDF(...).
 *
 * @module engine/text-analysis
 */

import type { StopwordSet } from '../config.js';
import stopwordData from './data/stopwords.json' with { type: 'json' };
import type { Value } from './values.js';

const STOPWORDS: Readonly<Record<StopwordSet, ReadonlySet<string>>> = {
  english: new Set(stopwordData.english),
  none: new Set(),
};

const TOKEN_PATTERN = /[a-z0-9_]+/g;

/** Lower-case word tokens with the chosen stopwords removed */
export function tokenizeText(text: string, stopwords: StopwordSet = 'english'): string[] {
  const excluded = STOPWORDS[stopwords];
  return (text.toLowerCase().match(TOKEN_PATTERN) ?? []).filter((token) => !excluded.has(token));
}

/**
 * Collapse whitespace and cut to `maxLength` characters at a word boundary,
 * appending `...` when anything was cut.
 */
export function summarizeText(text: string, maxLength: number): string {
  const collapsed = text.replace(/\s+/g, ' ').trim();
  if (collapsed.length <= maxLength) return collapsed;

  const head = collapsed.slice(0, maxLength);
  const boundary = collapsed.charAt(maxLength) === ' ' ? maxLength : head.lastIndexOf(' ');
  const cut = boundary > 0 ? head.slice(0, boundary) : head;
  return `${cut.trimEnd()}...`;
}

export interface TfidfParams {
  readonly topTerms: number;
  readonly minDf: number;
  /** 0 means the corpus size */
  readonly maxDf: number;
  readonly stopwords: StopwordSet;
}

/**
 * Score every document of a corpus.
 *
 * `tf = count / total`, `idf = ln((N + 1) / (df + 1)) + 1`. With query terms
 * each document scores the sum of `tf * idf` over the terms; without, it gets
 * its top terms as `[term, score]` pairs, score descending then term
 * ascending, restricted to `minDf <= df <= maxDf`.
 */
export function scoreTfidf(texts: readonly string[], terms: readonly string[], params: TfidfParams): Value[] {
  const documents = texts.map((text) => countTokens(tokenizeText(text, params.stopwords)));
  const n = documents.length;

  const df = new Map<string, number>();
  for (const doc of documents) {
    for (const term of doc.counts.keys()) {
      df.set(term, (df.get(term) ?? 0) + 1);
    }
  }
  const idf = (term: string): number => Math.log((n + 1) / ((df.get(term) ?? 0) + 1)) + 1;

  if (terms.length > 0) {
    const queryTokens = terms.flatMap((term) => tokenizeText(term, 'none'));
    return documents.map(({ counts, total }) => {
      if (total === 0) return 0;
      return queryTokens.reduce((sum, term) => sum + ((counts.get(term) ?? 0) / total) * idf(term), 0);
    });
  }

  const maxDf = params.maxDf === 0 ? n : params.maxDf;
  return documents.map(({ counts, total }) => {
    const scored: [string, number][] = [];
    for (const [term, count] of counts) {
      const termDf = df.get(term) ?? 0;
      if (termDf < params.minDf || termDf > maxDf) continue;
      scored.push([term, (count / total) * idf(term)]);
    }
    scored.sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0));
    return scored.slice(0, params.topTerms);
  });
}

function countTokens(tokens: readonly string[]): { counts: Map<string, number>; total: number } {
  const counts = new Map<string, number>();
  for (const token of tokens) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return { counts, total: tokens.length };
}
