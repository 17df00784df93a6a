/**
 * Vocabulary selection
 *
 * Counts every term over all documents and keeps the most frequent ones.
 * Ties are broken by term text so the same corpus always yields the same ids.
 */

import type { Term, TermStream, VocabularyEntry } from '../types';

export function countTerms(docs: readonly TermStream[]): Map<Term, number> {
  const freq = new Map<Term, number>();
  for (const doc of docs) {
    for (const term of doc) {
      freq.set(term, (freq.get(term) ?? 0) + 1);
    }
  }
  return freq;
}

function compareTerms(a: Term, b: Term): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Top `maxNodes` terms by descending frequency, ids assigned by rank (0 = most frequent)
 */
export function selectVocabulary(freq: ReadonlyMap<Term, number>, maxNodes: number): VocabularyEntry[] {
  return [...freq.entries()]
    .sort((a, b) => b[1] - a[1] || compareTerms(a[0], b[0]))
    .slice(0, maxNodes)
    .map(([term, frequency], id) => ({ id, term, frequency }));
}

export function vocabularyIndex(vocabulary: readonly VocabularyEntry[]): Map<Term, number> {
  return new Map(vocabulary.map(entry => [entry.term, entry.id]));
}
