/**
 * Co-occurrence accumulator
 *
 * Each document is reduced to its in-vocabulary ids (other terms are dropped,
 * not treated as gaps) and a window slides over that sequence. Every pair of
 * positions i < j < i + window adds 1 to the pair, so repeated proximity
 * accumulates. Pair keys are order independent.
 */

import type { GraphEdge, Term, TermStream } from '../types';

export interface CooccurrenceAccumulator {
  readonly size: number;
  readonly counts: number[];           // Per-node occurrences in the windowed scan
  readonly pairs: Map<number, number>; // min * size + max → weight
}

export function createAccumulator(size: number): CooccurrenceAccumulator {
  return {
    size,
    counts: new Array<number>(size).fill(0),
    pairs: new Map(),
  };
}

export function pairKey(a: number, b: number, size: number): number {
  return a < b ? a * size + b : b * size + a;
}

/**
 * Map a term stream onto vocabulary ids, dropping out-of-vocabulary terms
 */
export function toVocabularyIds(doc: TermStream, index: ReadonlyMap<Term, number>): number[] {
  const ids: number[] = [];
  for (const term of doc) {
    const id = index.get(term);
    if (id !== undefined) ids.push(id);
  }
  return ids;
}

export function accumulateDocument(
  acc: CooccurrenceAccumulator,
  doc: TermStream,
  index: ReadonlyMap<Term, number>,
  window: number
): void {
  const ids = toVocabularyIds(doc, index);

  for (let i = 0; i < ids.length; i++) {
    const a = ids[i];
    acc.counts[a] += 1;

    const end = Math.min(i + window, ids.length);
    for (let j = i + 1; j < end; j++) {
      const key = pairKey(a, ids[j], acc.size);
      acc.pairs.set(key, (acc.pairs.get(key) ?? 0) + 1);
    }
  }
}

/**
 * Enumerate accumulated pairs as edges with source < target
 *
 * A term adjacent to itself inside the window (possible when it repeats) forms
 * a self pair; those are never edges.
 */
export function accumulatedEdges(acc: CooccurrenceAccumulator): GraphEdge[] {
  const edges: GraphEdge[] = [];
  for (const [key, weight] of acc.pairs) {
    const source = Math.floor(key / acc.size);
    const target = key % acc.size;
    if (source !== target) {
      edges.push({ source, target, weight });
    }
  }
  return edges;
}
