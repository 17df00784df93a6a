/**
 * Concept graph pipeline
 *
 * texts → term streams → vocabulary → co-occurrence → graph → layout.
 * Each stage consumes its whole input before the next one starts.
 */

import type { GraphConfig } from '../lib/config';
import type { ConceptGraph, LayoutStats, TermStream, VocabularyEntry } from '../types';
import { buildGraph } from './builder';
import { accumulateDocument, createAccumulator } from './cooccurrence';
import { layoutGraph } from './layout';
import { tokenize } from './tokenizer';
import { countTerms, selectVocabulary, vocabularyIndex } from './vocabulary';

export interface PipelineResult {
  graph: ConceptGraph;
  vocabulary: VocabularyEntry[];
  layout: LayoutStats;
  distinctTerms: number;
}

export function buildConceptGraph(
  texts: readonly string[],
  stopwords: ReadonlySet<string>,
  config: GraphConfig
): PipelineResult {
  const docs: TermStream[] = texts.map(text => tokenize(text, stopwords, config));

  const freq = countTerms(docs);
  const vocabulary = selectVocabulary(freq, config.maxNodes);
  const index = vocabularyIndex(vocabulary);

  const acc = createAccumulator(vocabulary.length);
  for (const doc of docs) {
    accumulateDocument(acc, doc, index, config.window);
  }

  const graph = buildGraph(vocabulary, acc, config);
  const layout = layoutGraph(graph, config);

  return { graph, vocabulary, layout, distinctTerms: freq.size };
}
