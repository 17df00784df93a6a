/**
 * Graph builder
 *
 * One node per vocabulary entry, one edge per accumulated pair that reaches
 * minEdgeWeight. Edges are ordered strongest first and capped at
 * maxNodes * edgeFactor.
 */

import type { GraphConfig } from '../lib/config';
import type { ConceptGraph, GraphEdge, GraphNode, VocabularyEntry } from '../types';
import { accumulatedEdges, type CooccurrenceAccumulator } from './cooccurrence';

export type BuildOptions = Pick<GraphConfig, 'maxNodes' | 'edgeFactor' | 'minEdgeWeight'>;

/**
 * Weight descending, then endpoints ascending
 */
export function compareEdges(a: GraphEdge, b: GraphEdge): number {
  return b.weight - a.weight || a.source - b.source || a.target - b.target;
}

export function buildNodes(vocabulary: readonly VocabularyEntry[], acc: CooccurrenceAccumulator): GraphNode[] {
  return vocabulary.map(entry => ({
    id: entry.id,
    label: entry.term,
    count: acc.counts[entry.id] ?? 0,
    x: 0,
    y: 0,
  }));
}

export function pruneEdges(edges: readonly GraphEdge[], options: BuildOptions): GraphEdge[] {
  return edges
    .filter(edge => edge.weight >= options.minEdgeWeight)
    .sort(compareEdges)
    .slice(0, options.maxNodes * options.edgeFactor);
}

export function buildGraph(
  vocabulary: readonly VocabularyEntry[],
  acc: CooccurrenceAccumulator,
  options: BuildOptions
): ConceptGraph {
  return {
    nodes: buildNodes(vocabulary, acc),
    edges: pruneEdges(accumulatedEdges(acc), options),
  };
}
