/**
 * Shared types for the concept graph pipeline
 */

/**
 * A normalized unigram ("graph") or bigram ("concept graph")
 */
export type Term = string;

/**
 * One document's term stream, in the order the tokenizer emitted it
 */
export type TermStream = Term[];

export interface VocabularyEntry {
  id: number;
  term: Term;
  frequency: number;
}

export interface GraphNode {
  id: number;
  label: Term;
  count: number;  // Occurrences inside the windowed scan
  x: number;
  y: number;
}

export interface GraphEdge {
  source: number;  // Always < target
  target: number;
  weight: number;  // Co-occurrences within the window, summed over documents
}

export interface ConceptGraph {
  nodes: GraphNode[];
  edges: GraphEdge[];
}

export interface LayoutStats {
  iterations: number;
  temperature: number;
}

export interface GraphSummary {
  nodes: number;
  edges: number;
  strongest?: {
    source: Term;
    target: Term;
    weight: number;
  };
}

/**
 * Minimal logging surface used by the boundary collaborators
 */
export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}
