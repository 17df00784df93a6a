/**
 * Structured graph output
 *
 * graph.json keeps a fixed key order: nodes then edges, node fields
 * id/label/count/x/y, edge fields source/target/weight.
 */

import { GraphFormatError } from '../lib/errors';
import type { ConceptGraph, GraphEdge, GraphNode, GraphSummary } from '../types';

export function toJson(graph: ConceptGraph): string {
  const ordered = {
    nodes: graph.nodes.map(({ id, label, count, x, y }) => ({ id, label, count, x, y })),
    edges: graph.edges.map(({ source, target, weight }) => ({ source, target, weight })),
  };
  return JSON.stringify(ordered, null, 2);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readNumber(record: Record<string, unknown>, key: string, where: string): number {
  const value = record[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new GraphFormatError(`${where}: "${key}" must be a number`);
  }
  return value;
}

function readNode(value: unknown, index: number): GraphNode {
  const where = `nodes[${index}]`;
  if (!isRecord(value)) {
    throw new GraphFormatError(`${where} must be an object`);
  }
  if (typeof value.label !== 'string') {
    throw new GraphFormatError(`${where}: "label" must be a string`);
  }
  const id = readNumber(value, 'id', where);
  if (id !== index) {
    throw new GraphFormatError(`${where}: id ${id} does not match its position`);
  }
  return {
    id,
    label: value.label,
    count: readNumber(value, 'count', where),
    x: readNumber(value, 'x', where),
    y: readNumber(value, 'y', where),
  };
}

function readEdge(value: unknown, index: number, nodeCount: number): GraphEdge {
  const where = `edges[${index}]`;
  if (!isRecord(value)) {
    throw new GraphFormatError(`${where} must be an object`);
  }
  const source = readNumber(value, 'source', where);
  const target = readNumber(value, 'target', where);
  for (const end of [source, target]) {
    if (!Number.isInteger(end) || end < 0 || end >= nodeCount) {
      throw new GraphFormatError(`${where}: node ${end} is out of range`);
    }
  }
  if (source === target) {
    throw new GraphFormatError(`${where}: self-loop on node ${source}`);
  }
  return { source, target, weight: readNumber(value, 'weight', where) };
}

/**
 * Parse graph.json back into a ConceptGraph, checking node ids and edge endpoints
 */
export function parseGraph(json: string): ConceptGraph {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new GraphFormatError(`Invalid graph JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (!isRecord(raw) || !Array.isArray(raw.nodes) || !Array.isArray(raw.edges)) {
    throw new GraphFormatError('Graph JSON must have "nodes" and "edges" arrays');
  }

  const nodes = raw.nodes.map((node: unknown, i: number) => readNode(node, i));
  const edges = raw.edges.map((edge: unknown, i: number) => readEdge(edge, i, nodes.length));
  return { nodes, edges };
}

export function summarizeGraph(graph: ConceptGraph): GraphSummary {
  const summary: GraphSummary = { nodes: graph.nodes.length, edges: graph.edges.length };
  const strongest = graph.edges.reduce<GraphEdge | undefined>(
    (best, edge) => (best === undefined || edge.weight > best.weight ? edge : best),
    undefined
  );
  if (strongest) {
    summary.strongest = {
      source: graph.nodes[strongest.source].label,
      target: graph.nodes[strongest.target].label,
      weight: strongest.weight,
    };
  }
  return summary;
}
