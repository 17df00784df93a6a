/**
 * Fruchterman-Reingold layout tests
 */

import {
  idealEdgeLength,
  initialTemperature,
  layoutGraph,
  limitDisplacement,
  placeRandomly,
} from '../../src/graph/layout';
import { createRandom } from '../../src/graph/random';
import { DEFAULT_GRAPH_CONFIG } from '../../src/lib/config';
import type { ConceptGraph, GraphEdge } from '../../src/types';

function graphOf(nodeCount: number, edges: GraphEdge[] = []): ConceptGraph {
  return {
    nodes: Array.from({ length: nodeCount }, (_, id) => ({ id, label: `term${id}`, count: 1, x: 0, y: 0 })),
    edges,
  };
}

function distance(graph: ConceptGraph, a: number, b: number): number {
  return Math.hypot(graph.nodes[a].x - graph.nodes[b].x, graph.nodes[a].y - graph.nodes[b].y);
}

describe('createRandom', () => {
  it('should repeat the same sequence for the same seed', () => {
    const a = createRandom(37);
    const b = createRandom(37);
    const first = [a(), a(), a()];

    expect([b(), b(), b()]).toEqual(first);
    expect(first.every(v => v >= 0 && v < 1)).toBe(true);
  });

  it('should give different sequences for different seeds', () => {
    expect(createRandom(1)()).not.toBe(createRandom(2)());
  });
});

describe('layout helpers', () => {
  it('should compute the ideal edge length from canvas area and node count', () => {
    expect(idealEdgeLength(1200, 800, 30)).toBeCloseTo(Math.sqrt(32000), 10);
    expect(idealEdgeLength(10, 10, 1000)).toBe(1);
  });

  it('should start at a tenth of the shorter canvas side', () => {
    expect(initialTemperature(1200, 800)).toBe(80);
  });

  it('should clamp displacement per axis, keeping the sign', () => {
    expect(limitDisplacement(-5, 2)).toBe(-2);
    expect(limitDisplacement(3, 10)).toBe(3);
    expect(limitDisplacement(25, 10)).toBe(10);
    expect(limitDisplacement(0, 1)).toBe(0);
  });
});

describe('layoutGraph', () => {
  it('should skip the simulation for an empty graph', () => {
    const graph = graphOf(0);
    const stats = layoutGraph(graph, DEFAULT_GRAPH_CONFIG);

    expect(stats).toEqual({ iterations: 0, temperature: 80 });
    expect(graph.nodes).toEqual([]);
  });

  it('should stop once the temperature falls below the threshold', () => {
    const stats = layoutGraph(graphOf(3), DEFAULT_GRAPH_CONFIG);

    // 80 * 0.96^125 < 0.5 <= 80 * 0.96^124
    expect(stats.iterations).toBe(125);
    expect(stats.temperature).toBeLessThan(0.5);
  });

  it('should respect the iteration ceiling', () => {
    const stats = layoutGraph(graphOf(3), { ...DEFAULT_GRAPH_CONFIG, iterations: 10 });

    expect(stats.iterations).toBe(10);
  });

  it('should produce identical positions for identical graphs', () => {
    const edges = [{ source: 0, target: 1, weight: 3 }, { source: 1, target: 2, weight: 2 }];
    const first = graphOf(5, edges);
    const second = graphOf(5, edges);

    layoutGraph(first, DEFAULT_GRAPH_CONFIG);
    layoutGraph(second, DEFAULT_GRAPH_CONFIG);

    expect(second.nodes).toEqual(first.nodes);
  });

  it('should keep every node inside the canvas', () => {
    const edges = [{ source: 0, target: 1, weight: 9 }, { source: 2, target: 3, weight: 4 }];
    const graph = graphOf(30, edges);
    layoutGraph(graph, DEFAULT_GRAPH_CONFIG);

    for (const node of graph.nodes) {
      expect(node.x).toBeGreaterThanOrEqual(0);
      expect(node.x).toBeLessThanOrEqual(1200);
      expect(node.y).toBeGreaterThanOrEqual(0);
      expect(node.y).toBeLessThanOrEqual(800);
    }
  });

  it('should leave a lone connected pair where it started (attraction cancels repulsion)', () => {
    const graph = graphOf(2, [{ source: 0, target: 1, weight: 2 }]);
    const expected = graphOf(2);
    placeRandomly(expected.nodes, 1200, 800, createRandom(DEFAULT_GRAPH_CONFIG.seed));

    layoutGraph(graph, DEFAULT_GRAPH_CONFIG);

    expect(graph.nodes).toEqual(expected.nodes);
  });

  it('should push unconnected nodes apart', () => {
    const graph = graphOf(2);
    const start = graphOf(2);
    placeRandomly(start.nodes, 1200, 800, createRandom(DEFAULT_GRAPH_CONFIG.seed));

    layoutGraph(graph, DEFAULT_GRAPH_CONFIG);

    expect(distance(graph, 0, 1)).toBeGreaterThan(distance(start, 0, 1));
  });

  it('should touch only positions', () => {
    const graph = graphOf(3, [{ source: 0, target: 2, weight: 2 }]);
    layoutGraph(graph, DEFAULT_GRAPH_CONFIG);

    expect(graph.nodes.map(({ id, label, count }) => ({ id, label, count }))).toEqual([
      { id: 0, label: 'term0', count: 1 },
      { id: 1, label: 'term1', count: 1 },
      { id: 2, label: 'term2', count: 1 },
    ]);
    expect(graph.edges).toEqual([{ source: 0, target: 2, weight: 2 }]);
  });
});
