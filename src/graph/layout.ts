/**
 * Force-directed layout (Fruchterman-Reingold)
 *
 * Writes x/y of every node in place. Repulsion runs over all node pairs, so
 * each iteration is O(N²); maxNodes keeps N small.
 *
 * Attraction reuses the repulsion law k²/d with the opposite sign, not the
 * d²/k spring.
 */

import type { GraphConfig } from '../lib/config';
import type { ConceptGraph, GraphNode, LayoutStats } from '../types';
import { createRandom, type RandomSource } from './random';

export type LayoutOptions = Pick<
  GraphConfig,
  'width' | 'height' | 'iterations' | 'coolingFactor' | 'minTemperature' | 'seed'
>;

const MIN_DISTANCE = 0.01;

interface Displacement {
  dx: number;
  dy: number;
}

/**
 * Ideal edge length for `nodeCount` nodes on a width x height canvas, floored at 1
 */
export function idealEdgeLength(width: number, height: number, nodeCount: number): number {
  return Math.max(Math.sqrt((width * height) / nodeCount), 1);
}

export function initialTemperature(width: number, height: number): number {
  return Math.min(width, height) / 10;
}

/**
 * Clamp a displacement component to [-t, t], keeping its sign
 */
export function limitDisplacement(d: number, t: number): number {
  return Math.sign(d) * Math.min(Math.abs(d), t);
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

export function placeRandomly(nodes: GraphNode[], width: number, height: number, random: RandomSource): void {
  for (const node of nodes) {
    node.x = random() * width;
    node.y = random() * height;
  }
}

/**
 * Force of magnitude k²/d along the line from b to a
 */
function pairForce(a: GraphNode, b: GraphNode, k2: number): Displacement {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  const dist = Math.max(Math.sqrt(dx * dx + dy * dy), MIN_DISTANCE);
  const force = k2 / dist;
  return { dx: (dx / dist) * force, dy: (dy / dist) * force };
}

export function layoutGraph(graph: ConceptGraph, options: LayoutOptions): LayoutStats {
  const { nodes, edges } = graph;
  const { width, height } = options;
  let t = initialTemperature(width, height);

  if (nodes.length === 0) {
    return { iterations: 0, temperature: t };
  }

  const k = idealEdgeLength(width, height, nodes.length);
  const k2 = k * k;
  placeRandomly(nodes, width, height, createRandom(options.seed));

  let iterations = 0;
  while (iterations < options.iterations) {
    const disp: Displacement[] = nodes.map(() => ({ dx: 0, dy: 0 }));

    // Repulsion
    for (let i = 0; i < nodes.length; i++) {
      for (let j = i + 1; j < nodes.length; j++) {
        const f = pairForce(nodes[i], nodes[j], k2);
        disp[i].dx += f.dx;
        disp[i].dy += f.dy;
        disp[j].dx -= f.dx;
        disp[j].dy -= f.dy;
      }
    }

    // Attraction
    for (const edge of edges) {
      const f = pairForce(nodes[edge.source], nodes[edge.target], k2);
      disp[edge.source].dx -= f.dx;
      disp[edge.source].dy -= f.dy;
      disp[edge.target].dx += f.dx;
      disp[edge.target].dy += f.dy;
    }

    nodes.forEach((node, i) => {
      node.x = clamp(node.x + limitDisplacement(disp[i].dx, t), 0, width);
      node.y = clamp(node.y + limitDisplacement(disp[i].dy, t), 0, height);
    });

    iterations++;
    t *= options.coolingFactor;
    if (t < options.minTemperature) {
      break;
    }
  }

  return { iterations, temperature: t };
}
