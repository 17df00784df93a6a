/**
 * SVG rendering
 *
 * Edges are drawn first so circles and labels sit on top of the lines.
 */

import type { ConceptGraph, GraphEdge, GraphNode } from '../types';

export interface CanvasSize {
  width: number;
  height: number;
}

/**
 * Escape &, < and > for element text. Labels never go into attributes.
 */
export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}

/**
 * 1 + ln(weight), clamped to [1, 6]
 */
export function strokeWidth(weight: number): number {
  return Math.min(Math.max(1 + Math.log(weight), 1), 6);
}

/**
 * 4 + log2(count), never below 4 (count 0 included)
 */
export function nodeRadius(count: number): number {
  return 4 + Math.max(0, Math.log2(count));
}

function svgHeader({ width: w, height: h }: CanvasSize): string {
  return `<svg viewBox="0 0 ${w} ${h}" xmlns="http://www.w3.org/2000/svg" width="${w}" height="${h}">
<style>
text { font: 12px system-ui, sans-serif; fill: #222; }
.line { stroke: #999; stroke-opacity: .6; }
.node { fill: #3b82f6; }
</style>
<rect x="0" y="0" width="${w}" height="${h}" fill="white" />
`;
}

export function renderEdge(edge: GraphEdge, nodes: readonly GraphNode[]): string {
  const a = nodes[edge.source];
  const b = nodes[edge.target];
  return `<line class="line" x1="${a.x.toFixed(1)}" y1="${a.y.toFixed(1)}" x2="${b.x.toFixed(1)}" y2="${b.y.toFixed(1)}" stroke-width="${strokeWidth(edge.weight).toFixed(2)}" />`;
}

export function renderNode(node: GraphNode): string {
  const cx = node.x.toFixed(1);
  const cy = node.y.toFixed(1);
  return (
    `<circle class="node" cx="${cx}" cy="${cy}" r="${nodeRadius(node.count).toFixed(1)}"/>` +
    `<text x="${cx}" y="${cy}" dx="6" dy="4">${escapeXml(node.label)}</text>`
  );
}

export function renderSvg(graph: ConceptGraph, canvas: CanvasSize): string {
  let svg = svgHeader(canvas);

  for (const edge of graph.edges) {
    svg += renderEdge(edge, graph.nodes);
  }

  for (const node of graph.nodes) {
    svg += renderNode(node);
  }

  return svg + '</svg>';
}
