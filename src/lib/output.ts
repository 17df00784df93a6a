/**
 * Artifact writer
 *
 * Writes graph.json and graph.svg into the output directory, creating it if
 * needed and overwriting previous runs. Any failure here is fatal.
 */

import * as fs from 'fs';
import * as path from 'path';
import { renderSvg, type CanvasSize } from '../graph/render';
import { toJson } from '../graph/serialize';
import type { ConceptGraph } from '../types';
import { OutputError } from './errors';

export const JSON_FILENAME = 'graph.json';
export const SVG_FILENAME = 'graph.svg';

export interface WrittenArtifacts {
  jsonPath: string;
  svgPath: string;
}

function writeFile(filePath: string, content: string): void {
  try {
    fs.writeFileSync(filePath, content, 'utf-8');
  } catch (error) {
    throw new OutputError(`Failed to write ${filePath}`, filePath, { cause: error });
  }
}

export function writeArtifacts(outDir: string, graph: ConceptGraph, canvas: CanvasSize): WrittenArtifacts {
  try {
    fs.mkdirSync(outDir, { recursive: true });
  } catch (error) {
    throw new OutputError(`Failed to create output directory ${outDir}`, outDir, { cause: error });
  }

  const jsonPath = path.join(outDir, JSON_FILENAME);
  const svgPath = path.join(outDir, SVG_FILENAME);

  writeFile(jsonPath, toJson(graph));
  writeFile(svgPath, renderSvg(graph, canvas));

  return { jsonPath, svgPath };
}
