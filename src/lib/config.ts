/**
 * Configuration for concept-graph runs
 *
 * Every tunable constant of the pipeline lives in GraphConfig with a
 * documented default. A run layers, in order: defaults, an optional JSON
 * config file (--config), then command-line flags. No environment variables
 * are consulted.
 */

import * as fs from 'fs';
import { ConfigError } from './errors';

export interface GraphConfig {
  maxNodes: number;        // Vocabulary cap (one node per term)
  edgeFactor: number;      // Edge cap = maxNodes * edgeFactor
  minEdgeWeight: number;   // Pairs seen fewer times than this are pruned
  window: number;          // Co-occurrence window over vocabulary-filtered positions
  minTokenLength: number;  // Shortest unigram kept by the tokenizer
  width: number;           // Canvas width
  height: number;          // Canvas height
  iterations: number;      // Layout iteration ceiling
  coolingFactor: number;   // Temperature decay per iteration
  minTemperature: number;  // Layout stops once the temperature drops below this
  seed: number;            // Layout PRNG seed
}

export interface ToolConfig extends GraphConfig {
  root: string;
  outDir: string;
  patterns: string[];
  ignore: string[];
  stopwords?: string;  // Path to a replacement stopword list
}

export const DEFAULT_GRAPH_CONFIG: Readonly<GraphConfig> = Object.freeze({
  maxNodes: 30,
  edgeFactor: 6,
  minEdgeWeight: 2,
  window: 12,
  minTokenLength: 3,
  width: 1200,
  height: 800,
  iterations: 400,
  coolingFactor: 0.96,
  minTemperature: 0.5,
  seed: 37,
});

export const DEFAULT_ROOT = 'content/blog';
export const DEFAULT_OUT_DIR = 'static/graph';
export const DEFAULT_PATTERNS: readonly string[] = ['**/*.md'];
export const DEFAULT_IGNORE: readonly string[] = ['**/node_modules/**', '**/.git/**'];

const GRAPH_KEYS = [
  'maxNodes',
  'edgeFactor',
  'minEdgeWeight',
  'window',
  'minTokenLength',
  'width',
  'height',
  'iterations',
  'coolingFactor',
  'minTemperature',
  'seed',
] as const satisfies readonly (keyof GraphConfig)[];

const INTEGER_KEYS: ReadonlyArray<keyof GraphConfig> = [
  'maxNodes',
  'edgeFactor',
  'minEdgeWeight',
  'window',
  'minTokenLength',
  'iterations',
];

const POSITIVE_KEYS: ReadonlyArray<keyof GraphConfig> = ['width', 'height', 'minTemperature'];

function isGraphKey(key: string): key is keyof GraphConfig {
  return GRAPH_KEYS.some(k => k === key);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Check a fully merged config, throwing ConfigError on the first bad key
 */
export function validateGraphConfig(config: GraphConfig): GraphConfig {
  for (const key of INTEGER_KEYS) {
    const value = config[key];
    if (!Number.isInteger(value) || value < 1) {
      throw new ConfigError(`${key} must be a positive integer (got ${value})`, key);
    }
  }

  for (const key of POSITIVE_KEYS) {
    const value = config[key];
    if (!Number.isFinite(value) || value <= 0) {
      throw new ConfigError(`${key} must be a positive number (got ${value})`, key);
    }
  }

  if (!(config.coolingFactor > 0 && config.coolingFactor < 1)) {
    throw new ConfigError(`coolingFactor must be between 0 and 1 (got ${config.coolingFactor})`, 'coolingFactor');
  }

  if (!Number.isInteger(config.seed) || config.seed < 0) {
    throw new ConfigError(`seed must be a non-negative integer (got ${config.seed})`, 'seed');
  }

  return config;
}

/**
 * Merge partial layers over the defaults (later layers win, undefined is skipped)
 */
export function resolveGraphConfig(...layers: Array<Partial<GraphConfig> | undefined>): GraphConfig {
  const config: GraphConfig = { ...DEFAULT_GRAPH_CONFIG };

  for (const layer of layers) {
    if (!layer) continue;
    for (const key of GRAPH_KEYS) {
      const value = layer[key];
      if (value !== undefined) {
        config[key] = value;
      }
    }
  }

  return validateGraphConfig(config);
}

/**
 * Merge run settings and graph settings into one ToolConfig
 */
export function resolveToolConfig(...layers: Array<Partial<ToolConfig> | undefined>): ToolConfig {
  const tool: ToolConfig = {
    ...resolveGraphConfig(...layers),
    root: DEFAULT_ROOT,
    outDir: DEFAULT_OUT_DIR,
    patterns: [...DEFAULT_PATTERNS],
    ignore: [...DEFAULT_IGNORE],
  };

  for (const layer of layers) {
    if (!layer) continue;
    if (layer.root !== undefined) tool.root = layer.root;
    if (layer.outDir !== undefined) tool.outDir = layer.outDir;
    if (layer.patterns !== undefined && layer.patterns.length > 0) tool.patterns = [...layer.patterns];
    if (layer.ignore !== undefined) tool.ignore = [...layer.ignore];
    if (layer.stopwords !== undefined) tool.stopwords = layer.stopwords;
  }

  return tool;
}

/**
 * Read a JSON config file into a partial ToolConfig
 *
 * Unknown keys and wrongly typed values are rejected rather than ignored.
 */
export function loadConfigFile(configPath: string): Partial<ToolConfig> {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Failed to load config from ${configPath}`, undefined, { cause: error });
  }

  if (!isRecord(raw)) {
    throw new ConfigError(`Config file ${configPath} must contain a JSON object`);
  }

  const result: Partial<ToolConfig> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (isGraphKey(key)) {
      if (typeof value !== 'number') {
        throw new ConfigError(`${key} must be a number in ${configPath}`, key);
      }
      result[key] = value;
    } else if (key === 'root' || key === 'outDir' || key === 'stopwords') {
      if (typeof value !== 'string') {
        throw new ConfigError(`${key} must be a string in ${configPath}`, key);
      }
      result[key] = value;
    } else if (key === 'patterns' || key === 'ignore') {
      if (!isStringArray(value)) {
        throw new ConfigError(`${key} must be an array of strings in ${configPath}`, key);
      }
      result[key] = value;
    } else {
      throw new ConfigError(`Unknown config key "${key}" in ${configPath}`, key);
    }
  }

  return result;
}
