/**
 * Stopword lists
 *
 * The default list ships as data/stopwords.json. A replacement list can be a
 * JSON array of strings or plain text with one word per line.
 */

import * as fs from 'fs';
import defaultList from '../../data/stopwords.json';

function normalize(words: Iterable<string>): Set<string> {
  const set = new Set<string>();
  for (const word of words) {
    const w = word.trim().toLowerCase();
    if (w) set.add(w);
  }
  return set;
}

export const DEFAULT_STOPWORDS: ReadonlySet<string> = normalize(defaultList);

/**
 * Parse stopword file contents (JSON array or newline-separated words)
 */
export function parseStopwords(content: string): Set<string> {
  const trimmed = content.trim();

  if (trimmed.startsWith('[')) {
    const parsed: unknown = JSON.parse(trimmed);
    if (!Array.isArray(parsed) || !parsed.every((w): w is string => typeof w === 'string')) {
      throw new Error('Stopword JSON must be an array of strings');
    }
    return normalize(parsed);
  }

  const lines = trimmed
    .split(/\r?\n/)
    .map(line => line.replace(/#.*$/, ''));
  return normalize(lines);
}

/**
 * Load a replacement stopword list from disk
 */
export function loadStopwords(filePath: string): Set<string> {
  return parseStopwords(fs.readFileSync(filePath, 'utf-8'));
}
