/**
 * Document discovery
 *
 * Recursively collects files under a root whose root-relative path matches
 * an include pattern and no ignore pattern. Results are sorted so the same
 * tree always yields the same document order.
 */

import * as fs from 'fs';
import * as path from 'path';
import { minimatch } from 'minimatch';
import type { Logger } from '../types';

export interface DiscoveryOptions {
  patterns: readonly string[];
  ignore: readonly string[];
}

function toPosix(relativePath: string): string {
  return relativePath.split(path.sep).join('/');
}

function matchesAny(relativePath: string, patterns: readonly string[]): boolean {
  return patterns.some(pattern => minimatch(relativePath, pattern));
}

/**
 * True when an ignore pattern ending in a globstar covers the whole directory
 */
function isIgnoredDirectory(relativeDir: string, ignore: readonly string[]): boolean {
  return ignore.some(pattern => {
    const dirPattern = pattern.replace(/\/\*\*$/, '');
    return dirPattern !== pattern && minimatch(relativeDir, dirPattern);
  });
}

function walk(root: string, dir: string, options: DiscoveryOptions, files: string[], logger?: Logger): void {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch (error) {
    // Unreadable directories are skipped like unreadable documents
    logger?.warn(`Skipping directory ${dir}: ${error instanceof Error ? error.message : String(error)}`);
    return;
  }

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    const relativePath = toPosix(path.relative(root, fullPath));

    if (entry.isDirectory()) {
      if (!isIgnoredDirectory(relativePath, options.ignore)) {
        walk(root, fullPath, options, files, logger);
      }
    } else if (entry.isFile()) {
      if (matchesAny(relativePath, options.patterns) && !matchesAny(relativePath, options.ignore)) {
        files.push(fullPath);
      }
    }
  }
}

export function collectDocuments(root: string, options: DiscoveryOptions, logger?: Logger): string[] {
  if (!fs.existsSync(root)) {
    logger?.warn(`Document root ${root} does not exist`);
    return [];
  }

  if (fs.statSync(root).isFile()) {
    const name = path.basename(root);
    return matchesAny(name, options.patterns) && !matchesAny(name, options.ignore) ? [root] : [];
  }

  const files: string[] = [];
  walk(root, root, options, files, logger);
  return files.sort();
}
