/**
 * Terminal color scheme for concept-graph output
 * Using ansis for enhanced terminal styling
 */

import ansis from 'ansis';

/**
 * Term colors - emphasis for graph labels in summaries
 */
export const term = {
  label: ansis.bold.hex('#B4F8C8'),
  bigram: ansis.italic.hex('#DDA0DD'),   // Two-word terms
  weight: ansis.bold.hex('#FFD700'),     // Gold - co-occurrence strength
  link: ansis.dim.hex('#666666'),
};

/**
 * Status colors
 */
export const status = {
  warning: ansis.bold.hex('#FFD700'),       // Gold
  error: ansis.bold.hex('#FF5F5F'),         // Red
  dim: ansis.dim.hex('#808080'),            // Gray
};

/**
 * Run statistics colors
 */
export const stats = {
  label: ansis.bold.hex('#00D7FF'),         // Cyan
  value: ansis.hex('#00FF87'),              // Bright green
  section: ansis.bold.underline.hex('#FFD700'),  // Gold with underline
  count: ansis.hex('#B4F8C8'),
};

/**
 * UI elements
 */
export const ui = {
  title: ansis.bold.hex('#FFD700'),         // Gold
  separator: ansis.dim.hex('#666666'),      // Dark gray
  header: ansis.bold.underline.hex('#B4F8C8'),
  key: ansis.hex('#9370DB'),                // Purple
  value: ansis.hex('#E6E6FA'),              // Lavender
  command: ansis.hex('#228B22'),            // Forest green for commands and options
};

/**
 * Format a term, italicising bigrams
 */
export function coloredTerm(label: string): string {
  return label.includes(' ') ? term.bigram(label) : term.label(label);
}

/**
 * Format a count with color
 */
export function coloredCount(count: number): string {
  if (count === 0) return status.dim(String(count));
  if (count > 100) return stats.value.bold(String(count));
  if (count > 10) return stats.count(String(count));
  return stats.value(String(count));
}

/**
 * Create a visual separator
 */
export function separator(length: number = 60, char: string = '─'): string {
  return ui.separator(char.repeat(length));
}
