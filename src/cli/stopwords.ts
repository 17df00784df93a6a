/**
 * Stopwords command - show the list the tokenizer filters with
 */

import { Command } from 'commander';
import { DEFAULT_STOPWORDS, loadStopwords } from '../graph/stopwords';
import { describeError } from '../lib/errors';
import * as colors from './colors';
import { setCommandHelp } from './help-formatter';

interface StopwordsOptions {
  file?: string;
  json?: boolean;
}

/**
 * Lay words out in fixed-width columns
 */
export function formatColumns(words: readonly string[], columns: number = 6, width: number = 12): string[] {
  const lines: string[] = [];
  for (let i = 0; i < words.length; i += columns) {
    lines.push('  ' + words.slice(i, i + columns).map(w => w.padEnd(width)).join('').trimEnd());
  }
  return lines;
}

export function createStopwordsCommand(): Command {
  return setCommandHelp(
    new Command('stopwords'),
    'Show the stopword list',
    'Print the stopwords removed before unigrams and bigrams are formed. Without --file this is the built-in list.'
  )
    .option('-f, --file <path>', 'Show the list loaded from this file instead')
    .option('--json', 'Output as a JSON array')
    .action((options: StopwordsOptions) => {
      try {
        const words = [...(options.file ? loadStopwords(options.file) : DEFAULT_STOPWORDS)];

        if (options.json) {
          console.log(JSON.stringify(words, null, 2));
          return;
        }

        console.log('\n' + colors.ui.title(`Stopwords (${words.length})`));
        console.log(colors.separator());
        for (const line of formatColumns(words)) {
          console.log(colors.ui.value(line));
        }
        console.log();
      } catch (error) {
        console.error(colors.status.error('Failed to load stopwords'));
        console.error(colors.status.error(describeError(error)));
        process.exit(1);
      }
    });
}
