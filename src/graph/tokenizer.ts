/**
 * Tokenizer
 *
 * Turns plain text into a term stream of unigrams with bigrams interleaved:
 * each unigram is followed by the bigram it starts, if any.
 *
 *   "The Quick-Brown fox jumps" → quick-brown, "quick-brown fox", fox, "fox jumps", jumps
 */

import type { TermStream } from '../types';

// Alphanumeric start, then at least one alphanumeric/hyphen/apostrophe
const WORD_PATTERN = /[a-z0-9][a-z0-9\-']+/g;

export interface TokenizeOptions {
  minTokenLength: number;
}

/**
 * Lowercase, match word-like spans, trim edge hyphens, drop short words and stopwords
 */
export function extractUnigrams(
  text: string,
  stopwords: ReadonlySet<string>,
  { minTokenLength }: TokenizeOptions
): string[] {
  const words: string[] = [];

  for (const match of text.toLowerCase().matchAll(WORD_PATTERN)) {
    const word = match[0].replace(/^-+|-+$/g, '');
    if (word.length >= minTokenLength && !stopwords.has(word)) {
      words.push(word);
    }
  }

  return words;
}

export function tokenize(
  text: string,
  stopwords: ReadonlySet<string>,
  options: TokenizeOptions
): TermStream {
  const words = extractUnigrams(text, stopwords, options);
  const terms: TermStream = [];

  for (let i = 0; i < words.length; i++) {
    terms.push(words[i]);
    if (i + 1 < words.length) {
      const first = words[i];
      const second = words[i + 1];
      // Never true after extractUnigrams; a bigram must not carry a stopword half
      if (!stopwords.has(first) && !stopwords.has(second)) {
        terms.push(`${first} ${second}`);
      }
    }
  }

  return terms;
}
