/**
 * Markdown to plain text
 *
 * Drops a leading frontmatter block, then keeps only the prose of the
 * document: text of paragraphs, headings, list items, table cells and image
 * alt text. Code blocks, inline code and raw HTML contribute nothing.
 */

import * as fs from 'fs';
import { decodeHTML } from 'entities';
import { marked, type Token } from 'marked';
import type { Logger } from '../types';

const FRONTMATTER_FENCES = ['+++', '---'];

/**
 * Remove a leading +++ (TOML) or --- (YAML) block. Unterminated blocks are left alone.
 */
export function stripFrontmatter(source: string): string {
  for (const fence of FRONTMATTER_FENCES) {
    if (!source.startsWith(fence)) continue;

    const terminator = `\n${fence}\n`;
    const end = source.indexOf(terminator);
    return end === -1 ? source : source.slice(end + terminator.length);
  }
  return source;
}

function hasChildren(token: Token): boolean {
  return 'tokens' in token && Array.isArray(token.tokens) && token.tokens.length > 0;
}

function leafText(token: Token): string | undefined {
  switch (token.type) {
    case 'text':
      // raw is the source text; the lexer's text field is HTML-escaped.
      // Character references (&nbsp; &mdash; &#8212;) are decoded in both.
      return hasChildren(token) ? undefined : decodeHTML(token.raw);
    case 'escape':
      return token.raw.slice(1);
    case 'image':
      return decodeHTML(token.text);
    default:
      return undefined;
  }
}

export function markdownToText(source: string): string {
  const tokens = marked.lexer(stripFrontmatter(source), { gfm: true });
  let out = '';

  marked.walkTokens(tokens, token => {
    const text = leafText(token);
    if (text) {
      out += text + ' ';
    }
  });

  return out;
}

/**
 * Read one document as plain text; unreadable documents count as empty
 */
export function readDocumentText(filePath: string, logger?: Logger): string {
  try {
    return markdownToText(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    logger?.warn(`Skipping ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
    return '';
  }
}
