/**
 * Tokenizer: source text → ordered tokens with stable indices.
 * Clients address votes by token index, so the output must stay byte-for-byte
 * deterministic for a given source and rendering pipeline.
 */

import { decodeHTML } from 'entities';
import { renderMarkdown, isMarkdownName } from './markdown.js';

export const PUNCT_BREAK = new Set('.,:;!?()"\'-[]{}«»“”—–…');

const RE_SPLIT = /([\s]+|[.,:;!?()"\-'[\]{}«»“”—–…])/;
const RE_WHITESPACE = /^\s+$/;

const HTML_CLOSE_TO_NL = /<\/(p|h1|h2|h3|h4|h5|h6|li|div|section|article|blockquote)>\s*/gi;
const HTML_BR = /<br\s*\/?>/gi;
const HTML_TAGS = /<[^>]+>/g;
const MULTI_NL = /\n{3,}/g;

/** Convert HTML to plain text, keeping block boundaries as newlines. */
export function htmlToPlain(text: string): string {
  if (!text.includes('<') || !text.includes('>')) {
    return decodeHTML(text);
  }
  let plain = text.replace(HTML_BR, '\n');
  plain = plain.replace(HTML_CLOSE_TO_NL, '\n');
  plain = plain.replace(HTML_TAGS, '');
  plain = decodeHTML(plain);
  return plain.replace(MULTI_NL, '\n\n');
}

/**
 * Split text into tokens. Whitespace runs are dropped except for their newlines,
 * each of which becomes a literal "\n" token. Punctuation separators are kept.
 */
export function tokenize(text: string): string[] {
  const plain = htmlToPlain(text);
  const tokens: string[] = [];
  for (const seg of plain.split(RE_SPLIT)) {
    if (!seg) continue;
    if (RE_WHITESPACE.test(seg)) {
      for (const ch of seg) {
        if (ch === '\n') tokens.push('\n');
      }
      continue;
    }
    tokens.push(seg);
  }
  return tokens;
}

/** True if the token breaks highlight runs (newline or punctuation only). */
export function isBreakToken(token: string): boolean {
  if (token === '\n' || token === '\r' || token === '\r\n') return true;
  if (!token) return false;
  for (const ch of token) {
    if (!PUNCT_BREAK.has(ch)) return false;
  }
  return true;
}

/** Join tokens into the lowercase text used for phrase grouping. */
export function normalisedText(tokens: readonly string[]): string {
  return tokens.join(' ').trim().toLowerCase();
}

export function stripBom(text: string): string {
  return text.includes('\uFEFF') ? text.replace(/\uFEFF/g, '') : text;
}

export function isHtmlLikeName(name: string): boolean {
  return isMarkdownName(name) || name.toLowerCase().endsWith('.html');
}

/**
 * Tokenize a named source. Markdown is rendered to HTML first; for HTML-like
 * sources the block structure is already encoded, so bare newline tokens are dropped.
 */
export function tokenizeSource(name: string, text: string): string[] {
  const source = stripBom(text);
  const tokens = isMarkdownName(name)
    ? tokenize(stripBom(renderMarkdown(source)))
    : tokenize(source);
  if (!isHtmlLikeName(name)) return tokens;
  return tokens.filter((tok) => tok && tok !== '\n');
}
