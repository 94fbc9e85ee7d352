/**
 * Markdown → HTML rendering for `.md` sources.
 */

import MarkdownIt from 'markdown-it';

// One shared instance: render() keeps no state between conversions.
const md = new MarkdownIt({ html: true, linkify: false });
md.enable(['table', 'strikethrough']);

export function renderMarkdown(source: string): string {
  return md.render(source);
}

export function isMarkdownName(name: string | null | undefined): boolean {
  return !!name && name.toLowerCase().endsWith('.md');
}
