/**
 * Plain-text renderer.
 *
 * Flattens the content tree the way a browser would lay it out as text: whitespace in text
 * nodes collapses, block elements start new lines, table cells are joined with ` | `, and links
 * stay visible as `[text](href)`.
 */

import type { ContentElement } from '../schema/content-tree';
import { assertEncodable } from './render-html';
import { CHECKED_MARKER, UNCHECKED_MARKER } from './rules';

const BLOCK_TAGS = new Set([
  'address',
  'article',
  'blockquote',
  'dd',
  'div',
  'dl',
  'dt',
  'en-note',
  'footer',
  'h1',
  'h2',
  'h3',
  'h4',
  'h5',
  'h6',
  'header',
  'li',
  'ol',
  'p',
  'pre',
  'section',
  'table',
  'tr',
  'ul',
]);

const SKIPPED_TAGS = new Set(['en-media', 'img', 'script', 'style']);

const CELL_TAGS = new Set(['td', 'th']);
export const CELL_SEPARATOR = ' | ';

function collapse(s: string | undefined): string {
  return s ? s.replace(/[ \t\r\n\f]+/g, ' ') : '';
}

function flattenInto(el: ContentElement, out: string[]): void {
  const tag = el.tag.toLowerCase();

  if (tag === 'br') {
    out.push('\n');
    return;
  }
  if (tag === 'hr') {
    out.push('\n---\n');
    return;
  }
  if (tag === 'input' && el.attrs.type === 'checkbox') {
    out.push('checked' in el.attrs ? CHECKED_MARKER : UNCHECKED_MARKER);
    return;
  }
  if (SKIPPED_TAGS.has(tag)) return;

  const block = BLOCK_TAGS.has(tag);
  if (block) out.push('\n');
  if (tag === 'li') out.push('* ');

  const href = tag === 'a' ? el.attrs.href : undefined;
  if (href) {
    const inner: string[] = [];
    flattenChildren(el, inner);
    const label = inner.join('').trim();
    out.push(label && label !== href ? `[${label}](${href})` : href);
  } else {
    flattenChildren(el, out);
  }

  if (block) out.push('\n');
}

function flattenChildren(el: ContentElement, out: string[]): void {
  out.push(collapse(el.text));
  let cells = 0;
  for (const child of el.children) {
    const cell = CELL_TAGS.has(child.tag.toLowerCase());
    if (cell && cells++ > 0) out.push(CELL_SEPARATOR);
    flattenInto(child, out);
    // Whitespace between cells is markup indentation, not content.
    if (cell && !child.tail?.trim()) continue;
    out.push(collapse(child.tail));
  }
}

/** Readable text for a content tree, without a trailing newline. */
export function flattenText(root: ContentElement): string {
  const out: string[] = [];
  flattenInto(root, out);
  return out
    .join('')
    .replace(/\u00a0/g, ' ')
    .split('\n')
    .map((line) => line.trim())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

export function renderTextDocument(title: string, root: ContentElement, context = 'note'): string {
  const rule = '='.repeat(Array.from(title).length);
  const body = flattenText(root);
  const text = `${title}\n${rule}\n\n${body}${body ? '\n' : ''}`;
  assertEncodable(text, context);
  return text;
}
