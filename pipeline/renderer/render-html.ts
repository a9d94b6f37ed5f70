/**
 * HTML renderer: minimal document around the (rewritten) content tree root.
 */

import type { ContentElement } from '../schema/content-tree';
import { SerializationError } from '../lib/errors';

const VOID_TAGS = new Set(['area', 'base', 'br', 'col', 'embed', 'hr', 'img', 'input', 'link', 'meta', 'source', 'track', 'wbr', 'en-media']);

// Unpaired UTF-16 surrogates cannot be encoded as UTF-8.
const LONE_SURROGATE_RE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

export function escapeHtml(str: string | undefined | null): string {
  if (!str) return '';
  return String(str)
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}

export function assertEncodable(s: string, what: string): void {
  const m = LONE_SURROGATE_RE.exec(s);
  if (m) {
    throw new SerializationError(`${what}: unpaired surrogate U+${m[0].charCodeAt(0).toString(16).toUpperCase()} at offset ${m.index}`);
  }
}

/** Serialize an element, its subtree and its tail. */
export function serializeElement(el: ContentElement): string {
  const attrs = Object.entries(el.attrs)
    .map(([k, v]) => ` ${k}="${escapeHtml(v)}"`)
    .join('');

  let out: string;
  if (VOID_TAGS.has(el.tag) && !el.children.length && !el.text) {
    out = `<${el.tag}${attrs}/>`;
  } else {
    out = `<${el.tag}${attrs}>${escapeHtml(el.text)}${el.children.map(serializeElement).join('')}</${el.tag}>`;
  }
  return out + escapeHtml(el.tail);
}

export function renderHtmlDocument(root: ContentElement, context = 'note'): string {
  const html = `<!DOCTYPE html>
<html>
<head></head>
<body>
${serializeElement({ ...root, tail: undefined })}
</body>
</html>
`;
  assertEncodable(html, context);
  return html;
}
