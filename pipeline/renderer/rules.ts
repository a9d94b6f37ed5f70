/**
 * Rendering rules for the tag remapping engine:
 * - `en-todo`  -> "[x] " / "[ ] " marker (or a disabled checkbox input)
 * - `a`        -> internal `evernote:///` links rewritten to relative output paths
 */

import * as path from 'path';

import { element, type ContentElement } from '../schema/content-tree';
import { FORMAT_EXT } from '../schema/formats';
import type { CrosslinkStore } from '../crosslinks/crosslink-store';
import { anchorText, isInternalHref, lookupByName, lookupCrosslink } from '../crosslinks/build-crosslinks';
import type { RewriteRule, RewriteRules } from './remap-tags';

export type CheckboxStyle = 'marker' | 'input';

export const CHECKED_MARKER = '[x] ';
export const UNCHECKED_MARKER = '[ ] ';

/** Per-note rendering context; the store handle is shared read-only across notes. */
export interface RenderContext {
  store: CrosslinkStore;
  /** Identity key of the note being rendered */
  noteKey: string;
  /** Output extension including the dot (".html", ".txt") */
  ext: string;
  checkboxStyle: CheckboxStyle;
}

/** Path of `toKey`'s output file relative to the directory holding `fromKey`'s output file. */
export function relativeOutputPath(fromKey: string, toKey: string, ext: string): string {
  return path.posix.relative(path.posix.dirname(fromKey), toKey) + ext;
}

/** Percent-encode each segment so `#`, `?`, `%` and spaces in note names stay part of the path. */
export function encodeHrefPath(relPath: string): string {
  return relPath
    .split('/')
    .map((seg) => (seg === '..' || seg === '.' ? seg : encodeURIComponent(seg)))
    .join('/');
}

/** Link target as written into output: URL-encoded for HTML, the plain path for text. */
export function outputHref(fromKey: string, toKey: string, ext: string): string {
  const rel = relativeOutputPath(fromKey, toKey, ext);
  return ext === FORMAT_EXT.html ? encodeHrefPath(rel) : rel;
}

export function checkboxRule(style: CheckboxStyle, noteKey = ''): RewriteRule {
  return (el: ContentElement) => {
    let checked = el.attrs.checked;
    if (checked == null) {
      console.warn(`[rules] ⚠️  <${el.tag}> without "checked" attribute${noteKey ? ` in ${noteKey}` : ''}; treating as unchecked`);
      checked = 'false';
    }
    const isChecked = checked.trim().toLowerCase() === 'true';

    if (style === 'input') {
      const attrs: Record<string, string> = { type: 'checkbox', disabled: 'disabled' };
      if (isChecked) attrs.checked = 'checked';
      return element('input', attrs, { tail: el.tail });
    }
    return element('span', {}, { text: isChecked ? CHECKED_MARKER : UNCHECKED_MARKER, tail: el.tail });
  };
}

export function internalLinkRule(ctx: RenderContext): RewriteRule {
  return (el: ContentElement) => {
    const href = el.attrs.href;
    if (href == null) {
      console.warn(`[rules] ⚠️  anchor without href in ${ctx.noteKey}: "${anchorText(el)}"`);
      return el;
    }
    if (!isInternalHref(href)) return el;

    const text = anchorText(el);
    const match = lookupCrosslink(ctx.store, href);
    const targetKey = match.token ? match.key : lookupByName(ctx.store, text);
    if (!targetKey) {
      console.warn(`[rules] ⚠️  unresolved crosslink in ${ctx.noteKey}: "${text}" -> ${href}`);
      return el;
    }

    return element(el.tag, { ...el.attrs, href: outputHref(ctx.noteKey, targetKey, ctx.ext) }, {
      text: el.text,
      tail: el.tail,
      children: el.children,
    });
  };
}

/** Rule table in application order: checkboxes first, then links. */
export function defaultRules(ctx: RenderContext): RewriteRules {
  return new Map<string, RewriteRule>([
    ['en-todo', checkboxRule(ctx.checkboxStyle, ctx.noteKey)],
    ['a', internalLinkRule(ctx)],
  ]);
}
