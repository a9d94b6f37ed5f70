/**
 * Crosslink database builder.
 *
 * Needs the WHOLE corpus before any note can be rendered:
 *   pass 1: every note identity key -> ""            (every identity is a known key)
 *   pass 2: identity key -> the internal href a note uses to link to ITSELF (anchor text equal to
 *           the key's last segment)
 *
 * Render-time lookup goes the other way: given an href token, find the identity key whose
 * stored token ends with it.
 */

import { findAll, textContent, type ContentElement } from '../schema/content-tree';
import type { Notebook } from '../schema/note-schema';
import type { CrosslinkStore } from './crosslink-store';

export const INTERNAL_SCHEME = 'evernote:///';

export interface CrosslinkMatch {
  /** Identity key on success; the original reference text when unresolved */
  key: string;
  /** Stored self-reference token; "" when unresolved */
  token: string;
}

export interface CrosslinkBuildStats {
  identities: number;
  references: number;
}

export function isInternalHref(href: string | undefined): href is string {
  return typeof href === 'string' && href.startsWith(INTERNAL_SCHEME);
}

/** Visible text of an anchor: its own text, or all descendant text when that is empty. */
export function anchorText(el: ContentElement): string {
  return el.text ? el.text : textContent(el);
}

/** `text` names the note only when it is the key's whole last segment (or the whole key). */
export function isOwnName(key: string, text: string): boolean {
  return !!text && (key === text || key.endsWith(`/${text}`));
}

export function buildCrosslinks(notebooks: Notebook[], store: CrosslinkStore): CrosslinkBuildStats {
  const stats: CrosslinkBuildStats = { identities: 0, references: 0 };

  for (const nb of notebooks) {
    for (const note of nb.notes) {
      store.set(note.key, '');
      stats.identities++;
    }
  }

  for (const nb of notebooks) {
    for (const note of nb.notes) {
      for (const a of findAll(note.content, 'a')) {
        const href = a.attrs.href;
        if (!isInternalHref(href)) continue;
        const text = anchorText(a);
        if (!isOwnName(note.key, text)) continue;
        store.set(note.key, href);
        stats.references++;
      }
    }
  }

  try {
    store.flush();
  } catch (err) {
    console.warn('[crosslinks] ⚠️  flush failed (continuing with in-memory handle):', err);
  }

  console.log(`[crosslinks] ${stats.identities} identities, ${stats.references} self-reference(s)`);
  return stats;
}

/**
 * First key (insertion order) whose stored value ends with `ref`.
 * Never throws for a miss: unresolved returns `{ key: ref, token: '' }`.
 */
export function lookupCrosslink(store: CrosslinkStore, ref: string): CrosslinkMatch {
  if (ref) {
    for (const key of store.keys()) {
      const value = store.get(key);
      if (value && value.endsWith(ref)) return { key, token: value };
    }
  }
  return { key: ref, token: '' };
}

/** First identity key whose last path segment equals `name`. */
export function lookupByName(store: CrosslinkStore, name: string): string | null {
  if (!name) return null;
  for (const key of store.keys()) {
    if (key.slice(key.lastIndexOf('/') + 1) === name) return key;
  }
  return null;
}
