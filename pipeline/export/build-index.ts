/**
 * Per-notebook index.
 *
 * `{{header}}` / `{{footer}}` are opaque placeholders for a downstream site template.
 * Entries are keyed by title (a later note with the same title wins) and sorted by title.
 * A note named like the index itself is left out; the index takes its output file.
 */

import * as path from 'path';

import type { Notebook } from '../schema/note-schema';
import { FORMAT_EXT, type OutputFormat } from '../schema/formats';
import { escapeHtml } from '../renderer/render-html';
import { outputHref } from '../renderer/rules';

export const INDEX_HEADER = '{{header}}';
export const INDEX_FOOTER = '{{footer}}';
export const INDEX_BASENAME = 'index';

export interface IndexEntry {
  title: string;
  /** Output path relative to the notebook directory (where the index is written), URL-encoded for html */
  path: string;
}

/** Identity key the index file would have if it were a note; a note with this key would be overwritten. */
export function indexKey(notebook: Notebook): string {
  return notebook.key ? `${notebook.key}/${INDEX_BASENAME}` : INDEX_BASENAME;
}

export function buildIndexEntries(notebook: Notebook, format: OutputFormat): IndexEntry[] {
  const byTitle = new Map<string, string>();
  // Paths resolve from the index's own position in the notebook directory.
  const fromKey = indexKey(notebook);
  for (const note of notebook.notes) {
    if (note.key === fromKey) continue;
    byTitle.set(note.title, outputHref(fromKey, note.key, FORMAT_EXT[format]));
  }
  return Array.from(byTitle.entries())
    .map(([title, p]) => ({ title, path: p }))
    .sort((a, b) => a.title.localeCompare(b.title) || a.path.localeCompare(b.path));
}

export function renderIndex(entries: IndexEntry[], format: OutputFormat): string {
  if (format === 'text') {
    const lines = entries.map((e, i) => `${i + 1}. ${e.title} (${e.path})`);
    return [INDEX_HEADER, ...lines, INDEX_FOOTER].join('\n') + '\n';
  }
  const items = entries.map((e) => `<li><a href="${escapeHtml(e.path)}">${escapeHtml(e.title)}</a></li>`);
  return [INDEX_HEADER, '<ol>', ...items, '</ol>', INDEX_FOOTER].join('\n') + '\n';
}

export function indexOutputPath(outDir: string, notebook: Notebook, format: OutputFormat): string {
  return path.join(outDir, ...notebook.key.split('/'), INDEX_BASENAME + FORMAT_EXT[format]);
}
