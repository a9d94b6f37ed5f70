/**
 * Render one note: run the rewrite rules over its content tree (in place), then serialize.
 */

import type { Note } from '../schema/note-schema';
import type { OutputFormat } from '../schema/formats';
import { remapTags, type RemapOptions } from '../renderer/remap-tags';
import { defaultRules, type RenderContext } from '../renderer/rules';
import { renderHtmlDocument } from '../renderer/render-html';
import { renderTextDocument } from '../renderer/render-text';

export function renderNote(
  note: Note,
  format: OutputFormat,
  ctx: RenderContext,
  opts: Pick<RemapOptions, 'refreshParents'> = {}
): string {
  const { root } = remapTags(note.content, defaultRules(ctx), { ...opts, context: note.key });
  note.content = root;

  return format === 'text'
    ? renderTextDocument(note.title, root, note.archivePath)
    : renderHtmlDocument(root, note.archivePath);
}
