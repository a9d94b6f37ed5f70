/**
 * Parse a single `.enex` archive into a Note.
 *
 * Two XML passes:
 * 1. The export envelope (`<en-export><note>…`), parsed as plain objects; the four required
 *    fields are checked with zod.
 * 2. The ENML body inside `<content>`, parsed with `preserveOrder` so mixed content keeps its
 *    order, then folded into a ContentElement tree (text/tail).
 *
 * Any failure raises ArchiveParseError; the corpus loader decides what to do with it.
 */

import * as fs from 'fs';
import * as path from 'path';
import { XMLParser, XMLValidator } from 'fast-xml-parser';

import type { ContentElement } from '../schema/content-tree';
import { ARCHIVE_EXT, ArchivedNoteSchema, type Note } from '../schema/note-schema';
import { ArchiveParseError, errorMessage } from '../lib/errors';

type XmlRecord = Record<string, unknown>;

function isRecord(v: unknown): v is XmlRecord {
  return !!v && typeof v === 'object' && !Array.isArray(v);
}

const envelopeParser = new XMLParser({
  ignoreAttributes: true,
  parseTagValue: false,
  isArray: (_name: string, jpath: string) => jpath === 'en-export.note',
});

const contentParser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: '',
  allowBooleanAttributes: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: false,
  htmlEntities: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
});

// =============================================================================
// ENML body -> ContentElement
// =============================================================================

function readAttrs(node: XmlRecord): Record<string, string> {
  const raw = node[':@'];
  const attrs: Record<string, string> = {};
  if (!isRecord(raw)) return attrs;
  for (const [k, v] of Object.entries(raw)) {
    // Boolean attributes (`<input disabled>`) come back as `true`.
    attrs[k] = typeof v === 'string' ? v : '';
  }
  return attrs;
}

function tagOf(node: XmlRecord): string | null {
  for (const k of Object.keys(node)) {
    if (k !== ':@' && k !== '#text') return k;
  }
  return null;
}

/** Fold an ordered node list into (leading text, child elements with tails). */
function foldNodes(nodes: unknown[]): { text: string; children: ContentElement[] } {
  let text = '';
  const children: ContentElement[] = [];

  for (const node of nodes) {
    if (!isRecord(node)) continue;

    if ('#text' in node) {
      const s = String(node['#text'] ?? '');
      const last = children[children.length - 1];
      if (last) last.tail = (last.tail ?? '') + s;
      else text += s;
      continue;
    }

    const tag = tagOf(node);
    if (!tag || tag.startsWith('?')) continue;

    const inner = node[tag];
    const folded = foldNodes(Array.isArray(inner) ? inner : []);
    const el: ContentElement = { tag, attrs: readAttrs(node), children: folded.children };
    if (folded.text) el.text = folded.text;
    children.push(el);
  }

  return { text, children };
}

export function parseContent(enml: string): ContentElement {
  const src = enml.trim();
  const valid = XMLValidator.validate(src, { allowBooleanAttributes: true });
  if (valid !== true) {
    throw new Error(`malformed content markup at line ${valid.err.line}: ${valid.err.msg}`);
  }

  const parsed: unknown = contentParser.parse(src);
  const { children } = foldNodes(Array.isArray(parsed) ? parsed : []);
  const root = children[0];
  if (!root) throw new Error('content has no root element');
  // Text after the root's end tag is outside the document.
  delete root.tail;
  return root;
}

// =============================================================================
// Envelope -> Note
// =============================================================================

export function noteKey(corpusRoot: string, archivePath: string): string {
  const rel = path.relative(corpusRoot, archivePath);
  const noExt = rel.endsWith(ARCHIVE_EXT) ? rel.slice(0, -ARCHIVE_EXT.length) : rel;
  return noExt.split(path.sep).join('/');
}

export function parseArchiveXml(xml: string, archivePath: string, corpusRoot: string): Note {
  let doc: unknown;
  try {
    doc = envelopeParser.parse(xml, true);
  } catch (err) {
    throw new ArchiveParseError(`malformed archive: ${errorMessage(err)}`, archivePath, err);
  }

  const exportEl = isRecord(doc) ? doc['en-export'] : undefined;
  const notes = isRecord(exportEl) ? exportEl.note : undefined;
  if (!Array.isArray(notes) || notes.length !== 1) {
    const n = Array.isArray(notes) ? notes.length : 0;
    throw new ArchiveParseError(`expected exactly one <note>, found ${n}`, archivePath);
  }

  const fields = ArchivedNoteSchema.safeParse(notes[0]);
  if (!fields.success) {
    const missing = fields.error.issues.map((i) => i.path.join('.')).join(', ');
    throw new ArchiveParseError(`missing or invalid required field(s): ${missing}`, archivePath, fields.error);
  }

  let content: ContentElement;
  try {
    content = parseContent(fields.data.content);
  } catch (err) {
    throw new ArchiveParseError(`bad <content>: ${errorMessage(err)}`, archivePath, err);
  }

  return {
    key: noteKey(corpusRoot, archivePath),
    archivePath,
    title: fields.data.title,
    created: fields.data.created,
    attributes: fields.data['note-attributes'],
    content,
  };
}

export function parseArchive(archivePath: string, corpusRoot: string): Note {
  let xml: string;
  try {
    xml = fs.readFileSync(archivePath, 'utf8');
  } catch (err) {
    throw new ArchiveParseError(`unreadable archive: ${errorMessage(err)}`, archivePath, err);
  }
  return parseArchiveXml(xml, archivePath, corpusRoot);
}
