/**
 * Note / Notebook entity model
 *
 * A Note is created once by the corpus loader and only its `content` tree is mutated
 * afterwards (by the tag remapping pass during rendering).
 */

import { z } from 'zod';

import type { ContentElement } from './content-tree';

// =============================================================================
// Archive contract
// =============================================================================

/**
 * The four fields every archived note must carry. `note-attributes` is presence-only:
 * an empty element parses to "" and a populated one to an object.
 */
export const ArchivedNoteSchema = z.object({
  title: z.string(),
  content: z.string(),
  created: z.string(),
  'note-attributes': z.union([z.string(), z.record(z.unknown())]),
});
export type ArchivedNote = z.infer<typeof ArchivedNoteSchema>;

// =============================================================================
// Entities
// =============================================================================

export interface Note {
  /** Corpus-relative archive path without extension, `/`-separated. Unique within the corpus. */
  key: string;
  /** Absolute path of the source archive */
  archivePath: string;
  title: string;
  /** Raw creation timestamp as exported (e.g. "20240115T100000Z") */
  created: string;
  attributes: string | Record<string, unknown>;
  content: ContentElement;
}

export interface Notebook {
  /** Corpus-relative directory, `/`-separated */
  key: string;
  /** Absolute directory path */
  dir: string;
  notes: Note[];
}

export const ARCHIVE_EXT = '.enex';
