/**
 * Corpus discovery.
 *
 * Layout:
 *   <root>/<Notebook>/<Note>.enex
 *   <root>/<Name>.stack/<Notebook>/<Note>.enex      (stacks flatten, at any depth)
 *
 * A note that fails to parse is logged and skipped; it never aborts its notebook or the corpus.
 */

import * as fs from 'fs';
import * as path from 'path';

import { ARCHIVE_EXT, type Note, type Notebook } from '../schema/note-schema';
import { errorMessage } from '../lib/errors';
import { parseArchive } from './parse-archive';

export const DEFAULT_STACK_SUFFIX = '.stack';

export interface LoadCorpusOptions {
  stackSuffix?: string;
}

export interface LoadCorpusResult {
  notebooks: Notebook[];
  skipped: Array<{ archivePath: string; reason: string }>;
}

function listDirs(dir: string): string[] {
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((d) => d.isDirectory())
    .map((d) => d.name)
    .sort();
}

function toKey(root: string, dir: string): string {
  return path.relative(root, dir).split(path.sep).join('/');
}

export function loadNotebook(dir: string, corpusRoot: string, skipped: LoadCorpusResult['skipped']): Notebook {
  const notes: Note[] = [];
  const files = fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((d) => d.isFile() && d.name.endsWith(ARCHIVE_EXT))
    .map((d) => d.name)
    .sort();

  for (const name of files) {
    const archivePath = path.join(dir, name);
    try {
      notes.push(parseArchive(archivePath, corpusRoot));
    } catch (err) {
      const reason = errorMessage(err);
      console.warn(`[corpus] ⚠️  skipping note: ${reason}`);
      skipped.push({ archivePath, reason });
    }
  }

  return { key: toKey(corpusRoot, dir), dir, notes };
}

export function loadCorpus(root: string, opts: LoadCorpusOptions = {}): LoadCorpusResult {
  const stackSuffix = opts.stackSuffix ?? DEFAULT_STACK_SUFFIX;
  const corpusRoot = path.resolve(root);
  const notebooks: Notebook[] = [];
  const skipped: LoadCorpusResult['skipped'] = [];

  const walk = (dir: string) => {
    for (const name of listDirs(dir)) {
      const abs = path.join(dir, name);
      if (stackSuffix && name.endsWith(stackSuffix)) {
        walk(abs);
        continue;
      }
      notebooks.push(loadNotebook(abs, corpusRoot, skipped));
    }
  };
  walk(corpusRoot);

  const noteCount = notebooks.reduce((n, nb) => n + nb.notes.length, 0);
  console.log(`[corpus] Loaded ${notebooks.length} notebook(s), ${noteCount} note(s), ${skipped.length} skipped`);
  return { notebooks, skipped };
}
