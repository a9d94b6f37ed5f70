/**
 * Full conversion run.
 *
 * Order matters:
 *   1. stage source -> cache (optional mirror)
 *   2. load the whole corpus
 *   3. open the crosslink store and run both passes over EVERY note
 *   4. only then render notes (rules read the store) and write per-notebook indexes
 *
 * Store-open and staging failures end the run; a single note or index failing does not.
 */

import * as fs from 'fs';
import * as path from 'path';

import type { ConvertConfig } from '../lib/config';
import { errorMessage } from '../lib/errors';
import { FORMAT_EXT } from '../schema/formats';
import type { Note } from '../schema/note-schema';
import { loadCorpus } from '../import/load-corpus';
import { SqliteCrosslinkStore, type CrosslinkStore } from '../crosslinks/crosslink-store';
import { buildCrosslinks } from '../crosslinks/build-crosslinks';
import { fsDirectorySync, type DirectorySync } from '../sync/mirror-dir';
import { buildIndexEntries, indexKey, indexOutputPath, renderIndex } from './build-index';
import { renderNote } from './render-note';

export interface ConvertDeps {
  directorySync?: DirectorySync;
  openStore?: (dbPath: string) => CrosslinkStore;
  refreshParents?: boolean;
}

export interface ConvertSummary {
  notebooks: number;
  notes: number;
  written: number;
  /** Notes skipped at load time plus notes whose output failed */
  skipped: number;
  indexes: number;
}

export function corpusCacheDir(config: ConvertConfig): string {
  return path.join(config.cacheDir, 'corpus');
}

export function noteOutputPath(outDir: string, note: Note, ext: string): string {
  return path.join(outDir, ...note.key.split('/')) + ext;
}

function writeOutput(file: string, content: string): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, content, 'utf8');
}

export function convertCorpus(config: ConvertConfig, deps: ConvertDeps = {}): ConvertSummary {
  const directorySync = deps.directorySync ?? fsDirectorySync;
  const openStore = deps.openStore ?? ((p: string) => SqliteCrosslinkStore.open(p));
  const ext = FORMAT_EXT[config.format];

  let workDir = config.sourceDir;
  if (config.sync) {
    workDir = corpusCacheDir(config);
    if (!directorySync.mirror(config.sourceDir, workDir)) {
      throw new Error(`BLOCKED: could not stage ${config.sourceDir} into ${workDir}`);
    }
  }

  const { notebooks, skipped } = loadCorpus(workDir, { stackSuffix: config.stackSuffix });
  const summary: ConvertSummary = {
    notebooks: notebooks.length,
    notes: notebooks.reduce((n, nb) => n + nb.notes.length, 0),
    written: 0,
    skipped: skipped.length,
    indexes: 0,
  };

  const store = openStore(config.dbPath);
  try {
    buildCrosslinks(notebooks, store);

    for (const nb of notebooks) {
      const indexPath = indexOutputPath(config.outDir, nb, config.format);
      for (const note of nb.notes) {
        const outPath = noteOutputPath(config.outDir, note, ext);
        if (note.key === indexKey(nb)) {
          summary.skipped++;
          console.error(`[render] ❌ ${note.archivePath}: output ${outPath} is the notebook index; note skipped`);
          continue;
        }
        try {
          const out = renderNote(
            note,
            config.format,
            { store, noteKey: note.key, ext, checkboxStyle: config.checkboxStyle },
            { refreshParents: deps.refreshParents }
          );
          writeOutput(outPath, out);
          summary.written++;
        } catch (err) {
          summary.skipped++;
          console.error(`[render] ❌ ${note.archivePath}: ${errorMessage(err)}`);
        }
      }

      try {
        writeOutput(indexPath, renderIndex(buildIndexEntries(nb, config.format), config.format));
        summary.indexes++;
      } catch (err) {
        console.error(`[index] ❌ ${indexPath}: ${errorMessage(err)}`);
      }
    }
  } finally {
    store.close();
  }

  console.log(
    `[convert] ✅ ${summary.written}/${summary.notes} note(s) written as ${config.format}, ` +
      `${summary.indexes} index(es), ${summary.skipped} skipped`
  );
  return summary;
}
