#!/usr/bin/env npx tsx
/**
 * Convert an exported notebook tree (.enex per note) into HTML or plain text,
 * with internal note links rewritten to relative paths and an index per notebook.
 *
 * Usage:
 *   npx tsx pipeline/scripts/convert.ts <sourceDir> --out <outDir>
 *     [--format html|text] [--db <store.sqlite>] [--cache <dir>] [--checkbox marker|input]
 *     [--stack-suffix .stack] [--env-file <path>] [--no-sync] [--refresh-parents]
 *
 * Exit status: 0 ok (even if some notes were skipped), 1 fatal run error, 2 usage/config error.
 */

import * as path from 'path';
import { pathToFileURL } from 'url';

import { loadEnv } from '../lib/load-env';
import { resolveConfig, type ConvertConfig } from '../lib/config';
import { StoreOpenError, UnsupportedFormatError, errorMessage } from '../lib/errors';
import { convertCorpus, type ConvertDeps } from '../export/convert-corpus';

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_USAGE = 2;

const USAGE =
  'Usage: npx tsx pipeline/scripts/convert.ts <sourceDir> --out <outDir> ' +
  '[--format html|text] [--db <path>] [--cache <dir>] [--checkbox marker|input] [--stack-suffix <suffix>] [--env-file <path>] [--no-sync] [--refresh-parents]';

function getArg(argv: string[], flag: string): string | null {
  const idx = argv.indexOf(flag);
  if (idx === -1) return null;
  const v = argv[idx + 1];
  if (!v || v.startsWith('--')) return null;
  return v;
}

function hasFlag(argv: string[], flag: string): boolean {
  return argv.includes(flag);
}

function fail(msg: string, code: number): number {
  console.error(`❌ ${msg}`);
  return code;
}

/** Run the CLI on `argv` (arguments after the script path); returns the exit status. */
export function run(argv: string[], deps: Omit<ConvertDeps, 'refreshParents'> = {}): number {
  if (hasFlag(argv, '--help') || hasFlag(argv, '-h')) {
    console.log(USAGE);
    return EXIT_OK;
  }

  const positional = argv[0];
  const sourceDir = getArg(argv, '--source') ?? (positional && !positional.startsWith('--') ? positional : null);
  const outDir = getArg(argv, '--out');
  if (!sourceDir || !outDir) return fail(USAGE, EXIT_USAGE);

  const loaded = loadEnv({ envFile: getArg(argv, '--env-file') ?? undefined });
  if (loaded) console.log(`[convert] env: ${loaded.path} (${loaded.applied.length} variable(s) applied)`);

  let config: ConvertConfig;
  try {
    config = resolveConfig({
      sourceDir,
      outDir,
      format: getArg(argv, '--format'),
      dbPath: getArg(argv, '--db'),
      cacheDir: getArg(argv, '--cache'),
      checkboxStyle: getArg(argv, '--checkbox'),
      stackSuffix: getArg(argv, '--stack-suffix'),
      sync: !hasFlag(argv, '--no-sync'),
    });
  } catch (err) {
    if (err instanceof UnsupportedFormatError) return fail(err.message, EXIT_USAGE);
    return fail(`Invalid configuration: ${errorMessage(err)}`, EXIT_USAGE);
  }

  try {
    convertCorpus(config, { ...deps, refreshParents: hasFlag(argv, '--refresh-parents') });
  } catch (err) {
    if (err instanceof StoreOpenError) return fail(`Crosslink store unavailable: ${err.message}`, EXIT_FATAL);
    return fail(errorMessage(err), EXIT_FATAL);
  }
  return EXIT_OK;
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(path.resolve(entry)).href) {
  process.exitCode = run(process.argv.slice(2));
}
