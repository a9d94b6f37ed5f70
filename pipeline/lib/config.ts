/**
 * Run configuration: CLI overrides > environment (.env via loadEnv) > XDG defaults.
 */

import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';

import { OUTPUT_FORMATS, parseFormat } from '../schema/formats';
import { DEFAULT_STACK_SUFFIX } from '../import/load-corpus';

export const APP_DIR_NAME = 'notes-export';

export const ConvertConfigSchema = z.object({
  sourceDir: z.string().min(1),
  outDir: z.string().min(1),
  cacheDir: z.string().min(1),
  dbPath: z.string().min(1),
  format: z.enum(OUTPUT_FORMATS),
  checkboxStyle: z.enum(['marker', 'input']),
  stackSuffix: z.string(),
  sync: z.boolean(),
});
export type ConvertConfig = z.infer<typeof ConvertConfigSchema>;

export interface ConfigOverrides {
  sourceDir: string;
  outDir: string;
  format?: string | null;
  dbPath?: string | null;
  cacheDir?: string | null;
  checkboxStyle?: string | null;
  stackSuffix?: string | null;
  sync?: boolean;
}

export function optionalEnv(env: NodeJS.ProcessEnv, name: string, fallback: string): string {
  const v = env[name];
  if (!v || typeof v !== 'string' || !v.trim()) return fallback;
  return v.trim();
}

export function xdgCacheHome(env: NodeJS.ProcessEnv = process.env): string {
  return optionalEnv(env, 'XDG_CACHE_HOME', path.join(os.homedir(), '.cache'));
}

function pick(...values: Array<string | null | undefined>): string | undefined {
  for (const v of values) {
    if (v != null && String(v).trim()) return String(v).trim();
  }
  return undefined;
}

export function resolveConfig(overrides: ConfigOverrides, env: NodeJS.ProcessEnv = process.env): ConvertConfig {
  // Unsupported format is reported before anything else is looked at.
  const format = parseFormat(pick(overrides.format, env.NOTES_EXPORT_FORMAT));

  const cacheDir = path.resolve(
    pick(overrides.cacheDir, env.NOTES_EXPORT_CACHE_DIR) ?? path.join(xdgCacheHome(env), APP_DIR_NAME)
  );
  const dbPath = pick(overrides.dbPath, env.NOTES_EXPORT_DB) ?? path.join(cacheDir, 'crosslinks.sqlite');

  return ConvertConfigSchema.parse({
    sourceDir: path.resolve(overrides.sourceDir),
    outDir: path.resolve(overrides.outDir),
    cacheDir,
    dbPath,
    format,
    checkboxStyle: pick(overrides.checkboxStyle, env.NOTES_EXPORT_CHECKBOX) ?? 'marker',
    stackSuffix: overrides.stackSuffix ?? env.NOTES_EXPORT_STACK_SUFFIX ?? DEFAULT_STACK_SUFFIX,
    sync: overrides.sync ?? true,
  });
}
