import * as fs from 'fs';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { fileURLToPath } from 'url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const REPO_ROOT = path.resolve(__dirname, '..', '..');

export interface LoadEnvOptions {
  /** Explicit file (`--env-file`); wins over ENV_FILE and the defaults */
  envFile?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface LoadedEnv {
  path: string;
  /** Keys taken from the file (already-set variables are never replaced) */
  applied: string[];
}

export function envFileCandidates(opts: LoadEnvOptions = {}): string[] {
  const env = opts.env ?? process.env;
  const cwd = opts.cwd ?? process.cwd();
  const candidates = [
    String(opts.envFile || '').trim() || null,
    String(env.ENV_FILE || '').trim() || null,
    path.resolve(cwd, '.env.local'),
    path.resolve(cwd, '.env'),
    path.resolve(REPO_ROOT, '.env.local'),
    path.resolve(REPO_ROOT, '.env'),
  ].filter((x): x is string => !!x);
  return Array.from(new Set(candidates));
}

/**
 * Load the first env file found into `env` (process.env by default).
 * Returns null when there is none.
 */
export function loadEnv(opts: LoadEnvOptions = {}): LoadedEnv | null {
  const env = opts.env ?? process.env;

  for (const p of envFileCandidates(opts)) {
    if (!fs.existsSync(p)) continue;
    const parsed = dotenv.parse(fs.readFileSync(p));
    const applied: string[] = [];
    for (const [key, value] of Object.entries(parsed)) {
      if (env[key] !== undefined) continue;
      env[key] = value;
      applied.push(key);
    }
    return { path: p, applied };
  }
  return null;
}
