/**
 * Crosslink store: flat string -> string mapping, persisted in SQLite.
 *
 * Opened fresh on every run (table dropped and recreated) so nothing from a previous
 * conversion leaks into the current map. Key order is insertion order (rowid); updating
 * an existing key keeps its position.
 */

import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';

import { StoreOpenError, errorMessage } from '../lib/errors';

export interface CrosslinkStore {
  get(key: string): string | undefined;
  set(key: string, value: string): void;
  /** All keys, in insertion order */
  keys(): string[];
  /** Best-effort durable flush; may throw, callers treat failure as non-fatal */
  flush(): void;
  close(): void;
}

export const MEMORY_STORE = ':memory:';

export class SqliteCrosslinkStore implements CrosslinkStore {
  private readonly getStmt: Database.Statement<[string], { value: string }>;
  private readonly setStmt: Database.Statement<[string, string]>;
  private readonly keysStmt: Database.Statement<[], { key: string }>;

  private constructor(private readonly db: Database.Database) {
    this.getStmt = db.prepare<[string], { value: string }>('SELECT value FROM crosslinks WHERE key = ?');
    this.setStmt = db.prepare<[string, string]>(
      'INSERT INTO crosslinks (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value'
    );
    this.keysStmt = db.prepare<[], { key: string }>('SELECT key FROM crosslinks ORDER BY rowid');
  }

  static open(dbPath: string): SqliteCrosslinkStore {
    let db: Database.Database | null = null;
    try {
      if (dbPath !== MEMORY_STORE) {
        fs.mkdirSync(path.dirname(dbPath), { recursive: true });
      }
      db = new Database(dbPath);
      if (dbPath !== MEMORY_STORE) db.pragma('journal_mode = WAL');
      db.exec(`
        DROP TABLE IF EXISTS crosslinks;
        CREATE TABLE crosslinks (
          key TEXT PRIMARY KEY,
          value TEXT NOT NULL
        );
      `);
      return new SqliteCrosslinkStore(db);
    } catch (err) {
      db?.close();
      throw new StoreOpenError(`Cannot open crosslink store at ${dbPath}: ${errorMessage(err)}`, err);
    }
  }

  get(key: string): string | undefined {
    return this.getStmt.get(key)?.value;
  }

  set(key: string, value: string): void {
    this.setStmt.run(key, value);
  }

  keys(): string[] {
    return this.keysStmt.all().map((r) => r.key);
  }

  flush(): void {
    this.db.pragma('wal_checkpoint(TRUNCATE)');
  }

  close(): void {
    this.db.close();
  }
}
