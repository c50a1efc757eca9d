import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { schemaSQL } from './schema.js';

export const IN_MEMORY = ':memory:';

// Opens (and creates, if needed) the storefront database with its schema applied.
export function openDatabase(path: string): Database.Database {
  if (path !== IN_MEMORY) {
    mkdirSync(dirname(path), { recursive: true });
  }

  const db = new Database(path);
  if (path !== IN_MEMORY) {
    db.pragma('journal_mode = WAL');
  }
  // SQLite ships with FK enforcement off
  db.pragma('foreign_keys = ON');
  db.exec(schemaSQL);

  return db;
}

export function isConstraintError(err: unknown, kind: 'UNIQUE' | 'FOREIGNKEY'): boolean {
  return (
    err instanceof Error &&
    'code' in err &&
    err.code === `SQLITE_CONSTRAINT_${kind}`
  );
}
