import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Database } from './db.js';

// migrations/ sits beside src/ and dist/
export const MIGRATIONS_DIR = fileURLToPath(new URL('../migrations', import.meta.url));

const LEDGER = `
  CREATE SCHEMA IF NOT EXISTS crawler;
  CREATE TABLE IF NOT EXISTS crawler.migrations (
    filename TEXT PRIMARY KEY,
    applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
  );
`;

/** Applies each not-yet-recorded migrations/*.sql file in name order, one transaction per file. */
export async function migrate(db: Database, dir: string = MIGRATIONS_DIR): Promise<string[]> {
  await db.exec(LEDGER);
  const done = await db.query<{ filename: string }>('SELECT filename FROM crawler.migrations');
  const seen = new Set(done.rows.map((r) => r.filename));

  const todo = fs
    .readdirSync(dir)
    .filter((f) => f.endsWith('.sql') && !seen.has(f))
    .sort();
  for (const file of todo) {
    const script = fs.readFileSync(path.join(dir, file), 'utf-8');
    await db.transaction(async (tx) => {
      await tx.exec(script);
      await tx.query('INSERT INTO crawler.migrations (filename) VALUES ($1)', [file]);
    });
    console.log(`[migrate] applied ${file}`);
  }
  return todo;
}
