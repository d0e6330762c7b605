import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Sql } from '../src/db/pool.js';
import { logger } from '../src/utils/logger.js';

const MIGRATIONS_DIR = path.dirname(fileURLToPath(import.meta.url));

/** SQL files in this directory, in the order they are applied. */
export function listMigrationFiles(dir: string = MIGRATIONS_DIR): string[] {
  return fs
    .readdirSync(dir)
    .filter((f) => f.endsWith('.sql'))
    .sort();
}

/** Applies every migration not yet recorded in `_migrations`, each in its own transaction. */
export async function runMigrations(sql: Sql): Promise<number> {
  await sql`
    CREATE TABLE IF NOT EXISTS _migrations (
      id SERIAL PRIMARY KEY,
      name TEXT NOT NULL UNIQUE,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `;

  const applied = await sql<{ name: string }[]>`SELECT name FROM _migrations ORDER BY id`;
  const appliedSet = new Set(applied.map((r) => r.name));
  let count = 0;

  for (const file of listMigrationFiles()) {
    if (appliedSet.has(file)) {
      logger.debug({ file }, 'Migration already applied');
      continue;
    }
    const content = fs.readFileSync(path.join(MIGRATIONS_DIR, file), 'utf-8');
    logger.info({ file }, 'Applying migration');
    await sql.begin(async (tx) => {
      await tx.unsafe(content);
      await tx.unsafe('INSERT INTO _migrations (name) VALUES ($1)', [file]);
    });
    count++;
  }

  logger.info({ applied: count }, 'Migrations up to date');
  return count;
}
