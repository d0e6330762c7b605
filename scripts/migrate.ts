import { loadConfig } from '../src/config.js';
import { createSql } from '../src/db/pool.js';
import { runMigrations } from '../migrations/runner.js';

const config = loadConfig();
const sql = createSql(config.databaseUrl);

try {
  await runMigrations(sql);
} finally {
  await sql.end();
}
