// scripts/run-migrations.ts
// What: Migration runner for the pgvector store (VECTOR_STORE=pgvector).
// How: Loads .env, discovers *.sql files in src/db/migrations, sorts by filename, and executes each file's SQL
//      on a single connection. Each migration carries its own BEGIN/COMMIT and IF NOT EXISTS guards.

import 'dotenv/config';
import { promises as fs } from 'fs';
import path from 'path';
import { createPool, redactConnectionString } from '../src/db/pool.js';
import { moduleLogger } from '../src/logging.js';

const log = moduleLogger('migrate');

const PG_ERROR_FIELDS = ['code', 'severity', 'detail', 'hint', 'routine'] as const;

function pgErrorFields(err: unknown): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  if (typeof err !== 'object' || err === null) return out;
  for (const key of PG_ERROR_FIELDS) {
    if (key in err) out[key] = Reflect.get(err, key);
  }
  return out;
}

async function main(): Promise<void> {
  const migrationsDir = path.resolve(process.cwd(), 'src/db/migrations');
  const entries = await fs.readdir(migrationsDir, { withFileTypes: true });
  const files = entries
    .filter((e) => e.isFile() && e.name.endsWith('.sql'))
    .map((e) => e.name)
    .sort((a, b) => a.localeCompare(b));

  if (files.length === 0) {
    log.info({ migrationsDir }, 'No migrations found');
    return;
  }

  const connStr = process.env.DATABASE_URL;
  if (!connStr) {
    log.error('DATABASE_URL is not set');
    process.exitCode = 1;
    return;
  }

  log.info({ target: redactConnectionString(connStr) }, 'Effective DATABASE_URL target');

  const pool = createPool(connStr);
  try {
    const client = await pool.connect();
    log.info('Connected to database');
    try {
      for (const file of files) {
        const sql = await fs.readFile(path.join(migrationsDir, file), 'utf8');
        log.info({ file }, 'Applying migration');
        await client.query(sql);
        log.info({ file }, 'Applied migration');
      }
    } finally {
      client.release();
    }
  } finally {
    await pool.end();
  }

  log.info('Migrations complete');
}

main().catch((err: unknown) => {
  log.error({ err, ...pgErrorFields(err) }, 'Migration failed');
  process.exitCode = 1;
});
