// src/db/pool.ts
// What: Postgres connection pool for the pgvector store.
// How: Builds a small pg Pool from DATABASE_URL. The store depends only on the SqlPool shape below,
//      so tests can hand it an in-process fake.

import { Pool } from 'pg';

export interface SqlResult {
  rows: unknown[];
  rowCount: number | null;
}

export interface SqlRunner {
  query(text: string, params?: unknown[]): Promise<SqlResult>;
}

export interface SqlClient extends SqlRunner {
  release(): void;
}

export interface SqlPool extends SqlRunner {
  connect(): Promise<SqlClient>;
  end(): Promise<void>;
}

export function createPool(connectionString: string): SqlPool {
  return new Pool({
    connectionString,
    max: 5,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
  });
}

/** DATABASE_URL without its password, for logs and stats. */
export function redactConnectionString(connectionString: string): string {
  try {
    const u = new URL(connectionString);
    if (u.password) u.password = '***';
    return u.toString();
  } catch {
    return 'postgres://<unparseable>';
  }
}
