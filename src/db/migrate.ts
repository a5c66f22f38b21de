import fs from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Pool } from 'pg';
import type { Pool as MysqlPool, RowDataPacket } from 'mysql2/promise';
import { getEnv } from '../config/env.js';
import { createMysqlPool } from './mysqlPool.js';
import { createPostgresPool } from './postgresPool.js';

type Migrator =
  | { engine: 'postgres'; pool: Pool }
  | { engine: 'mysql'; pool: MysqlPool };

async function ensureMigrationsTable(m: Migrator) {
  if (m.engine === 'postgres') {
    await m.pool.query(`
      CREATE TABLE IF NOT EXISTS schema_migrations_pg (
        id TEXT PRIMARY KEY,
        applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
      );
    `);
    return;
  }

  await m.pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations_mysql (
      id VARCHAR(255) PRIMARY KEY,
      applied_at TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP
    )
  `);
}

async function getAppliedIds(m: Migrator): Promise<Set<string>> {
  if (m.engine === 'postgres') {
    const res = await m.pool.query<{ id: string }>('SELECT id FROM schema_migrations_pg');
    return new Set(res.rows.map((r) => r.id));
  }

  const [rows] = await m.pool.query<({ id: string } & RowDataPacket)[]>('SELECT id FROM schema_migrations_mysql');
  return new Set(rows.map((r) => String(r.id)));
}

async function applyMigration(m: Migrator, id: string, sql: string) {
  if (m.engine === 'postgres') {
    const client = await m.pool.connect();
    try {
      await client.query('BEGIN');
      await client.query(sql);
      await client.query('INSERT INTO schema_migrations_pg(id) VALUES ($1)', [id]);
      await client.query('COMMIT');
      // eslint-disable-next-line no-console
      console.log(`Applied postgres migration ${id}`);
    } catch (e) {
      await client.query('ROLLBACK');
      throw e;
    } finally {
      client.release();
    }
    return;
  }

  const conn = await m.pool.getConnection();
  try {
    await conn.beginTransaction();
    // One statement per query; the pool does not enable multipleStatements
    for (const stmt of sql
      .split(/;\s*\n/)
      .map((s) => s.trim())
      .filter(Boolean)) {
      await conn.query(stmt);
    }
    await conn.query('INSERT INTO schema_migrations_mysql(id) VALUES (?)', [id]);
    await conn.commit();
    // eslint-disable-next-line no-console
    console.log(`Applied mysql migration ${id}`);
  } catch (e) {
    await conn.rollback();
    throw e;
  } finally {
    conn.release();
  }
}

async function runMigrations(m: Migrator) {
  await ensureMigrationsTable(m);

  const __filename = fileURLToPath(import.meta.url);
  const __dirname = path.dirname(__filename);
  const migrationsDir = path.resolve(__dirname, `../../migrations/${m.engine}`);

  const files = (await fs.readdir(migrationsDir))
    .filter((f) => f.endsWith('.sql'))
    .sort();

  const applied = await getAppliedIds(m);

  for (const file of files) {
    if (applied.has(file)) continue;
    const sql = await fs.readFile(path.join(migrationsDir, file), 'utf8');
    await applyMigration(m, file, sql);
  }
}

function migratorFromEnv(): Migrator | null {
  const env = getEnv();
  if (env.LOCK_BACKEND === 'mysql' && env.MYSQL_URL) {
    return {
      engine: 'mysql',
      pool: createMysqlPool({ url: env.MYSQL_URL, ssl: env.MYSQL_SSL, sslRejectUnauthorized: env.MYSQL_SSL_REJECT_UNAUTHORIZED })
    };
  }
  if (env.LOCK_BACKEND === 'postgres' && env.POSTGRES_URL) {
    return {
      engine: 'postgres',
      pool: createPostgresPool({ url: env.POSTGRES_URL, sslRejectUnauthorized: env.POSTGRES_SSL_REJECT_UNAUTHORIZED })
    };
  }
  return null;
}

async function main() {
  const m = migratorFromEnv();
  if (!m) {
    // eslint-disable-next-line no-console
    console.log('LOCK_BACKEND=memory: nothing to migrate');
    return;
  }

  try {
    await runMigrations(m);
  } finally {
    await m.pool.end();
  }
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
