import pg from 'pg';
import type { Pool as PgPool } from 'pg';

const { Pool } = pg;

export interface PostgresPoolOptions {
  url: string;
  sslRejectUnauthorized: boolean;
}

export function pgConfigFromUrl(opts: PostgresPoolOptions) {
  const url = new URL(opts.url);
  const database = url.pathname.replace(/^\//, '');
  const sslMode = url.searchParams.get('sslmode');

  return {
    host: url.hostname,
    port: url.port ? Number(url.port) : 5432,
    user: decodeURIComponent(url.username),
    password: decodeURIComponent(url.password),
    database,
    ssl: sslMode
      ? {
          rejectUnauthorized: opts.sslRejectUnauthorized
        }
      : undefined
  };
}

export function createPostgresPool(opts: PostgresPoolOptions): PgPool {
  return new Pool({
    ...pgConfigFromUrl(opts),
    max: 2
  });
}
