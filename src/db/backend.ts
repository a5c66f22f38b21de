import type { Env } from '../config/env.js';
import { InMemoryBranchLease, MysqlBranchLease, PostgresBranchLease, type BranchLease } from '../lock/branchLease.js';
import { InMemorySyncRunStore, MysqlSyncRunStore, PostgresSyncRunStore, type SyncRunStore } from '../runs/syncRunStore.js';
import { createMysqlPool } from './mysqlPool.js';
import { createPostgresPool } from './postgresPool.js';

/** Lease + run history over whichever database LOCK_BACKEND names. */
export interface SyncBackend {
  kind: Env['LOCK_BACKEND'];
  lease: BranchLease;
  runs: SyncRunStore;
  ping(): Promise<void>;
  close(): Promise<void>;
}

function requireUrl(value: string | undefined, key: string): string {
  if (!value) throw new Error(`${key} is required for this LOCK_BACKEND`);
  return value;
}

export function createBackend(env: Env): SyncBackend {
  if (env.LOCK_BACKEND === 'mysql') {
    const pool = createMysqlPool({
      url: requireUrl(env.MYSQL_URL, 'MYSQL_URL'),
      ssl: env.MYSQL_SSL,
      sslRejectUnauthorized: env.MYSQL_SSL_REJECT_UNAUTHORIZED
    });
    return {
      kind: 'mysql',
      lease: new MysqlBranchLease(pool),
      runs: new MysqlSyncRunStore(pool),
      ping: async () => {
        await pool.query('SELECT 1');
      },
      close: () => pool.end()
    };
  }

  if (env.LOCK_BACKEND === 'postgres') {
    const pool = createPostgresPool({
      url: requireUrl(env.POSTGRES_URL, 'POSTGRES_URL'),
      sslRejectUnauthorized: env.POSTGRES_SSL_REJECT_UNAUTHORIZED
    });
    return {
      kind: 'postgres',
      lease: new PostgresBranchLease(pool),
      runs: new PostgresSyncRunStore(pool),
      ping: async () => {
        await pool.query('SELECT 1');
      },
      close: () => pool.end()
    };
  }

  return {
    kind: 'memory',
    lease: new InMemoryBranchLease(),
    runs: new InMemorySyncRunStore(),
    ping: async () => {},
    close: async () => {}
  };
}
