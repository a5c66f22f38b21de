import type { Pool } from 'pg';
import type { Pool as MysqlPool, ResultSetHeader, RowDataPacket } from 'mysql2/promise';
import { LeaseUnavailableError } from '../errors.js';
import { withRetry } from '../utils/retry.js';
import type { Logger } from '../utils/log.js';

/**
 * Exclusive, expiring claim on a branch so that two runs (a scheduled one
 * and a manual one, or two hosts) never fetch-commit-push concurrently.
 * An expired lease may be taken over by anyone.
 */
export interface BranchLease {
  acquire(key: string, holder: string, ttlSeconds: number): Promise<boolean>;
  release(key: string, holder: string): Promise<void>;
}

export class InMemoryBranchLease implements BranchLease {
  private readonly leases = new Map<string, { holder: string; expiresAt: number }>();

  constructor(private readonly now: () => number = Date.now) {}

  async acquire(key: string, holder: string, ttlSeconds: number): Promise<boolean> {
    const current = this.leases.get(key);
    const now = this.now();
    if (current && current.holder !== holder && current.expiresAt > now) return false;
    this.leases.set(key, { holder, expiresAt: now + ttlSeconds * 1000 });
    return true;
  }

  async release(key: string, holder: string): Promise<void> {
    if (this.leases.get(key)?.holder === holder) this.leases.delete(key);
  }
}

interface LeaseRow extends RowDataPacket {
  holder: string;
}

export class MysqlBranchLease implements BranchLease {
  constructor(private readonly pool: MysqlPool) {}

  async acquire(key: string, holder: string, ttlSeconds: number): Promise<boolean> {
    // Take the row over only when it is ours already or has expired
    await this.pool.query<ResultSetHeader>(
      `
      INSERT INTO sync_leases(lease_key, holder, expires_at)
      VALUES (?, ?, DATE_ADD(NOW(), INTERVAL ? SECOND))
      ON DUPLICATE KEY UPDATE
        holder = IF(expires_at < NOW() OR holder = VALUES(holder), VALUES(holder), holder),
        expires_at = IF(holder = VALUES(holder), VALUES(expires_at), expires_at)
      `,
      [key, holder, ttlSeconds]
    );

    const [rows] = await this.pool.query<LeaseRow[]>('SELECT holder FROM sync_leases WHERE lease_key = ?', [key]);
    return rows[0]?.holder === holder;
  }

  async release(key: string, holder: string): Promise<void> {
    await this.pool.query<ResultSetHeader>('DELETE FROM sync_leases WHERE lease_key = ? AND holder = ?', [key, holder]);
  }
}

export class PostgresBranchLease implements BranchLease {
  constructor(private readonly pool: Pool) {}

  async acquire(key: string, holder: string, ttlSeconds: number): Promise<boolean> {
    const res = await this.pool.query<{ holder: string }>(
      `
      INSERT INTO sync_leases(lease_key, holder, expires_at)
      VALUES ($1, $2, now() + make_interval(secs => $3))
      ON CONFLICT (lease_key) DO UPDATE
        SET holder = EXCLUDED.holder, expires_at = EXCLUDED.expires_at
        WHERE sync_leases.expires_at < now() OR sync_leases.holder = EXCLUDED.holder
      RETURNING holder
      `,
      [key, holder, ttlSeconds]
    );
    return res.rows[0]?.holder === holder;
  }

  async release(key: string, holder: string): Promise<void> {
    await this.pool.query('DELETE FROM sync_leases WHERE lease_key = $1 AND holder = $2', [key, holder]);
  }
}

export interface LeaseOptions {
  key: string;
  holder: string;
  ttlSeconds: number;
  waitRetries: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  logger?: Logger;
}

/**
 * Run `fn` while holding the lease; released on every exit path. A failed
 * release after `fn` threw is logged, and `fn`'s error is rethrown.
 * Waits for a busy lease with backoff, then gives up with LeaseUnavailableError.
 */
export async function withBranchLease<T>(lease: BranchLease, opts: LeaseOptions, fn: () => Promise<T>): Promise<T> {
  await withRetry(
    async () => {
      const ok = await lease.acquire(opts.key, opts.holder, opts.ttlSeconds);
      if (!ok) throw new LeaseUnavailableError(opts.key);
    },
    {
      retries: opts.waitRetries,
      baseDelayMs: opts.baseDelayMs ?? 5_000,
      maxDelayMs: opts.maxDelayMs ?? 60_000,
      shouldRetry: (err) => err instanceof LeaseUnavailableError,
      onRetry: (_err, attempt, delayMs) =>
        opts.logger?.warn(`⏳ Lease '${opts.key}' busy, retry ${attempt}/${opts.waitRetries} in ${Math.round(delayMs / 1000)}s`)
    }
  );
  opts.logger?.info(`🔒 Lease '${opts.key}' acquired`);

  let result: T;
  try {
    result = await fn();
  } catch (err) {
    // The body's error is the one the caller must see
    await lease.release(opts.key, opts.holder).then(
      () => opts.logger?.info(`🔓 Lease '${opts.key}' released`),
      (releaseErr: unknown) => opts.logger?.error(`Failed to release lease '${opts.key}':`, releaseErr)
    );
    throw err;
  }

  await lease.release(opts.key, opts.holder);
  opts.logger?.info(`🔓 Lease '${opts.key}' released`);
  return result;
}
