import type { Pool } from 'pg';
import type { Pool as MysqlPool, ResultSetHeader, RowDataPacket } from 'mysql2/promise';
import type { SyncRunRecord } from '../types.js';

export interface SyncRunStore {
  record(run: SyncRunRecord): Promise<void>;
  latest(limit: number): Promise<SyncRunRecord[]>;
}

export class InMemorySyncRunStore implements SyncRunStore {
  readonly runs: SyncRunRecord[] = [];

  async record(run: SyncRunRecord): Promise<void> {
    this.runs.push(run);
  }

  async latest(limit: number): Promise<SyncRunRecord[]> {
    return [...this.runs].sort((a, b) => b.startedAt.getTime() - a.startedAt.getTime()).slice(0, limit);
  }
}

interface SyncRunRow {
  id: string;
  started_at: Date;
  finished_at: Date;
  status: SyncRunRecord['status'];
  epithets_status: SyncRunRecord['epithets'];
  etymologies_status: SyncRunRecord['etymologies'];
  error: string | null;
}

function fromRow(row: SyncRunRow): SyncRunRecord {
  return {
    id: row.id,
    startedAt: new Date(row.started_at),
    finishedAt: new Date(row.finished_at),
    status: row.status,
    epithets: row.epithets_status,
    etymologies: row.etymologies_status,
    error: row.error
  };
}

export class MysqlSyncRunStore implements SyncRunStore {
  constructor(private readonly pool: MysqlPool) {}

  async record(run: SyncRunRecord): Promise<void> {
    await this.pool.query<ResultSetHeader>(
      `
      INSERT INTO sync_runs(id, started_at, finished_at, status, epithets_status, etymologies_status, error)
      VALUES (?, ?, ?, ?, ?, ?, ?)
      `,
      [run.id, run.startedAt, run.finishedAt, run.status, run.epithets, run.etymologies, run.error]
    );
  }

  async latest(limit: number): Promise<SyncRunRecord[]> {
    const [rows] = await this.pool.query<(SyncRunRow & RowDataPacket)[]>(
      'SELECT * FROM sync_runs ORDER BY started_at DESC LIMIT ?',
      [limit]
    );
    return rows.map(fromRow);
  }
}

export class PostgresSyncRunStore implements SyncRunStore {
  constructor(private readonly pool: Pool) {}

  async record(run: SyncRunRecord): Promise<void> {
    await this.pool.query(
      `
      INSERT INTO sync_runs(id, started_at, finished_at, status, epithets_status, etymologies_status, error)
      VALUES ($1, $2, $3, $4, $5, $6, $7)
      `,
      [run.id, run.startedAt, run.finishedAt, run.status, run.epithets, run.etymologies, run.error]
    );
  }

  async latest(limit: number): Promise<SyncRunRecord[]> {
    const res = await this.pool.query<SyncRunRow>('SELECT * FROM sync_runs ORDER BY started_at DESC LIMIT $1', [limit]);
    return res.rows.map(fromRow);
  }
}
