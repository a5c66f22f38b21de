import type { DiffStat } from './git/gitClient.js';

export type SyncTarget = 'epithets' | 'etymologies';
export type SyncStatus = 'unchanged' | 'pushed';
export type RunStatus = 'success' | 'failed';

export interface SyncOutcome {
  target: SyncTarget;
  path: string;
  status: SyncStatus;
  /** Set when a commit was made */
  commitSha?: string;
  diff?: DiffStat;
}

export interface SyncRunResult {
  epithets: SyncOutcome | null;
  etymologies: SyncOutcome | null;
}

export interface SyncRunRecord {
  id: string;
  startedAt: Date;
  finishedAt: Date;
  status: RunStatus;
  epithets: SyncStatus | null;
  etymologies: SyncStatus | null;
  error: string | null;
}
