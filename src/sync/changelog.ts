import type { DiffStat } from '../git/gitClient.js';

export interface ChangelogEntry {
  /** Where the new content came from: an upstream ref or the generator command */
  source: string;
  syncedAt: Date;
  diff: DiffStat;
}

export function formatDiffSummary(diff: DiffStat): string {
  const lines = `+${diff.added} -${diff.removed} lines`;
  return diff.binary ? `${lines} (binary)` : lines;
}

/**
 * Commit body appended under the fixed subject line, in git trailer form so
 * `git log --format=%(trailers)` can read it back.
 */
export function formatChangelog(entry: ChangelogEntry): string {
  return [
    `Source: ${entry.source}`,
    `Synced-At: ${entry.syncedAt.toISOString()}`,
    `Diff: ${formatDiffSummary(entry.diff)}`
  ].join('\n');
}
