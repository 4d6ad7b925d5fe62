import type { JournalStatus } from '@features/journal/journal-service.js';
import type { RecoveryReport } from '@features/recovery/path-recovery.js';
import type { MissingMediaStats } from '@features/recovery/missing-media.js';

const STATUS_LABELS: Record<JournalStatus['syncStatus'], string> = {
  unknown: 'not synced yet',
  syncing: 'syncing',
  synced: 'up to date',
  error: 'error',
  'no-account': 'no account',
};

/**
 * Format the journal's sync state as a short summary.
 */
export function formatSyncStatus(status: JournalStatus): string {
  const lines: string[] = [];

  lines.push(`Entries:   ${status.entries}`);
  lines.push(`Sync:      ${status.syncEnabled ? 'enabled' : 'disabled'}`);
  lines.push(`Mirror:    ${status.mirrorAvailable ? 'configured' : 'not configured'}`);
  lines.push(`Status:    ${STATUS_LABELS[status.syncStatus]}`);
  lines.push(`Last sync: ${status.lastSyncAt ?? 'never'}`);
  if (status.lastError) {
    lines.push(`Error:     ${status.lastError}`);
  }

  return lines.join('\n');
}

/**
 * Format a path recovery run: what moved and what is still missing.
 */
export function formatRecoveryReport(report: RecoveryReport): string {
  if (report.repaired.length === 0 && report.unresolved.length === 0) {
    return 'All media references resolve.';
  }

  const lines: string[] = [];
  if (report.repaired.length > 0) {
    lines.push(`Repaired ${report.repaired.length} reference(s):`);
    for (const repair of report.repaired) {
      lines.push(`  ${repair.fileName} -> ${repair.to}${repair.via === 'scan' ? ' (found by scan)' : ''}`);
    }
  }
  if (report.unresolved.length > 0) {
    if (lines.length > 0) lines.push('');
    lines.push(`Could not locate ${report.unresolved.length} file(s):`);
    for (const missing of report.unresolved) {
      lines.push(`  ${missing.fileName} (entry ${missing.entryId.slice(0, 8)}, ${missing.field})`);
    }
  }
  return lines.join('\n');
}

/**
 * Format missing media counts per kind.
 */
export function formatMissingMedia(stats: MissingMediaStats): string {
  const total = stats.audio + stats.video + stats.photos;
  if (total === 0) {
    return 'No missing media.';
  }
  return [
    `Missing media: ${total}`,
    `  Audio:  ${stats.audio}`,
    `  Video:  ${stats.video}`,
    `  Photos: ${stats.photos}`,
  ].join('\n');
}
