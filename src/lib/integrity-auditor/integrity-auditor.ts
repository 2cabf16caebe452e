/**
 * Integrity Auditor
 *
 * Read-only report over grouped guide entries: empty sources, entries
 * with neither id nor display name, and ids repeated within or across
 * sources.
 */

import type { GuideEntry, GuideGroups } from '@/types';
import { createLogger, type Logger } from '@/lib/logger';

export interface NullEntry {
  source: string;
  entry: GuideEntry;
}

export interface DuplicateEntry {
  source: string;
  id: string;
}

export interface AuditReport {
  totalSources: number;
  emptySources: string[];
  nullEntries: NullEntry[];
  duplicates: DuplicateEntry[];
}

export function auditGuides(groups: GuideGroups, logger?: Logger): AuditReport {
  const log = logger ?? createLogger('IntegrityAuditor');
  const seenIds = new Set<string>();
  const report: AuditReport = {
    totalSources: groups.size,
    emptySources: [],
    nullEntries: [],
    duplicates: [],
  };

  for (const [source, entries] of groups) {
    if (entries.length === 0) {
      report.emptySources.push(source);
      continue;
    }

    for (const entry of entries) {
      if (!entry.id && !entry.displayName) {
        report.nullEntries.push({ source, entry });
      } else if (seenIds.has(entry.id)) {
        report.duplicates.push({ source, id: entry.id });
      } else if (entry.id) {
        seenIds.add(entry.id);
      }
    }
  }

  log.info(
    `[AUDIT] Sources: ${report.totalSources}, Empty: ${report.emptySources.length}, ` +
      `Nulls: ${report.nullEntries.length}, Duplicates: ${report.duplicates.length}`
  );

  return report;
}
