/**
 * Integrity Auditor Tests
 */

import { describe, it, expect } from 'vitest';
import type { GuideEntry, GuideGroups } from '@/types';
import { auditGuides } from './integrity-auditor';

function entry(id: string, displayName: string, source: string): GuideEntry {
  return { id, displayName, sourceGuideUrl: source, language: 'unknown' };
}

describe('auditGuides', () => {
  it('reports an empty group as an empty source, not a null entry', () => {
    const report = auditGuides(new Map([['http://g/empty.xml', []]]));

    expect(report).toEqual({
      totalSources: 1,
      emptySources: ['http://g/empty.xml'],
      nullEntries: [],
      duplicates: [],
    });
  });

  it('finds null entries and duplicates across sources', () => {
    const a = 'http://g/a.xml';
    const b = 'http://g/b.xml';
    const nullEntry = entry('', '', a);
    const groups: GuideGroups = new Map([
      [a, [entry('bbc1', 'BBC One', a), nullEntry, entry('bbc1', 'BBC One HD', a)]],
      [b, [entry('itv1', 'ITV1', b), entry('bbc1', 'BBC One', b)]],
    ]);

    const report = auditGuides(groups);

    expect(report.totalSources).toBe(2);
    expect(report.emptySources).toEqual([]);
    expect(report.nullEntries).toEqual([{ source: a, entry: nullEntry }]);
    expect(report.duplicates).toEqual([
      { source: a, id: 'bbc1' },
      { source: b, id: 'bbc1' },
    ]);
  });

  it('never treats entries without an id as duplicates', () => {
    const a = 'http://g/a.xml';
    const groups: GuideGroups = new Map([
      [a, [entry('', 'Name Only', a), entry('', 'Name Only', a)]],
    ]);

    const report = auditGuides(groups);

    expect(report.duplicates).toEqual([]);
    expect(report.nullEntries).toEqual([]);
  });

  it('handles an empty snapshot', () => {
    expect(auditGuides(new Map())).toEqual({
      totalSources: 0,
      emptySources: [],
      nullEntries: [],
      duplicates: [],
    });
  });
});
