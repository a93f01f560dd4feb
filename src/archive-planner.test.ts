import fs from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { buildArchivePlan, formatMonthBucket } from './archive-planner.js';
import { scanProjects } from './stale-scanner.js';
import type { ProjectItem, ScanReport } from './types.js';
import { NOW, daysAgo, makeProject, makeTempDir, removeDir } from '../tests/fixtures.js';

function reportFor(paths: string[]): ScanReport {
  const stale: ProjectItem[] = paths.map((itemPath, index) => ({
    path: itemPath,
    lastModified: daysAgo(100 - index),
  }));
  return {
    root: '/projects',
    olderThanDays: 30,
    cutoff: daysAgo(30),
    stale,
    fresh: [],
    scannedCount: stale.length,
  };
}

describe('formatMonthBucket', () => {
  it('formats the local year and zero-padded month', () => {
    expect(formatMonthBucket(new Date(2026, 0, 5))).toBe('2026-01');
    expect(formatMonthBucket(new Date(2025, 11, 31, 23, 59))).toBe('2025-12');
  });
});

describe('buildArchivePlan', () => {
  let dest: string;

  beforeEach(() => {
    dest = makeTempDir('sweeper-plan-');
  });

  afterEach(() => {
    removeDir(dest);
  });

  it('buckets moves under the current month in stale order', () => {
    const plan = buildArchivePlan(reportFor(['/projects/old', '/projects/older']), dest, { now: NOW });

    expect(plan.destRoot).toBe(dest);
    expect(plan.monthBucket).toBe('2026-02');
    expect(plan.moves).toEqual([
      { from: '/projects/old', to: path.join(dest, '2026-02', 'old') },
      { from: '/projects/older', to: path.join(dest, '2026-02', 'older') },
    ]);
  });

  it('suffixes a destination that already exists', () => {
    fs.mkdirSync(path.join(dest, '2026-02', 'A'), { recursive: true });

    const plan = buildArchivePlan(reportFor(['/projects/A']), dest, { now: NOW });

    expect(plan.moves).toEqual([{ from: '/projects/A', to: path.join(dest, '2026-02', 'A_1') }]);
  });

  it('never plans two moves to the same destination', () => {
    const plan = buildArchivePlan(reportFor(['/one/A', '/two/A', '/three/A']), dest, { now: NOW });

    expect(plan.moves.map(move => move.to)).toEqual([
      path.join(dest, '2026-02', 'A'),
      path.join(dest, '2026-02', 'A_1'),
      path.join(dest, '2026-02', 'A_2'),
    ]);
  });

  it('skips items that are the destination or live inside it', () => {
    const sibling = `${dest}-other`;
    const plan = buildArchivePlan(
      reportFor([dest, path.join(dest, '2025-11', 'kept'), sibling]),
      dest,
      { now: NOW }
    );

    expect(plan.moves).toEqual([{ from: sibling, to: path.join(dest, '2026-02', path.basename(sibling)) }]);
  });

  it('plans nothing when the destination is the scanned root', () => {
    makeProject(dest, 'A', daysAgo(40));
    makeProject(dest, 'B', daysAgo(90));
    const report = scanProjects(dest, 30, { now: NOW });
    expect(report.stale).toHaveLength(2);

    const plan = buildArchivePlan(report, dest, { now: NOW });

    expect(plan.moves).toEqual([]);
  });

  it('accepts a destination that does not exist yet without creating it', () => {
    const missing = path.join(dest, 'not-yet', 'archive');

    const plan = buildArchivePlan(reportFor(['/projects/A']), missing, { now: NOW });

    expect(plan.destRoot).toBe(missing);
    expect(plan.moves).toEqual([{ from: '/projects/A', to: path.join(missing, '2026-02', 'A') }]);
    expect(fs.existsSync(path.join(dest, 'not-yet'))).toBe(false);
  });

  it('resolves a relative destination against the working directory', () => {
    const plan = buildArchivePlan(reportFor([]), 'relative-archive-that-does-not-exist', { now: NOW });

    expect(plan.destRoot).toBe(path.resolve('relative-archive-that-does-not-exist'));
  });
});
