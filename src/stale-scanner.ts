import { ComputeError } from './errors.js';
import { canonicalize, listChildren, modifiedTime } from './fs-primitives.js';
import { logger } from './logger.js';
import { DEFAULT_MAX_DEPTH, resolveNewestMtime } from './tree-mtime.js';
import type { ProjectItem, ScanReport } from './types.js';

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

/** Oldest timestamp the tool represents; unreadable directories land here. */
export const OLDEST_TIMESTAMP = new Date(0);

export interface ScanOptions {
  now?: Date;
  maxDepth?: number;
}

/**
 * One step of the effective-timestamp chain. Returns undefined to defer to the next step.
 */
type TimestampStrategy = (dir: string, maxDepth: number) => Date | undefined;

const TIMESTAMP_STRATEGIES: readonly TimestampStrategy[] = [
  (dir, maxDepth) => resolveNewestMtime(dir, maxDepth),
  dir => modifiedTime(dir),
  () => OLDEST_TIMESTAMP,
];

export function effectiveTimestamp(dir: string, maxDepth: number = DEFAULT_MAX_DEPTH): Date {
  for (const strategy of TIMESTAMP_STRATEGIES) {
    const resolved = strategy(dir, maxDepth);
    if (resolved) return resolved;
  }
  return OLDEST_TIMESTAMP;
}

export function computeCutoff(now: Date, olderThanDays: number): Date {
  if (!Number.isSafeInteger(olderThanDays) || olderThanDays < 0) {
    throw new ComputeError(`older-than must be a non-negative integer number of days, got ${olderThanDays}`, {
      olderThanDays,
    });
  }

  const cutoffMs = now.getTime() - olderThanDays * MS_PER_DAY;
  if (!Number.isFinite(cutoffMs) || cutoffMs < OLDEST_TIMESTAMP.getTime()) {
    throw new ComputeError('Failed to compute cutoff time', {
      olderThanDays,
      now: now.toISOString(),
    });
  }

  return new Date(cutoffMs);
}

/**
 * Partition the non-hidden immediate subdirectories of `root` into stale and fresh.
 *
 * Only canonicalizing and listing the root can fail; every per-child problem is absorbed by
 * the timestamp fallback chain.
 */
export function scanProjects(root: string, olderThanDays: number, options: ScanOptions = {}): ScanReport {
  const canonicalRoot = canonicalize(root);
  const cutoff = computeCutoff(options.now ?? new Date(), olderThanDays);
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;

  const stale: ProjectItem[] = [];
  const fresh: ProjectItem[] = [];
  let scannedCount = 0;

  for (const child of listChildren(canonicalRoot)) {
    if (!child.isDirectory) continue;

    if (child.name.startsWith('.')) {
      logger.debug(`Skipping hidden directory ${child.path}`, undefined, 'StaleScanner');
      continue;
    }

    scannedCount += 1;

    const item: ProjectItem = {
      path: child.path,
      lastModified: effectiveTimestamp(child.path, maxDepth),
    };

    if (item.lastModified.getTime() <= cutoff.getTime()) {
      stale.push(item);
    } else {
      fresh.push(item);
    }
  }

  stale.sort((left, right) => left.lastModified.getTime() - right.lastModified.getTime());

  logger.debug(
    `Scanned ${scannedCount} project folders`,
    { root: canonicalRoot, stale: stale.length, fresh: fresh.length },
    'StaleScanner'
  );

  return {
    root: canonicalRoot,
    olderThanDays,
    cutoff,
    stale,
    fresh,
    scannedCount,
  };
}
