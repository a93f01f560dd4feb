import path from 'node:path';
import { avoidCollision, claimingExistsCheck } from './collision.js';
import type { ExistsCheck } from './collision.js';
import { canonicalize, isInside, pathExists, statOrUndefined } from './fs-primitives.js';
import { logger } from './logger.js';
import type { ArchiveMove, ArchivePlan, ScanReport } from './types.js';

export interface PlanOptions {
  now?: Date;
  exists?: ExistsCheck;
}

export function formatMonthBucket(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  return `${year}-${month}`;
}

// The destination may not exist yet; it is created on apply.
function resolveDestinationRoot(destRoot: string): string {
  if (statOrUndefined(destRoot) === undefined) {
    return path.resolve(destRoot);
  }
  try {
    return canonicalize(destRoot);
  } catch {
    return path.resolve(destRoot);
  }
}

/**
 * Derive a month-bucketed move plan for every stale item that does not already live in `destRoot`.
 * Building a plan only performs existence checks.
 */
export function buildArchivePlan(report: ScanReport, destRoot: string, options: PlanOptions = {}): ArchivePlan {
  const resolvedDestRoot = resolveDestinationRoot(destRoot);
  const monthBucket = formatMonthBucket(options.now ?? new Date());
  const bucketDir = path.join(resolvedDestRoot, monthBucket);

  const claimed = new Set<string>();
  const exists = claimingExistsCheck(claimed, options.exists ?? pathExists);
  const moves: ArchiveMove[] = [];

  for (const item of report.stale) {
    if (isInside(resolvedDestRoot, item.path)) {
      logger.debug(`Skipping ${item.path}: already inside archive destination`, undefined, 'ArchivePlanner');
      continue;
    }

    const name = path.basename(item.path) || 'unknown';
    const to = avoidCollision(path.join(bucketDir, name), exists);
    claimed.add(to);
    moves.push({ from: item.path, to });
  }

  return {
    destRoot: resolvedDestRoot,
    monthBucket,
    moves,
  };
}
