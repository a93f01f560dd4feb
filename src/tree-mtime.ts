import fg from 'fast-glob';
import { statOrUndefined } from './fs-primitives.js';

export const DEFAULT_MAX_DEPTH = 3;

/**
 * Newest modification time among `dir` itself and every entry up to `maxDepth` levels below it.
 *
 * Unreadable directories and entries that cannot be stat-ed are skipped. Returns `undefined`
 * only when nothing at all could be read.
 */
export function resolveNewestMtime(dir: string, maxDepth: number = DEFAULT_MAX_DEPTH): Date | undefined {
  let newest: number | undefined = statOrUndefined(dir)?.mtimeMs;

  if (maxDepth < 1) {
    return newest === undefined ? undefined : new Date(newest);
  }

  const entries = fg.sync('**', {
    cwd: dir,
    deep: maxDepth,
    dot: true,
    onlyFiles: false,
    followSymbolicLinks: false,
    suppressErrors: true,
    stats: true,
  });

  for (const entry of entries) {
    const mtimeMs = entry.stats?.mtimeMs;
    if (mtimeMs === undefined) continue;
    if (newest === undefined || mtimeMs > newest) {
      newest = mtimeMs;
    }
  }

  return newest === undefined ? undefined : new Date(newest);
}
