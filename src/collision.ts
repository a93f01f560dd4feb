import path from 'node:path';
import { pathExists } from './fs-primitives.js';

export type ExistsCheck = (candidate: string) => boolean;

/**
 * Returns `target` if free, else `target_1`, `target_2`, ... for the first free one.
 * The suffix is appended to the full path string, extension included.
 */
export function avoidCollision(target: string, exists: ExistsCheck = pathExists): string {
  if (!exists(target)) {
    return target;
  }

  for (let counter = 1; ; counter += 1) {
    const candidate = `${target}_${counter}`;
    if (!exists(candidate)) {
      return candidate;
    }
  }
}

/**
 * Organizer variant: the counter goes on the file name inside `dir`.
 */
export function avoidNameCollision(dir: string, fileName: string, exists: ExistsCheck = pathExists): string {
  let candidate = path.join(dir, fileName);
  for (let counter = 1; exists(candidate); counter += 1) {
    candidate = path.join(dir, `${fileName}_${counter}`);
  }
  return candidate;
}

/**
 * Existence check that also treats paths already handed out in the current plan as taken.
 */
export function claimingExistsCheck(claimed: Set<string>, exists: ExistsCheck = pathExists): ExistsCheck {
  return candidate => claimed.has(candidate) || exists(candidate);
}
