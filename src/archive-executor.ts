import path from 'node:path';
import { IOError, MoveError } from './errors.js';
import { ensureDirectory, movePath, pathExists } from './fs-primitives.js';
import { describeError, logger } from './logger.js';
import type { ArchiveMove, ArchivePlan } from './types.js';

/**
 * Apply one move: create the destination's parent, refuse to overwrite, then rename.
 * `index` is the move's position in its plan and is carried on any error.
 */
export function applyMove(move: ArchiveMove, index: number): void {
  const parent = path.dirname(move.to);
  try {
    ensureDirectory(parent);
  } catch (error) {
    throw new IOError(parent, describeError(error), move, index);
  }

  if (pathExists(move.to)) {
    throw new MoveError(move.from, move.to, 'destination already exists', index);
  }

  try {
    movePath(move.from, move.to);
  } catch (error) {
    throw new MoveError(move.from, move.to, describeError(error), index);
  }
}

/**
 * Execute every move of a plan in order. Stops at the first failure; moves already applied stay applied.
 */
export function applyArchivePlan(plan: ArchivePlan): void {
  plan.moves.forEach((move, index) => {
    try {
      applyMove(move, index);
    } catch (error) {
      logger.error(
        `Archive stopped at move ${index + 1} of ${plan.moves.length}`,
        error instanceof Error ? error : undefined,
        'ArchiveExecutor'
      );
      throw error;
    }
    logger.info(`Archived ${move.from}`, { to: move.to }, 'ArchiveExecutor');
  });
}
