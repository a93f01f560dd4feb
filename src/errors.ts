import { AppError } from './logger.js';
import type { ArchiveMove } from './types.js';

/**
 * Root or destination path is missing, unreadable or cannot be canonicalized.
 */
export class PathError extends AppError {
  constructor(
    message: string,
    public readonly path: string,
    reason?: string
  ) {
    super(reason ? `${message}: ${reason}` : message, 'PATH_ERROR', 1, { path });
    this.name = 'PathError';
  }
}

/**
 * Cutoff arithmetic left the representable range.
 */
export class ComputeError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'COMPUTE_ERROR', 1, context);
    this.name = 'ComputeError';
  }
}

export class MoveError extends AppError {
  constructor(
    public readonly from: string,
    public readonly to: string,
    reason: string,
    public readonly index?: number
  ) {
    super(`Failed to move '${from}' -> '${to}': ${reason}`, 'MOVE_ERROR', 1, { from, to, index });
    this.name = 'MoveError';
  }
}

export class TrashError extends AppError {
  constructor(
    public readonly path: string,
    reason: string
  ) {
    super(`Failed to move '${path}' to trash: ${reason}`, 'TRASH_ERROR', 1, { path });
    this.name = 'TrashError';
  }
}

/**
 * Directory creation failed while applying a move.
 */
export class IOError extends AppError {
  constructor(
    public readonly path: string,
    reason: string,
    public readonly move?: ArchiveMove,
    public readonly index?: number
  ) {
    super(`Failed to create dir: ${path}: ${reason}`, 'IO_ERROR', 1, {
      path,
      from: move?.from,
      to: move?.to,
      index,
    });
    this.name = 'IOError';
  }
}

export type ExecError = MoveError | IOError;
