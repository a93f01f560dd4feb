/**
 * Thin wrappers over the blocking filesystem calls the core relies on
 */

import fs from 'node:fs';
import path from 'node:path';
import { PathError } from './errors.js';
import { describeError } from './logger.js';

export interface ChildEntry {
  name: string;
  path: string;
  isDirectory: boolean;
  isFile: boolean;
}

export function canonicalize(target: string): string {
  try {
    return fs.realpathSync(target);
  } catch (error) {
    throw new PathError('Cannot access path', target, describeError(error));
  }
}

/**
 * Immediate children of a directory. Symbolic links report the kind of their target;
 * a dangling link is neither a file nor a directory.
 */
export function listChildren(dir: string): ChildEntry[] {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch (error) {
    throw new PathError('Cannot list directory', dir, describeError(error));
  }

  return entries.map(entry => {
    const absolute = path.join(dir, entry.name);
    if (!entry.isSymbolicLink()) {
      return {
        name: entry.name,
        path: absolute,
        isDirectory: entry.isDirectory(),
        isFile: entry.isFile(),
      };
    }

    const target = statOrUndefined(absolute);
    return {
      name: entry.name,
      path: absolute,
      isDirectory: target?.isDirectory() ?? false,
      isFile: target?.isFile() ?? false,
    };
  });
}

export function statOrUndefined(target: string): fs.Stats | undefined {
  try {
    return fs.statSync(target);
  } catch {
    return undefined;
  }
}

export function modifiedTime(target: string): Date | undefined {
  return statOrUndefined(target)?.mtime;
}

export function pathExists(target: string): boolean {
  return fs.existsSync(target);
}

export function ensureDirectory(dir: string): void {
  fs.mkdirSync(dir, { recursive: true });
}

export function isInside(parentAbs: string, candidateAbs: string): boolean {
  const relative = path.relative(parentAbs, candidateAbs);
  return relative === '' || (relative !== '..' && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative));
}

function isCrossDeviceError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EXDEV';
}

/**
 * Rename, falling back to copy + remove when source and destination sit on different devices.
 */
export function movePath(from: string, to: string): void {
  try {
    fs.renameSync(from, to);
  } catch (error) {
    if (!isCrossDeviceError(error)) {
      throw error;
    }
    fs.cpSync(from, to, { recursive: true, errorOnExist: true, force: false, preserveTimestamps: true });
    fs.rmSync(from, { recursive: true, force: true });
  }
}
