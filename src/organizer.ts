/**
 * File categorizer: sorts the files directly inside a folder into category sub-folders
 */

import path from 'node:path';
import { avoidNameCollision, claimingExistsCheck } from './collision.js';
import { applyMove } from './archive-executor.js';
import { listChildren, pathExists } from './fs-primitives.js';
import { logger } from './logger.js';
import type { FileCategory, OrganizeMove, OrganizeOptions } from './types.js';

const CATEGORY_BY_EXTENSION: Record<string, FileCategory> = {
  pdf: 'Documents',
  doc: 'Documents',
  docx: 'Documents',
  txt: 'Documents',
  jpg: 'Images',
  png: 'Images',
  gif: 'Images',
  webp: 'Images',
  zip: 'Archives',
  rar: 'Archives',
  '7z': 'Archives',
  tar: 'Archives',
  gz: 'Archives',
  dmg: 'Installers',
  exe: 'Installers',
  msi: 'Installers',
  pkg: 'Installers',
  deb: 'Installers',
  rpm: 'Installers',
  csv: 'Spreadsheets',
  xlsx: 'Spreadsheets',
};

/**
 * Lowercased extension without the dot; empty for names like `Makefile` or `.bashrc`.
 */
export function fileExtension(fileName: string): string {
  return path.extname(fileName).slice(1).toLowerCase();
}

export function categorize(extension: string): FileCategory {
  return CATEGORY_BY_EXTENSION[extension.toLowerCase()] ?? 'Other';
}

export function planOrganize(dir: string): OrganizeMove[] {
  const root = path.resolve(dir);
  const claimed = new Set<string>();
  const exists = claimingExistsCheck(claimed, pathExists);

  return listChildren(root)
    .filter(child => child.isFile)
    .sort((left, right) => (left.name < right.name ? -1 : left.name > right.name ? 1 : 0))
    .map(child => {
      const category = categorize(fileExtension(child.name));
      const to = avoidNameCollision(path.join(root, category), child.name, exists);
      claimed.add(to);
      return { from: child.path, to, category };
    });
}

export function formatOrganizeMove(move: OrganizeMove): string {
  return `Move: '${move.from}' -> '${move.to}'`;
}

export function organizeFolder(dir: string, options: OrganizeOptions = {}): OrganizeMove[] {
  const moves = planOrganize(dir);

  moves.forEach((move, index) => {
    if (options.dryRun) {
      logger.debug(formatOrganizeMove(move), { category: move.category }, 'Organizer');
      return;
    }
    applyMove(move, index);
    logger.info(formatOrganizeMove(move), { category: move.category }, 'Organizer');
  });

  return moves;
}
