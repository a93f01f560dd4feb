/**
 * Core type definitions shared by the scanner, planners and executors
 */

/**
 * One immediate child directory of a scanned root.
 */
export interface ProjectItem {
  path: string;
  /** Effective timestamp: newest mtime found by bounded recursive inspection. */
  lastModified: Date;
}

export interface ScanReport {
  /** Canonical absolute path of the scanned root. */
  root: string;
  olderThanDays: number;
  cutoff: Date;
  /** Oldest first. */
  stale: ProjectItem[];
  fresh: ProjectItem[];
  scannedCount: number;
}

export interface ArchiveMove {
  from: string;
  to: string;
}

export interface ArchivePlan {
  destRoot: string;
  /** Current local calendar month at plan-build time, formatted YYYY-MM. */
  monthBucket: string;
  moves: ArchiveMove[];
}

export type FileCategory =
  | 'Documents'
  | 'Images'
  | 'Archives'
  | 'Installers'
  | 'Spreadsheets'
  | 'Other';

export interface OrganizeMove extends ArchiveMove {
  category: FileCategory;
}

export interface OrganizeOptions {
  dryRun?: boolean;
}
