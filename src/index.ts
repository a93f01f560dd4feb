/**
 * Library entry point
 */

export * from './types.js';
export * from './errors.js';
export { AppError, Logger, logger, handleError } from './logger.js';
export type { LogEntry, LogLevel } from './logger.js';
export { DEFAULT_MAX_DEPTH, resolveNewestMtime } from './tree-mtime.js';
export { computeCutoff, effectiveTimestamp, scanProjects, OLDEST_TIMESTAMP } from './stale-scanner.js';
export type { ScanOptions } from './stale-scanner.js';
export { avoidCollision, avoidNameCollision } from './collision.js';
export type { ExistsCheck } from './collision.js';
export { buildArchivePlan, formatMonthBucket } from './archive-planner.js';
export type { PlanOptions } from './archive-planner.js';
export { applyArchivePlan } from './archive-executor.js';
export { categorize, organizeFolder, planOrganize } from './organizer.js';
export { deleteToTrash, systemTrash } from './trash.js';
export type { TrashBin } from './trash.js';
export { formatArchivePlan, formatScanReport, formatTimestamp } from './report-format.js';
export { ConfigManager, DEFAULT_CONFIG, getConfig } from './config.js';
export type { SweeperConfig } from './config.js';
