/**
 * Configuration system with YAML and JSON support
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import YAML from 'js-yaml';
import { isLogLevel, logger } from './logger.js';
import type { LogLevel } from './logger.js';

export interface ScanConfig {
  olderThanDays: number;
  /** Levels below each project folder inspected for the newest mtime. */
  maxDepth: number;
}

export interface ArchiveConfig {
  olderThanDays: number;
  destination?: string;
}

export interface DeleteConfig {
  olderThanDays: number;
}

export interface SweeperConfig {
  scan: ScanConfig;
  archive: ArchiveConfig;
  delete: DeleteConfig;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG_PATH = './sweeper.yaml';

export const DEFAULT_CONFIG: SweeperConfig = {
  scan: {
    olderThanDays: 30,
    maxDepth: 3
  },
  archive: {
    olderThanDays: 30
  },
  delete: {
    olderThanDays: 90
  },
  logLevel: 'info'
};

function cloneConfig(config: SweeperConfig): SweeperConfig {
  return structuredClone(config);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function mergeSection<T extends object>(defaults: T, user: unknown): T {
  return isRecord(user) ? { ...defaults, ...user } : { ...defaults };
}

function isNonNegativeInteger(value: unknown): boolean {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0;
}

/**
 * Configuration manager
 */
export class ConfigManager {
  private config: SweeperConfig;
  private configPath: string;

  constructor(configPath: string = DEFAULT_CONFIG_PATH) {
    this.configPath = configPath;
    this.config = this.loadConfig();
  }

  /**
   * Load configuration from file or use defaults
   */
  private loadConfig(): SweeperConfig {
    if (!existsSync(this.configPath)) {
      logger.debug(
        `Config file not found: ${this.configPath}, using defaults`,
        { path: this.configPath },
        'ConfigManager'
      );
      return cloneConfig(DEFAULT_CONFIG);
    }

    try {
      const content = readFileSync(this.configPath, 'utf-8');
      let config: unknown;

      if (this.configPath.endsWith('.json')) {
        config = JSON.parse(content);
      } else if (this.configPath.endsWith('.yaml') || this.configPath.endsWith('.yml')) {
        config = YAML.load(content);
      } else {
        throw new Error(`Unsupported config format: ${this.configPath}`);
      }

      logger.debug(
        `Loaded configuration from ${this.configPath}`,
        undefined,
        'ConfigManager'
      );

      // Merge with defaults
      return this.mergeConfigs(cloneConfig(DEFAULT_CONFIG), config);
    } catch (error) {
      logger.warn(
        `Failed to load config: ${error instanceof Error ? error.message : String(error)}`,
        undefined,
        'ConfigManager'
      );
      return cloneConfig(DEFAULT_CONFIG);
    }
  }

  /**
   * Merge user config with defaults (user config takes precedence)
   */
  private mergeConfigs(defaults: SweeperConfig, user: unknown): SweeperConfig {
    if (!isRecord(user)) {
      return defaults;
    }

    return {
      scan: mergeSection(defaults.scan, user.scan),
      archive: mergeSection(defaults.archive, user.archive),
      delete: mergeSection(defaults.delete, user.delete),
      logLevel: isLogLevel(user.logLevel) ? user.logLevel : defaults.logLevel
    };
  }

  /**
   * Get complete configuration
   */
  getConfig(): SweeperConfig {
    return cloneConfig(this.config);
  }

  /**
   * Validate configuration
   */
  validate(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];
    const { scan, archive, delete: deletion } = this.config;

    if (!isNonNegativeInteger(scan.olderThanDays)) {
      errors.push('scan.olderThanDays must be a non-negative integer');
    }

    if (!isNonNegativeInteger(scan.maxDepth)) {
      errors.push('scan.maxDepth must be a non-negative integer');
    }

    if (!isNonNegativeInteger(archive.olderThanDays)) {
      errors.push('archive.olderThanDays must be a non-negative integer');
    }

    if (archive.destination !== undefined && (typeof archive.destination !== 'string' || !archive.destination.trim())) {
      errors.push('archive.destination must be a non-empty string');
    }

    if (!isNonNegativeInteger(deletion.olderThanDays)) {
      errors.push('delete.olderThanDays must be a non-negative integer');
    }

    return {
      valid: errors.length === 0,
      errors
    };
  }

  /**
   * Export configuration as YAML
   */
  toYAML(): string {
    return YAML.dump(this.config);
  }

  /**
   * Get config file path
   */
  getPath(): string {
    return this.configPath;
  }
}

/**
 * Global config instance
 */
let globalConfig: ConfigManager | null = null;

/**
 * Get or create global config instance
 */
export function getConfig(path?: string): ConfigManager {
  if (!globalConfig || (path !== undefined && globalConfig.getPath() !== path)) {
    globalConfig = new ConfigManager(path);
  }
  return globalConfig;
}

/**
 * Create example config file
 */
export function createExampleConfig(outputPath: string = DEFAULT_CONFIG_PATH): void {
  const exampleConfig = {
    scan: {
      olderThanDays: 30,
      maxDepth: 3
    },
    archive: {
      olderThanDays: 30,
      destination: '~/Archive'
    },
    delete: {
      olderThanDays: 90
    },
    logLevel: 'info'
  };

  mkdirSync(dirname(outputPath), { recursive: true });
  writeFileSync(outputPath, YAML.dump(exampleConfig));
  logger.info(`Example config created at ${outputPath}`, undefined, 'ConfigManager');
}
