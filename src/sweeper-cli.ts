#!/usr/bin/env node
/**
 * Sweeper CLI: organize files by type, find stale project folders, archive or trash them
 */

import { config } from 'dotenv';
import { existsSync, realpathSync } from 'fs';
import { homedir } from 'os';
import { join, resolve } from 'path';
import { fileURLToPath } from 'url';
import { applyArchivePlan } from './archive-executor.js';
import { buildArchivePlan } from './archive-planner.js';
import { ConfigManager, DEFAULT_CONFIG_PATH, createExampleConfig } from './config.js';
import { AppError, handleError, logger } from './logger.js';
import { formatOrganizeMove, organizeFolder } from './organizer.js';
import { formatArchivePlan, formatScanReport } from './report-format.js';
import { scanProjects } from './stale-scanner.js';
import { deleteToTrash, systemTrash } from './trash.js';
import type { TrashBin } from './trash.js';

export type Command = 'organize' | 'scan' | 'archive' | 'delete' | 'config' | 'help';

const COMMANDS: readonly Command[] = ['organize', 'scan', 'archive', 'delete', 'config', 'help'];

export interface CliOptions {
  command: Command;
  path?: string;
  configAction?: 'init' | 'show';
  configFile?: string;
  dest?: string;
  olderThan?: number;
  maxDepth?: number;
  yes: boolean;
  dryRun: boolean;
  json: boolean;
  configPath?: string;
}

export interface RunDeps {
  out?: (line: string) => void;
  trashBin?: TrashBin;
  now?: () => Date;
}

export const USAGE = `Usage: sweeper <command> [options]

Commands:
  organize <path> [--dry-run]                 Organize files in a folder by type
  scan <path> [--older-than N] [--json]       Scan for stale project folders (default 30 days)
  archive <path> --dest <dir> [--older-than N] [--yes] [--json]
                                              Archive stale folders into YYYY-MM buckets (default 30 days)
  delete <path> [--older-than N] [--yes]      Send stale folders to the system bin (default 90 days)
  config init [file] | config show            Write an example config or print the active one

Options:
  --max-depth N      Levels inspected below each project folder (default 3)
  --config <file>    Config file (default $SWEEPER_CONFIG or ./sweeper.yaml)
  -h, --help         Show this help message`;

function usageError(message: string): AppError {
  return new AppError(message, 'USAGE_ERROR', 2);
}

function isCommand(value: string): value is Command {
  return COMMANDS.some(command => command === value);
}

function parseDays(flag: string, value: string | undefined): number {
  if (value === undefined || !/^\d+$/.test(value)) {
    throw usageError(`Invalid ${flag} value: ${value ?? '(missing)'}`);
  }
  return Number(value);
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith('--')) {
    throw usageError(`Missing value for ${flag}`);
  }
  return value;
}

export function parseArgs(argv: string[]): CliOptions {
  const positionals: string[] = [];
  const options: CliOptions = { command: 'help', yes: false, dryRun: false, json: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    switch (arg) {
      case '-h':
      case '--help':
        return { ...options, command: 'help' };
      case '--older-than':
        options.olderThan = parseDays(arg, argv[++i]);
        break;
      case '--max-depth':
        options.maxDepth = parseDays(arg, argv[++i]);
        break;
      case '--dest':
        options.dest = requireValue(arg, argv[++i]);
        break;
      case '--config':
        options.configPath = requireValue(arg, argv[++i]);
        break;
      case '--yes':
        options.yes = true;
        break;
      case '--dry-run':
        options.dryRun = true;
        break;
      case '--json':
        options.json = true;
        break;
      default:
        if (arg.startsWith('-')) {
          throw usageError(`Unknown argument: ${arg}`);
        }
        positionals.push(arg);
    }
  }

  const [command, target, extra] = positionals;
  if (command === undefined) {
    return options;
  }
  if (!isCommand(command)) {
    throw usageError(`Unknown command: ${command}`);
  }
  options.command = command;

  if (command === 'help') {
    return options;
  }

  if (command === 'config') {
    if (target !== 'init' && target !== 'show') {
      throw usageError('Missing config action: init|show');
    }
    options.configAction = target;
    options.configFile = extra;
    return options;
  }

  if (!target) {
    throw usageError(`Missing required argument: <path> for ${command}`);
  }
  if (extra !== undefined) {
    throw usageError(`Unexpected argument: ${extra}`);
  }
  options.path = target;
  return options;
}

export function expandHome(value: string): string {
  return value === '~' || value.startsWith('~/') ? join(homedir(), value.slice(1)) : value;
}

function resolveConfigPath(options: CliOptions): string {
  return options.configPath ?? (process.env.SWEEPER_CONFIG?.trim() || DEFAULT_CONFIG_PATH);
}

function requirePath(options: CliOptions): string {
  if (!options.path) {
    throw usageError(`Missing required argument: <path> for ${options.command}`);
  }
  return options.path;
}

export async function run(argv: string[], deps: RunDeps = {}): Promise<void> {
  const out = deps.out ?? ((line: string) => console.log(line));
  const now = deps.now ?? (() => new Date());
  const options = parseArgs(argv);

  if (options.command === 'help') {
    out(USAGE);
    return;
  }

  const configPath = resolveConfigPath(options);

  if (options.command === 'config' && options.configAction === 'init') {
    const target = options.configFile ?? configPath;
    if (existsSync(target)) {
      throw new AppError(`Config file already exists: ${target}`, 'CONFIG_EXISTS', 1, { path: target });
    }
    createExampleConfig(target);
    out(`Example config written to ${target}`);
    return;
  }

  const manager = new ConfigManager(configPath);
  const validation = manager.validate();
  if (!validation.valid) {
    throw new AppError(
      `Invalid configuration in ${manager.getPath()}: ${validation.errors.join('; ')}`,
      'CONFIG_INVALID',
      2,
      { errors: validation.errors }
    );
  }
  const settings = manager.getConfig();
  if (!process.env.LOG_LEVEL) {
    logger.setMinLevel(settings.logLevel);
  }

  const maxDepth = options.maxDepth ?? settings.scan.maxDepth;

  switch (options.command) {
    case 'config': {
      out(`# ${manager.getPath()}`);
      out(manager.toYAML().trimEnd());
      return;
    }

    case 'organize': {
      const moves = organizeFolder(requirePath(options), { dryRun: options.dryRun });
      moves.forEach(move => out(formatOrganizeMove(move)));
      if (options.dryRun) {
        out('');
        out('Dry-run only. Use without --dry-run to apply.');
      }
      return;
    }

    case 'scan': {
      const report = scanProjects(requirePath(options), options.olderThan ?? settings.scan.olderThanDays, {
        now: now(),
        maxDepth,
      });
      if (options.json) {
        out(JSON.stringify(report, null, 2));
        return;
      }
      formatScanReport(report).forEach(line => out(line));
      return;
    }

    case 'archive': {
      const dest = options.dest ?? settings.archive.destination;
      if (!dest) {
        throw usageError('Missing required argument: --dest <dir> (or archive.destination in config)');
      }
      const report = scanProjects(requirePath(options), options.olderThan ?? settings.archive.olderThanDays, {
        now: now(),
        maxDepth,
      });
      const plan = buildArchivePlan(report, resolve(expandHome(dest)), { now: now() });

      if (options.json) {
        out(JSON.stringify(plan, null, 2));
      } else {
        formatArchivePlan(plan).forEach(line => out(line));
      }

      if (options.yes) {
        applyArchivePlan(plan);
        if (!options.json) {
          out('');
          out('Archived successfully.');
        }
      } else if (!options.json) {
        out('');
        out('Dry-run only. Use --yes to apply.');
      }
      return;
    }

    case 'delete': {
      const report = scanProjects(requirePath(options), options.olderThan ?? settings.delete.olderThanDays, {
        now: now(),
        maxDepth,
      });

      if (report.stale.length === 0) {
        out('Nothing to delete.');
        return;
      }

      formatScanReport(report).forEach(line => out(line));

      if (options.yes) {
        await deleteToTrash(report.stale, deps.trashBin ?? systemTrash);
        out('');
        out('Moved to system bin successfully.');
      } else {
        out('');
        out('Dry-run only. Use --yes to move to bin.');
      }
      return;
    }
  }
}

async function main(): Promise<void> {
  config({ override: false });
  await run(process.argv.slice(2));
}

function isInvokedDirectly(): boolean {
  const invoked = process.argv[1];
  if (!invoked) return false;
  try {
    return realpathSync(invoked) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isInvokedDirectly()) {
  main().catch(error => {
    const appError = handleError(error, 'sweeper');
    process.exitCode = appError.exitCode;
  });
}
