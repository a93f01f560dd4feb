import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

/** Fixed local clock for tests: 15 Feb 2026, noon. Month bucket "2026-02". */
export const NOW = new Date(2026, 1, 15, 12, 0, 0);

export function daysAgo(days: number, from: Date = NOW): Date {
  return new Date(from.getTime() - days * MS_PER_DAY);
}

/**
 * Temp directory with symlinks resolved, so it compares equal to canonicalized scan roots.
 */
export function makeTempDir(prefix = 'sweeper-test-'): string {
  return fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), prefix)));
}

export function removeDir(dir: string | null | undefined): void {
  if (dir && fs.existsSync(dir)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

/**
 * Write files (relative path -> content), creating parent directories as needed.
 */
export function writeTree(root: string, files: Record<string, string>): void {
  for (const [relativePath, content] of Object.entries(files)) {
    const absolutePath = path.join(root, relativePath);
    fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
    fs.writeFileSync(absolutePath, content, 'utf8');
  }
}

/**
 * Set atime and mtime of `target` and everything below it, children before parents.
 */
export function setTreeMtime(target: string, date: Date): void {
  const stats = fs.lstatSync(target);
  if (stats.isDirectory()) {
    for (const name of fs.readdirSync(target)) {
      setTreeMtime(path.join(target, name), date);
    }
  }
  fs.utimesSync(target, date, date);
}

/**
 * Create `root/name` holding a couple of files, all stamped with `date`.
 */
export function makeProject(root: string, name: string, date: Date): string {
  const projectPath = path.join(root, name);
  writeTree(projectPath, {
    'README.md': `# ${name}\n`,
    'src/main.txt': `${name} source\n`,
  });
  setTreeMtime(projectPath, date);
  return projectPath;
}
