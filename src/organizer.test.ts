import fs from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { PathError } from './errors.js';
import { categorize, fileExtension, formatOrganizeMove, organizeFolder, planOrganize } from './organizer.js';
import { makeTempDir, removeDir, writeTree } from '../tests/fixtures.js';

describe('categorize', () => {
  it('maps known extensions to their category', () => {
    expect(categorize('pdf')).toBe('Documents');
    expect(categorize('docx')).toBe('Documents');
    expect(categorize('webp')).toBe('Images');
    expect(categorize('7z')).toBe('Archives');
    expect(categorize('rpm')).toBe('Installers');
    expect(categorize('xlsx')).toBe('Spreadsheets');
  });

  it('is case-insensitive and defaults to Other', () => {
    expect(categorize('PNG')).toBe('Images');
    expect(categorize('mp3')).toBe('Other');
    expect(categorize('')).toBe('Other');
  });
});

describe('fileExtension', () => {
  it('returns the lowercased last extension', () => {
    expect(fileExtension('Report.PDF')).toBe('pdf');
    expect(fileExtension('backup.tar.gz')).toBe('gz');
  });

  it('returns an empty string for dotfiles and names without an extension', () => {
    expect(fileExtension('.bashrc')).toBe('');
    expect(fileExtension('Makefile')).toBe('');
  });
});

describe('organizer', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir('sweeper-organize-');
    writeTree(dir, {
      'a.pdf': 'pdf bytes',
      'b.PNG': 'png bytes',
      'c.unknown': 'mystery',
      'nested/inner.txt': 'left alone',
    });
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('plans one move per top-level file in name order', () => {
    expect(planOrganize(dir)).toEqual([
      { from: path.join(dir, 'a.pdf'), to: path.join(dir, 'Documents', 'a.pdf'), category: 'Documents' },
      { from: path.join(dir, 'b.PNG'), to: path.join(dir, 'Images', 'b.PNG'), category: 'Images' },
      { from: path.join(dir, 'c.unknown'), to: path.join(dir, 'Other', 'c.unknown'), category: 'Other' },
    ]);
  });

  it('appends a counter to the file name when the target is taken', () => {
    writeTree(dir, { 'Documents/a.pdf': 'older copy' });

    const moves = planOrganize(dir);

    expect(moves[0].to).toBe(path.join(dir, 'Documents', 'a.pdf_1'));
  });

  it('leaves files in place on a dry run', () => {
    const moves = organizeFolder(dir, { dryRun: true });

    expect(moves).toHaveLength(3);
    expect(fs.existsSync(path.join(dir, 'a.pdf'))).toBe(true);
    expect(fs.existsSync(path.join(dir, 'Documents'))).toBe(false);
  });

  it('moves files into category folders', () => {
    organizeFolder(dir);

    expect(fs.readFileSync(path.join(dir, 'Documents', 'a.pdf'), 'utf8')).toBe('pdf bytes');
    expect(fs.readFileSync(path.join(dir, 'Images', 'b.PNG'), 'utf8')).toBe('png bytes');
    expect(fs.readFileSync(path.join(dir, 'Other', 'c.unknown'), 'utf8')).toBe('mystery');
    expect(fs.existsSync(path.join(dir, 'a.pdf'))).toBe(false);
    expect(fs.readFileSync(path.join(dir, 'nested', 'inner.txt'), 'utf8')).toBe('left alone');
  });

  it('plans nothing once every file has been organized', () => {
    organizeFolder(dir);

    expect(planOrganize(dir)).toEqual([]);
  });

  it('throws PathError for a missing folder', () => {
    expect(() => planOrganize(path.join(dir, 'missing'))).toThrow(PathError);
  });

  it('formats a move for display', () => {
    expect(formatOrganizeMove({ from: '/d/a.pdf', to: '/d/Documents/a.pdf', category: 'Documents' })).toBe(
      "Move: '/d/a.pdf' -> '/d/Documents/a.pdf'"
    );
  });
});
