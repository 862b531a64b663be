import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { UploadError } from '../core/errors.js';
import { parseGlobFilter } from '../core/filter/glob-filter.js';
import { buildUploadManifest, collectFiles } from '../core/upload/file-collector.js';
import { makeTempDir, removeDir, writeFile } from './fixtures.js';

describe('collectFiles', () => {
  let srcDir: string;

  beforeEach(() => {
    srcDir = makeTempDir();
  });

  afterEach(() => {
    removeDir(srcDir);
  });

  it('walks depth-first in lexicographic order', async () => {
    writeFile(srcDir, 'b.txt', 'b');
    writeFile(srcDir, 'a.txt', 'a');
    writeFile(srcDir, 'Z.txt', 'z');
    writeFile(srcDir, 'sub-file.txt', 's');
    writeFile(srcDir, 'sub/c.txt', 'c');

    const entries = await collectFiles(srcDir);

    expect(entries.map((e) => e.relativePath)).toEqual([
      'Z.txt',
      'a.txt',
      'b.txt',
      'sub/c.txt',
      'sub-file.txt',
    ]);
  });

  it('records absolute paths and sizes', async () => {
    const filePath = writeFile(srcDir, 'deep/er/data.bin', '12345');

    const entries = await collectFiles(srcDir);

    expect(entries).toEqual([
      { absolutePath: filePath, relativePath: 'deep/er/data.bin', size: 5 },
    ]);
  });

  it('includes symlinked files but does not follow symlinked directories', async () => {
    writeFile(srcDir, 'a.txt', 'abc');
    writeFile(srcDir, 'real/x.txt', 'x');
    fs.symlinkSync(path.join(srcDir, 'a.txt'), path.join(srcDir, 'alias.txt'));
    fs.symlinkSync(path.join(srcDir, 'real'), path.join(srcDir, 'linked-dir'));

    const entries = await collectFiles(srcDir);

    expect(entries.map((e) => [e.relativePath, e.size])).toEqual([
      ['a.txt', 3],
      ['alias.txt', 3],
      ['real/x.txt', 1],
    ]);
  });

  it('skips dangling symlinks', async () => {
    writeFile(srcDir, 'a.txt', 'a');
    fs.symlinkSync(path.join(srcDir, 'missing.txt'), path.join(srcDir, 'broken.txt'));

    const entries = await collectFiles(srcDir);

    expect(entries.map((e) => e.relativePath)).toEqual(['a.txt']);
  });

  it('returns nothing for an empty directory', async () => {
    await expect(collectFiles(srcDir)).resolves.toEqual([]);
  });

  it('rejects a missing directory with UploadError', async () => {
    await expect(collectFiles(path.join(srcDir, 'nope'))).rejects.toBeInstanceOf(UploadError);
  });

  it('rejects a file given as the source', async () => {
    const filePath = writeFile(srcDir, 'a.txt', 'a');
    await expect(collectFiles(filePath)).rejects.toThrow(`Source is not a directory: ${filePath}`);
  });
});

describe('buildUploadManifest', () => {
  const entries = [
    { absolutePath: '/src/a.txt', relativePath: 'a.txt', size: 1 },
    { absolutePath: '/src/tmp/b.tmp', relativePath: 'tmp/b.tmp', size: 2 },
  ];

  it('normalizes the directory and freezes the result', () => {
    const manifest = buildUploadManifest(entries, '/release1/', undefined);

    expect(manifest.directory).toBe('release1');
    expect(manifest.entries).toHaveLength(2);
    expect(Object.isFrozen(manifest)).toBe(true);
    expect(Object.isFrozen(manifest.entries)).toBe(true);
  });

  it('treats a blank directory as none', () => {
    expect(buildUploadManifest(entries, '/', undefined).directory).toBeUndefined();
  });

  it('keeps only entries the filter selects', () => {
    const manifest = buildUploadManifest(entries, undefined, parseGlobFilter('!**/*.tmp'));
    expect(manifest.entries.map((e) => e.relativePath)).toEqual(['a.txt']);
  });
});
