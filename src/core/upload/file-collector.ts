/**
 * Source tree walker for uploads.
 *
 * Enumerates regular files depth-first with entries sorted by name at each
 * level. Symlinks to files are included; symlinked directories are not
 * followed.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { UploadError, errorMessage } from '../errors.js';
import type { GlobFilter } from '../filter/glob-filter.js';
import { matchesGlobFilter } from '../filter/glob-filter.js';
import type { UploadManifest, UploadManifestEntry } from './types.js';

function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

async function walk(
  root: string,
  dir: string,
  out: UploadManifestEntry[]
): Promise<void> {
  const entries = await fs.promises.readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => compareNames(a.name, b.name));

  for (const entry of entries) {
    const absolutePath = path.join(dir, entry.name);

    if (entry.isDirectory()) {
      await walk(root, absolutePath, out);
      continue;
    }

    let stats: fs.Stats;
    if (entry.isFile()) {
      stats = await fs.promises.stat(absolutePath);
    } else if (entry.isSymbolicLink()) {
      try {
        stats = await fs.promises.stat(absolutePath);
      } catch (err) {
        // Dangling link
        if (err instanceof Error && 'code' in err && err.code === 'ENOENT') continue;
        throw err;
      }
      if (!stats.isFile()) continue;
    } else {
      continue;
    }

    out.push({
      absolutePath,
      relativePath: path.relative(root, absolutePath).split(path.sep).join('/'),
      size: stats.size,
    });
  }
}

/**
 * List every regular file under `sourceDir`.
 *
 * Throws UploadError when the directory is missing or unreadable. Entries
 * sharing a relative path collapse to the one enumerated last.
 */
export async function collectFiles(sourceDir: string): Promise<UploadManifestEntry[]> {
  let rootStats: fs.Stats;
  try {
    rootStats = await fs.promises.stat(sourceDir);
  } catch (err) {
    throw new UploadError(`Cannot read source directory ${sourceDir}: ${errorMessage(err)}`, {
      cause: err,
    });
  }
  if (!rootStats.isDirectory()) {
    throw new UploadError(`Source is not a directory: ${sourceDir}`);
  }

  const collected: UploadManifestEntry[] = [];
  try {
    await walk(sourceDir, sourceDir, collected);
  } catch (err) {
    throw new UploadError(`Cannot read source directory ${sourceDir}: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  const byPath = new Map<string, UploadManifestEntry>();
  for (const entry of collected) {
    byPath.delete(entry.relativePath);
    byPath.set(entry.relativePath, entry);
  }
  return [...byPath.values()];
}

/**
 * Build a frozen manifest from collected entries, keeping those the filter selects.
 */
export function buildUploadManifest(
  entries: UploadManifestEntry[],
  directory: string | undefined,
  filter?: GlobFilter
): UploadManifest {
  const selected = filter
    ? entries.filter((entry) => matchesGlobFilter(entry.relativePath, filter))
    : entries;

  const normalizedDirectory = directory?.replace(/^\/+/, '').replace(/\/+$/, '');

  return Object.freeze({
    entries: Object.freeze(selected.map((entry) => Object.freeze({ ...entry }))),
    directory: normalizedDirectory === '' ? undefined : normalizedDirectory,
  });
}
