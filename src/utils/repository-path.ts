/**
 * Parsing for the repository-side CLI arguments.
 *
 * download source:    repository/folder[/sub...]
 * upload destination: repository[/subdir...]
 */

import { UsageError } from '../core/errors.js';

export interface DownloadSource {
  repository: string;
  folder: string;
}

export interface UploadDestination {
  repository: string;
  /** Undefined when the files go to the repository root */
  directory?: string;
}

function trimSlashes(value: string): string {
  return value.replace(/^\/+/, '').replace(/\/+$/, '');
}

export function parseDownloadSource(src: string): DownloadSource {
  const trimmed = trimSlashes(src);
  const slash = trimmed.indexOf('/');
  if (slash === -1) {
    throw new UsageError(
      `Invalid source '${src}': expected repository/folder (e.g. builds/release1)`
    );
  }

  const repository = trimmed.slice(0, slash);
  const folder = trimSlashes(trimmed.slice(slash + 1));
  if (repository === '' || folder === '') {
    throw new UsageError(
      `Invalid source '${src}': expected repository/folder (e.g. builds/release1)`
    );
  }

  return { repository, folder };
}

export function parseUploadDestination(dest: string): UploadDestination {
  const trimmed = trimSlashes(dest);
  if (trimmed === '') {
    throw new UsageError(`Invalid destination '${dest}': expected repository[/subdir]`);
  }

  const slash = trimmed.indexOf('/');
  if (slash === -1) {
    return { repository: trimmed };
  }

  const directory = trimSlashes(trimmed.slice(slash + 1));
  return {
    repository: trimmed.slice(0, slash),
    directory: directory === '' ? undefined : directory,
  };
}
