/**
 * Asset lister.
 *
 * Pages through the search endpoint for every raw asset under a folder,
 * following continuation tokens until the repository stops returning one.
 */

import type { Logger } from 'pino';
import type { GlobFilter } from '../filter/glob-filter.js';
import { isEmptyFilter, matchesGlobFilter } from '../filter/glob-filter.js';
import { RepositoryError } from '../errors.js';
import type { HttpTransport } from '../transport/http-transport.js';
import { assetRelativePath } from './asset-downloader.js';
import type { AssetRecord, SearchPage } from './types.js';
import { SEARCH_ASSETS_PATH } from './types.js';

/**
 * Search expression for every asset below a folder: `/folder/*`.
 */
export function buildSearchQuery(pathPrefix: string): string {
  const trimmed = pathPrefix.replace(/^\/+/, '').replace(/\/+$/, '');
  return trimmed === '' ? '/*' : `/${trimmed}/*`;
}

function optionalString(item: object, key: string): string | undefined {
  const value: unknown = Reflect.get(item, key);
  return typeof value === 'string' ? value : undefined;
}

function parseAssetRecord(item: unknown, index: number): AssetRecord {
  if (typeof item !== 'object' || item === null) {
    throw new RepositoryError(`Malformed search response: item ${index} is not an object`);
  }

  const path = optionalString(item, 'path');
  const downloadUrl = optionalString(item, 'downloadUrl');
  if (path === undefined || downloadUrl === undefined) {
    throw new RepositoryError(
      `Malformed search response: item ${index} is missing path or downloadUrl`
    );
  }

  const fileSize: unknown = Reflect.get(item, 'fileSize');

  return {
    path,
    downloadUrl,
    id: optionalString(item, 'id'),
    repository: optionalString(item, 'repository'),
    format: optionalString(item, 'format'),
    contentType: optionalString(item, 'contentType'),
    fileSize: typeof fileSize === 'number' && fileSize >= 0 ? fileSize : undefined,
  };
}

/**
 * Validate a decoded search response body.
 */
export function parseSearchPage(body: unknown): SearchPage {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new RepositoryError('Malformed search response: expected a JSON object');
  }

  const rawItems: unknown = Reflect.get(body, 'items') ?? [];
  if (!Array.isArray(rawItems)) {
    throw new RepositoryError('Malformed search response: items is not an array');
  }

  const token: unknown = Reflect.get(body, 'continuationToken');

  return {
    items: rawItems.map((item: unknown, index) => parseAssetRecord(item, index)),
    continuationToken: typeof token === 'string' && token !== '' ? token : null,
  };
}

export class AssetLister {
  private readonly transport: HttpTransport;
  private readonly logger: Logger;

  constructor(transport: HttpTransport, logger: Logger) {
    this.transport = transport;
    this.logger = logger.child({ component: 'asset-lister' });
  }

  /**
   * List every asset under `pathPrefix` in `repository`.
   *
   * Any failed page aborts the listing with a RepositoryError; pages already
   * fetched are dropped. An empty folder yields an empty array.
   */
  async listAssets(repository: string, pathPrefix: string): Promise<AssetRecord[]> {
    const query = buildSearchQuery(pathPrefix);
    const assets: AssetRecord[] = [];
    let continuationToken: string | null = null;
    let pageCount = 0;

    do {
      const page = await this.fetchPage(repository, query, continuationToken);
      assets.push(...page.items);
      continuationToken = page.continuationToken;
      pageCount++;

      this.logger.debug(
        { repository, query, page: pageCount, items: page.items.length },
        'Fetched search page'
      );
    } while (continuationToken !== null);

    this.logger.info(
      { repository, query, pages: pageCount, assets: assets.length },
      'Asset listing complete'
    );

    return assets;
  }

  /**
   * Fetch and validate one page of search results.
   */
  async fetchPage(
    repository: string,
    query: string,
    continuationToken: string | null
  ): Promise<SearchPage> {
    const url = this.transport.buildUrl(SEARCH_ASSETS_PATH, {
      repository,
      format: 'raw',
      direction: 'asc',
      sort: 'name',
      q: query,
      continuationToken: continuationToken ?? undefined,
    });

    let body: unknown;
    try {
      body = await this.transport.getJson(url);
    } catch (err) {
      if (err instanceof RepositoryError) {
        throw new RepositoryError(`Failed to list assets: ${err.message}`, {
          statusCode: err.statusCode,
          responseBody: err.responseBody,
          cause: err,
        });
      }
      throw err;
    }

    return parseSearchPage(body);
  }
}

/**
 * Keep the assets whose path below `pathPrefix` passes the filter.
 */
export function filterAssets(
  records: AssetRecord[],
  pathPrefix: string,
  filter: GlobFilter
): AssetRecord[] {
  if (isEmptyFilter(filter)) return records;

  return records.filter((record) =>
    matchesGlobFilter(assetRelativePath(record.path, pathPrefix), filter)
  );
}
