import { describe, it, expect } from 'vitest';
import {
  AssetLister,
  buildSearchQuery,
  filterAssets,
  parseSearchPage,
} from '../core/download/asset-lister.js';
import type { AssetRecord } from '../core/download/types.js';
import { RepositoryError } from '../core/errors.js';
import { parseGlobFilter } from '../core/filter/glob-filter.js';
import { HttpTransport } from '../core/transport/http-transport.js';
import { BASE_URL, createFakeFetch, jsonResponse, makeConfig, silentLogger } from './fixtures.js';

function item(path: string): { path: string; downloadUrl: string } {
  return { path, downloadUrl: `${BASE_URL}/repository/builds/${path.replace(/^\//, '')}` };
}

function makeLister(handler: Parameters<typeof createFakeFetch>[0]) {
  const fake = createFakeFetch(handler);
  const transport = new HttpTransport(makeConfig(), silentLogger(), { fetchFn: fake.fetchFn });
  return { lister: new AssetLister(transport, silentLogger()), requests: fake.requests };
}

describe('buildSearchQuery', () => {
  it('wraps the trimmed folder', () => {
    expect(buildSearchQuery('release1')).toBe('/release1/*');
    expect(buildSearchQuery('/release1/linux/')).toBe('/release1/linux/*');
  });

  it('covers the whole repository for an empty folder', () => {
    expect(buildSearchQuery('')).toBe('/*');
  });
});

describe('parseSearchPage', () => {
  it('keeps optional metadata with the right types', () => {
    const page = parseSearchPage({
      items: [
        {
          ...item('/x/1.txt'),
          id: 'abc',
          repository: 'builds',
          format: 'raw',
          contentType: 'text/plain',
          fileSize: 12,
        },
        { ...item('/x/2.txt'), fileSize: 'big' },
      ],
      continuationToken: 'next',
    });

    expect(page.continuationToken).toBe('next');
    expect(page.items[0]).toEqual({
      ...item('/x/1.txt'),
      id: 'abc',
      repository: 'builds',
      format: 'raw',
      contentType: 'text/plain',
      fileSize: 12,
    });
    expect(page.items[1]?.fileSize).toBeUndefined();
  });

  it('treats an empty continuation token as the last page', () => {
    expect(parseSearchPage({ items: [], continuationToken: '' }).continuationToken).toBeNull();
    expect(parseSearchPage({ items: [] }).continuationToken).toBeNull();
  });

  it('rejects malformed bodies', () => {
    expect(() => parseSearchPage([])).toThrow(RepositoryError);
    expect(() => parseSearchPage({ items: 'nope' })).toThrow(RepositoryError);
    expect(() => parseSearchPage({ items: [{ path: '/x/1.txt' }] })).toThrow(
      'Malformed search response: item 0 is missing path or downloadUrl'
    );
  });
});

describe('AssetLister', () => {
  it('queries the search endpoint with raw-format parameters', async () => {
    const { lister, requests } = makeLister(() => jsonResponse({ items: [item('/x/1.txt')] }));

    const assets = await lister.listAssets('builds', 'x');

    expect(assets).toEqual([item('/x/1.txt')]);
    expect(requests).toHaveLength(1);
    const url = new URL(requests[0]?.url ?? '');
    expect(url.origin + url.pathname).toBe(`${BASE_URL}/service/rest/v1/search/assets`);
    expect(Object.fromEntries(url.searchParams)).toEqual({
      repository: 'builds',
      format: 'raw',
      direction: 'asc',
      sort: 'name',
      q: '/x/*',
    });
  });

  it('follows continuation tokens and keeps page order', async () => {
    const { lister, requests } = makeLister((request) => {
      const token = new URL(request.url).searchParams.get('continuationToken');
      if (token === null) {
        return jsonResponse({ items: [item('/x/1.txt'), item('/x/2.txt')], continuationToken: 'p2' });
      }
      if (token === 'p2') {
        return jsonResponse({ items: [item('/x/3.txt')], continuationToken: 'p3' });
      }
      return jsonResponse({ items: [item('/x/4.txt')], continuationToken: null });
    });

    const assets = await lister.listAssets('builds', 'x');

    expect(assets.map((asset) => asset.path)).toEqual([
      '/x/1.txt',
      '/x/2.txt',
      '/x/3.txt',
      '/x/4.txt',
    ]);
    expect(requests.map((r) => new URL(r.url).searchParams.get('continuationToken'))).toEqual([
      null,
      'p2',
      'p3',
    ]);
  });

  it('returns an empty list for an empty folder', async () => {
    const { lister } = makeLister(() => jsonResponse({ items: [], continuationToken: null }));
    await expect(lister.listAssets('builds', 'empty')).resolves.toEqual([]);
  });

  it('fails the whole listing when a later page errors', async () => {
    const { lister } = makeLister((request) => {
      const token = new URL(request.url).searchParams.get('continuationToken');
      return token === null
        ? jsonResponse({ items: [item('/x/1.txt')], continuationToken: 'p2' })
        : new Response('boom', { status: 500 });
    });

    const error = await lister.listAssets('builds', 'x').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RepositoryError);
    expect(error).toMatchObject({
      message: 'Failed to list assets: 500 boom',
      statusCode: 500,
      responseBody: 'boom',
    });
  });
});

describe('filterAssets', () => {
  const records: AssetRecord[] = [
    item('/x/a.txt'),
    item('/x/sub/b.txt'),
    item('/x/sub/c.tmp'),
  ];

  it('matches paths relative to the folder', () => {
    const selected = filterAssets(records, 'x', parseGlobFilter('sub/**,!**/*.tmp'));
    expect(selected.map((r) => r.path)).toEqual(['/x/sub/b.txt']);
  });

  it('returns everything for an empty filter', () => {
    expect(filterAssets(records, 'x', parseGlobFilter(undefined))).toBe(records);
  });
});
