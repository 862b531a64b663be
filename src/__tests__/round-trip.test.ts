import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { AssetLister } from '../core/download/asset-lister.js';
import { DownloadCoordinator } from '../core/download/download-coordinator.js';
import { HttpTransport } from '../core/transport/http-transport.js';
import { collectFiles } from '../core/upload/file-collector.js';
import { UploadEncoder } from '../core/upload/upload-encoder.js';
import type { FakeFetchHandler, RecordedRequest } from './fixtures.js';
import {
  BASE_URL,
  createFakeFetch,
  jsonResponse,
  makeConfig,
  makeTempDir,
  removeDir,
  silentLogger,
  writeFile,
} from './fixtures.js';

/** Form fields of a multipart body, keyed by part name */
function parseForm(request: RecordedRequest): Map<string, Buffer> {
  const match = /boundary=(.+)$/.exec(request.headers.get('content-type') ?? '');
  const boundary = match?.[1];
  if (!boundary || !request.body) {
    throw new Error('Not a multipart request');
  }

  const fields = new Map<string, Buffer>();
  const parts = request.body.toString('latin1').split(`--${boundary}`).slice(1, -1);
  for (const part of parts) {
    const headerEnd = part.indexOf('\r\n\r\n');
    const name = /name="([^"]+)"/.exec(part.slice(0, headerEnd))?.[1];
    if (name === undefined) continue;
    fields.set(name, Buffer.from(part.slice(headerEnd + 4, -2), 'latin1'));
  }
  return fields;
}

/**
 * In-process raw repository: accepts component uploads, answers asset
 * searches and serves the stored bytes.
 */
function rawRepository(): FakeFetchHandler {
  const stored = new Map<string, Buffer>();

  return (request) => {
    const url = new URL(request.url);

    if (request.method === 'POST' && url.pathname === '/service/rest/v1/components') {
      const fields = parseForm(request);
      const directory = fields.get('raw.directory')?.toString('utf-8') ?? '';
      for (let n = 1; fields.has(`raw.asset${n}`); n++) {
        const filename = fields.get(`raw.asset${n}.filename`)?.toString('utf-8') ?? '';
        const assetPath = directory ? `/${directory}/${filename}` : `/${filename}`;
        stored.set(assetPath, fields.get(`raw.asset${n}`) ?? Buffer.alloc(0));
      }
      return new Response(null, { status: 204 });
    }

    if (url.pathname === '/service/rest/v1/search/assets') {
      const prefix = (url.searchParams.get('q') ?? '').replace(/\*$/, '');
      const items = [...stored.entries()]
        .filter(([assetPath]) => assetPath.startsWith(prefix))
        .map(([assetPath, data]) => ({
          path: assetPath,
          downloadUrl: `${BASE_URL}/repository/builds${assetPath}`,
          fileSize: data.length,
        }));
      return jsonResponse({ items, continuationToken: null });
    }

    const data = stored.get(url.pathname.replace('/repository/builds', ''));
    return data ? new Response(data) : new Response('missing', { status: 404 });
  };
}

async function snapshotTree(root: string): Promise<Array<[string, string]>> {
  const entries = await collectFiles(root);
  return entries.map((entry) => [
    entry.relativePath,
    fs.readFileSync(entry.absolutePath).toString('hex'),
  ]);
}

describe('upload then download', () => {
  let srcDir: string;
  let destDir: string;

  beforeEach(() => {
    srcDir = makeTempDir();
    destDir = makeTempDir();
  });

  afterEach(() => {
    removeDir(srcDir);
    removeDir(destDir);
  });

  it('reproduces the uploaded tree byte for byte', async () => {
    writeFile(srcDir, 'readme.txt', 'top level');
    writeFile(srcDir, 'linux/app.bin', 'linux build');
    writeFile(srcDir, 'linux/lib/deep/core.so', 'nested library');
    fs.writeFileSync(path.join(srcDir, 'linux', 'raw.dat'), Buffer.from([0, 255, 13, 10, 45, 45, 7]));

    const config = makeConfig({ maxConcurrentDownloads: 2 });
    const { fetchFn } = createFakeFetch(rawRepository());
    const transport = new HttpTransport(config, silentLogger(), { fetchFn });

    const uploaded = await new UploadEncoder(transport, config, silentLogger()).uploadAll(
      srcDir,
      'builds',
      { directory: 'release1' }
    );
    expect(uploaded).toMatchObject({ success: true, fileCount: 4 });

    const records = await new AssetLister(transport, silentLogger()).listAssets(
      'builds',
      'release1'
    );
    expect(records).toHaveLength(4);

    const downloaded = await new DownloadCoordinator(config, transport, silentLogger()).downloadAll(
      records,
      destDir,
      { basePath: 'release1', flatten: true }
    );
    expect(downloaded).toMatchObject({ success: true, total: 4, succeeded: 4, failed: 0 });

    expect(await snapshotTree(destDir)).toEqual(await snapshotTree(srcDir));
  });
});
