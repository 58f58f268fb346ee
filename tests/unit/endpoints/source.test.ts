import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  loadEndpoints,
  loadEndpointsFromUrl,
  splitEndpointLines,
} from '../../../src/lib/endpoints/index.js';
import { StorageError } from '../../../src/utils/errors.js';

describe('splitEndpointLines', () => {
  it('should trim entries and drop blank lines', () => {
    expect(splitEndpointLines('  http://a.test \r\n\n\thttps://b.test\n   \n')).toEqual([
      'http://a.test',
      'https://b.test',
    ]);
  });
});

describe('loadEndpoints', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'monfix-endpoints-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
    vi.unstubAllGlobals();
  });

  it('should read a local file', async () => {
    const path = join(dir, 'endpoints.txt');
    await writeFile(path, 'http://a.test\n\nhttp://b.test:8080/x\n');
    expect(await loadEndpoints({ kind: 'file', location: path })).toEqual([
      'http://a.test',
      'http://b.test:8080/x',
    ]);
  });

  it('should raise StorageError for a missing file', async () => {
    await expect(
      loadEndpoints({ kind: 'file', location: join(dir, 'absent.txt') }),
    ).rejects.toThrow(StorageError);
  });

  it('should fetch a remote list', async () => {
    const fetchMock = vi.fn(async () => new Response('http://a.test\nhttp://b.test\n'));
    vi.stubGlobal('fetch', fetchMock);

    const lines = await loadEndpoints({ kind: 'url', location: 'http://lists.test/hosts' });

    expect(lines).toEqual(['http://a.test', 'http://b.test']);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('should raise StorageError on a non-ok response', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('gone', { status: 404 })));
    await expect(loadEndpointsFromUrl('http://lists.test/hosts')).rejects.toThrow(
      'Failed to fetch endpoints from http://lists.test/hosts: HTTP 404',
    );
  });

  it('should raise StorageError when the request fails', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed');
      }),
    );
    await expect(loadEndpointsFromUrl('http://lists.test/hosts', 50)).rejects.toThrow(
      StorageError,
    );
  });
});
