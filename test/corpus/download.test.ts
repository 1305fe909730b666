/**
 * Tests for the streaming download module
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, readdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  streamDownload,
  downloadToFile,
  downloadIfNotThere,
  fileExists,
} from '../../src/corpus/download.js';
import { DownloadError } from '../../src/lib/errors.js';
import type { DownloadProgress } from '../../src/corpus/types.js';
import { makeTempDir, mockResponse, removeDir } from '../helpers.js';

// Mock fetch globally
const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

async function drain(stream: ReadableStream<Uint8Array>): Promise<number[]> {
  const reader = stream.getReader();
  const bytes: number[] = [];
  while (true) {
    const { done, value } = await reader.read();
    if (done) break;
    bytes.push(...value);
  }
  return bytes;
}

describe('streamDownload', () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it('should stream data from URL', async () => {
    mockFetch.mockResolvedValueOnce(mockResponse(new Uint8Array([1, 2, 3, 4, 5])));

    const stream = await streamDownload('https://archive.test/de-en.tgz');

    expect(await drain(stream)).toEqual([1, 2, 3, 4, 5]);
    expect(mockFetch).toHaveBeenCalledWith('https://archive.test/de-en.tgz', {});
  });

  it('should report progress with a final update', async () => {
    mockFetch.mockResolvedValueOnce(mockResponse(new Uint8Array(10)));

    const updates: DownloadProgress[] = [];
    const stream = await streamDownload('https://archive.test/de-en.tgz', {
      onProgress: (p) => updates.push({ ...p }),
    });
    await drain(stream);

    const last = updates[updates.length - 1];
    expect(last?.bytesDownloaded).toBe(10);
    expect(last?.totalBytes).toBe(10);
  });

  it('should leave totalBytes unset without Content-Length', async () => {
    mockFetch.mockResolvedValueOnce(mockResponse(new Uint8Array(4), { contentLength: false }));

    const updates: DownloadProgress[] = [];
    const stream = await streamDownload('https://archive.test/de-en.tgz', {
      onProgress: (p) => updates.push({ ...p }),
    });
    await drain(stream);

    const last = updates[updates.length - 1];
    expect(last?.bytesDownloaded).toBe(4);
    expect(last && 'totalBytes' in last).toBe(false);
  });

  it('should not retry by default', async () => {
    mockFetch.mockRejectedValue(new Error('Network error'));

    await expect(streamDownload('https://archive.test/de-en.tgz')).rejects.toThrow('Network error');
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('should retry network errors when asked', async () => {
    mockFetch.mockRejectedValue(new Error('Network error'));

    await expect(
      streamDownload('https://archive.test/de-en.tgz', { maxRetries: 3, retryDelayMs: 1 })
    ).rejects.toThrow('Network error');
    expect(mockFetch).toHaveBeenCalledTimes(4);
  });

  it('should not retry client errors', async () => {
    mockFetch.mockResolvedValue(
      mockResponse(new Uint8Array(0), { status: 404, statusText: 'Not Found' })
    );

    const attempt = streamDownload('https://archive.test/missing.tgz', {
      maxRetries: 3,
      retryDelayMs: 1,
    });
    await expect(attempt).rejects.toThrow(DownloadError);
    await expect(attempt).rejects.toThrow(
      'Client error: 404 Not Found (https://archive.test/missing.tgz)'
    );
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('should retry server errors then succeed', async () => {
    mockFetch
      .mockResolvedValueOnce(mockResponse(new Uint8Array(0), { status: 500, statusText: 'Internal Server Error' }))
      .mockResolvedValueOnce(mockResponse(new Uint8Array(0), { status: 503, statusText: 'Service Unavailable' }))
      .mockResolvedValueOnce(mockResponse(new Uint8Array([7, 8, 9])));

    const stream = await streamDownload('https://archive.test/de-en.tgz', {
      maxRetries: 3,
      retryDelayMs: 1,
    });

    expect(await drain(stream)).toEqual([7, 8, 9]);
    expect(mockFetch).toHaveBeenCalledTimes(3);
  });

  it('should stop when the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('stop requested'));
    mockFetch.mockRejectedValue(new Error('fetch aborted'));

    await expect(
      streamDownload('https://archive.test/de-en.tgz', {
        signal: controller.signal,
        maxRetries: 3,
        retryDelayMs: 1,
      })
    ).rejects.toThrow('stop requested');
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });
});

describe('file downloads', () => {
  let dir: string;

  beforeEach(async () => {
    mockFetch.mockReset();
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('should write the body to the destination', async () => {
    mockFetch.mockResolvedValueOnce(mockResponse(new TextEncoder().encode('archive bytes')));
    const dest = join(dir, 'nested', 'iwslt2016.de-en.tgz');

    const bytes = await downloadToFile('https://archive.test/de-en.tgz', dest);

    expect(bytes).toBe(13);
    expect(await readFile(dest, 'utf-8')).toBe('archive bytes');
    expect(await readdir(join(dir, 'nested'))).toEqual(['iwslt2016.de-en.tgz']);
  });

  it('should leave nothing behind when the download fails', async () => {
    mockFetch.mockResolvedValueOnce(
      mockResponse(new Uint8Array(0), { status: 404, statusText: 'Not Found' })
    );
    const dest = join(dir, 'iwslt2016.de-en.tgz');

    await expect(downloadToFile('https://archive.test/de-en.tgz', dest)).rejects.toThrow(DownloadError);
    expect(await readdir(dir)).toEqual([]);
  });

  it('should skip the download when the file exists', async () => {
    const dest = join(dir, 'iwslt2016.de-en.tgz');
    await writeFile(dest, 'cached');

    expect(await downloadIfNotThere('https://archive.test/de-en.tgz', dest)).toBe(false);
    expect(mockFetch).not.toHaveBeenCalled();
    expect(await readFile(dest, 'utf-8')).toBe('cached');
  });

  it('should download again when forced', async () => {
    const dest = join(dir, 'iwslt2016.de-en.tgz');
    await writeFile(dest, 'cached');
    mockFetch.mockResolvedValueOnce(mockResponse(new TextEncoder().encode('fresh')));

    expect(await downloadIfNotThere('https://archive.test/de-en.tgz', dest, { force: true })).toBe(true);
    expect(await readFile(dest, 'utf-8')).toBe('fresh');
  });

  it('should download when the file is missing', async () => {
    const dest = join(dir, 'iwslt2016.de-en.tgz');
    mockFetch.mockResolvedValueOnce(mockResponse(new TextEncoder().encode('new')));

    expect(await downloadIfNotThere('https://archive.test/de-en.tgz', dest)).toBe(true);
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });
});

describe('fileExists', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('should report regular files only', async () => {
    await writeFile(join(dir, 'a.tgz'), 'x');
    await mkdir(join(dir, 'sub'));

    expect(await fileExists(join(dir, 'a.tgz'))).toBe(true);
    expect(await fileExists(join(dir, 'sub'))).toBe(false);
    expect(await fileExists(join(dir, 'missing.tgz'))).toBe(false);
  });
});
