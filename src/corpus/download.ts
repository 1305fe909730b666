/**
 * Streaming HTTP download with progress tracking and optional retry
 */

import { createWriteStream } from 'node:fs';
import { mkdir, rename, rm, stat } from 'node:fs/promises';
import { dirname } from 'node:path';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import type { DownloadOptions, DownloadProgress } from './types.js';
import { DownloadError } from '../lib/errors.js';
import {
  DEFAULT_MAX_RETRIES,
  DEFAULT_RETRY_DELAY_MS,
  PROGRESS_INTERVAL_MS,
} from '../lib/constants.js';
import { createLogger } from '../lib/logger.js';

const getLog = () => createLogger('corpus:download');

/**
 * Stream download from a URL with progress tracking.
 *
 * Network errors and 5xx responses are retried up to `maxRetries` times
 * with exponential backoff; 4xx responses fail immediately.
 *
 * @returns A ReadableStream of the downloaded bytes
 *
 * @example
 * ```typescript
 * const stream = await streamDownload('https://wit3.fbk.eu/archive/2016-01//texts/de/en/de-en.tgz', {
 *   onProgress: (p) => console.log(`Downloaded ${p.bytesDownloaded} bytes`),
 *   maxRetries: 2,
 * });
 * ```
 */
export async function streamDownload(
  url: string,
  options: DownloadOptions = {}
): Promise<ReadableStream<Uint8Array>> {
  const {
    onProgress,
    signal,
    maxRetries = DEFAULT_MAX_RETRIES,
    retryDelayMs = DEFAULT_RETRY_DELAY_MS,
  } = options;

  let attempt = 0;
  let lastError: Error | null = null;

  while (attempt <= maxRetries) {
    try {
      return await attemptDownload(url, signal, onProgress);
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      signal?.throwIfAborted();

      if (lastError instanceof DownloadError && !lastError.retryable) {
        throw lastError;
      }

      attempt++;
      if (attempt <= maxRetries) {
        const delay = retryDelayMs * Math.pow(2, attempt - 1);
        getLog().warn('Download attempt failed, retrying', {
          url,
          attempt,
          delayMs: delay,
          error: lastError,
        });
        await sleep(delay);
      }
    }
  }

  throw lastError ?? new Error(`Download failed: ${url}`);
}

/**
 * Single download attempt
 */
async function attemptDownload(
  url: string,
  signal: AbortSignal | undefined,
  onProgress: ((progress: DownloadProgress) => void) | undefined
): Promise<ReadableStream<Uint8Array>> {
  const response = await fetch(url, signal ? { signal } : {});

  if (!response.ok) {
    throw new DownloadError(url, response.status, response.statusText);
  }

  const body = response.body;
  if (!body) {
    throw new Error(`Response body is null: ${url}`);
  }

  const contentLength = response.headers.get('Content-Length');
  const totalBytes = contentLength ? parseInt(contentLength, 10) : undefined;

  if (!onProgress) {
    return body;
  }

  return createProgressStream(body, onProgress, totalBytes);
}

/**
 * Wrap a stream so that consumed bytes are reported, throttled to
 * PROGRESS_INTERVAL_MS, with a final report at end of stream
 */
function createProgressStream(
  source: ReadableStream<Uint8Array>,
  onProgress: (progress: DownloadProgress) => void,
  totalBytes: number | undefined
): ReadableStream<Uint8Array> {
  let bytesDownloaded = 0;
  const startTime = Date.now();
  let lastProgressTime = startTime;

  const report = (now: number): void => {
    const elapsedMs = now - startTime;
    const progress: DownloadProgress = {
      bytesDownloaded,
      bytesPerSecond: elapsedMs > 0 ? bytesDownloaded / (elapsedMs / 1000) : 0,
      elapsedMs,
    };
    if (totalBytes !== undefined) {
      progress.totalBytes = totalBytes;
    }
    onProgress(progress);
  };

  const reader = source.getReader();

  return new ReadableStream<Uint8Array>({
    async pull(controller) {
      try {
        const { done, value } = await reader.read();

        if (done) {
          report(Date.now());
          controller.close();
          return;
        }

        bytesDownloaded += value.byteLength;
        controller.enqueue(value);

        const now = Date.now();
        if (now - lastProgressTime >= PROGRESS_INTERVAL_MS) {
          lastProgressTime = now;
          report(now);
        }
      } catch (error) {
        controller.error(error);
      }
    },

    async cancel(reason) {
      await reader.cancel(reason);
    },
  });
}

/**
 * Download a URL to a file.
 *
 * Bytes are written to a temporary sibling and renamed into place, so the
 * destination never holds a partial archive.
 *
 * @returns Number of bytes written
 */
export async function downloadToFile(
  url: string,
  destPath: string,
  options: DownloadOptions = {}
): Promise<number> {
  await mkdir(dirname(destPath), { recursive: true });

  const stream = await streamDownload(url, options);
  const partPath = `${destPath}.${process.pid}.${Date.now()}.part`;
  const out = createWriteStream(partPath);

  try {
    await pipeline(Readable.fromWeb(stream), out);
    await rename(partPath, destPath);
  } catch (error) {
    await rm(partPath, { force: true });
    throw error;
  }

  return out.bytesWritten;
}

/**
 * Download a URL to a file unless the file already exists.
 *
 * @returns True when a download happened
 */
export async function downloadIfNotThere(
  url: string,
  destPath: string,
  options: DownloadOptions & { force?: boolean } = {}
): Promise<boolean> {
  const { force = false, ...downloadOptions } = options;
  const log = getLog();

  if (!force && (await fileExists(destPath))) {
    log.debug('Archive already present, skipping download', { path: destPath });
    return false;
  }

  log.info('Downloading', { url, path: destPath });
  const bytes = await downloadToFile(url, destPath, downloadOptions);
  log.info('Download complete', { path: destPath, bytes });
  return true;
}

/**
 * Check whether a regular file exists at a path
 */
export async function fileExists(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Sleep helper for retry delays
 */
function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
