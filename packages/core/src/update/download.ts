import { createHash } from 'crypto';
import { createWriteStream } from 'fs';
import path from 'path';
import { Readable, Transform } from 'stream';
import { pipeline } from 'stream/promises';
import fse from 'fs-extra';
import { HttpError, Logger, errorMessage } from '@pacup/shared';

export interface DownloadOptions {
  /** Directory the artifact is written to. Created when missing. */
  dir: string;
  /** Time allowed until response headers arrive. */
  timeoutMs?: number;
  contentLengthRetries?: number;
  userAgent?: string;
  onProgress?: (received: number, total?: number) => void;
  logger?: Logger;
}

export interface DownloadResult {
  sha256: string;
  path: string;
  bytes: number;
}

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_CONTENT_LENGTH_RETRIES = 3;

function artifactName(url: string): string {
  try {
    return path.posix.basename(new URL(url).pathname) || 'artifact';
  } catch {
    return 'artifact';
  }
}

async function request(
  url: string,
  headers: Record<string, string>,
  timeoutMs: number,
): Promise<Response> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  try {
    return await fetch(url, { headers, signal: controller.signal, redirect: 'follow' });
  } catch (error) {
    const message = controller.signal.aborted
      ? `No response from ${url} within ${timeoutMs}ms`
      : `Request to ${url} failed: ${errorMessage(error)}`;
    throw new HttpError(message, { cause: error });
  } finally {
    clearTimeout(timer);
  }
}

function contentLength(response: Response): number | undefined {
  const header = response.headers.get('content-length');
  if (header === null) return undefined;
  const value = Number(header);
  return Number.isSafeInteger(value) && value >= 0 ? value : undefined;
}

/**
 * Downloads `url` into `options.dir` and hashes it on the way.
 *
 * Responses without a `Content-Length` (typically compressed on the fly) are
 * discarded unread and requested again with identity encoding, so progress
 * can show a total. The last attempt is kept either way.
 */
export async function downloadArtifact(
  url: string,
  options: DownloadOptions,
): Promise<DownloadResult> {
  const log = options.logger;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const retries = options.contentLengthRetries ?? DEFAULT_CONTENT_LENGTH_RETRIES;
  const headers: Record<string, string> = { 'User-Agent': options.userAgent ?? 'pacup' };

  let response = await request(url, headers, timeoutMs);
  for (let attempt = 0; attempt < retries; attempt++) {
    if (!response.ok || contentLength(response) !== undefined) break;
    log?.debug(`No Content-Length from ${url}, retrying with identity encoding`);
    await response.body?.cancel();
    response = await request(url, { ...headers, 'Accept-Encoding': 'identity' }, timeoutMs);
  }

  if (!response.ok) {
    await response.body?.cancel();
    throw new HttpError(`Download of ${url} failed with status ${response.status}`, {
      status: response.status,
    });
  }
  if (!response.body) {
    throw new HttpError(`Download of ${url} returned no body`, { status: response.status });
  }

  await fse.ensureDir(options.dir);
  const target = path.join(options.dir, artifactName(url));
  const total = contentLength(response);
  const hash = createHash('sha256');
  let received = 0;

  const meter = new Transform({
    transform(chunk: Buffer, _encoding, callback) {
      hash.update(chunk);
      received += chunk.length;
      options.onProgress?.(received, total);
      callback(null, chunk);
    },
  });

  try {
    await pipeline(Readable.fromWeb(response.body), meter, createWriteStream(target));
  } catch (error) {
    throw new HttpError(`Download of ${url} was interrupted: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const sha256 = hash.digest('hex');
  log?.info(`Downloaded ${received} bytes to ${target} (sha256 ${sha256})`);
  return { sha256, path: target, bytes: received };
}
