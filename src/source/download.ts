import fs from 'node:fs';
import path from 'node:path';
import { pipeline } from 'node:stream/promises';
import { DownloadFailedError } from '../shared/errors.js';
import { generateId } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

export interface DownloadOptions {
  timeoutMs?: number;
  userAgent?: string;
}

/**
 * Chunks of a fetch body. If the consumer stops early (the write side failed),
 * the body is cancelled so the connection is released.
 */
async function* bodyChunks(body: ReadableStream<Uint8Array>): AsyncGenerator<Uint8Array> {
  const reader = body.getReader();
  let drained = false;
  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        drained = true;
        return;
      }
      yield value;
    }
  } finally {
    if (!drained) {
      await reader.cancel().catch((err: unknown) => {
        logger.debug({ error: err instanceof Error ? err.message : String(err) }, 'Response body cancel failed');
      });
    }
    reader.releaseLock();
  }
}

/**
 * Remove `<name>.<id>.part` files left next to `filePath` by an interrupted transfer.
 */
async function removeStaleParts(filePath: string): Promise<void> {
  const dir = path.dirname(filePath);
  const prefix = `${path.basename(filePath)}.`;
  const stale = (await fs.promises.readdir(dir)).filter((f) => f.startsWith(prefix) && f.endsWith('.part'));
  for (const name of stale) {
    await fs.promises.rm(path.join(dir, name), { force: true });
  }
  if (stale.length > 0) {
    logger.info({ file_path: filePath, removed: stale.length }, 'Removed stale partial downloads');
  }
}

/**
 * Final path segment of the URL, query string and fragment ignored.
 */
export function deriveFileName(audioUrl: string): string {
  let pathname: string;
  try {
    pathname = new URL(audioUrl).pathname;
  } catch {
    throw new DownloadFailedError(`Invalid audio URL: ${audioUrl}`, { url: audioUrl });
  }

  const name = path.posix.basename(pathname);
  if (!name || name === '.' || name === '..') {
    throw new DownloadFailedError(`Audio URL has no file name: ${audioUrl}`, { url: audioUrl });
  }
  return name;
}

export function deriveAudioPath(audioUrl: string, audioDir: string): string {
  return path.join(audioDir, deriveFileName(audioUrl));
}

/**
 * Download an audio file into `audioDir` and return its local path.
 *
 * An existing file at the derived path is returned as-is. Otherwise the body is
 * streamed into a temporary sibling and renamed onto the destination once complete,
 * so a failed transfer never leaves a file at the destination.
 */
export async function downloadAudio(
  audioUrl: string,
  audioDir: string,
  options: DownloadOptions = {},
): Promise<string> {
  const { timeoutMs = 600000, userAgent } = options;
  const filePath = deriveAudioPath(audioUrl, audioDir);

  if (fs.existsSync(filePath)) {
    logger.info({ file_path: filePath }, 'Audio file already exists');
    return filePath;
  }

  fs.mkdirSync(audioDir, { recursive: true });
  await removeStaleParts(filePath);
  const tempPath = `${filePath}.${generateId(8)}.part`;
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const headers: Record<string, string> = {};
    if (userAgent) headers['User-Agent'] = userAgent;

    const response = await fetch(audioUrl, {
      headers,
      signal: controller.signal,
      redirect: 'follow',
    });

    if (!response.ok) {
      throw new DownloadFailedError(`Download failed: ${response.status} from ${audioUrl}`, {
        url: audioUrl,
        status: response.status,
      });
    }
    if (!response.body) {
      throw new DownloadFailedError(`Download failed: empty body from ${audioUrl}`, { url: audioUrl });
    }

    await pipeline(bodyChunks(response.body), fs.createWriteStream(tempPath));

    const { size } = await fs.promises.stat(tempPath);
    if (size === 0) {
      throw new DownloadFailedError(`Download failed: empty body from ${audioUrl}`, { url: audioUrl });
    }

    await fs.promises.rename(tempPath, filePath);
    logger.info({ file_path: filePath, bytes: size }, 'Audio downloaded');
    return filePath;
  } catch (err) {
    await fs.promises.rm(tempPath, { force: true });
    if (err instanceof DownloadFailedError) throw err;
    if (err instanceof Error && err.name === 'AbortError') {
      throw new DownloadFailedError(`Download timed out after ${timeoutMs}ms: ${audioUrl}`, {
        url: audioUrl,
        timeout: timeoutMs,
      });
    }
    throw new DownloadFailedError(
      `Download failed: ${err instanceof Error ? err.message : String(err)}`,
      { url: audioUrl },
    );
  } finally {
    clearTimeout(timer);
  }
}
