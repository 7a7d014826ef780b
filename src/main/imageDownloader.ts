import path from 'path';
import mime from 'mime-types';
import { sanitizeExtension, sanitizeFileName } from '../common/fileName';
import { logDownloadError } from '../utils/downloadLogger';
import { createLogger } from '../utils/logger';
import { writeFileExclusive } from './downloads/pathAllocator';

const logger = createLogger('image-downloader');

const DEFAULT_IMAGE_EXTENSION = '.jpg';
const DEFAULT_TIMEOUT_MS = 30000;
const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36';

const imageExtensionInUrl = /\.(jpg|jpeg|png|webp)(?![\p{L}\p{N}])/iu;

const urlPathname = (url: string) => {
  try {
    return new URL(url).pathname;
  } catch {
    return url.split('?')[0];
  }
};

export const inferImageExtension = (url: string, contentType?: string | null): string => {
  const fromPath = path.posix.extname(urlPathname(url));
  const cleanedFromPath = sanitizeExtension(fromPath);
  if (fromPath && cleanedFromPath === fromPath) {
    return fromPath.toLowerCase();
  }
  const match = imageExtensionInUrl.exec(url);
  if (match) {
    return `.${match[1].toLowerCase()}`;
  }
  if (contentType) {
    const extension = mime.extension(contentType);
    if (extension) {
      return `.${extension}`;
    }
  }
  return cleanedFromPath ? cleanedFromPath.toLowerCase() : DEFAULT_IMAGE_EXTENSION;
};

export interface DownloadImageOptions {
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
}

/**
 * Saves the image at `url` into `directory` as `{baseName}{ext}` (suffixed
 * when taken). Returns the written path, or `null` when the download failed.
 */
export const downloadImage = async (
  url: string,
  directory: string,
  baseName: string,
  { fetchImpl = fetch, timeoutMs = DEFAULT_TIMEOUT_MS }: DownloadImageOptions = {},
): Promise<string | null> => {
  try {
    const response = await fetchImpl(url, {
      headers: { 'User-Agent': USER_AGENT },
      signal: AbortSignal.timeout(timeoutMs),
    });
    if (!response.ok) {
      throw new Error(`Image request failed with ${response.status}`);
    }
    const body = new Uint8Array(await response.arrayBuffer());
    const extension = inferImageExtension(url, response.headers.get('content-type'));
    const safeBase = sanitizeFileName(baseName) || 'image';
    const savedPath = await writeFileExclusive(directory, safeBase, extension, body);
    logger.info(`Downloaded image ${path.basename(savedPath)}`);
    return savedPath;
  } catch (error: unknown) {
    logDownloadError(error, { url, stage: 'image' });
    return null;
  }
};
