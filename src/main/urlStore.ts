import fs from 'fs/promises';
import path from 'path';
import { describeError, errorCode } from '../common/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('url-store');

export const saveUrls = async (urls: readonly string[], filePath: string): Promise<boolean> => {
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, urls.map((url) => `${url}\n`).join(''), 'utf8');
    logger.info(`Saved ${urls.length} URLs to ${filePath}`);
    return true;
  } catch (error: unknown) {
    logger.error(`Error saving URLs to ${filePath}: ${describeError(error)}`);
    return false;
  }
};

export const loadUrls = async (filePath: string): Promise<string[]> => {
  try {
    const raw = await fs.readFile(filePath, 'utf8');
    const urls = raw
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter(Boolean);
    logger.info(`Loaded ${urls.length} URLs from ${filePath}`);
    return urls;
  } catch (error: unknown) {
    if (errorCode(error) === 'ENOENT') {
      logger.warn(`URL list file not found: ${filePath}`);
    } else {
      logger.error(`Error loading URLs from ${filePath}: ${describeError(error)}`);
    }
    return [];
  }
};
