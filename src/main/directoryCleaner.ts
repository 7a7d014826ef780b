import fs from 'fs/promises';
import path from 'path';
import type { CleanResult } from '../types/reconcile';
import { describeError, errorCode } from '../common/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('directory-cleaner');

/**
 * Empties `directory`, creating it when missing. Entries that cannot be
 * removed are reported; the remaining ones are still removed.
 */
export const cleanDirectory = async (directory: string): Promise<CleanResult> => {
  const result: CleanResult = { directory, removed: [], failed: [] };

  let names: string[];
  try {
    names = await fs.readdir(directory);
  } catch (error: unknown) {
    if (errorCode(error) !== 'ENOENT') {
      throw error;
    }
    await fs.mkdir(directory, { recursive: true });
    return result;
  }

  logger.info(`Cleaning ${directory} (${names.length} entries)`);
  for (const name of names) {
    const entryPath = path.join(directory, name);
    try {
      await fs.rm(entryPath, { recursive: true, force: true });
      result.removed.push(entryPath);
    } catch (error: unknown) {
      logger.warn(`Failed to delete ${entryPath}: ${describeError(error)}`);
      result.failed.push({ from: entryPath, error: describeError(error) });
    }
  }
  return result;
};

export const removeDirectory = async (directory: string): Promise<boolean> => {
  try {
    await fs.rm(directory, { recursive: true, force: true });
    return true;
  } catch (error: unknown) {
    logger.warn(`Could not remove ${directory}: ${describeError(error)}`);
    return false;
  }
};
