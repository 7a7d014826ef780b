import fs from 'fs/promises';
import path from 'path';
import type { ModelLayout, ModelOutputRecord } from '../types/model';
import type { MoveFileFn, MovedEntry, RelocationResult } from '../types/reconcile';
import { describeError, errorCode } from '../common/errors';
import { createLogger } from '../utils/logger';
import { logRelocation } from '../utils/downloadLogger';
import { allocateUniquePath, moveFileExclusive } from './downloads/pathAllocator';

const logger = createLogger('reconciler');

export interface RelocateOptions {
  moveFile?: MoveFileFn;
}

const listEntries = async (directory: string): Promise<string[]> => {
  try {
    return (await fs.readdir(directory)).sort((a, b) => a.localeCompare(b));
  } catch (error: unknown) {
    if (errorCode(error) === 'ENOENT') {
      return [];
    }
    throw error;
  }
};

const moveDirectoryExclusive = async (sourcePath: string, destinationDir: string) => {
  const targetPath = await allocateUniquePath(destinationDir, path.basename(sourcePath), '');
  try {
    await fs.rename(sourcePath, targetPath);
  } catch (error: unknown) {
    if (errorCode(error) !== 'EXDEV') {
      throw error;
    }
    await fs.cp(sourcePath, targetPath, { recursive: true, errorOnExist: true, force: false });
    await fs.rm(sourcePath, { recursive: true, force: true });
  }
  return targetPath;
};

/**
 * Default mover: files go through the exclusive allocator, nested folders
 * are renamed as a whole.
 */
export const moveEntry: MoveFileFn = async (sourcePath, destinationDir) => {
  const stats = await fs.lstat(sourcePath);
  await fs.mkdir(destinationDir, { recursive: true });
  if (stats.isDirectory()) {
    return moveDirectoryExclusive(sourcePath, destinationDir);
  }
  return moveFileExclusive(sourcePath, destinationDir);
};

const rewritePaths = (recordedPaths: readonly string[], moved: MovedEntry[]) => {
  const byBasename = new Map(moved.map((entry) => [path.basename(entry.from), entry.to]));
  return recordedPaths.flatMap((recorded) => {
    const target = byBasename.get(path.basename(recorded));
    return target ? [target] : [];
  });
};

/**
 * Moves every entry of `sourceDir` into `destinationDir` and rewrites the
 * recorded paths from what actually moved. A failing entry is logged and
 * skipped, and its recorded path is dropped. An empty source leaves the
 * recorded paths untouched.
 */
export const relocateDirectory = async (
  sourceDir: string,
  destinationDir: string,
  recordedPaths: readonly string[],
  { moveFile = moveEntry }: RelocateOptions = {},
): Promise<RelocationResult> => {
  const result: RelocationResult = {
    sourceDir,
    destinationDir,
    moved: [],
    failed: [],
    paths: [...recordedPaths],
  };

  const names = await listEntries(sourceDir);
  if (names.length === 0) {
    return result;
  }

  for (const name of names) {
    const from = path.join(sourceDir, name);
    try {
      const to = await moveFile(from, destinationDir);
      result.moved.push({ from, to });
    } catch (error: unknown) {
      const message = describeError(error);
      logger.warn(`Could not move ${from} to ${destinationDir}: ${message}`);
      result.failed.push({ from, error: message });
    }
  }

  result.paths = rewritePaths(recordedPaths, result.moved);
  logRelocation(result);
  return result;
};

export interface ReconcileReport {
  images: RelocationResult;
  files: RelocationResult;
}

/**
 * Relocates a model's temporary `images/` and `files/` into the final
 * layout and returns a copy of `record` pointing at the final paths.
 */
export const reconcileModelRecord = async (
  record: ModelOutputRecord,
  temporary: ModelLayout,
  final: ModelLayout,
  options: RelocateOptions = {},
): Promise<{ record: ModelOutputRecord; report: ReconcileReport }> => {
  const images = await relocateDirectory(
    temporary.imagesDir,
    final.imagesDir,
    record.downloadedImagePaths,
    options,
  );
  const files = await relocateDirectory(
    temporary.filesDir,
    final.filesDir,
    record.downloadedFilePaths,
    options,
  );

  return {
    record: {
      ...record,
      downloadedImagePaths: images.paths,
      downloadedFilePaths: files.paths,
    },
    report: { images, files },
  };
};
