import fs from 'fs/promises';
import { constants as fsConstants } from 'fs';
import path from 'path';
import { HarvestError, errorCode } from '../../common/errors';
import { isSafePathSegment, splitStemAndExtension } from '../../common/fileName';

const DEFAULT_MAX_ATTEMPTS = 5;

const pathExists = async (targetPath: string) => {
  try {
    await fs.access(targetPath);
    return true;
  } catch {
    return false;
  }
};

/**
 * Returns `{base}{ext}` or the first free `{base}_{n}{ext}` in `directory`.
 * The answer is only true at call time; creating the file is what settles it.
 */
export const allocateUniquePath = async (
  directory: string,
  baseName: string,
  extension: string,
): Promise<string> => {
  if (!isSafePathSegment(`${baseName}${extension}`)) {
    throw new HarvestError('unsafe-path', `Refusing to create "${baseName}${extension}" in ${directory}`);
  }
  let candidate = path.join(directory, `${baseName}${extension}`);
  let counter = 1;
  while (await pathExists(candidate)) {
    candidate = path.join(directory, `${baseName}_${counter}${extension}`);
    counter += 1;
  }
  return candidate;
};

export interface ExclusiveOptions {
  maxAttempts?: number;
}

/**
 * Re-runs `attempt` on a freshly allocated path for as long as creation
 * reports `EEXIST`, which means another writer claimed the path first.
 */
const withFreshPath = async (
  directory: string,
  baseName: string,
  extension: string,
  attempt: (targetPath: string) => Promise<void>,
  maxAttempts: number,
): Promise<string> => {
  for (let round = 0; round < maxAttempts; round += 1) {
    const targetPath = await allocateUniquePath(directory, baseName, extension);
    try {
      await attempt(targetPath);
      return targetPath;
    } catch (error: unknown) {
      if (errorCode(error) !== 'EEXIST') {
        throw error;
      }
    }
  }
  throw new HarvestError(
    'allocation-exhausted',
    `Could not claim a free name for ${baseName}${extension} in ${directory} after ${maxAttempts} attempts`,
  );
};

export const writeFileExclusive = async (
  directory: string,
  baseName: string,
  extension: string,
  data: string | Uint8Array,
  { maxAttempts = DEFAULT_MAX_ATTEMPTS }: ExclusiveOptions = {},
): Promise<string> => {
  await fs.mkdir(directory, { recursive: true });
  return withFreshPath(
    directory,
    baseName,
    extension,
    (targetPath) => fs.writeFile(targetPath, data, { flag: 'wx' }),
    maxAttempts,
  );
};

const claimByLinkOrCopy = async (sourcePath: string, targetPath: string) => {
  try {
    await fs.link(sourcePath, targetPath);
  } catch (error: unknown) {
    const code = errorCode(error);
    if (code !== 'EXDEV' && code !== 'EPERM' && code !== 'ENOTSUP') {
      throw error;
    }
    // Hard links are unavailable here (other device or filesystem without
    // link support): copy, still refusing to overwrite.
    await fs.copyFile(sourcePath, targetPath, fsConstants.COPYFILE_EXCL);
  }
  try {
    await fs.unlink(sourcePath);
  } catch (error: unknown) {
    // The source is still in place, so the claimed copy must not survive.
    await fs.rm(targetPath, { force: true });
    throw error;
  }
};

/**
 * Moves `sourcePath` into `directory` under its own name, or under a
 * `_n`-suffixed one when that name is taken. Never overwrites.
 */
export const moveFileExclusive = async (
  sourcePath: string,
  directory: string,
  { maxAttempts = DEFAULT_MAX_ATTEMPTS }: ExclusiveOptions = {},
): Promise<string> => {
  await fs.mkdir(directory, { recursive: true });
  const { stem, extension } = splitStemAndExtension(path.basename(sourcePath));
  return withFreshPath(
    directory,
    stem,
    extension,
    (targetPath) => claimByLinkOrCopy(sourcePath, targetPath),
    maxAttempts,
  );
};
