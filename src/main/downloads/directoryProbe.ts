import fs from 'fs/promises';
import type { DirectoryProbe, FileProbeStats } from '../../types/download';

const listDirectory = async (directory: string): Promise<string[] | null> => {
  try {
    return await fs.readdir(directory);
  } catch {
    // Missing or unreadable directories count as "nothing there yet".
    return null;
  }
};

const statFile = async (filePath: string): Promise<FileProbeStats | null> => {
  try {
    const stats = await fs.stat(filePath);
    if (!stats.isFile()) return null;
    return { size: stats.size, mtimeMs: stats.mtimeMs };
  } catch {
    return null;
  }
};

export const nodeDirectoryProbe: DirectoryProbe = {
  list: listDirectory,
  stat: statFile,
};
