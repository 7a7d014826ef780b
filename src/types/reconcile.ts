export interface MovedEntry {
  from: string;
  to: string;
}

export interface FailedEntry {
  from: string;
  error: string;
}

export interface RelocationResult {
  sourceDir: string;
  destinationDir: string;
  moved: MovedEntry[];
  failed: FailedEntry[];
  /** Recorded paths rewritten to their final location */
  paths: string[];
}

export interface CleanResult {
  directory: string;
  removed: string[];
  failed: FailedEntry[];
}

export type MoveFileFn = (sourcePath: string, destinationDir: string) => Promise<string>;
