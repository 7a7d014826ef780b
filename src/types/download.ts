export interface DownloadDirectorySnapshot {
  /** Directory the snapshot was taken from */
  directory: string;
  /** Entry names present when the snapshot was taken */
  names: ReadonlySet<string>;
  /** Epoch milliseconds of the capture */
  capturedAt: number;
}

export interface CandidateFile {
  /** Absolute path inside the watched directory */
  path: string;
  name: string;
  /** Last modification time in epoch milliseconds */
  mtimeMs: number;
}

export interface FileProbeStats {
  size: number;
  mtimeMs: number;
}

/**
 * Minimal view of the filesystem the detector needs. `null` stands for an
 * entry (or directory) that could not be read at that instant.
 */
export interface DirectoryProbe {
  list: (directory: string) => Promise<string[] | null>;
  stat: (filePath: string) => Promise<FileProbeStats | null>;
}

export interface Clock {
  now: () => number;
  sleep: (ms: number) => Promise<void>;
}

export type CandidateSelector = (candidates: CandidateFile[]) => CandidateFile | null;

export type CompletionPhase = 'scanning' | 'stability';

export type CompletionOutcome =
  | {
      status: 'completed';
      filePath: string;
      elapsedMs: number;
    }
  | {
      status: 'timed-out';
      phase: CompletionPhase;
      /** Candidate that never settled, when the stability phase was reached */
      candidatePath?: string;
      elapsedMs: number;
    };

export interface CompletionOptions {
  timeoutMs: number;
  scanIntervalMs?: number;
  stabilityIntervalMs?: number;
  requiredStableReadings?: number;
  maxStabilityChecks?: number;
  partialSuffixes?: readonly string[];
  selectCandidate?: CandidateSelector;
  probe?: DirectoryProbe;
  clock?: Clock;
}
