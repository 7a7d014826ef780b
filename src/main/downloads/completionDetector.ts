import path from 'path';
import type {
  CandidateFile,
  CompletionOptions,
  CompletionOutcome,
  DirectoryProbe,
  DownloadDirectorySnapshot,
} from '../../types/download';
import { PARTIAL_DOWNLOAD_SUFFIXES, isPartialDownload } from '../../common/partialDownloads';
import {
  logCandidate,
  logScan,
  logStabilityReading,
  logUnreadableCandidate,
  logVerifyResult,
  logVerifyStart,
} from '../../utils/downloadLogger';
import { selectMostRecent } from './candidateSelection';
import { systemClock } from './clock';
import { nodeDirectoryProbe } from './directoryProbe';
import { pollUntilStable } from './pollUntilStable';

export const DEFAULT_SCAN_INTERVAL_MS = 2000;
export const DEFAULT_STABILITY_INTERVAL_MS = 1000;
export const DEFAULT_REQUIRED_STABLE_READINGS = 5;
export const DEFAULT_MAX_STABILITY_CHECKS = 25;

/**
 * Records the names in `directory`. Must be taken before the action that
 * starts a download, otherwise the new file is part of the baseline.
 */
export const captureDirectorySnapshot = async (
  directory: string,
  probe: DirectoryProbe = nodeDirectoryProbe,
  now: () => number = Date.now,
): Promise<DownloadDirectorySnapshot> => {
  const names = (await probe.list(directory)) ?? [];
  return {
    directory,
    names: new Set(names),
    capturedAt: now(),
  };
};

export const listPartialDownloads = async (
  directory: string,
  probe: DirectoryProbe = nodeDirectoryProbe,
  suffixes: readonly string[] = PARTIAL_DOWNLOAD_SUFFIXES,
): Promise<string[]> => {
  const names = (await probe.list(directory)) ?? [];
  return names.filter((name) => isPartialDownload(name, suffixes));
};

const statCandidates = async (
  directory: string,
  names: string[],
  probe: DirectoryProbe,
): Promise<CandidateFile[]> => {
  const candidates: CandidateFile[] = [];
  for (const name of names) {
    const filePath = path.join(directory, name);
    const stats = await probe.stat(filePath);
    if (!stats) {
      logUnreadableCandidate(name);
      continue;
    }
    candidates.push({ path: filePath, name, mtimeMs: stats.mtimeMs });
  }
  return candidates;
};

/**
 * Polls `directory` until a file absent from `baseline` appears and its size
 * holds still for `requiredStableReadings` consecutive reads. Only one
 * candidate is followed per call: if it never settles the call times out
 * rather than switching to another file.
 *
 * The first read of a new size already counts toward the streak, so with the
 * defaults (5 readings, 1000 ms apart) completion is reported four intervals
 * after the first read of the final size. That can be as little as 4 s after
 * the last change, not 5 s.
 */
export const waitForCompletion = async (
  directory: string,
  baseline: DownloadDirectorySnapshot,
  options: CompletionOptions,
): Promise<CompletionOutcome> => {
  const {
    timeoutMs,
    scanIntervalMs = DEFAULT_SCAN_INTERVAL_MS,
    stabilityIntervalMs = DEFAULT_STABILITY_INTERVAL_MS,
    requiredStableReadings = DEFAULT_REQUIRED_STABLE_READINGS,
    maxStabilityChecks = DEFAULT_MAX_STABILITY_CHECKS,
    partialSuffixes = PARTIAL_DOWNLOAD_SUFFIXES,
    selectCandidate = selectMostRecent,
    probe = nodeDirectoryProbe,
    clock = systemClock,
  } = options;

  const startedAt = clock.now();
  const deadline = startedAt + timeoutMs;
  const elapsed = () => clock.now() - startedAt;

  logVerifyStart(directory, baseline.names, timeoutMs);

  const finish = (outcome: CompletionOutcome) => {
    logVerifyResult(outcome);
    return outcome;
  };

  while (clock.now() - startedAt < timeoutMs) {
    const current = (await probe.list(directory)) ?? [];
    const rawNew = current.filter((name) => !baseline.names.has(name));
    const completed = rawNew.filter((name) => !isPartialDownload(name, partialSuffixes));
    logScan({ rawNew, completed, elapsedMs: elapsed() });

    if (completed.length === 0) {
      await clock.sleep(scanIntervalMs);
      continue;
    }

    const candidates = await statCandidates(directory, completed, probe);
    const chosen = candidates.length > 0 ? selectCandidate(candidates) : null;
    if (!chosen) {
      await clock.sleep(stabilityIntervalMs);
      continue;
    }
    logCandidate(chosen.path, candidates.length);

    const stability = await pollUntilStable<number>({
      read: async () => (await probe.stat(chosen.path))?.size ?? null,
      clock,
      intervalMs: stabilityIntervalMs,
      requiredStreak: requiredStableReadings,
      maxAttempts: maxStabilityChecks,
      deadline,
      isEligible: (size) => size > 0,
      onReading: ({ value, streak, attempt }) =>
        logStabilityReading({
          candidatePath: chosen.path,
          size: value,
          streak,
          required: requiredStableReadings,
          attempt,
          maxAttempts: maxStabilityChecks,
        }),
    });

    if (stability.stable) {
      return finish({ status: 'completed', filePath: chosen.path, elapsedMs: elapsed() });
    }
    return finish({
      status: 'timed-out',
      phase: 'stability',
      candidatePath: chosen.path,
      elapsedMs: elapsed(),
    });
  }

  return finish({ status: 'timed-out', phase: 'scanning', elapsedMs: elapsed() });
};
