import type { CompletionOptions, CompletionOutcome } from '../../types/download';
import type { MoveFileFn } from '../../types/reconcile';
import { describeError } from '../../common/errors';
import { createLogger } from '../../utils/logger';
import { logDownloadError } from '../../utils/downloadLogger';
import {
  captureDirectorySnapshot,
  listPartialDownloads,
  waitForCompletion,
} from '../downloads/completionDetector';
import { moveFileExclusive } from '../downloads/pathAllocator';
import type { DownloadTrigger, ModelPageDriver } from './pageDriver';

const logger = createLogger('file-downloads');

export type TriggerMode = 'bulk' | 'individual';

export interface TriggerReport {
  label: string;
  mode: TriggerMode;
  outcome: CompletionOutcome | null;
  savedPath?: string;
  error?: string;
  /** In-progress files left behind after a timeout */
  partialFiles?: string[];
}

export interface FileDownloadResult {
  paths: string[];
  reports: TriggerReport[];
}

export type DetectorSettings = Omit<CompletionOptions, 'timeoutMs'>;

export interface FileDownloadOptions {
  /** Browser download directory, shared by every trigger */
  tempDownloadDir: string;
  /** Where verified files are moved */
  targetDir: string;
  bulkTimeoutMs: number;
  fileTimeoutMs: number;
  detector?: DetectorSettings;
  moveFile?: MoveFileFn;
}

const runTrigger = async (
  trigger: DownloadTrigger,
  mode: TriggerMode,
  timeoutMs: number,
  options: FileDownloadOptions,
): Promise<TriggerReport> => {
  const { tempDownloadDir, targetDir, detector = {}, moveFile = moveFileExclusive } = options;
  const report: TriggerReport = { label: trigger.label, mode, outcome: null };

  // The baseline has to exist before the click or the new file would be part of it.
  const { clock } = detector;
  const baseline = await captureDirectorySnapshot(
    tempDownloadDir,
    detector.probe,
    clock ? () => clock.now() : undefined,
  );

  try {
    await trigger.click();
  } catch (error: unknown) {
    report.error = describeError(error);
    logger.warn(`Could not trigger ${trigger.label}: ${report.error}`);
    return report;
  }

  const outcome = await waitForCompletion(tempDownloadDir, baseline, { ...detector, timeoutMs });
  report.outcome = outcome;

  if (outcome.status !== 'completed') {
    report.partialFiles = await listPartialDownloads(tempDownloadDir, detector.probe, detector.partialSuffixes);
    logger.warn(
      `${trigger.label} did not complete (${outcome.phase})${
        report.partialFiles.length ? `; partial files: ${report.partialFiles.join(', ')}` : ''
      }`,
    );
    return report;
  }

  try {
    report.savedPath = await moveFile(outcome.filePath, targetDir);
    logger.info(`${trigger.label} saved to ${report.savedPath}`);
  } catch (error: unknown) {
    report.error = describeError(error);
    logDownloadError(error, { stage: 'file', filePath: outcome.filePath });
  }
  return report;
};

/**
 * Tries the bulk download first and falls back to the per-file buttons when
 * it is missing or does not land. Every trigger gets its own baseline.
 */
export const downloadModelFiles = async (
  driver: ModelPageDriver,
  options: FileDownloadOptions,
): Promise<FileDownloadResult> => {
  const result: FileDownloadResult = { paths: [], reports: [] };

  const record = (report: TriggerReport) => {
    result.reports.push(report);
    if (report.savedPath) {
      result.paths.push(report.savedPath);
    }
  };

  const bulk = await driver.findBulkDownload();
  if (bulk) {
    record(await runTrigger(bulk, 'bulk', options.bulkTimeoutMs, options));
  } else {
    logger.info('No bulk download available, trying individual files');
  }

  if (result.paths.length > 0) {
    return result;
  }

  const triggers = await driver.findIndividualDownloads();
  for (const trigger of triggers) {
    record(await runTrigger(trigger, 'individual', options.fileTimeoutMs, options));
  }

  if (result.paths.length === 0) {
    logger.warn('No files were downloaded for this model');
  }
  return result;
};
