import type { Clock } from '../../types/download';
import type { ModelOutputRecord } from '../../types/model';
import type { MoveFileFn } from '../../types/reconcile';
import type { HarvestConfig } from '../config';
import { createLogger } from '../../utils/logger';
import { logDownloadError } from '../../utils/downloadLogger';
import { cleanDirectory, removeDirectory } from '../directoryCleaner';
import { systemClock } from '../downloads/clock';
import type { DetectorSettings } from './fileDownloads';
import { downloadModelFiles } from './fileDownloads';
import { downloadImage } from '../imageDownloader';
import {
  createTemporaryModelLayout,
  ensureModelLayout,
  extractModelId,
  resolveFinalModelLayout,
} from '../modelLayout';
import { applyModelDetails, createModelRecord, writeModelRecord } from '../modelRecord';
import { reconcileModelRecord } from '../reconciler';
import type { ModelPageDriver } from './pageDriver';

const logger = createLogger('model-processor');

export type ProcessorConfig = Pick<
  HarvestConfig,
  | 'outputDir'
  | 'tempDownloadDir'
  | 'bulkDownloadTimeoutMs'
  | 'fileDownloadTimeoutMs'
  | 'scanIntervalMs'
  | 'stabilityIntervalMs'
  | 'imagePauseMs'
>;

export interface ProcessModelOptions {
  driver: ModelPageDriver;
  config: ProcessorConfig;
  excludedTags?: readonly string[];
  fetchImpl?: typeof fetch;
  clock?: Clock;
  detector?: DetectorSettings;
  moveFile?: MoveFileFn;
}

export interface ProcessedModel {
  modelId: string;
  record: ModelOutputRecord;
  recordFile: string;
}

const downloadImages = async (
  record: ModelOutputRecord,
  directory: string,
  options: ProcessModelOptions,
  clock: Clock,
): Promise<string[]> => {
  const saved: string[] = [];
  for (const [index, imageUrl] of record.images.entries()) {
    const imagePath = await downloadImage(imageUrl, directory, `image_${index + 1}`, {
      fetchImpl: options.fetchImpl,
    });
    if (imagePath) {
      saved.push(imagePath);
    }
    await clock.sleep(options.config.imagePauseMs);
  }
  return saved;
};

/**
 * Scrapes one model into a temporary folder, moves the result into
 * `{output}/{tag}/{id}_{title}` and writes its JSON record. Any failure
 * yields `null` so the crawl can carry on with the next model.
 */
export const processModel = async (
  url: string,
  index: number,
  options: ProcessModelOptions,
): Promise<ProcessedModel | null> => {
  const { driver, config, excludedTags = [], clock = systemClock } = options;
  const modelId = extractModelId(url, index);

  const temporary = createTemporaryModelLayout(config.outputDir, modelId);
  try {
    // A file left over from the previous model would be mistaken for a new download.
    await cleanDirectory(config.tempDownloadDir);
    await ensureModelLayout(temporary);

    if (!(await driver.openModel(url))) {
      logger.warn(`Timed out loading ${url}, skipping`);
      return null;
    }

    let record = applyModelDetails(createModelRecord(url), await driver.readModelDetails(), excludedTags);
    logger.info(`Scraping ${record.title} (${record.images.length} images, ${record.tags.length} tags)`);

    record.downloadedImagePaths = await downloadImages(record, temporary.imagesDir, options, clock);

    if (await driver.openFilesTab()) {
      const files = await downloadModelFiles(driver, {
        tempDownloadDir: config.tempDownloadDir,
        targetDir: temporary.filesDir,
        bulkTimeoutMs: config.bulkDownloadTimeoutMs,
        fileTimeoutMs: config.fileDownloadTimeoutMs,
        detector: {
          scanIntervalMs: config.scanIntervalMs,
          stabilityIntervalMs: config.stabilityIntervalMs,
          clock,
          ...options.detector,
        },
        moveFile: options.moveFile,
      });
      record.downloadedFilePaths = files.paths;
    } else {
      logger.warn(`Files tab not available on ${url}; no files downloaded`);
    }

    const final = await ensureModelLayout(resolveFinalModelLayout(config.outputDir, modelId, record));
    const reconciled = await reconcileModelRecord(record, temporary, final, { moveFile: options.moveFile });
    record = reconciled.record;

    const recordFile = await writeModelRecord(record, final.root, modelId);
    logger.info(`Details saved to ${recordFile}`);
    return { modelId, record, recordFile };
  } catch (error: unknown) {
    logDownloadError(error, { url, stage: 'model' });
    return null;
  } finally {
    await removeDirectory(temporary.root);
  }
};
