import fs from 'fs/promises';
import type { Clock } from '../../types/download';
import type { ModelOutputRecord } from '../../types/model';
import type { HarvestConfig } from '../config';
import { describeError } from '../../common/errors';
import { createLogger } from '../../utils/logger';
import { cleanDirectory } from '../directoryCleaner';
import { systemClock } from '../downloads/clock';
import { writeAggregateRecords } from '../modelRecord';
import { loadUrls, saveUrls } from '../urlStore';
import type { DetectorSettings } from './fileDownloads';
import { processModel } from './modelProcessor';
import type { DriverFactory, ModelPageDriver } from './pageDriver';

const logger = createLogger('crawl');

export type CrawlMode = 'collect' | 'process' | 'all';

export interface CrawlOptions {
  mode: CrawlMode;
  /** 0 means unlimited */
  limitCollection: number;
  /** 0 means unlimited */
  limitProcessing: number;
  config: HarvestConfig;
  createDriver: DriverFactory;
  excludedTags?: readonly string[];
  fetchImpl?: typeof fetch;
  clock?: Clock;
  detector?: DetectorSettings;
}

export interface CrawlSummary {
  collectedUrls: string[];
  processed: ModelOutputRecord[];
  failedUrls: string[];
  aggregateFile?: string;
}

const closeQuietly = async (driver: ModelPageDriver | null) => {
  if (!driver) return;
  try {
    await driver.close();
  } catch (error: unknown) {
    logger.warn(`Failed to close browser: ${describeError(error)}`);
  }
};

const collectUrls = async (options: CrawlOptions): Promise<string[]> => {
  let driver: ModelPageDriver | null = null;
  try {
    driver = await options.createDriver('collect');
    const urls = await driver.collectModelUrls(options.limitCollection);
    await saveUrls(urls, options.config.urlListFile);
    logger.info(`Finished collecting model URLs, found ${urls.length}`);
    return urls;
  } catch (error: unknown) {
    logger.error(`URL collection failed: ${describeError(error)}`);
    return [];
  } finally {
    await closeQuietly(driver);
  }
};

const resolveUrlsToProcess = async (options: CrawlOptions, collected: string[]) => {
  let urls = collected;
  if (options.mode === 'process' || urls.length === 0) {
    urls = await loadUrls(options.config.urlListFile);
  }
  if (options.limitProcessing > 0) {
    urls = urls.slice(0, options.limitProcessing);
  }
  return urls;
};

export const runCrawl = async (options: CrawlOptions): Promise<CrawlSummary> => {
  const { config, clock = systemClock } = options;
  const summary: CrawlSummary = { collectedUrls: [], processed: [], failedUrls: [] };

  await fs.mkdir(config.outputDir, { recursive: true });
  await cleanDirectory(config.tempDownloadDir);

  if (options.mode === 'collect' || options.mode === 'all') {
    summary.collectedUrls = await collectUrls(options);
    if (options.mode === 'collect') {
      return summary;
    }
  }

  const urls = await resolveUrlsToProcess(options, summary.collectedUrls);
  if (urls.length === 0) {
    logger.warn('No model URLs to process');
    return summary;
  }

  let driver: ModelPageDriver | null = null;
  try {
    driver = await options.createDriver('process');
    for (const [index, url] of urls.entries()) {
      logger.info(`Processing model ${index + 1}/${urls.length}: ${url}`);
      const processed = await processModel(url, index, {
        driver,
        config,
        excludedTags: options.excludedTags,
        fetchImpl: options.fetchImpl,
        clock,
        detector: options.detector,
      });
      if (processed) {
        summary.processed.push(processed.record);
      } else {
        summary.failedUrls.push(url);
      }
      if (index < urls.length - 1) {
        await clock.sleep(config.modelPauseMs);
      }
    }
    summary.aggregateFile = await writeAggregateRecords(summary.processed, config.outputDir);
    logger.info(`Aggregated data for ${summary.processed.length} models saved to ${summary.aggregateFile}`);
  } catch (error: unknown) {
    logger.error(`Crawl aborted: ${describeError(error)}`);
  } finally {
    await closeQuietly(driver);
    await cleanDirectory(config.tempDownloadDir).catch((error: unknown) => {
      logger.warn(`Could not empty ${config.tempDownloadDir}: ${describeError(error)}`);
    });
  }

  return summary;
};
