#!/usr/bin/env node
/**
 * Command line entry point. Collects model URLs from a listing page,
 * processes each model into its tag folder and writes the aggregate index.
 */
import { Command, InvalidArgumentError } from 'commander';
import { HarvestError, describeError } from '../common/errors';
import log, { createLogger } from '../utils/logger';
import { type HarvestConfig, loadSiteProfile, resolveHarvestConfig } from './config';
import { type CrawlMode, runCrawl } from './crawl/crawlRunner';
import { playwrightDriverFactory } from './crawl/playwrightDriver';

const logger = createLogger('cli');

const CRAWL_MODES: readonly CrawlMode[] = ['collect', 'process', 'all'];

type CliOptions = {
  mode: CrawlMode;
  limitCollection: number;
  limitProcessing: number;
  output?: string;
  profile?: string;
  headless?: boolean;
};

const parseMode = (value: string): CrawlMode => {
  const mode = CRAWL_MODES.find((candidate) => candidate === value);
  if (!mode) {
    throw new InvalidArgumentError(`Expected one of ${CRAWL_MODES.join(', ')}.`);
  }
  return mode;
};

const parseLimit = (value: string): number => {
  const limit = Number.parseInt(value, 10);
  if (Number.isNaN(limit) || limit < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer (0 for no limit).');
  }
  return limit;
};

const toOverrides = (options: CliOptions): Partial<HarvestConfig> => {
  const overrides: Partial<HarvestConfig> = {};
  if (options.output) overrides.outputDir = options.output;
  if (options.profile) overrides.profileFile = options.profile;
  if (options.headless !== undefined) overrides.headless = options.headless;
  return overrides;
};

const run = async (options: CliOptions) => {
  const config = resolveHarvestConfig(toOverrides(options));
  const profile = await loadSiteProfile(config.profileFile);

  logger.info(`Mode: ${options.mode}, output: ${config.outputDir}`);
  const summary = await runCrawl({
    mode: options.mode,
    limitCollection: options.limitCollection,
    limitProcessing: options.limitProcessing,
    config,
    excludedTags: profile.excludedTags,
    createDriver: playwrightDriverFactory({
      profile,
      headless: config.headless,
      executablePath: config.browserExecutablePath,
      downloadDir: config.tempDownloadDir,
    }),
  });

  logger.info(
    `Done: ${summary.collectedUrls.length} collected, ${summary.processed.length} processed, ${summary.failedUrls.length} failed`,
  );
  if (summary.failedUrls.length > 0) {
    logger.warn(`Failed models:\n${summary.failedUrls.join('\n')}`);
  }
};

const program = new Command();

program
  .name('model-harvester')
  .description('Crawl a 3D model catalogue and download each model with its images and metadata')
  .option('-m, --mode <mode>', 'collect, process or all', parseMode, 'all')
  .option('--limit-collection <count>', 'Maximum URLs to collect (0 = unlimited)', parseLimit, 0)
  .option('--limit-processing <count>', 'Maximum models to process (0 = unlimited)', parseLimit, 0)
  .option('-o, --output <dir>', 'Output directory')
  .option('-p, --profile <file>', 'Site profile JSON')
  .option('--headless', 'Run the browser without a window')
  .option('--no-headless', 'Show the browser window')
  .action(async () => {
    try {
      await run(program.opts<CliOptions>());
    } catch (error: unknown) {
      if (error instanceof HarvestError) {
        log.error(`${error.code}: ${error.message}`);
      } else {
        log.error(`Unexpected failure: ${describeError(error)}`);
      }
      process.exitCode = 1;
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  log.error(describeError(error));
  process.exitCode = 1;
});
