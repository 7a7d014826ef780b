import fs from 'fs/promises';
import path from 'path';
import { HarvestError, describeError } from '../common/errors';
import { createLogger } from '../utils/logger';

export interface HarvestConfig {
  outputDir: string;
  tempDownloadDir: string;
  urlListFile: string;
  profileFile: string;
  bulkDownloadTimeoutMs: number;
  fileDownloadTimeoutMs: number;
  scanIntervalMs: number;
  stabilityIntervalMs: number;
  imagePauseMs: number;
  modelPauseMs: number;
  headless: boolean;
  /** Chromium or Chrome binary; `undefined` lets the driver pick the installed Chrome channel. */
  browserExecutablePath?: string;
}

export interface SiteProfile {
  listingUrl: string;
  /** Prefix that turns a relative model href into an absolute URL */
  origin: string;
  modelLinkPattern: string;
  maxScrollAttempts: number;
  scrollPauseMs: number;
  excludedTags: string[];
  selectors: {
    cookieAccept?: string;
    detailReady: string;
    title: string;
    description: string;
    images: string;
    mass: string;
    tags: string[];
    filesTab: string;
    bulkDownload: string;
    fileDownload: string;
  };
}

const logger = createLogger('config');

const DEFAULT_OUTPUT_DIR = path.resolve('downloaded_models');
const DEFAULT_PROFILE_FILE = path.resolve('config', 'site-profile.json');

export const TEMP_DOWNLOADS_SUBDIR = 'temp_downloads';
export const URL_LIST_FILE_NAME = 'model_urls.txt';

const coerceBoolean = (value: string | undefined, fallback: boolean) => {
  if (value === undefined || value.trim() === '') return fallback;
  return ['1', 'true', 't', 'yes', 'y', 'on'].includes(value.trim().toLowerCase());
};

const readMs = (name: string, fallback: number): number => {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new HarvestError('invalid-config', `${name} must be a non-negative number of milliseconds, got "${raw}"`);
  }
  return value;
};

/** Defaults, then `HARVEST_*` environment variables, then `overrides`. */
export const resolveHarvestConfig = (overrides: Partial<HarvestConfig> = {}): HarvestConfig => {
  const outputDir = path.resolve(overrides.outputDir ?? process.env.HARVEST_OUTPUT_DIR ?? DEFAULT_OUTPUT_DIR);
  const base: HarvestConfig = {
    outputDir,
    tempDownloadDir: path.join(outputDir, TEMP_DOWNLOADS_SUBDIR),
    urlListFile: path.join(outputDir, URL_LIST_FILE_NAME),
    profileFile: process.env.HARVEST_PROFILE ?? DEFAULT_PROFILE_FILE,
    bulkDownloadTimeoutMs: readMs('HARVEST_BULK_TIMEOUT_MS', 240000),
    fileDownloadTimeoutMs: readMs('HARVEST_FILE_TIMEOUT_MS', 120000),
    scanIntervalMs: readMs('HARVEST_SCAN_INTERVAL_MS', 2000),
    stabilityIntervalMs: readMs('HARVEST_STABILITY_INTERVAL_MS', 1000),
    imagePauseMs: readMs('HARVEST_IMAGE_PAUSE_MS', 500),
    modelPauseMs: readMs('HARVEST_MODEL_PAUSE_MS', 5000),
    headless: coerceBoolean(process.env.HARVEST_HEADLESS, false),
    browserExecutablePath: process.env.HARVEST_BROWSER_PATH || undefined,
  };
  const merged: HarvestConfig = { ...base, ...overrides, outputDir };
  if (merged.bulkDownloadTimeoutMs <= 0 || merged.fileDownloadTimeoutMs <= 0) {
    throw new HarvestError('invalid-config', 'Download timeouts must be greater than zero');
  }
  return merged;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const requireString = (source: Record<string, unknown>, key: string, file: string): string => {
  const value = source[key];
  if (typeof value !== 'string' || value.length === 0) {
    throw new HarvestError('invalid-profile', `${file}: "${key}" must be a non-empty string`);
  }
  return value;
};

const optionalString = (source: Record<string, unknown>, key: string): string | undefined => {
  const value = source[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
};

const stringList = (value: unknown): string[] =>
  Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];

const numberOr = (value: unknown, fallback: number) =>
  typeof value === 'number' && Number.isFinite(value) && value >= 0 ? value : fallback;

export const parseSiteProfile = (raw: unknown, file = 'site profile'): SiteProfile => {
  if (!isRecord(raw) || !isRecord(raw.selectors)) {
    throw new HarvestError('invalid-profile', `${file}: expected an object with a "selectors" object`);
  }
  const selectors = raw.selectors;
  return {
    listingUrl: requireString(raw, 'listingUrl', file),
    origin: requireString(raw, 'origin', file),
    modelLinkPattern: optionalString(raw, 'modelLinkPattern') ?? '^/model/',
    maxScrollAttempts: numberOr(raw.maxScrollAttempts, 20),
    scrollPauseMs: numberOr(raw.scrollPauseMs, 3000),
    excludedTags: stringList(raw.excludedTags),
    selectors: {
      cookieAccept: optionalString(selectors, 'cookieAccept'),
      detailReady: requireString(selectors, 'detailReady', file),
      title: requireString(selectors, 'title', file),
      description: requireString(selectors, 'description', file),
      images: requireString(selectors, 'images', file),
      mass: requireString(selectors, 'mass', file),
      tags: stringList(selectors.tags),
      filesTab: requireString(selectors, 'filesTab', file),
      bulkDownload: requireString(selectors, 'bulkDownload', file),
      fileDownload: requireString(selectors, 'fileDownload', file),
    },
  };
};

export const loadSiteProfile = async (file: string): Promise<SiteProfile> => {
  let raw: string;
  try {
    raw = await fs.readFile(file, 'utf8');
  } catch (error: unknown) {
    throw new HarvestError('invalid-profile', `Cannot read site profile ${file}: ${describeError(error)}`, {
      cause: error,
    });
  }
  try {
    const profile = parseSiteProfile(JSON.parse(raw), file);
    logger.info(`Loaded site profile ${file}`);
    return profile;
  } catch (error: unknown) {
    if (error instanceof HarvestError) throw error;
    throw new HarvestError('invalid-profile', `Site profile ${file} is not valid JSON: ${describeError(error)}`, {
      cause: error,
    });
  }
};
