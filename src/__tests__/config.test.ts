/** @jest-environment node */
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { HarvestError } from '../common/errors';
import {
  TEMP_DOWNLOADS_SUBDIR,
  URL_LIST_FILE_NAME,
  loadSiteProfile,
  parseSiteProfile,
  resolveHarvestConfig,
} from '../main/config';

const REPO_PROFILE = path.join(__dirname, '..', '..', 'config', 'site-profile.json');

const minimalProfile = () => ({
  listingUrl: 'https://example.test/models',
  origin: 'https://example.test',
  selectors: {
    detailReady: 'h1',
    title: 'h1',
    description: '.summary',
    images: 'img',
    mass: '.mass',
    tags: ['.tag'],
    filesTab: '.files',
    bulkDownload: '.all',
    fileDownload: '.one',
  },
});

describe('resolveHarvestConfig', () => {
  const originalEnv = { ...process.env };

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  it('derives every path from the output directory', () => {
    process.env.HARVEST_OUTPUT_DIR = '/data/models';
    const config = resolveHarvestConfig();
    expect(config.outputDir).toBe(path.resolve('/data/models'));
    expect(config.tempDownloadDir).toBe(path.join(path.resolve('/data/models'), TEMP_DOWNLOADS_SUBDIR));
    expect(config.urlListFile).toBe(path.join(path.resolve('/data/models'), URL_LIST_FILE_NAME));
  });

  it('uses the documented defaults', () => {
    [
      'HARVEST_BULK_TIMEOUT_MS',
      'HARVEST_FILE_TIMEOUT_MS',
      'HARVEST_SCAN_INTERVAL_MS',
      'HARVEST_STABILITY_INTERVAL_MS',
      'HARVEST_HEADLESS',
    ].forEach((name) => delete process.env[name]);
    const config = resolveHarvestConfig({ outputDir: '/tmp/out' });
    expect(config).toMatchObject({
      bulkDownloadTimeoutMs: 240000,
      fileDownloadTimeoutMs: 120000,
      scanIntervalMs: 2000,
      stabilityIntervalMs: 1000,
      headless: false,
    });
  });

  it('reads overrides from the environment', () => {
    process.env.HARVEST_FILE_TIMEOUT_MS = '5000';
    process.env.HARVEST_HEADLESS = 'yes';
    const config = resolveHarvestConfig({ outputDir: '/tmp/out' });
    expect(config.fileDownloadTimeoutMs).toBe(5000);
    expect(config.headless).toBe(true);
  });

  it('lets explicit overrides win over the environment', () => {
    process.env.HARVEST_HEADLESS = 'true';
    expect(resolveHarvestConfig({ outputDir: '/tmp/out', headless: false }).headless).toBe(false);
  });

  it('rejects malformed durations', () => {
    process.env.HARVEST_BULK_TIMEOUT_MS = 'soon';
    expect(() => resolveHarvestConfig()).toThrow(HarvestError);
  });

  it('rejects a zero download timeout', () => {
    expect(() => resolveHarvestConfig({ outputDir: '/tmp/out', fileDownloadTimeoutMs: 0 })).toThrow(
      'Download timeouts must be greater than zero',
    );
  });
});

describe('parseSiteProfile', () => {
  it('applies defaults to optional fields', () => {
    const profile = parseSiteProfile(minimalProfile());
    expect(profile.modelLinkPattern).toBe('^/model/');
    expect(profile.maxScrollAttempts).toBe(20);
    expect(profile.scrollPauseMs).toBe(3000);
    expect(profile.excludedTags).toEqual([]);
    expect(profile.selectors.cookieAccept).toBeUndefined();
  });

  it('names the missing selector', () => {
    const raw = minimalProfile();
    const { filesTab: _omitted, ...selectors } = raw.selectors;
    expect(() => parseSiteProfile({ ...raw, selectors }, 'profile.json')).toThrow(
      'profile.json: "filesTab" must be a non-empty string',
    );
  });

  it('rejects a profile without selectors', () => {
    expect(() => parseSiteProfile({ listingUrl: 'x' })).toThrow(HarvestError);
  });
});

describe('loadSiteProfile', () => {
  it('loads the bundled profile', async () => {
    const profile = await loadSiteProfile(REPO_PROFILE);
    expect(profile.origin).toBe('https://www.printables.com');
    expect(profile.excludedTags).toEqual(['3D Models']);
    expect(profile.selectors.tags.length).toBeGreaterThan(0);
  });

  it('wraps invalid JSON in an invalid-profile error', async () => {
    const file = path.join(await fs.mkdtemp(path.join(os.tmpdir(), 'config-')), 'broken.json');
    await fs.writeFile(file, '{ not json');
    await expect(loadSiteProfile(file)).rejects.toMatchObject({ code: 'invalid-profile' });
  });

  it('wraps a missing file in an invalid-profile error', async () => {
    await expect(loadSiteProfile('/nonexistent/profile.json')).rejects.toMatchObject({ code: 'invalid-profile' });
  });
});
