import { createWriteStream } from 'fs';
import fs from 'fs/promises';
import { pipeline } from 'stream/promises';
import { chromium, type Browser, type Download, type LaunchOptions, type Page } from 'playwright-core';
import type { ModelDetails } from '../../types/model';
import type { SiteProfile } from '../config';
import { HarvestError, describeError } from '../../common/errors';
import { sanitizeExtension, sanitizeFileName, splitStemAndExtension } from '../../common/fileName';
import { createLogger } from '../../utils/logger';
import { allocateUniquePath } from '../downloads/pathAllocator';
import type { DownloadTrigger, DriverFactory, ModelPageDriver } from './pageDriver';

const logger = createLogger('playwright-driver');

const CLICK_TIMEOUT_MS = 10000;
const COOKIE_TIMEOUT_MS = 15000;
const IN_PROGRESS_SUFFIX = '.crdownload';

export interface PlaywrightDriverOptions {
  profile: SiteProfile;
  headless: boolean;
  executablePath?: string;
  /** Directory browser downloads land in; omit for a driver that never downloads. */
  downloadDir?: string;
}

const textOf = async (page: Page, selector: string): Promise<string | null> => {
  const locator = page.locator(selector).first();
  if ((await locator.count()) === 0) return null;
  const text = await locator.textContent();
  return text?.trim() || null;
};

export class PlaywrightModelPageDriver implements ModelPageDriver {
  private readonly browser: Browser;

  private readonly page: Page;

  private readonly options: PlaywrightDriverOptions;

  private constructor(browser: Browser, page: Page, options: PlaywrightDriverOptions) {
    this.browser = browser;
    this.page = page;
    this.options = options;
  }

  static async launch(options: PlaywrightDriverOptions): Promise<PlaywrightModelPageDriver> {
    const launchOptions: LaunchOptions = {
      headless: options.headless,
      args: ['--disable-gpu', '--no-sandbox', '--disable-dev-shm-usage'],
    };
    if (options.executablePath) {
      launchOptions.executablePath = options.executablePath;
    } else {
      launchOptions.channel = 'chrome';
    }

    let browser: Browser;
    try {
      browser = await chromium.launch(launchOptions);
    } catch (error: unknown) {
      if (!launchOptions.channel) {
        throw new HarvestError('browser', `Could not start Chromium: ${describeError(error)}`, { cause: error });
      }
      logger.warn(`System Chrome not available (${describeError(error)}), trying a Playwright-managed Chromium`);
      delete launchOptions.channel;
      try {
        browser = await chromium.launch(launchOptions);
      } catch (fallbackError: unknown) {
        throw new HarvestError('browser', `Could not start Chromium: ${describeError(fallbackError)}`, {
          cause: fallbackError,
        });
      }
    }
    const context = await browser.newContext({
      acceptDownloads: Boolean(options.downloadDir),
      viewport: { width: 1920, height: 1080 },
    });
    const page = await context.newPage();
    const driver = new PlaywrightModelPageDriver(browser, page, options);
    const { downloadDir } = options;
    if (downloadDir) {
      await fs.mkdir(downloadDir, { recursive: true });
      page.on('download', (download) => {
        driver.persistDownload(download, downloadDir).catch((error: unknown) => {
          logger.warn(`Download ${download.suggestedFilename()} failed: ${describeError(error)}`);
        });
      });
    }
    return driver;
  }

  /**
   * Streams a browser download into `directory` the way Chrome does on its
   * own: under an in-progress name first, renamed once the stream ends.
   */
  private async persistDownload(download: Download, directory: string) {
    const { stem, extension } = splitStemAndExtension(download.suggestedFilename());
    const finalPath = await allocateUniquePath(
      directory,
      sanitizeFileName(stem) || 'download',
      sanitizeExtension(extension),
    );
    const partialPath = `${finalPath}${IN_PROGRESS_SUFFIX}`;
    const stream = await download.createReadStream();
    await pipeline(stream, createWriteStream(partialPath, { flags: 'wx' }));
    await fs.rename(partialPath, finalPath);
  }

  private async acceptCookies() {
    const selector = this.options.profile.selectors.cookieAccept;
    if (!selector) return;
    try {
      await this.page.locator(selector).first().click({ timeout: COOKIE_TIMEOUT_MS });
      logger.info('Accepted cookie consent');
    } catch {
      logger.debug('No cookie consent banner found');
    }
  }

  private async scrollHeight(): Promise<number> {
    return Number(await this.page.evaluate('document.body.scrollHeight'));
  }

  async collectModelUrls(limit: number): Promise<string[]> {
    const { profile } = this.options;
    const linkPattern = new RegExp(profile.modelLinkPattern);
    const links = new Set<string>();

    await this.page.goto(profile.listingUrl, { waitUntil: 'domcontentloaded' });
    await this.acceptCookies();

    let lastHeight = await this.scrollHeight();
    for (let attempt = 0; attempt < profile.maxScrollAttempts; attempt += 1) {
      await this.page.keyboard.press('End');
      await this.page.waitForTimeout(profile.scrollPauseMs);

      for (const anchor of await this.page.locator('a[href]').all()) {
        const href = await anchor.getAttribute('href');
        if (href && linkPattern.test(href)) {
          links.add(`${profile.origin}${href.split('?')[0]}`);
        }
      }
      logger.info(`Collected ${links.size} unique links after scroll ${attempt + 1}`);

      if (limit > 0 && links.size >= limit) break;
      const height = await this.scrollHeight();
      if (height === lastHeight) break;
      lastHeight = height;
    }

    const urls = [...links];
    return limit > 0 ? urls.slice(0, limit) : urls;
  }

  async openModel(url: string): Promise<boolean> {
    await this.page.goto(url, { waitUntil: 'domcontentloaded' });
    await this.acceptCookies();
    try {
      await this.page.waitForSelector(this.options.profile.selectors.detailReady, { timeout: CLICK_TIMEOUT_MS });
      return true;
    } catch {
      return false;
    }
  }

  async readModelDetails(): Promise<ModelDetails> {
    const { selectors } = this.options.profile;
    const imageUrls: string[] = [];
    for (const image of await this.page.locator(selectors.images).all()) {
      const src = await image.getAttribute('src');
      if (src) imageUrls.push(src);
    }
    const tags: string[] = [];
    for (const tagSelector of selectors.tags) {
      for (const tag of await this.page.locator(tagSelector).all()) {
        tags.push((await tag.textContent()) ?? '');
      }
    }
    return {
      title: await textOf(this.page, selectors.title),
      description: await textOf(this.page, selectors.description),
      imageUrls,
      massText: await textOf(this.page, selectors.mass),
      tags,
    };
  }

  async openFilesTab(): Promise<boolean> {
    try {
      await this.page.locator(this.options.profile.selectors.filesTab).first().click({ timeout: CLICK_TIMEOUT_MS });
      await this.page.waitForTimeout(this.options.profile.scrollPauseMs);
      return true;
    } catch {
      return false;
    }
  }

  async findBulkDownload(): Promise<DownloadTrigger | null> {
    const button = this.page.locator(this.options.profile.selectors.bulkDownload).first();
    try {
      await button.waitFor({ state: 'visible', timeout: CLICK_TIMEOUT_MS });
    } catch {
      return null;
    }
    return { label: 'download all', click: () => button.click({ timeout: CLICK_TIMEOUT_MS }) };
  }

  async findIndividualDownloads(): Promise<DownloadTrigger[]> {
    const buttons = this.page.locator(this.options.profile.selectors.fileDownload);
    try {
      await buttons.first().waitFor({ state: 'attached', timeout: CLICK_TIMEOUT_MS });
    } catch {
      return [];
    }
    return (await buttons.all()).map((button, index) => ({
      label: `file #${index + 1}`,
      click: () => button.click({ timeout: CLICK_TIMEOUT_MS }),
    }));
  }

  async close(): Promise<void> {
    await this.browser.close();
  }
}

/** Only the processing driver accepts downloads; collection never triggers any. */
export const playwrightDriverFactory =
  (options: Omit<PlaywrightDriverOptions, 'downloadDir'> & { downloadDir: string }): DriverFactory =>
  (purpose) =>
    PlaywrightModelPageDriver.launch({
      ...options,
      downloadDir: purpose === 'process' ? options.downloadDir : undefined,
    });
