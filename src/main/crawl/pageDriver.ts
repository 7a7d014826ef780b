import type { ModelDetails } from '../../types/model';

export interface DownloadTrigger {
  /** Human-readable name used in logs and reports */
  label: string;
  click: () => Promise<void>;
}

/**
 * Browser-side collaborator of the crawl. Implementations own navigation and
 * element lookup; the crawl only sees URLs, details and download triggers.
 */
export interface ModelPageDriver {
  collectModelUrls: (limit: number) => Promise<string[]>;
  /** Resolves `false` when the model page never became ready. */
  openModel: (url: string) => Promise<boolean>;
  readModelDetails: () => Promise<ModelDetails>;
  openFilesTab: () => Promise<boolean>;
  findBulkDownload: () => Promise<DownloadTrigger | null>;
  findIndividualDownloads: () => Promise<DownloadTrigger[]>;
  close: () => Promise<void>;
}

export type DriverPurpose = 'collect' | 'process';

export type DriverFactory = (purpose: DriverPurpose) => Promise<ModelPageDriver>;
