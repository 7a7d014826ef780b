export interface ModelOutputRecord {
  title: string;
  description: string;
  /** Source image URLs found on the model page */
  images: string[];
  /** Printed mass in grams, `null` when the page does not state it */
  grams: number | null;
  tags: string[];
  downloadedFilePaths: string[];
  downloadedImagePaths: string[];
  url: string;
}

/** On-disk JSON shape of a model record. */
export interface PersistedModelRecord {
  title: string;
  description: string;
  images: string[];
  grams: number | 'N/A';
  tags: string[];
  downloaded_filepaths: string[];
  downloaded_image_filepaths: string[];
  url: string;
}

export interface ModelLayout {
  root: string;
  imagesDir: string;
  filesDir: string;
}

export interface ModelDetails {
  title: string | null;
  description: string | null;
  imageUrls: string[];
  massText: string | null;
  tags: string[];
}
