import fs from 'fs/promises';
import path from 'path';
import type { ModelDetails, ModelOutputRecord, PersistedModelRecord } from '../types/model';

export const NOT_AVAILABLE = 'N/A';
export const AGGREGATE_FILE_NAME = 'all_models_data.json';

const massPattern = /(\d+(?:\.\d+)?)\s*g/i;

export const createModelRecord = (url: string): ModelOutputRecord => ({
  title: NOT_AVAILABLE,
  description: NOT_AVAILABLE,
  images: [],
  grams: null,
  tags: [],
  downloadedFilePaths: [],
  downloadedImagePaths: [],
  url,
});

export const parseGrams = (text: string | null | undefined): number | null => {
  if (!text) return null;
  const match = massPattern.exec(text);
  if (!match) return null;
  const value = Number.parseFloat(match[1]);
  return Number.isFinite(value) ? value : null;
};

export const addTag = (
  record: ModelOutputRecord,
  tag: string,
  excluded: readonly string[] = [],
): boolean => {
  const trimmed = tag.trim();
  if (!trimmed || excluded.includes(trimmed) || record.tags.includes(trimmed)) {
    return false;
  }
  record.tags.push(trimmed);
  return true;
};

export const applyModelDetails = (
  record: ModelOutputRecord,
  details: ModelDetails,
  excludedTags: readonly string[] = [],
): ModelOutputRecord => {
  const next: ModelOutputRecord = {
    ...record,
    title: details.title?.trim() || NOT_AVAILABLE,
    description: details.description?.trim() || NOT_AVAILABLE,
    images: [...new Set(details.imageUrls.filter(Boolean))],
    grams: parseGrams(details.massText),
    tags: [],
  };
  details.tags.forEach((tag) => addTag(next, tag, excludedTags));
  return next;
};

export const serializeModelRecord = (record: ModelOutputRecord): PersistedModelRecord => ({
  title: record.title,
  description: record.description,
  images: record.images,
  grams: record.grams ?? NOT_AVAILABLE,
  tags: record.tags,
  downloaded_filepaths: record.downloadedFilePaths,
  downloaded_image_filepaths: record.downloadedImagePaths,
  url: record.url,
});

const writeJson = async (filePath: string, payload: unknown) => {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(payload, null, 2), 'utf8');
  return filePath;
};

export const writeModelRecord = (record: ModelOutputRecord, directory: string, modelId: string) =>
  writeJson(path.join(directory, `${modelId}.json`), serializeModelRecord(record));

export const writeAggregateRecords = (records: ModelOutputRecord[], outputRoot: string) =>
  writeJson(path.join(outputRoot, AGGREGATE_FILE_NAME), records.map(serializeModelRecord));
