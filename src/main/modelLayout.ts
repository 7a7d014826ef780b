import fs from 'fs/promises';
import path from 'path';
import type { ModelLayout, ModelOutputRecord } from '../types/model';
import { sanitizeFileName } from '../common/fileName';

export const IMAGES_SUBDIR = 'images';
export const FILES_SUBDIR = 'files';
export const NO_TAG_FOLDER = 'No_Tag';

const modelIdPattern = /\/model\/(\d+)/;

export const extractModelId = (url: string, index: number) =>
  modelIdPattern.exec(url)?.[1] ?? `unknown_id_${index}`;

const layoutAt = (root: string): ModelLayout => ({
  root,
  imagesDir: path.join(root, IMAGES_SUBDIR),
  filesDir: path.join(root, FILES_SUBDIR),
});

export const createTemporaryModelLayout = (outputRoot: string, modelId: string) =>
  layoutAt(path.join(outputRoot, `${sanitizeFileName(modelId) || 'model'}_temp_model_folder`));

/** `{root}/{first tag}/{id}_{title}` with every segment sanitised. */
export const resolveFinalModelLayout = (
  outputRoot: string,
  modelId: string,
  record: Pick<ModelOutputRecord, 'title' | 'tags'>,
): ModelLayout => {
  const tagFolder = record.tags.length > 0 ? sanitizeFileName(record.tags[0]) || NO_TAG_FOLDER : NO_TAG_FOLDER;
  const safeId = sanitizeFileName(modelId) || 'model';
  const safeTitle = sanitizeFileName(record.title);
  const modelFolder = safeTitle ? `${safeId}_${safeTitle}` : safeId;
  return layoutAt(path.join(outputRoot, tagFolder, modelFolder));
};

export const ensureModelLayout = async (layout: ModelLayout) => {
  await fs.mkdir(layout.imagesDir, { recursive: true });
  await fs.mkdir(layout.filesDir, { recursive: true });
  return layout;
};
