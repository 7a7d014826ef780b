/** @jest-environment node */
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { loadUrls, saveUrls } from '../main/urlStore';

const createTempWorkspace = () => fs.mkdtemp(path.join(os.tmpdir(), 'url-store-'));

describe('URL store', () => {
  it('writes one URL per line and reads them back', async () => {
    const file = path.join(await createTempWorkspace(), 'lists', 'model_urls.txt');
    const urls = ['https://example.test/model/1', 'https://example.test/model/2'];

    expect(await saveUrls(urls, file)).toBe(true);
    expect(await fs.readFile(file, 'utf8')).toBe('https://example.test/model/1\nhttps://example.test/model/2\n');
    expect(await loadUrls(file)).toEqual(urls);
  });

  it('ignores blank lines and carriage returns', async () => {
    const file = path.join(await createTempWorkspace(), 'model_urls.txt');
    await fs.writeFile(file, 'https://example.test/model/1\r\n\r\n  https://example.test/model/2  \n');
    expect(await loadUrls(file)).toEqual(['https://example.test/model/1', 'https://example.test/model/2']);
  });

  it('returns an empty list when the file is missing', async () => {
    expect(await loadUrls(path.join(await createTempWorkspace(), 'missing.txt'))).toEqual([]);
  });

  it('reports a failed save', async () => {
    const dir = await createTempWorkspace();
    expect(await saveUrls(['https://example.test/model/1'], dir)).toBe(false);
  });
});
