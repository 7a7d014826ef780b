/** @jest-environment node */
import fs from 'fs/promises';
import { writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import { HarvestError } from '../common/errors';
import {
  allocateUniquePath,
  moveFileExclusive,
  writeFileExclusive,
} from '../main/downloads/pathAllocator';
import { errnoError } from './support/fakes';

const createTempWorkspace = () => fs.mkdtemp(path.join(os.tmpdir(), 'path-allocator-'));

describe('allocateUniquePath', () => {
  it('returns the plain name when it is free', async () => {
    const dir = await createTempWorkspace();
    expect(await allocateUniquePath(dir, 'photo', '.jpg')).toBe(path.join(dir, 'photo.jpg'));
  });

  it('appends the first free counter', async () => {
    const dir = await createTempWorkspace();
    await fs.writeFile(path.join(dir, 'photo.jpg'), 'a');
    await fs.writeFile(path.join(dir, 'photo_1.jpg'), 'b');
    expect(await allocateUniquePath(dir, 'photo', '.jpg')).toBe(path.join(dir, 'photo_2.jpg'));
  });

  it('handles names without an extension', async () => {
    const dir = await createTempWorkspace();
    await fs.mkdir(path.join(dir, 'parts'));
    expect(await allocateUniquePath(dir, 'parts', '')).toBe(path.join(dir, 'parts_1'));
  });

  it('refuses names that are not a single plain segment', async () => {
    const dir = await createTempWorkspace();
    await expect(allocateUniquePath(dir, 'image_1', '.jpg:large')).rejects.toMatchObject({ code: 'unsafe-path' });
    await expect(allocateUniquePath(dir, '..', '')).rejects.toMatchObject({ code: 'unsafe-path' });
    expect(await fs.readdir(dir)).toEqual([]);
  });
});

describe('writeFileExclusive', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('never overwrites an existing file', async () => {
    const dir = await createTempWorkspace();
    await fs.writeFile(path.join(dir, 'image_1.png'), 'old');

    const saved = await writeFileExclusive(dir, 'image_1', '.png', 'new');

    expect(saved).toBe(path.join(dir, 'image_1_1.png'));
    expect(await fs.readFile(path.join(dir, 'image_1.png'), 'utf8')).toBe('old');
    expect(await fs.readFile(saved, 'utf8')).toBe('new');
  });

  it('creates the target directory', async () => {
    const dir = path.join(await createTempWorkspace(), 'nested', 'images');
    const saved = await writeFileExclusive(dir, 'image', '.jpg', new Uint8Array([1, 2, 3]));
    expect([...(await fs.readFile(saved))]).toEqual([1, 2, 3]);
  });

  it('claims the next name when another writer wins the race', async () => {
    const dir = await createTempWorkspace();
    jest.spyOn(fs, 'writeFile').mockImplementationOnce(async (target) => {
      writeFileSync(String(target), 'racer');
      throw errnoError('EEXIST');
    });

    const saved = await writeFileExclusive(dir, 'photo', '.jpg', 'mine');

    expect(saved).toBe(path.join(dir, 'photo_1.jpg'));
    expect(await fs.readFile(path.join(dir, 'photo.jpg'), 'utf8')).toBe('racer');
    expect(await fs.readFile(saved, 'utf8')).toBe('mine');
  });

  it('gives up after the configured number of collisions', async () => {
    const dir = await createTempWorkspace();
    jest.spyOn(fs, 'writeFile').mockRejectedValue(errnoError('EEXIST'));

    const attempt = writeFileExclusive(dir, 'photo', '.jpg', 'data', { maxAttempts: 2 });

    await expect(attempt).rejects.toBeInstanceOf(HarvestError);
    await expect(attempt).rejects.toMatchObject({ code: 'allocation-exhausted' });
  });

  it('propagates errors other than a name collision', async () => {
    const dir = await createTempWorkspace();
    jest.spyOn(fs, 'writeFile').mockRejectedValue(errnoError('EACCES'));

    await expect(writeFileExclusive(dir, 'photo', '.jpg', 'data')).rejects.toMatchObject({ code: 'EACCES' });
  });
});

describe('moveFileExclusive', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('moves the file under its own name', async () => {
    const source = await createTempWorkspace();
    const target = await createTempWorkspace();
    const file = path.join(source, 'model.zip');
    await fs.writeFile(file, 'zip');

    const moved = await moveFileExclusive(file, target);

    expect(moved).toBe(path.join(target, 'model.zip'));
    expect(await fs.readFile(moved, 'utf8')).toBe('zip');
    await expect(fs.access(file)).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('suffixes the name instead of replacing an existing file', async () => {
    const source = await createTempWorkspace();
    const target = await createTempWorkspace();
    const file = path.join(source, 'model.zip');
    await fs.writeFile(file, 'incoming');
    await fs.writeFile(path.join(target, 'model.zip'), 'existing');

    const moved = await moveFileExclusive(file, target);

    expect(moved).toBe(path.join(target, 'model_1.zip'));
    expect(await fs.readFile(path.join(target, 'model.zip'), 'utf8')).toBe('existing');
    expect(await fs.readFile(moved, 'utf8')).toBe('incoming');
  });

  it('copies when hard links cross devices', async () => {
    const source = await createTempWorkspace();
    const target = await createTempWorkspace();
    const file = path.join(source, 'part.stl');
    await fs.writeFile(file, 'solid');
    jest.spyOn(fs, 'link').mockRejectedValue(errnoError('EXDEV'));

    const moved = await moveFileExclusive(file, target);

    expect(moved).toBe(path.join(target, 'part.stl'));
    expect(await fs.readFile(moved, 'utf8')).toBe('solid');
    await expect(fs.access(file)).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('rejects when the source does not exist', async () => {
    const target = await createTempWorkspace();
    await expect(moveFileExclusive(path.join(target, 'missing.stl'), target)).rejects.toMatchObject({
      code: 'ENOENT',
    });
  });
});
