import { mkdir, mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { atomicWrite, readJsonFile } from './fileHelpers';

describe('atomicWrite', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(os.tmpdir(), 'file-helpers-'));
  });

  afterEach(async () => {
    await rm(directory, { force: true, recursive: true });
  });

  it('writes JSON with dates as ISO strings', async () => {
    const filePath = path.join(directory, 'nested', 'doc.json');

    await atomicWrite(filePath, { at: new Date('2025-03-01T00:00:00.000Z') });

    expect(await readJsonFile(filePath)).toEqual({ at: '2025-03-01T00:00:00.000Z' });
  });

  it('removes its temporary file when the rename fails', async () => {
    // A non-empty directory cannot be replaced by a file
    const target = path.join(directory, 'occupied');
    await mkdir(target);
    await writeFile(path.join(target, 'keep.txt'), 'x');

    await expect(atomicWrite(target, { value: 1 })).rejects.toThrow();

    expect(await readdir(directory)).toEqual(['occupied']);
  });
});
