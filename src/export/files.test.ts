import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { checksum, readCorpusJson, readGzipFile, writeCorpusJson, writeGzipJson } from './files';
import { loadSampleCorpus } from '../testing';

describe('gzip JSON files', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'lexicon-files-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('writes a corpus that reads back equal', async () => {
    const corpus = loadSampleCorpus();
    const filePath = join(directory, 'lexicon.json.gz');

    await writeCorpusJson(filePath, corpus, false);

    expect(await readCorpusJson(filePath)).toEqual(corpus);
  });

  it('refuses to overwrite without force', async () => {
    const filePath = join(directory, 'payload.json.gz');
    await writeFile(filePath, 'old');

    await expect(writeGzipJson(filePath, { a: 1 }, false)).rejects.toThrow(
      `File already exists: ${filePath}. Use --force to overwrite.`
    );

    await writeGzipJson(filePath, { a: 1 }, true);
    expect(JSON.parse(await readGzipFile(filePath))).toEqual({ a: 1 });
  });

  it('computes sha256 checksums', async () => {
    const filePath = join(directory, 'abc.txt');
    await writeFile(filePath, 'abc');

    expect(await checksum(filePath)).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
  });
});
