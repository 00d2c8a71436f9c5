import { createHash } from 'node:crypto';
import { createReadStream, createWriteStream, existsSync } from 'node:fs';
import { readFile, rm } from 'node:fs/promises';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { createGunzip, createGzip } from 'node:zlib';

import { corpusFromInterchange, corpusToInterchange } from './interchange';
import type { Corpus } from '../types';

/** Removes `filePath` when `force` is set; refuses to overwrite otherwise. */
export const prepareTarget = async (filePath: string, force: boolean): Promise<void> => {
  if (!existsSync(filePath)) {
    return;
  }
  if (!force) {
    throw new Error(`File already exists: ${filePath}. Use --force to overwrite.`);
  }
  await rm(filePath, { force: true });
};

export const checksum = async (filePath: string): Promise<string> => {
  const hash = createHash('sha256');
  const data = await readFile(filePath);
  hash.update(data);
  return hash.digest('hex');
};

export const writeGzipJson = async (filePath: string, payload: unknown, force: boolean): Promise<void> => {
  await prepareTarget(filePath, force);
  const json = JSON.stringify(payload, null, 2);
  const gzip = createGzip({ level: 9 });
  const input = Readable.from([json]);
  const output = createWriteStream(filePath);
  await pipeline(input, gzip, output);
};

export const readGzipFile = async (filePath: string): Promise<string> => {
  const stream = createReadStream(filePath).pipe(createGunzip());
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
};

export const writeCorpusJson = async (filePath: string, corpus: Corpus, force: boolean): Promise<void> => {
  await writeGzipJson(filePath, corpusToInterchange(corpus), force);
};

export const readCorpusJson = async (filePath: string): Promise<Corpus> => {
  const content = await readGzipFile(filePath);
  return corpusFromInterchange(JSON.parse(content));
};
