import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { writeCorpusSqlite } from './sqlite';
import { loadSampleCorpus } from '../testing';

interface SenseRow {
  headword: string;
  language: string;
  pos: string;
  sense_number: number;
  gloss: string;
  tag: string | null;
  cross_references: string | null;
}

describe('writeCorpusSqlite', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'lexicon-sqlite-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('writes one row per sense and per translation', async () => {
    const filePath = join(directory, 'lexicon.sqlite');

    const senses = await writeCorpusSqlite(filePath, loadSampleCorpus(), false);

    expect(senses).toBe(4);
    const db = new Database(filePath, { readonly: true });
    try {
      const rows = db
        .prepare<[string], SenseRow>(
          'SELECT headword, language, pos, sense_number, gloss, tag, cross_references FROM senses WHERE headword = ? ORDER BY id'
        )
        .all('bot');
      expect(rows.map((row) => [row.language, row.sense_number, row.tag])).toEqual([
        ['ca', 1, null],
        ['ca', 2, 'nàutica'],
        ['en', 1, 'informàtica']
      ]);
      expect(JSON.parse(rows[1].cross_references ?? '[]')).toEqual([
        { relation: 'synonym', target: 'barca' },
        { relation: 'synonym', target: 'llanxa' }
      ]);

      const terms = db
        .prepare<[string], { term: string }>('SELECT term FROM translations WHERE target_language = ? ORDER BY id')
        .all('en');
      expect(terms.map((row) => row.term)).toEqual(['wineskin', 'boat']);
    } finally {
      db.close();
    }
  });

  it('refuses to replace an existing file without force', async () => {
    const filePath = join(directory, 'lexicon.sqlite');
    const corpus = loadSampleCorpus();
    await writeCorpusSqlite(filePath, corpus, false);

    await expect(writeCorpusSqlite(filePath, corpus, false)).rejects.toThrow('File already exists');
    await expect(writeCorpusSqlite(filePath, corpus, true)).resolves.toBe(4);
  });
});
