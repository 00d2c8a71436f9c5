import { describe, expect, it } from 'vitest';

import {
  INTERCHANGE_SCHEMA_VERSION,
  corpusFromInterchange,
  corpusToInterchange,
  fromInterchange,
  toInterchange
} from './interchange';
import { InvalidEntryError, InvalidInterchangeError } from '../errors';
import { loadSampleCorpus } from '../testing';

const corpus = loadSampleCorpus();

const bot = () => {
  const page = corpus.get('bot');
  if (!page) {
    throw new Error('sample corpus has no "bot" page');
  }
  return page;
};

describe('toInterchange', () => {
  it('produces plain mutable JSON with the schema version', () => {
    const record = toInterchange(bot());

    expect(record.schemaVersion).toBe(INTERCHANGE_SCHEMA_VERSION);
    expect(Object.isFrozen(record.languages[0])).toBe(false);
    expect(JSON.parse(JSON.stringify(record))).toEqual(record);
  });
});

describe('fromInterchange', () => {
  it('rebuilds an equal frozen page', () => {
    const page = fromInterchange(JSON.parse(JSON.stringify(toInterchange(bot()))));

    expect(page).toEqual(bot());
    expect(Object.isFrozen(page.languages[0].partsOfSpeech[0].senses[1])).toBe(true);
  });

  it('rejects other schema versions', () => {
    const record = { ...toInterchange(bot()), schemaVersion: 2 };

    expect(() => fromInterchange(record)).toThrow(new InvalidInterchangeError('Unsupported schema version 2, expected 1'));
  });

  it('names the offending field', () => {
    const record = {
      schemaVersion: 1,
      headword: 'mar',
      languages: [{ code: 'ca', pronunciations: { entries: [{ system: 'IPA' }] }, partsOfSpeech: [] }]
    };

    expect(() => fromInterchange(record)).toThrow('page.languages[0].pronunciations.entries[0].value must be a string');
  });

  it('rejects unknown cross-reference relations', () => {
    const record = toInterchange(bot());
    const raw = JSON.parse(JSON.stringify(record).replace('"synonym"', '"cousin"'));

    expect(() => fromInterchange(raw)).toThrow(InvalidInterchangeError);
  });

  it('validates the rebuilt page', () => {
    const record = { schemaVersion: 1, headword: 'mar', languages: [] };

    expect(() => fromInterchange(record)).toThrow(InvalidEntryError);
  });
});

describe('corpus records', () => {
  it('round-trips a whole corpus', () => {
    const record = JSON.parse(JSON.stringify(corpusToInterchange(corpus)));

    expect(record.pages).toHaveLength(2);
    expect(corpusFromInterchange(record)).toEqual(corpus);
  });

  it('rejects a record that lists a headword twice', () => {
    const page = toInterchange(bot());
    const record = { ...corpusToInterchange(corpus), pages: [page, page] };

    expect(() => corpusFromInterchange(record)).toThrow(
      new InvalidInterchangeError('corpus.pages contains "bot" more than once')
    );
  });
});
