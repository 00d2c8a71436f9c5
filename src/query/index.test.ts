import { describe, expect, it } from 'vitest';

import { allSensesOf, lookup, resolveCrossReference, sensesOf, translationsOf } from './index';
import { loadSampleCorpus } from '../testing';

const corpus = loadSampleCorpus();

describe('lookup', () => {
  it('returns every language section in document order', () => {
    expect(lookup(corpus, 'bot').map((section) => section.code)).toEqual(['ca', 'en']);
  });

  it('filters by language code', () => {
    const [section] = lookup(corpus, 'bot', 'ca');

    expect(section.etymology).toBe('Del llatí tardà buttis.');
    expect(section.pronunciations).toEqual({ entries: [{ system: 'IPA', value: '/ˈbɔt/' }], audio: 'Ca-bot.ogg' });
  });

  it('returns an empty list for unknown headwords', () => {
    expect(lookup(corpus, 'vaixell')).toEqual([]);
  });
});

describe('sensesOf', () => {
  it('returns the senses of one part of speech', () => {
    expect(sensesOf(corpus, 'bot', 'ca', 'noun')).toEqual([
      {
        number: 1,
        gloss: 'Recipient de pell per a contenir vi.',
        notes: [],
        examples: [{ text: 'Van omplir el bot a la bodega.' }],
        crossReferences: [{ relation: 'synonym', target: 'odre' }],
        translations: [
          { language: 'en', term: 'wineskin', attributes: {} },
          { language: 'fr', term: 'outre', attributes: { gender: 'f' } }
        ]
      },
      {
        number: 2,
        gloss: 'Embarcació petita.',
        tag: 'nàutica',
        notes: [],
        examples: [],
        crossReferences: [
          { relation: 'synonym', target: 'barca' },
          { relation: 'synonym', target: 'llanxa' }
        ],
        translations: [{ language: 'en', term: 'boat', attributes: {} }]
      }
    ]);
  });

  it('returns nothing for a kind the section lacks', () => {
    expect(sensesOf(corpus, 'bot', 'ca', 'verb')).toEqual([]);
  });

  it('keeps the language sections apart', () => {
    expect(allSensesOf(corpus, 'bot', 'en').map((sense) => sense.tag)).toEqual(['informàtica']);
  });
});

describe('translationsOf', () => {
  it('counts senses from one', () => {
    expect(translationsOf(corpus, 'bot', 'ca', 2)).toEqual([{ language: 'en', term: 'boat', attributes: {} }]);
  });

  it('filters by target language', () => {
    expect(translationsOf(corpus, 'bot', 'ca', 1, 'fr').map((translation) => translation.term)).toEqual(['outre']);
  });

  it('returns an empty list for senses out of range', () => {
    expect(translationsOf(corpus, 'bot', 'ca', 0)).toEqual([]);
    expect(translationsOf(corpus, 'bot', 'ca', 3)).toEqual([]);
  });
});

describe('resolveCrossReference', () => {
  it('finds the page of an exact headword', () => {
    const [reference] = sensesOf(corpus, 'bot', 'ca', 'noun')[0].crossReferences;

    expect(resolveCrossReference(reference, corpus)?.headword).toBe('odre');
  });

  it('returns undefined for missing targets', () => {
    expect(resolveCrossReference({ relation: 'synonym', target: 'barca' }, corpus)).toBeUndefined();
  });
});
