import type { Corpus, CrossReference, LanguageSection, Page, Sense, Translation } from '../types';

export const lookup = (corpus: Corpus, headword: string, languageCode?: string): LanguageSection[] => {
  const page = corpus.get(headword);
  if (!page) {
    return [];
  }
  return page.languages.filter((section) => languageCode === undefined || section.code === languageCode);
};

/** Senses of every block of `posKind`, in document order. */
export const sensesOf = (corpus: Corpus, headword: string, languageCode: string, posKind: string): Sense[] =>
  lookup(corpus, headword, languageCode).flatMap((section) =>
    section.partsOfSpeech.filter((block) => block.kind === posKind).flatMap((block) => block.senses)
  );

/** All senses of a language section across its blocks, in document order. */
export const allSensesOf = (corpus: Corpus, headword: string, languageCode: string): Sense[] =>
  lookup(corpus, headword, languageCode).flatMap((section) =>
    section.partsOfSpeech.flatMap((block) => block.senses)
  );

/**
 * Translations of the `senseIndex`-th sense (1-based, counted across all
 * part-of-speech blocks of the language), optionally for one target language.
 */
export const translationsOf = (
  corpus: Corpus,
  headword: string,
  languageCode: string,
  senseIndex: number,
  targetLanguageCode?: string
): Translation[] => {
  const sense = allSensesOf(corpus, headword, languageCode)[senseIndex - 1];
  if (!sense) {
    return [];
  }
  return sense.translations.filter(
    (translation) => targetLanguageCode === undefined || translation.language === targetLanguageCode
  );
};

/** Exact headword match only. */
export const resolveCrossReference = (reference: CrossReference, corpus: Corpus): Page | undefined =>
  corpus.get(reference.target);
