import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import { describeError, InvalidVocabularyError } from '../errors';
import type { CrossReferenceRelation } from '../types';

const DEFAULT_VOCABULARY_PATH = fileURLToPath(new URL('../../data/vocabulary.json', import.meta.url));

export const CROSS_REFERENCE_RELATIONS: readonly CrossReferenceRelation[] = [
  'synonym',
  'antonym',
  'hypernym',
  'hyponym',
  'derived-term',
  'related-term',
  'compound'
];

export type SectionKind = 'etymology' | 'pronunciation' | 'translations';

export type LinkTemplateArgument = 'last' | 'second';

/** Lookup tables over the closed template and heading vocabulary. */
export interface Vocabulary {
  sectionTemplates: ReadonlyMap<string, SectionKind>;
  sectionHeadings: ReadonlyMap<string, SectionKind>;
  crossReferenceTemplates: ReadonlyMap<string, CrossReferenceRelation>;
  crossReferenceHeadings: ReadonlyMap<string, CrossReferenceRelation>;
  partOfSpeechHeadings: ReadonlyMap<string, string>;
  partOfSpeechSuffixes: ReadonlyMap<string, string>;
  languageNames: ReadonlyMap<string, string>;
  /** Codes accepted in `{{-xx-}}` markers. */
  languageCodes: ReadonlySet<string>;
  pronunciationTemplates: ReadonlyMap<string, string>;
  audioTemplates: ReadonlySet<string>;
  translationTemplates: ReadonlySet<string>;
  translationGroupOpen: ReadonlySet<string>;
  translationGroupClose: ReadonlySet<string>;
  exampleTemplates: ReadonlySet<string>;
  senseTagTemplates: ReadonlySet<string>;
  inlineCrossReferenceTemplates: ReadonlyMap<string, CrossReferenceRelation>;
  linkTemplates: ReadonlyMap<string, LinkTemplateArgument>;
}

type JsonObject = Record<string, unknown>;

const isObject = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const objectAt = (source: JsonObject, key: string, path: string): JsonObject => {
  const value = source[key];
  if (!isObject(value)) {
    throw new InvalidVocabularyError(`${path}.${key} must be an object`);
  }
  return value;
};

const stringsAt = (source: JsonObject, key: string, path: string): string[] => {
  const value = source[key];
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new InvalidVocabularyError(`${path}.${key} must be an array of strings`);
  }
  return value;
};

const stringAt = (source: JsonObject, key: string, path: string): string => {
  const value = source[key];
  if (typeof value !== 'string') {
    throw new InvalidVocabularyError(`${path}.${key} must be a string`);
  }
  return value;
};

const isRelation = (value: string): value is CrossReferenceRelation =>
  CROSS_REFERENCE_RELATIONS.some((relation) => relation === value);

const toRelation = (value: string, path: string): CrossReferenceRelation => {
  if (!isRelation(value)) {
    throw new InvalidVocabularyError(`${path}: unknown cross-reference relation "${value}"`);
  }
  return value;
};

const normaliseTitle = (value: string): string => value.trim().toLowerCase();

const sectionMap = (source: JsonObject, path: string, normalise: (value: string) => string) => {
  const result = new Map<string, SectionKind>();
  const kinds: SectionKind[] = ['etymology', 'pronunciation', 'translations'];
  kinds.forEach((kind) => {
    stringsAt(source, kind, path).forEach((name) => result.set(normalise(name), kind));
  });
  return result;
};

const relationMap = (source: JsonObject, path: string, normalise: (value: string) => string) => {
  const result = new Map<string, CrossReferenceRelation>();
  Object.keys(source).forEach((key) => {
    const relation = toRelation(key, path);
    stringsAt(source, key, path).forEach((name) => result.set(normalise(name), relation));
  });
  return result;
};

const identity = (value: string): string => value;

export const buildVocabulary = (raw: unknown): Vocabulary => {
  if (!isObject(raw)) {
    throw new InvalidVocabularyError('vocabulary must be a JSON object');
  }

  const sectionTemplates = objectAt(raw, 'sectionTemplates', 'vocabulary');
  const sectionHeadings = objectAt(raw, 'sectionHeadings', 'vocabulary');

  const partOfSpeechHeadings = new Map<string, string>();
  const partOfSpeechSuffixes = new Map<string, string>();
  const partsOfSpeech = objectAt(raw, 'partsOfSpeech', 'vocabulary');
  Object.keys(partsOfSpeech).forEach((kind) => {
    const entry = objectAt(partsOfSpeech, kind, 'vocabulary.partsOfSpeech');
    const path = `vocabulary.partsOfSpeech.${kind}`;
    stringsAt(entry, 'headings', path).forEach((heading) => partOfSpeechHeadings.set(normaliseTitle(heading), kind));
    stringsAt(entry, 'suffixes', path).forEach((suffix) => partOfSpeechSuffixes.set(suffix, kind));
  });

  const languageNames = new Map<string, string>();
  const languages = objectAt(raw, 'languages', 'vocabulary');
  Object.keys(languages).forEach((code) => {
    stringsAt(languages, code, 'vocabulary.languages').forEach((name) => languageNames.set(normaliseTitle(name), code));
  });

  const pronunciationTemplates = new Map<string, string>();
  const pronunciation = objectAt(raw, 'pronunciationTemplates', 'vocabulary');
  Object.keys(pronunciation).forEach((name) => {
    pronunciationTemplates.set(name, stringAt(pronunciation, name, 'vocabulary.pronunciationTemplates'));
  });

  const inlineCrossReferenceTemplates = new Map<string, CrossReferenceRelation>();
  const inline = objectAt(raw, 'inlineCrossReferenceTemplates', 'vocabulary');
  Object.keys(inline).forEach((name) => {
    const path = 'vocabulary.inlineCrossReferenceTemplates';
    inlineCrossReferenceTemplates.set(name, toRelation(stringAt(inline, name, path), path));
  });

  const linkTemplates = new Map<string, LinkTemplateArgument>();
  const links = objectAt(raw, 'linkTemplates', 'vocabulary');
  Object.keys(links).forEach((name) => {
    const argument = stringAt(links, name, 'vocabulary.linkTemplates');
    if (argument !== 'last' && argument !== 'second') {
      throw new InvalidVocabularyError(`vocabulary.linkTemplates.${name} must be "last" or "second"`);
    }
    linkTemplates.set(name, argument);
  });

  return {
    sectionTemplates: sectionMap(sectionTemplates, 'vocabulary.sectionTemplates', identity),
    sectionHeadings: sectionMap(sectionHeadings, 'vocabulary.sectionHeadings', normaliseTitle),
    crossReferenceTemplates: relationMap(
      objectAt(sectionTemplates, 'crossReferences', 'vocabulary.sectionTemplates'),
      'vocabulary.sectionTemplates.crossReferences',
      identity
    ),
    crossReferenceHeadings: relationMap(
      objectAt(sectionHeadings, 'crossReferences', 'vocabulary.sectionHeadings'),
      'vocabulary.sectionHeadings.crossReferences',
      normaliseTitle
    ),
    partOfSpeechHeadings,
    partOfSpeechSuffixes,
    languageNames,
    languageCodes: new Set(Object.keys(languages)),
    pronunciationTemplates,
    audioTemplates: new Set(stringsAt(raw, 'audioTemplates', 'vocabulary')),
    translationTemplates: new Set(stringsAt(raw, 'translationTemplates', 'vocabulary')),
    translationGroupOpen: new Set(stringsAt(raw, 'translationGroupOpen', 'vocabulary')),
    translationGroupClose: new Set(stringsAt(raw, 'translationGroupClose', 'vocabulary')),
    exampleTemplates: new Set(stringsAt(raw, 'exampleTemplates', 'vocabulary')),
    senseTagTemplates: new Set(stringsAt(raw, 'senseTagTemplates', 'vocabulary')),
    inlineCrossReferenceTemplates,
    linkTemplates
  };
};

export const loadVocabulary = (filePath: string = DEFAULT_VOCABULARY_PATH): Vocabulary => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new InvalidVocabularyError(`Failed to read vocabulary ${filePath}: ${describeError(error)}`);
  }
  return buildVocabulary(parsed);
};

let defaultVocabulary: Vocabulary | undefined;

export const getDefaultVocabulary = (): Vocabulary => {
  defaultVocabulary ??= loadVocabulary();
  return defaultVocabulary;
};

export { normaliseTitle };
