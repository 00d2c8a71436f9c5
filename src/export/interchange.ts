import { InvalidInterchangeError } from '../errors';
import { deepFreeze } from '../model/freeze';
import { validatePage } from '../model/validate';
import { CROSS_REFERENCE_RELATIONS } from '../parser/vocabulary';
import type {
  Corpus,
  CrossReference,
  CrossReferenceRelation,
  Example,
  LanguageSection,
  Page,
  PartOfSpeechBlock,
  Pronunciation,
  Sense,
  Translation
} from '../types';

export const INTERCHANGE_SCHEMA_VERSION = 1;

export interface PageRecord {
  schemaVersion: number;
  headword: string;
  languages: LanguageSection[];
}

export interface CorpusRecord {
  schemaVersion: number;
  generatedAt: string;
  pages: PageRecord[];
}

/**
 * Plain JSON copy of a page. The model types are already the interchange
 * shape, so this only strips immutability and adds the schema version.
 */
export const toInterchange = (page: Page): PageRecord => ({
  schemaVersion: INTERCHANGE_SCHEMA_VERSION,
  headword: page.headword,
  languages: page.languages.map((section) => {
    const copy: LanguageSection = {
      code: section.code,
      pronunciations: {
        entries: section.pronunciations.entries.map((entry) => ({ ...entry })),
        ...(section.pronunciations.audio ? { audio: section.pronunciations.audio } : {})
      },
      partsOfSpeech: section.partsOfSpeech.map((block) => ({
        kind: block.kind,
        attributes: { ...block.attributes },
        senses: block.senses.map((sense) => ({
          ...sense,
          notes: [...sense.notes],
          examples: sense.examples.map((example) => ({ ...example })),
          crossReferences: sense.crossReferences.map((reference) => ({ ...reference })),
          translations: sense.translations.map((translation) => ({
            ...translation,
            attributes: { ...translation.attributes }
          }))
        }))
      }))
    };
    if (section.etymology !== undefined) {
      copy.etymology = section.etymology;
    }
    return copy;
  })
});

type JsonObject = Record<string, unknown>;

const isObject = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const fail = (path: string, expected: string): never => {
  throw new InvalidInterchangeError(`${path} must be ${expected}`);
};

const readObject = (value: unknown, path: string): JsonObject => (isObject(value) ? value : fail(path, 'an object'));

const readString = (source: JsonObject, key: string, path: string): string => {
  const value = source[key];
  return typeof value === 'string' ? value : fail(`${path}.${key}`, 'a string');
};

const readOptionalString = (source: JsonObject, key: string, path: string): string | undefined =>
  source[key] === undefined ? undefined : readString(source, key, path);

const readArray = <T>(source: JsonObject, key: string, path: string, read: (item: unknown, path: string) => T): T[] => {
  const value = source[key];
  if (!Array.isArray(value)) {
    return fail(`${path}.${key}`, 'an array');
  }
  return value.map((item, index) => read(item, `${path}.${key}[${index}]`));
};

const readStringMap = (source: JsonObject, key: string, path: string): Record<string, string> => {
  const value = readObject(source[key], `${path}.${key}`);
  const result: Record<string, string> = {};
  Object.keys(value).forEach((name) => {
    result[name] = readString(value, name, `${path}.${key}`);
  });
  return result;
};

const readRelation = (source: JsonObject, path: string): CrossReferenceRelation => {
  const value = readString(source, 'relation', path);
  const relation = CROSS_REFERENCE_RELATIONS.find((candidate) => candidate === value);
  return relation ?? fail(`${path}.relation`, `one of ${CROSS_REFERENCE_RELATIONS.join(', ')}`);
};

const readPronunciation = (value: unknown, path: string): Pronunciation => {
  const source = readObject(value, path);
  return { system: readString(source, 'system', path), value: readString(source, 'value', path) };
};

const readExample = (value: unknown, path: string): Example => {
  const source = readObject(value, path);
  const example: Example = { text: readString(source, 'text', path) };
  const translation = readOptionalString(source, 'translation', path);
  if (translation !== undefined) {
    example.translation = translation;
  }
  return example;
};

const readCrossReference = (value: unknown, path: string): CrossReference => {
  const source = readObject(value, path);
  return { relation: readRelation(source, path), target: readString(source, 'target', path) };
};

const readTranslation = (value: unknown, path: string): Translation => {
  const source = readObject(value, path);
  return {
    language: readString(source, 'language', path),
    term: readString(source, 'term', path),
    attributes: readStringMap(source, 'attributes', path)
  };
};

const readSense = (value: unknown, path: string): Sense => {
  const source = readObject(value, path);
  const number = source.number;
  if (typeof number !== 'number') {
    return fail(`${path}.number`, 'a number');
  }
  const sense: Sense = {
    number,
    gloss: readString(source, 'gloss', path),
    notes: readArray(source, 'notes', path, (item, itemPath) =>
      typeof item === 'string' ? item : fail(itemPath, 'a string')
    ),
    examples: readArray(source, 'examples', path, readExample),
    crossReferences: readArray(source, 'crossReferences', path, readCrossReference),
    translations: readArray(source, 'translations', path, readTranslation)
  };
  const tag = readOptionalString(source, 'tag', path);
  if (tag !== undefined) {
    sense.tag = tag;
  }
  return sense;
};

const readPartOfSpeech = (value: unknown, path: string): PartOfSpeechBlock => {
  const source = readObject(value, path);
  return {
    kind: readString(source, 'kind', path),
    attributes: readStringMap(source, 'attributes', path),
    senses: readArray(source, 'senses', path, readSense)
  };
};

const readLanguageSection = (value: unknown, path: string): LanguageSection => {
  const source = readObject(value, path);
  const pronunciations = readObject(source.pronunciations, `${path}.pronunciations`);
  const audio = readOptionalString(pronunciations, 'audio', `${path}.pronunciations`);
  const section: LanguageSection = {
    code: readString(source, 'code', path),
    pronunciations: {
      entries: readArray(pronunciations, 'entries', `${path}.pronunciations`, readPronunciation),
      ...(audio !== undefined ? { audio } : {})
    },
    partsOfSpeech: readArray(source, 'partsOfSpeech', path, readPartOfSpeech)
  };
  const etymology = readOptionalString(source, 'etymology', path);
  if (etymology !== undefined) {
    section.etymology = etymology;
  }
  return section;
};

/** Rebuilds a frozen, validated page from its interchange record. */
export const fromInterchange = (record: unknown): Page => {
  const source = readObject(record, 'page');
  if (source.schemaVersion !== INTERCHANGE_SCHEMA_VERSION) {
    throw new InvalidInterchangeError(
      `Unsupported schema version ${String(source.schemaVersion)}, expected ${INTERCHANGE_SCHEMA_VERSION}`
    );
  }
  const page: Page = {
    headword: readString(source, 'headword', 'page'),
    languages: readArray(source, 'languages', 'page', readLanguageSection)
  };
  return deepFreeze(validatePage(page));
};

export const corpusToInterchange = (corpus: Corpus): CorpusRecord => ({
  schemaVersion: INTERCHANGE_SCHEMA_VERSION,
  generatedAt: new Date().toISOString(),
  pages: Array.from(corpus.values(), toInterchange)
});

/** A fresh corpus from a corpus record; it replaces any previous snapshot. */
export const corpusFromInterchange = (record: unknown): Corpus => {
  const source = readObject(record, 'corpus');
  const pages = readArray(source, 'pages', 'corpus', (item) => fromInterchange(item));
  const result = new Map<string, Page>();
  for (const page of pages) {
    if (result.has(page.headword)) {
      throw new InvalidInterchangeError(`corpus.pages contains "${page.headword}" more than once`);
    }
    result.set(page.headword, page);
  }
  return result;
};
