export type CrossReferenceRelation =
  | 'synonym'
  | 'antonym'
  | 'hypernym'
  | 'hyponym'
  | 'derived-term'
  | 'related-term'
  | 'compound';

export type Attributes = Readonly<Record<string, string>>;

export interface Pronunciation {
  system: string;
  value: string;
}

export interface PronunciationSet {
  entries: readonly Pronunciation[];
  audio?: string;
}

export interface CrossReference {
  relation: CrossReferenceRelation;
  target: string;
}

export interface Translation {
  language: string;
  term: string;
  attributes: Attributes;
}

export interface Example {
  text: string;
  translation?: string;
}

export interface Sense {
  number: number;
  gloss: string;
  tag?: string;
  notes: readonly string[];
  examples: readonly Example[];
  crossReferences: readonly CrossReference[];
  translations: readonly Translation[];
}

export interface PartOfSpeechBlock {
  kind: string;
  attributes: Attributes;
  senses: readonly Sense[];
}

export interface LanguageSection {
  code: string;
  etymology?: string;
  pronunciations: PronunciationSet;
  partsOfSpeech: readonly PartOfSpeechBlock[];
}

export interface Page {
  headword: string;
  languages: readonly LanguageSection[];
}

/** Immutable headword → page mapping produced by a corpus run. */
export type Corpus = ReadonlyMap<string, Page>;

export interface RawPage {
  headword: string;
  text: string;
}

export type DiagnosticCode = 'MalformedTemplate' | 'OrphanEvent' | 'DuplicateHeadword';

export interface Diagnostic {
  code: DiagnosticCode;
  message: string;
  offset?: number;
}

export type Logger = Pick<Console, 'warn' | 'log'>;
