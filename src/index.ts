export * from './types';
export * from './errors';
export { tokenize, tokenizeInline, splitTopLevel } from './parser/tokenizer';
export { resolve, resolveTemplate } from './parser/resolver';
export { assemble, type AssembleOptions } from './parser/assembler';
export { renderInline, renderText } from './parser/render';
export { buildVocabulary, getDefaultVocabulary, loadVocabulary, type Vocabulary } from './parser/vocabulary';
export type { InlineToken, LexEvent, Token } from './parser/types';
export {
  validateCrossReference,
  validateLanguageSection,
  validatePage,
  validatePartOfSpeech,
  validateSense,
  validateTranslation
} from './model/validate';
export { deepFreeze } from './model/freeze';
export {
  isIgnoredTitle,
  parseCorpus,
  parseCorpusAsync,
  parsePage,
  type AsyncParseOptions,
  type CorpusResult,
  type PageFailure,
  type PageResult,
  type ParseOptions
} from './corpus';
export { allSensesOf, lookup, resolveCrossReference, sensesOf, translationsOf } from './query';
export {
  INTERCHANGE_SCHEMA_VERSION,
  corpusFromInterchange,
  corpusToInterchange,
  fromInterchange,
  toInterchange,
  type CorpusRecord,
  type PageRecord
} from './export/interchange';
export { readCorpusJson, writeCorpusJson } from './export/files';
export { writeCorpusSqlite } from './export/sqlite';
export { readExportFile, readMediaWikiExport } from './sources/mediawiki-xml';
