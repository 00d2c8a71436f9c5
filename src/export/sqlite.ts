import Database from 'better-sqlite3';

import { prepareTarget } from './files';
import type { Corpus, LanguageSection, Page, PartOfSpeechBlock, Sense } from '../types';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS languages (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    headword TEXT NOT NULL,
    language TEXT NOT NULL,
    position INTEGER NOT NULL,
    etymology TEXT,
    pronunciations TEXT NOT NULL,
    audio TEXT
  );
  CREATE TABLE IF NOT EXISTS senses (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    language_id INTEGER NOT NULL REFERENCES languages(id),
    headword TEXT NOT NULL,
    language TEXT NOT NULL,
    pos TEXT NOT NULL,
    pos_position INTEGER NOT NULL,
    attributes TEXT NOT NULL,
    sense_number INTEGER NOT NULL,
    gloss TEXT NOT NULL,
    tag TEXT,
    notes TEXT,
    examples TEXT,
    cross_references TEXT
  );
  CREATE TABLE IF NOT EXISTS translations (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    sense_id INTEGER NOT NULL REFERENCES senses(id),
    headword TEXT NOT NULL,
    language TEXT NOT NULL,
    target_language TEXT NOT NULL,
    term TEXT NOT NULL,
    attributes TEXT
  );
`;

const INDEXES = [
  'CREATE INDEX IF NOT EXISTS idx_languages_headword ON languages(headword, language);',
  'CREATE INDEX IF NOT EXISTS idx_senses_headword ON senses(headword, language, pos);',
  'CREATE INDEX IF NOT EXISTS idx_translations_target ON translations(target_language, term);'
];

const toLanguageRow = (page: Page, section: LanguageSection, position: number) => ({
  headword: page.headword,
  language: section.code,
  position,
  etymology: section.etymology ?? null,
  pronunciations: JSON.stringify(section.pronunciations.entries),
  audio: section.pronunciations.audio ?? null
});

const toSenseRow = (
  languageId: number | bigint,
  page: Page,
  section: LanguageSection,
  block: PartOfSpeechBlock,
  blockPosition: number,
  sense: Sense
) => ({
  languageId,
  headword: page.headword,
  language: section.code,
  pos: block.kind,
  posPosition: blockPosition,
  attributes: JSON.stringify(block.attributes),
  senseNumber: sense.number,
  gloss: sense.gloss,
  tag: sense.tag ?? null,
  notes: sense.notes.length ? JSON.stringify(sense.notes) : null,
  examples: sense.examples.length ? JSON.stringify(sense.examples) : null,
  crossReferences: sense.crossReferences.length ? JSON.stringify(sense.crossReferences) : null
});

/**
 * Writes the corpus into a fresh SQLite file: one row per language section,
 * per sense and per translation. Returns the number of sense rows.
 */
export const writeCorpusSqlite = async (filePath: string, corpus: Corpus, force: boolean): Promise<number> => {
  await prepareTarget(filePath, force);

  const db = new Database(filePath);
  db.pragma('journal_mode = WAL');
  db.exec(SCHEMA);
  INDEXES.forEach((statement) => db.exec(statement));

  const insertLanguage = db.prepare(
    `INSERT INTO languages (headword, language, position, etymology, pronunciations, audio)
     VALUES (@headword, @language, @position, @etymology, @pronunciations, @audio);`
  );
  const insertSense = db.prepare(
    `INSERT INTO senses (language_id, headword, language, pos, pos_position, attributes, sense_number, gloss, tag, notes, examples, cross_references)
     VALUES (@languageId, @headword, @language, @pos, @posPosition, @attributes, @senseNumber, @gloss, @tag, @notes, @examples, @crossReferences);`
  );
  const insertTranslation = db.prepare(
    `INSERT INTO translations (sense_id, headword, language, target_language, term, attributes)
     VALUES (@senseId, @headword, @language, @targetLanguage, @term, @attributes);`
  );

  const insertAll = db.transaction((pages: Page[]) => {
    let senses = 0;
    pages.forEach((page) => {
      page.languages.forEach((section, position) => {
        const languageId = insertLanguage.run(toLanguageRow(page, section, position + 1)).lastInsertRowid;
        section.partsOfSpeech.forEach((block, blockIndex) => {
          block.senses.forEach((sense) => {
            const senseId = insertSense.run(toSenseRow(languageId, page, section, block, blockIndex + 1, sense))
              .lastInsertRowid;
            senses += 1;
            sense.translations.forEach((translation) => {
              insertTranslation.run({
                senseId,
                headword: page.headword,
                language: section.code,
                targetLanguage: translation.language,
                term: translation.term,
                attributes: Object.keys(translation.attributes).length ? JSON.stringify(translation.attributes) : null
              });
            });
          });
        });
      });
    });
    return senses;
  });

  try {
    const count = insertAll(Array.from(corpus.values()));
    db.exec('VACUUM;');
    return count;
  } finally {
    db.close();
  }
};
