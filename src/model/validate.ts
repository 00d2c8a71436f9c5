import { InvalidEntryError } from '../errors';
import type { CrossReference, LanguageSection, PartOfSpeechBlock, Page, Sense, Translation } from '../types';

const isBlank = (value: string | undefined): boolean => !value || !value.trim();

export const validateCrossReference = (reference: CrossReference): CrossReference => {
  if (isBlank(reference.target)) {
    throw new InvalidEntryError(`${reference.relation} cross-reference has an empty target`);
  }
  return reference;
};

export const validateTranslation = (translation: Translation): Translation => {
  if (isBlank(translation.language)) {
    throw new InvalidEntryError(`translation "${translation.term}" has no target language`);
  }
  if (isBlank(translation.term)) {
    throw new InvalidEntryError(`translation into "${translation.language}" has an empty term`);
  }
  return translation;
};

export const validateSense = (sense: Sense): Sense => {
  if (!Number.isInteger(sense.number) || sense.number < 1) {
    throw new InvalidEntryError(`sense number ${sense.number} is not a positive integer`);
  }
  if (isBlank(sense.gloss)) {
    throw new InvalidEntryError(`sense ${sense.number} has an empty gloss`);
  }
  sense.crossReferences.forEach(validateCrossReference);
  sense.translations.forEach(validateTranslation);
  return sense;
};

export const validatePartOfSpeech = (block: PartOfSpeechBlock): PartOfSpeechBlock => {
  if (isBlank(block.kind)) {
    throw new InvalidEntryError('part-of-speech block has no kind');
  }
  block.senses.forEach((sense, index) => {
    if (sense.number !== index + 1) {
      throw new InvalidEntryError(`${block.kind} sense at position ${index + 1} is numbered ${sense.number}`);
    }
    validateSense(sense);
  });
  return block;
};

export const validateLanguageSection = (section: LanguageSection): LanguageSection => {
  if (isBlank(section.code)) {
    throw new InvalidEntryError('language section has no language code');
  }
  const hasContent =
    section.partsOfSpeech.length > 0 || !isBlank(section.etymology) || section.pronunciations.entries.length > 0;
  if (!hasContent) {
    throw new InvalidEntryError(`language section "${section.code}" has no part of speech, etymology or pronunciation`);
  }
  section.partsOfSpeech.forEach(validatePartOfSpeech);
  return section;
};

export const validatePage = (page: Page): Page => {
  if (isBlank(page.headword)) {
    throw new InvalidEntryError('page headword is empty');
  }
  if (!page.languages.length) {
    throw new InvalidEntryError(`page "${page.headword}" has no language section`);
  }
  page.languages.forEach(validateLanguageSection);
  return page;
};
