import { renderInline, renderText } from './render';
import type {
  CrossRefEntryEvent,
  ExampleEvent,
  HeadingToken,
  InlineToken,
  LexEvent,
  ListItemEvent,
  ListItemToken,
  TemplateToken,
  Token
} from './types';
import { getDefaultVocabulary, normaliseTitle, type Vocabulary } from './vocabulary';
import type { CrossReferenceRelation } from '../types';

const SECTION_MARKER_PATTERN = /^-(.+)-$/;
const LANGUAGE_CODE_PATTERN = /^[a-z]{2,3}(?:-[a-z]{2,8})*$/;
const INFLECTION_PATTERN = /^([a-z]{2,3})-(.+)$/;
const SENSE_NUMBER_PATTERN = /^\s*[([](\d+)[)\]]/;
const GENDER_PATTERN = /^(?:m|f|n|c|mf|fm|m f|m-f|mp|fp)$/;

/** Drops a leading language-code argument, as in `{{pron|ca|/bɔt/}}`. */
const withoutLanguage = (positional: readonly string[]): string[] =>
  positional.length > 1 && LANGUAGE_CODE_PATTERN.test(positional[0]) ? positional.slice(1) : [...positional];

const isSectionChange = (event: LexEvent): boolean =>
  event.kind === 'beginLanguage' ||
  event.kind === 'beginEtymology' ||
  event.kind === 'beginPronunciation' ||
  event.kind === 'beginTranslations' ||
  event.kind === 'beginPartOfSpeech' ||
  event.kind === 'beginCrossRefSection' ||
  event.kind === 'otherSection';

const inflectionAttributes = (token: TemplateToken): Record<string, string> => {
  const attributes: Record<string, string> = {};
  token.positional.forEach((value, index) => {
    if (!value) {
      return;
    }
    if (index === 0 && GENDER_PATTERN.test(value)) {
      attributes.gender = value;
      return;
    }
    attributes[String(index + 1)] = value;
  });
  return { ...attributes, ...token.keyed };
};

const translationAttributes = (token: TemplateToken): Record<string, string> => {
  const attributes: Record<string, string> = {};
  const [, , gender, number] = token.positional;
  if (gender) {
    attributes.gender = gender;
  }
  if (number) {
    attributes.number = number;
  }
  return { ...attributes, ...token.keyed };
};

/**
 * Maps a recognised template to its events. Returns undefined for templates
 * outside the vocabulary, which the caller passes through as opaque.
 */
export const resolveTemplate = (token: TemplateToken, vocabulary: Vocabulary): LexEvent[] | undefined => {
  const { name } = token;
  const offset = token.start;

  const section = vocabulary.sectionTemplates.get(name);
  if (section === 'etymology') {
    return [{ kind: 'beginEtymology', offset }];
  }
  if (section === 'pronunciation') {
    return [{ kind: 'beginPronunciation', offset }];
  }
  if (section === 'translations') {
    return [{ kind: 'beginTranslations', offset }];
  }

  const relation = vocabulary.crossReferenceTemplates.get(name);
  if (relation) {
    return [{ kind: 'beginCrossRefSection', relation, offset }];
  }

  const marker = name.match(SECTION_MARKER_PATTERN);
  if (marker) {
    const partOfSpeech = vocabulary.partOfSpeechSuffixes.get(marker[1]);
    if (partOfSpeech) {
      return [{ kind: 'beginPartOfSpeech', partOfSpeech, attributes: {}, origin: 'heading', offset }];
    }
    if (vocabulary.languageCodes.has(marker[1])) {
      return [{ kind: 'beginLanguage', code: marker[1], offset }];
    }
    return [{ kind: 'otherSection', title: marker[1], offset }];
  }

  const inflection = name.match(INFLECTION_PATTERN);
  if (inflection) {
    const partOfSpeech = vocabulary.partOfSpeechSuffixes.get(inflection[2]);
    if (partOfSpeech) {
      return [
        {
          kind: 'beginPartOfSpeech',
          partOfSpeech,
          attributes: inflectionAttributes(token),
          origin: 'template',
          offset
        }
      ];
    }
  }

  const system = vocabulary.pronunciationTemplates.get(name);
  if (system) {
    return withoutLanguage(token.positional)
      .map((value) => value.trim())
      .filter(Boolean)
      .map((value): LexEvent => ({ kind: 'pronunciation', system, value, offset }));
  }

  if (vocabulary.audioTemplates.has(name)) {
    const [file] = withoutLanguage(token.positional);
    return file ? [{ kind: 'audio', file, offset }] : [];
  }

  if (vocabulary.translationGroupOpen.has(name)) {
    return [{ kind: 'beginTranslationGroup', label: renderText(token.positional[0] ?? '', vocabulary), offset }];
  }
  if (vocabulary.translationGroupClose.has(name)) {
    return [{ kind: 'endTranslationGroup', offset }];
  }

  if (vocabulary.translationTemplates.has(name)) {
    return [
      {
        kind: 'translationEntry',
        language: (token.positional[0] ?? '').trim(),
        term: renderText(token.positional[1] ?? '', vocabulary),
        attributes: translationAttributes(token),
        offset
      }
    ];
  }

  if (vocabulary.exampleTemplates.has(name)) {
    const [text, positionalTranslation] = withoutLanguage(token.positional);
    const translation = token.keyed.t ?? token.keyed.trad ?? token.keyed.translation ?? positionalTranslation;
    const example: ExampleEvent = { kind: 'example', text: renderText(text ?? '', vocabulary), offset };
    const rendered = translation ? renderText(translation, vocabulary) : '';
    if (rendered) {
      example.translation = rendered;
    }
    return [example];
  }

  const inlineRelation = vocabulary.inlineCrossReferenceTemplates.get(name);
  if (inlineRelation) {
    return withoutLanguage(token.positional)
      .map((value) => renderText(value, vocabulary))
      .filter(Boolean)
      .map((target): LexEvent => ({ kind: 'crossRefEntry', relation: inlineRelation, target, offset }));
  }

  return undefined;
};

const opaque = (token: TemplateToken): LexEvent => ({
  kind: 'opaque',
  name: token.name,
  positional: token.positional,
  keyed: token.keyed,
  offset: token.start
});

const malformedIn = (tokens: readonly InlineToken[]): LexEvent[] =>
  tokens.flatMap((inner): LexEvent[] =>
    inner.kind === 'text' && inner.malformed ? [{ kind: 'malformed', raw: inner.raw, offset: inner.start }] : []
  );

const headingSection = (token: HeadingToken, vocabulary: Vocabulary): LexEvent => {
  const offset = token.start;
  for (const inner of token.content) {
    if (inner.kind !== 'template') {
      continue;
    }
    const structural = resolveTemplate(inner, vocabulary)?.find(isSectionChange);
    if (structural) {
      return structural;
    }
  }

  const title = renderInline(token.content, vocabulary);
  const key = normaliseTitle(title).replace(/\s*\d+$/, '');

  const code = vocabulary.languageNames.get(key);
  if (code) {
    return { kind: 'beginLanguage', code, offset };
  }
  const partOfSpeech = vocabulary.partOfSpeechHeadings.get(key);
  if (partOfSpeech) {
    return { kind: 'beginPartOfSpeech', partOfSpeech, attributes: {}, origin: 'heading', offset };
  }
  const section = vocabulary.sectionHeadings.get(key);
  if (section === 'etymology') {
    return { kind: 'beginEtymology', offset };
  }
  if (section === 'pronunciation') {
    return { kind: 'beginPronunciation', offset };
  }
  if (section === 'translations') {
    return { kind: 'beginTranslations', offset };
  }
  const relation = vocabulary.crossReferenceHeadings.get(key);
  if (relation) {
    return { kind: 'beginCrossRefSection', relation, offset };
  }
  return { kind: 'otherSection', title, offset };
};

/** Section event of a heading, preceded by any malformed markup found in its title. */
const resolveHeading = (token: HeadingToken, vocabulary: Vocabulary): LexEvent[] => [
  ...malformedIn(token.content),
  headingSection(token, vocabulary)
];

/** Cross-reference list items: `* (2) [[odre]], [[bota]]`. */
function* resolveCrossRefItem(
  token: ListItemToken,
  relation: CrossReferenceRelation,
  vocabulary: Vocabulary
): Generator<LexEvent, void, undefined> {
  const first = token.content[0];
  const senseMatch = first && first.kind === 'text' ? first.raw.match(SENSE_NUMBER_PATTERN) : null;
  const senseNumber = senseMatch ? Number.parseInt(senseMatch[1], 10) : undefined;

  for (const inner of token.content) {
    let target = '';
    if (inner.kind === 'text' && inner.malformed) {
      yield { kind: 'malformed', raw: inner.raw, offset: inner.start };
      continue;
    }
    if (inner.kind === 'link' && !inner.namespace) {
      target = inner.target;
    } else if (inner.kind === 'template' && vocabulary.linkTemplates.has(inner.name)) {
      target = renderInline([inner], vocabulary);
    } else if (inner.kind === 'template') {
      yield* resolveTemplate(inner, vocabulary) ?? [opaque(inner)];
      continue;
    }
    if (!target) {
      continue;
    }
    const entry: CrossRefEntryEvent = { kind: 'crossRefEntry', relation, target, offset: inner.start };
    if (senseNumber !== undefined) {
      entry.senseNumber = senseNumber;
    }
    yield entry;
  }
}

function* resolveListItem(token: ListItemToken, vocabulary: Vocabulary): Generator<LexEvent, void, undefined> {
  const remaining: InlineToken[] = [];
  const nested: LexEvent[] = [];
  const tags: string[] = [];
  let translationLine = false;

  for (const inner of token.content) {
    if (inner.kind === 'text' && inner.malformed) {
      nested.push({ kind: 'malformed', raw: inner.raw, offset: inner.start });
    }
    if (inner.kind !== 'template') {
      remaining.push(inner);
      continue;
    }
    if (vocabulary.senseTagTemplates.has(inner.name)) {
      tags.push(
        ...withoutLanguage(inner.positional)
          .map((value) => renderText(value, vocabulary))
          .filter(Boolean)
      );
      continue;
    }
    const events = resolveTemplate(inner, vocabulary);
    if (!events) {
      nested.push(opaque(inner));
      remaining.push(inner);
      continue;
    }
    if (events.some((event) => event.kind === 'translationEntry')) {
      translationLine = true;
    }
    nested.push(...events);
  }

  const text = renderInline(remaining, vocabulary);
  const tag = tags.length ? tags.join(', ') : undefined;
  const isSenseLine = token.marker === '#';
  if (!translationLine && (text || isSenseLine)) {
    const item: ListItemEvent = { kind: 'listItem', marker: token.marker, depth: token.depth, text, offset: token.start };
    if (tag !== undefined) {
      item.tag = tag;
    }
    yield item;
  }
  yield* nested;
}

function* resolveStream(tokens: Iterable<Token>, vocabulary: Vocabulary): Generator<LexEvent, void, undefined> {
  let relation: CrossReferenceRelation | undefined;
  let line: InlineToken[] = [];

  const flush = (): LexEvent | undefined => {
    const pending = line;
    line = [];
    if (!pending.length) {
      return undefined;
    }
    const text = renderInline(pending, vocabulary);
    return text ? { kind: 'text', text, offset: pending[0].start } : undefined;
  };

  function* emit(events: Iterable<LexEvent>): Generator<LexEvent, void, undefined> {
    for (const event of events) {
      if (event.kind === 'beginCrossRefSection') {
        relation = event.relation;
      } else if (isSectionChange(event)) {
        relation = undefined;
      }
      yield event;
    }
  }

  for (const token of tokens) {
    if (token.kind === 'heading' || token.kind === 'listItem' || (token.kind === 'text' && token.raw === '\n')) {
      const text = flush();
      if (text) {
        yield text;
      }
    }

    if (token.kind === 'listItem' && token.marker === '#') {
      relation = undefined;
    }

    switch (token.kind) {
      case 'heading':
        yield* emit(resolveHeading(token, vocabulary));
        break;
      case 'listItem':
        if (relation) {
          yield* emit(resolveCrossRefItem(token, relation, vocabulary));
        } else {
          yield* emit(resolveListItem(token, vocabulary));
        }
        break;
      case 'template': {
        const events = resolveTemplate(token, vocabulary);
        if (events) {
          const text = flush();
          if (text) {
            yield text;
          }
          yield* emit(events);
        } else {
          line.push(token);
          yield opaque(token);
        }
        break;
      }
      case 'text':
        if (token.malformed) {
          yield { kind: 'malformed', raw: token.raw, offset: token.start };
        }
        if (token.raw !== '\n') {
          line.push(token);
        }
        break;
      case 'link':
      case 'comment':
      case 'gallery':
        line.push(token);
        break;
    }
  }

  const text = flush();
  if (text) {
    yield text;
  }
}

/** Lazily resolves a token stream into typed events; restartable like its input. */
export const resolve = (tokens: Iterable<Token>, vocabulary: Vocabulary = getDefaultVocabulary()): Iterable<LexEvent> => ({
  [Symbol.iterator]: () => resolveStream(tokens, vocabulary)
});
