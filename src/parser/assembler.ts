import { ParseCancelledError } from '../errors';
import { deepFreeze } from '../model/freeze';
import {
  validateCrossReference,
  validateLanguageSection,
  validatePage,
  validatePartOfSpeech,
  validateSense,
  validateTranslation
} from '../model/validate';
import type {
  CrossReference,
  CrossReferenceRelation,
  Diagnostic,
  Example,
  LanguageSection,
  Page,
  PartOfSpeechBlock,
  Pronunciation,
  Sense,
  Translation
} from '../types';
import type { LexEvent, PartOfSpeechOrigin } from './types';

interface SenseBuilder {
  number: number;
  gloss: string;
  tag?: string;
  notes: string[];
  examples: Example[];
  crossReferences: CrossReference[];
  translations: Translation[];
}

interface LanguageFrame {
  kind: 'language';
  code: string;
  etymology: string[];
  pronunciations: Pronunciation[];
  audio?: string;
  partsOfSpeech: PartOfSpeechBlock[];
}

interface PartOfSpeechFrame {
  kind: 'partOfSpeech';
  partOfSpeech: string;
  attributes: Record<string, string>;
  origin: PartOfSpeechOrigin;
  senses: SenseBuilder[];
}

interface SenseFrame {
  kind: 'sense';
  sense: SenseBuilder;
}

interface TranslationGroupFrame {
  kind: 'translationGroup';
  label: string;
  target: SenseBuilder;
  entries: Translation[];
}

type Frame =
  | LanguageFrame
  | PartOfSpeechFrame
  | SenseFrame
  | TranslationGroupFrame
  | { kind: 'etymology'; lines: string[] }
  | { kind: 'pronunciation' }
  | { kind: 'crossRefs'; relation: CrossReferenceRelation }
  | { kind: 'translations' }
  | { kind: 'other'; title: string };

type FrameKind = Frame['kind'];

export interface AssembleOptions {
  signal?: AbortSignal;
  /** Receives recoverable problems (orphan events, malformed markup). */
  report?: (diagnostic: Diagnostic) => void;
}

const toSense = (builder: SenseBuilder): Sense => {
  const sense: Sense = {
    number: builder.number,
    gloss: builder.gloss,
    notes: builder.notes,
    examples: builder.examples,
    crossReferences: builder.crossReferences,
    translations: builder.translations
  };
  if (builder.tag) {
    sense.tag = builder.tag;
  }
  return sense;
};

const sameKey = (left: string, right: string): boolean => left.toLocaleLowerCase() === right.toLocaleLowerCase();

/** Nothing but parenthesised labels such as `(Plural)`, or nothing at all. */
const LABELS_ONLY_PATTERN = /^(?:\([^()]*\)[\s.,;:]*)*$/;

const hasGloss = (text: string): boolean => !LABELS_ONLY_PATTERN.test(text.trim());

/**
 * Explicit stack of open entities. Popping a frame commits it into the frame
 * below; the page itself is built once the stack is empty.
 */
class PageAssembler {
  private readonly stack: Frame[] = [];
  private readonly languages: LanguageSection[] = [];

  constructor(
    private readonly headword: string,
    private readonly report: (diagnostic: Diagnostic) => void
  ) {}

  private top(): Frame | undefined {
    return this.stack[this.stack.length - 1];
  }

  private nearest<K extends FrameKind>(kind: K): Extract<Frame, { kind: K }> | undefined {
    for (let index = this.stack.length - 1; index >= 0; index -= 1) {
      const frame = this.stack[index];
      if (isFrame(frame, kind)) {
        return frame;
      }
    }
    return undefined;
  }

  private orphan(event: LexEvent, reason: string): void {
    this.report({
      code: 'OrphanEvent',
      message: `Dropped ${event.kind} in "${this.headword}": ${reason}`,
      offset: event.offset
    });
  }

  /** Pops and commits frames until the top frame is one of `kinds`. */
  private closeUntil(...kinds: FrameKind[]): void {
    let current = this.top();
    while (current && !kinds.includes(current.kind)) {
      this.commit();
      current = this.top();
    }
  }

  private closeAll(): void {
    while (this.stack.length) {
      this.commit();
    }
  }

  private commit(): void {
    const frame = this.stack.pop();
    if (!frame) {
      return;
    }
    switch (frame.kind) {
      case 'sense':
        validateSense(toSense(frame.sense));
        break;
      case 'translationGroup':
        frame.entries.forEach((entry) => frame.target.translations.push(validateTranslation(entry)));
        break;
      case 'etymology': {
        const language = this.nearest('language');
        const text = frame.lines.join(' ').trim();
        if (language && text) {
          language.etymology.push(text);
        }
        break;
      }
      case 'partOfSpeech': {
        const language = this.nearest('language');
        const block = validatePartOfSpeech({
          kind: frame.partOfSpeech,
          attributes: frame.attributes,
          senses: frame.senses.map(toSense)
        });
        language?.partsOfSpeech.push(block);
        break;
      }
      case 'language': {
        const section: LanguageSection = {
          code: frame.code,
          pronunciations: frame.audio
            ? { entries: frame.pronunciations, audio: frame.audio }
            : { entries: frame.pronunciations },
          partsOfSpeech: frame.partsOfSpeech
        };
        if (frame.etymology.length) {
          section.etymology = frame.etymology.join('\n');
        }
        this.languages.push(validateLanguageSection(section));
        break;
      }
      case 'pronunciation':
      case 'crossRefs':
      case 'translations':
      case 'other':
        break;
    }
  }

  private currentSense(): SenseBuilder | undefined {
    return this.nearest('sense')?.sense;
  }

  private senseByNumber(number: number): SenseBuilder | undefined {
    return this.nearest('partOfSpeech')?.senses.find((sense) => sense.number === number);
  }

  /** A numeric label picks that sense; a label prefixing a gloss picks that one. */
  private senseForLabel(label: string): SenseBuilder | undefined {
    const trimmed = label.trim();
    const numbered = trimmed.match(/^[([]?(\d+)[)\].]?$/);
    if (numbered) {
      return this.senseByNumber(Number.parseInt(numbered[1], 10));
    }
    const partOfSpeech = this.nearest('partOfSpeech');
    if (trimmed && partOfSpeech) {
      const match = partOfSpeech.senses.find((sense) => sameKey(sense.gloss.slice(0, trimmed.length), trimmed));
      if (match) {
        return match;
      }
    }
    return this.currentSense();
  }

  accept(event: LexEvent): void {
    switch (event.kind) {
      case 'beginLanguage':
        this.closeAll();
        this.stack.push({ kind: 'language', code: event.code, etymology: [], pronunciations: [], partsOfSpeech: [] });
        return;

      case 'beginEtymology':
        if (!this.nearest('language')) {
          this.orphan(event, 'no language section is open');
          return;
        }
        this.closeUntil('language');
        this.stack.push({ kind: 'etymology', lines: [] });
        return;

      case 'beginPronunciation':
        if (!this.nearest('language')) {
          this.orphan(event, 'no language section is open');
          return;
        }
        this.closeUntil('language');
        this.stack.push({ kind: 'pronunciation' });
        return;

      case 'pronunciation': {
        const language = this.nearest('language');
        if (!language) {
          this.orphan(event, 'no language section is open');
          return;
        }
        const exists = language.pronunciations.some(
          (entry) => entry.system === event.system && entry.value === event.value
        );
        if (!exists) {
          language.pronunciations.push({ system: event.system, value: event.value });
        }
        return;
      }

      case 'audio': {
        const language = this.nearest('language');
        if (!language) {
          this.orphan(event, 'no language section is open');
          return;
        }
        language.audio ??= event.file;
        return;
      }

      case 'beginPartOfSpeech': {
        if (!this.nearest('language')) {
          this.orphan(event, 'no language section is open');
          return;
        }
        const open = this.top();
        if (
          event.origin === 'template' &&
          open?.kind === 'partOfSpeech' &&
          open.origin === 'heading' &&
          open.partOfSpeech === event.partOfSpeech &&
          !open.senses.length
        ) {
          Object.assign(open.attributes, event.attributes);
          open.origin = 'template';
          return;
        }
        this.closeUntil('language');
        this.stack.push({
          kind: 'partOfSpeech',
          partOfSpeech: event.partOfSpeech,
          attributes: { ...event.attributes },
          origin: event.origin,
          senses: []
        });
        return;
      }

      case 'listItem': {
        if (event.marker === '#') {
          const partOfSpeech = this.nearest('partOfSpeech');
          if (!partOfSpeech) {
            this.orphan(event, 'sense outside a part-of-speech block');
            return;
          }
          this.closeUntil('partOfSpeech');
          if (!hasGloss(event.text)) {
            this.orphan(event, `sense line "${event.text}" has no gloss text`);
            return;
          }
          const sense: SenseBuilder = {
            number: partOfSpeech.senses.length + 1,
            gloss: event.text,
            notes: [],
            examples: [],
            crossReferences: [],
            translations: []
          };
          if (event.tag) {
            sense.tag = event.tag;
          }
          partOfSpeech.senses.push(sense);
          this.stack.push({ kind: 'sense', sense });
          return;
        }
        this.acceptText(event, event.text);
        return;
      }

      case 'text':
        this.acceptText(event, event.text);
        return;

      case 'example': {
        const sense = this.currentSense();
        if (!sense) {
          this.orphan(event, 'example outside a sense');
          return;
        }
        sense.examples.push(event.translation ? { text: event.text, translation: event.translation } : { text: event.text });
        return;
      }

      case 'beginCrossRefSection':
        if (!this.currentSense()) {
          this.orphan(event, `${event.relation} list outside a sense`);
          return;
        }
        this.closeUntil('sense');
        this.stack.push({ kind: 'crossRefs', relation: event.relation });
        return;

      case 'crossRefEntry': {
        const open = this.top();
        const relation = event.relation ?? (open?.kind === 'crossRefs' ? open.relation : undefined);
        const inSection = open?.kind === 'crossRefs';
        const inSenseLine = open?.kind === 'sense' && event.relation !== undefined;
        if (!relation || !(inSection || inSenseLine)) {
          this.orphan(event, `cross-reference "${event.target}" outside a cross-reference list`);
          return;
        }
        const sense = event.senseNumber === undefined ? this.currentSense() : this.senseByNumber(event.senseNumber);
        if (!sense) {
          const missing = event.senseNumber === undefined ? 'no current sense' : `no sense ${event.senseNumber}`;
          this.orphan(event, `${missing} for "${event.target}"`);
          return;
        }
        sense.crossReferences.push(validateCrossReference({ relation, target: event.target }));
        return;
      }

      case 'beginTranslations':
        if (!this.nearest('partOfSpeech')) {
          this.orphan(event, 'translations outside a part-of-speech block');
          return;
        }
        this.closeUntil('sense', 'partOfSpeech');
        this.stack.push({ kind: 'translations' });
        return;

      case 'beginTranslationGroup': {
        const target = this.senseForLabel(event.label);
        if (!target) {
          this.orphan(event, `no sense for translation group "${event.label}"`);
          return;
        }
        this.closeUntil('translations', 'sense', 'partOfSpeech');
        this.stack.push({ kind: 'translationGroup', label: event.label, target, entries: [] });
        return;
      }

      case 'endTranslationGroup':
        if (this.top()?.kind !== 'translationGroup') {
          this.orphan(event, 'no translation group is open');
          return;
        }
        this.commit();
        return;

      case 'translationEntry': {
        const open = this.top();
        if (open?.kind !== 'translationGroup') {
          this.orphan(event, `translation "${event.term}" outside a translation group`);
          return;
        }
        if (!event.language.trim() || !event.term.trim()) {
          this.orphan(event, `translation "${event.term}" into "${event.language}" is incomplete`);
          return;
        }
        open.entries.push({ language: event.language, term: event.term, attributes: event.attributes });
        return;
      }

      case 'otherSection':
        if (!this.nearest('language')) {
          return;
        }
        this.closeUntil('language');
        this.stack.push({ kind: 'other', title: event.title });
        return;

      case 'malformed':
        this.report({
          code: 'MalformedTemplate',
          message: `Unbalanced "${event.raw}" in "${this.headword}" kept as text`,
          offset: event.offset
        });
        return;

      case 'opaque':
        return;
    }
  }

  /** Free text and non-sense list items: etymology prose or sense notes. */
  private acceptText(event: LexEvent, text: string): void {
    const open = this.top();
    if (!open || !text) {
      return;
    }
    switch (open.kind) {
      case 'etymology':
        open.lines.push(text);
        return;
      case 'sense':
        if (event.kind === 'listItem') {
          open.sense.notes.push(text);
        }
        return;
      case 'partOfSpeech':
      case 'crossRefs':
      case 'translationGroup':
        if (event.kind === 'listItem') {
          this.orphan(event, `list item "${text}" has no sense to attach to`);
        }
        return;
      case 'language':
      case 'pronunciation':
      case 'translations':
      case 'other':
        return;
    }
  }

  finish(): Page {
    this.closeAll();
    const page: Page = { headword: this.headword, languages: this.languages };
    return deepFreeze(validatePage(page));
  }
}

function isFrame<K extends FrameKind>(frame: Frame, kind: K): frame is Extract<Frame, { kind: K }> {
  return frame.kind === kind;
}

/**
 * Runs the section state machine over one page's events and returns the
 * frozen page. Throws InvalidEntryError when an entity breaks an invariant
 * and ParseCancelledError when `signal` fires between events.
 */
export const assemble = (headword: string, events: Iterable<LexEvent>, options: AssembleOptions = {}): Page => {
  const report = options.report ?? (() => undefined);
  const assembler = new PageAssembler(headword, report);
  for (const event of events) {
    if (options.signal?.aborted) {
      throw new ParseCancelledError(headword);
    }
    assembler.accept(event);
  }
  if (options.signal?.aborted) {
    throw new ParseCancelledError(headword);
  }
  return assembler.finish();
};
