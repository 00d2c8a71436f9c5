import type { Attributes, CrossReferenceRelation } from '../types';

interface TokenBase {
  raw: string;
  start: number;
  end: number;
}

export interface HeadingToken extends TokenBase {
  kind: 'heading';
  level: number;
  text: string;
  content: InlineToken[];
}

export interface TemplateToken extends TokenBase {
  kind: 'template';
  name: string;
  positional: string[];
  keyed: Record<string, string>;
}

export interface ListItemToken extends TokenBase {
  kind: 'listItem';
  marker: string;
  depth: number;
  content: InlineToken[];
}

export interface LinkToken extends TokenBase {
  kind: 'link';
  target: string;
  display: string;
  namespace?: string;
}

export interface TextToken extends TokenBase {
  kind: 'text';
  /** Set on an opener with no matching closer. */
  malformed?: 'template' | 'link';
}

export interface GalleryToken extends TokenBase {
  kind: 'gallery';
}

export interface CommentToken extends TokenBase {
  kind: 'comment';
}

export type InlineToken = TemplateToken | LinkToken | TextToken | GalleryToken | CommentToken;

export type Token = HeadingToken | ListItemToken | InlineToken;

export type PartOfSpeechOrigin = 'heading' | 'template';

export type LexEvent =
  | { kind: 'beginLanguage'; code: string; offset: number }
  | { kind: 'beginEtymology'; offset: number }
  | { kind: 'beginPronunciation'; offset: number }
  | { kind: 'pronunciation'; system: string; value: string; offset: number }
  | { kind: 'audio'; file: string; offset: number }
  | {
      kind: 'beginPartOfSpeech';
      partOfSpeech: string;
      attributes: Attributes;
      origin: PartOfSpeechOrigin;
      offset: number;
    }
  | { kind: 'beginCrossRefSection'; relation: CrossReferenceRelation; offset: number }
  | {
      kind: 'crossRefEntry';
      relation?: CrossReferenceRelation;
      target: string;
      senseNumber?: number;
      offset: number;
    }
  | { kind: 'beginTranslations'; offset: number }
  | { kind: 'beginTranslationGroup'; label: string; offset: number }
  | { kind: 'endTranslationGroup'; offset: number }
  | { kind: 'translationEntry'; language: string; term: string; attributes: Attributes; offset: number }
  | { kind: 'example'; text: string; translation?: string; offset: number }
  | { kind: 'listItem'; marker: string; depth: number; text: string; tag?: string; offset: number }
  | { kind: 'text'; text: string; offset: number }
  | { kind: 'otherSection'; title: string; offset: number }
  | { kind: 'opaque'; name: string; positional: string[]; keyed: Record<string, string>; offset: number }
  | { kind: 'malformed'; raw: string; offset: number };

export type LexEventKind = LexEvent['kind'];

export type CrossRefEntryEvent = Extract<LexEvent, { kind: 'crossRefEntry' }>;
export type ExampleEvent = Extract<LexEvent, { kind: 'example' }>;
export type ListItemEvent = Extract<LexEvent, { kind: 'listItem' }>;
