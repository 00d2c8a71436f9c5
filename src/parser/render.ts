import { tokenizeInline } from './tokenizer';
import type { InlineToken, TemplateToken } from './types';
import type { Vocabulary } from './vocabulary';

const DROPPED_NAMESPACES = new Set(['file', 'fitxer', 'image', 'imatge', 'category', 'categoria']);

const capitalise = (value: string): string => (value ? `${value[0].toUpperCase()}${value.slice(1)}` : value);

/**
 * Plain-text rendering of a template nobody claimed: link-like templates show
 * their term, bare labels such as `{{grammar|ca}}` show as `(Grammar)`, the
 * rest disappear.
 */
const renderTemplate = (token: TemplateToken, vocabulary: Vocabulary): string => {
  const linkArgument = vocabulary.linkTemplates.get(token.name);
  if (linkArgument === 'last') {
    return renderText(token.positional[token.positional.length - 1] ?? '', vocabulary);
  }
  if (linkArgument === 'second') {
    return renderText(token.positional[1] ?? token.positional[0] ?? '', vocabulary);
  }
  if (token.positional.length <= 1 && !Object.keys(token.keyed).length && token.name) {
    return `(${capitalise(token.name)})`;
  }
  return '';
};

const renderToken = (token: InlineToken, vocabulary: Vocabulary): string => {
  switch (token.kind) {
    case 'text':
      return token.raw;
    case 'link':
      if (token.namespace && DROPPED_NAMESPACES.has(token.namespace.toLowerCase())) {
        return '';
      }
      return token.display;
    case 'template':
      return renderTemplate(token, vocabulary);
    case 'comment':
    case 'gallery':
      return '';
  }
};

const cleanText = (value: string): string =>
  value
    .replace(/'''?([^']+)'''?/g, '$1')
    .replace(/<ref[^>]*>[\s\S]*?<\/ref>/g, '')
    .replace(/<ref[^>]*\/>/g, '')
    .replace(/<br\s*\/?>/gi, ' ')
    .replace(/&nbsp;/g, ' ')
    .replace(/\[https?:\/\/\S+ ([^\]]+)\]/g, '$1')
    .replace(/https?:\/\/\S+/g, '')
    .replace(/''/g, '')
    .replace(/\s{2,}/g, ' ')
    .replace(/\s+([.,;])/g, '$1')
    .trim();

export const renderInline = (tokens: readonly InlineToken[], vocabulary: Vocabulary): string =>
  cleanText(tokens.map((token) => renderToken(token, vocabulary)).join(''));

export const renderText = (value: string, vocabulary: Vocabulary): string =>
  renderInline(tokenizeInline(value), vocabulary);
