import { describe, expect, it } from 'vitest';

import { splitTopLevel, tokenize, tokenizeInline } from './tokenizer';
import type { Token } from './types';

const tokensOf = (text: string): Token[] => Array.from(tokenize(text));

describe('tokenize', () => {
  it('reproduces the input when token spans are concatenated', () => {
    const text = [
      '== {{-ca-}} ==',
      '# [[recipient|Recipient]] de pell {{x|{{y|1}}|k=v}}',
      '<gallery>',
      'Bot.jpg|Un bot',
      '</gallery>',
      '<!-- nota -->text {{foo|bar'
    ].join('\n');

    expect(tokensOf(text).map((token) => token.raw).join('')).toBe(text);
  });

  it('closes a gallery case-insensitively at the original offsets', () => {
    const [gallery, rest] = tokensOf('<gallery>\nİ.jpg\n</GALLERY >x');

    expect(gallery).toMatchObject({ kind: 'gallery', raw: '<gallery>\nİ.jpg\n</GALLERY >', start: 0, end: 27 });
    expect(rest).toMatchObject({ kind: 'text', raw: 'x', start: 27 });
  });

  it('keeps nested templates and links inside a single argument', () => {
    const [token] = tokensOf('{{x|{{y|1|2}}|k=v|[[a|b]]}}');

    expect(token).toMatchObject({
      kind: 'template',
      name: 'x',
      positional: ['{{y|1|2}}', '[[a|b]]'],
      keyed: { k: 'v' }
    });
  });

  it('strips a template namespace prefix from names', () => {
    const [token] = tokensOf('{{Plantilla:trad|en|boat}}');

    expect(token).toMatchObject({ kind: 'template', name: 'trad', positional: ['en', 'boat'] });
  });

  it('recognises headings with their level and inner tokens', () => {
    const [heading] = tokensOf('=== {{-nom-}} ===');

    expect(heading.kind).toBe('heading');
    if (heading.kind === 'heading') {
      expect(heading.level).toBe(3);
      expect(heading.text).toBe('{{-nom-}}');
      expect(heading.content.map((token) => token.kind)).toEqual(['text', 'template', 'text']);
      expect(heading.content[1].start).toBe(4);
    }
  });

  it('gives list items their marker, depth and absolute content offsets', () => {
    const tokens = tokensOf('ab\n#: {{ex|hola}}');
    const item = tokens[2];

    expect(item.kind).toBe('listItem');
    if (item.kind === 'listItem') {
      expect(item.marker).toBe('#:');
      expect(item.depth).toBe(2);
      expect(item.content[1]).toMatchObject({ kind: 'template', name: 'ex', start: 6, end: 17 });
    }
  });

  it('lets a template span lines inside a list item', () => {
    const tokens = tokensOf('# a {{x|\nb}} c\nnext');

    expect(tokens.map((token) => token.raw)).toEqual(['# a {{x|\nb}} c', '\n', 'next']);
  });

  it('emits an unbalanced opener as malformed text and keeps scanning', () => {
    const tokens = tokensOf('{{foo|bar');

    expect(tokens).toEqual([
      { kind: 'text', raw: '{{', start: 0, end: 2, malformed: 'template' },
      { kind: 'text', raw: 'foo|bar', start: 2, end: 9 }
    ]);
  });

  it('recovers templates that follow an unbalanced opener', () => {
    const tokens = tokensOf('{{a|{{b}}');

    expect(tokens.map((token) => token.kind)).toEqual(['text', 'text', 'template']);
    expect(tokens[2]).toMatchObject({ name: 'b', start: 4 });
  });

  it('parses link targets, display text and namespaces', () => {
    const [plain, file] = tokenizeInline('[[bot#Català|bot]][[Fitxer:Bot.jpg|miniatura|Un bot]]');

    expect(plain).toMatchObject({ kind: 'link', target: 'bot', display: 'bot' });
    expect(plain).not.toHaveProperty('namespace');
    expect(file).toMatchObject({ kind: 'link', namespace: 'Fitxer', display: 'Un bot' });
  });

  it('can be iterated more than once', () => {
    const stream = tokenize('== Català ==\n# a');

    expect(Array.from(stream)).toEqual(Array.from(stream));
  });
});

describe('splitTopLevel', () => {
  it('splits only outside nested spans', () => {
    expect(splitTopLevel('a|{{b|c}}|[[d|e]]|', '|')).toEqual(['a', '{{b|c}}', '[[d|e]]', '']);
  });
});
