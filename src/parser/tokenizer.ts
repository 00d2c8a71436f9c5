import type {
  HeadingToken,
  InlineToken,
  LinkToken,
  ListItemToken,
  TemplateToken,
  TextToken,
  Token
} from './types';

const HEADING_PATTERN = /^(={1,6})(.+?)\1[ \t\r]*$/;
const LIST_MARKER_PATTERN = /^[#*:;]+/;
const TEMPLATE_PREFIX_PATTERN = /^(?:template|plantilla)\s*:\s*/i;
const GALLERY_OPEN_PATTERN = /^<gallery[\s>]/i;
const GALLERY_CLOSE_PATTERN = /<\/gallery\s*>/gi;

type Opener = '{' | '[';

/**
 * Finds the index just past the closer matching the opener at `start`,
 * or -1 when the input ends first. Comments inside the span are skipped.
 */
const findClosing = (text: string, start: number): number => {
  const stack: Opener[] = [];
  let i = start;
  while (i < text.length) {
    if (text.startsWith('<!--', i)) {
      const close = text.indexOf('-->', i + 4);
      if (close === -1) {
        return -1;
      }
      i = close + 3;
      continue;
    }
    const pair = text.slice(i, i + 2);
    if (pair === '{{' || pair === '[[') {
      stack.push(pair === '{{' ? '{' : '[');
      i += 2;
      continue;
    }
    const top = stack[stack.length - 1];
    if ((pair === '}}' && top === '{') || (pair === ']]' && top === '[')) {
      stack.pop();
      i += 2;
      if (!stack.length) {
        return i;
      }
      continue;
    }
    i += 1;
  }
  return -1;
};

/** Splits on `separator` occurrences outside nested `{{…}}` and `[[…]]` spans. */
export const splitTopLevel = (text: string, separator: string): string[] => {
  const parts: string[] = [];
  let depth = 0;
  let current = '';
  let i = 0;
  while (i < text.length) {
    const pair = text.slice(i, i + 2);
    if (pair === '{{' || pair === '[[') {
      depth += 1;
      current += pair;
      i += 2;
      continue;
    }
    if ((pair === '}}' || pair === ']]') && depth > 0) {
      depth -= 1;
      current += pair;
      i += 2;
      continue;
    }
    if (depth === 0 && text[i] === separator) {
      parts.push(current);
      current = '';
      i += 1;
      continue;
    }
    current += text[i];
    i += 1;
  }
  parts.push(current);
  return parts;
};

const normaliseTemplateName = (value: string): string =>
  value.replace(TEMPLATE_PREFIX_PATTERN, '').replace(/\s+/g, ' ').trim();

const parseTemplate = (raw: string, start: number): TemplateToken => {
  const [rawName, ...args] = splitTopLevel(raw.slice(2, -2), '|');
  const positional: string[] = [];
  const keyed: Record<string, string> = {};
  args.forEach((arg) => {
    const [key, ...rest] = splitTopLevel(arg, '=');
    const name = key.trim();
    if (rest.length && name) {
      keyed[name] = rest.join('=').trim();
      return;
    }
    positional.push(arg.trim());
  });
  return {
    kind: 'template',
    raw,
    start,
    end: start + raw.length,
    name: normaliseTemplateName(rawName ?? ''),
    positional,
    keyed
  };
};

const parseLink = (raw: string, start: number): LinkToken => {
  const parts = splitTopLevel(raw.slice(2, -2), '|').map((part) => part.trim());
  const fullTarget = parts[0] ?? '';
  const namespaceMatch = fullTarget.match(/^([^:[\]{}|]+):\s*\S/);
  const withoutFragment = fullTarget.split('#')[0].trim();
  const target = withoutFragment || fullTarget;
  const link: LinkToken = {
    kind: 'link',
    raw,
    start,
    end: start + raw.length,
    target,
    display: parts.length > 1 ? parts[parts.length - 1] : target
  };
  if (namespaceMatch) {
    link.namespace = namespaceMatch[1].trim();
  }
  return link;
};

const textToken = (raw: string, start: number, malformed?: TextToken['malformed']): TextToken => {
  const token: TextToken = { kind: 'text', raw, start, end: start + raw.length };
  if (malformed) {
    token.malformed = malformed;
  }
  return token;
};

interface InlineScan {
  tokens: InlineToken[];
  end: number;
}

/**
 * Scans inline markup from `from` up to `limit`, or up to the first newline
 * outside a template or link span when `stopAtNewline` is set. `base` is added
 * to every offset.
 */
const scanInline = (text: string, from: number, limit: number, stopAtNewline: boolean, base: number): InlineScan => {
  const tokens: InlineToken[] = [];
  let runStart = from;
  let i = from;

  const flushText = (until: number) => {
    if (until > runStart) {
      tokens.push(textToken(text.slice(runStart, until), base + runStart));
    }
  };

  while (i < limit) {
    const ch = text[i];
    if (stopAtNewline && ch === '\n') {
      break;
    }
    if (ch === '<' && text.startsWith('<!--', i)) {
      const close = text.indexOf('-->', i + 4);
      if (close !== -1 && close + 3 <= limit) {
        flushText(i);
        const raw = text.slice(i, close + 3);
        tokens.push({ kind: 'comment', raw, start: base + i, end: base + close + 3 });
        i = close + 3;
        runStart = i;
        continue;
      }
    }
    if (ch === '<' && GALLERY_OPEN_PATTERN.test(text.slice(i, i + 9))) {
      GALLERY_CLOSE_PATTERN.lastIndex = i;
      const close = GALLERY_CLOSE_PATTERN.exec(text);
      const endIndex = close ? close.index + close[0].length : -1;
      if (close && endIndex <= limit) {
        flushText(i);
        tokens.push({ kind: 'gallery', raw: text.slice(i, endIndex), start: base + i, end: base + endIndex });
        i = endIndex;
        runStart = i;
        continue;
      }
    }
    const pair = text.slice(i, i + 2);
    if (pair === '{{' || pair === '[[') {
      flushText(i);
      const close = findClosing(text, i);
      if (close === -1 || close > limit) {
        tokens.push(textToken(pair, base + i, pair === '{{' ? 'template' : 'link'));
        i += 2;
        runStart = i;
        continue;
      }
      const raw = text.slice(i, close);
      tokens.push(pair === '{{' ? parseTemplate(raw, base + i) : parseLink(raw, base + i));
      i = close;
      runStart = i;
      continue;
    }
    i += 1;
  }

  flushText(i);
  return { tokens, end: i };
};

const lineEndOf = (text: string, from: number): number => {
  const index = text.indexOf('\n', from);
  return index === -1 ? text.length : index;
};

function* scanDocument(text: string): Generator<Token, void, undefined> {
  let pos = 0;
  while (pos < text.length) {
    if (text[pos] === '\n') {
      yield textToken('\n', pos);
      pos += 1;
      continue;
    }

    const lineEnd = lineEndOf(text, pos);
    const line = text.slice(pos, lineEnd);

    const heading = line.match(HEADING_PATTERN);
    if (heading) {
      const inner = heading[2];
      const innerOffset = pos + heading[1].length;
      const token: HeadingToken = {
        kind: 'heading',
        raw: line,
        start: pos,
        end: lineEnd,
        level: heading[1].length,
        text: inner.trim(),
        content: scanInline(inner, 0, inner.length, false, innerOffset).tokens
      };
      yield token;
      pos = lineEnd;
      continue;
    }

    const marker = line.match(LIST_MARKER_PATTERN);
    if (marker) {
      const contentStart = pos + marker[0].length;
      const scan = scanInline(text, contentStart, text.length, true, 0);
      const token: ListItemToken = {
        kind: 'listItem',
        raw: text.slice(pos, scan.end),
        start: pos,
        end: scan.end,
        marker: marker[0],
        depth: marker[0].length,
        content: scan.tokens
      };
      yield token;
      pos = scan.end;
      continue;
    }

    const scan = scanInline(text, pos, text.length, true, 0);
    yield* scan.tokens;
    pos = scan.end;
  }
}

/**
 * Tokenizes a whole page. The result is lazy and can be iterated any number
 * of times; each iteration scans from the start.
 */
export const tokenize = (text: string): Iterable<Token> => ({
  [Symbol.iterator]: () => scanDocument(text)
});

/** Tokenizes a fragment without line structure (heading text, template arguments). */
export const tokenizeInline = (text: string): InlineToken[] => scanInline(text, 0, text.length, false, 0).tokens;
