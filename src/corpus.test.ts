import { describe, expect, it, vi } from 'vitest';

import { isIgnoredTitle, parseCorpus, parseCorpusAsync, parsePage } from './corpus';
import { InvalidEntryError, ParseCancelledError } from './errors';
import { sensesOf } from './query';
import type { Logger, RawPage } from './types';

const BARCA = ['{{-ca-}}', '=== Nom ===', '# Embarcació petita.'].join('\n');

const silentLogger = (): Logger => ({ warn: vi.fn(), log: vi.fn() });

describe('isIgnoredTitle', () => {
  it('skips one-character and namespaced titles', () => {
    expect(isIgnoredTitle('a')).toBe(true);
    expect(isIgnoredTitle('Viquidiccionari:Portada')).toBe(true);
    expect(isIgnoredTitle('bot')).toBe(false);
  });
});

describe('parsePage', () => {
  it('returns the page with its diagnostics', () => {
    const result = parsePage('barca', `${BARCA}\n{{foo|bar`);

    expect(result.ok).toBe(true);
    expect(result.diagnostics).toEqual([
      { code: 'MalformedTemplate', message: 'Unbalanced "{{" in "barca" kept as text', offset: 42 }
    ]);
  });

  it('returns a failure for invalid entries', () => {
    const result = parsePage('buit', '{{-ca-}}');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.headword).toBe('buit');
      expect(result.error).toBeInstanceOf(InvalidEntryError);
    }
  });

  it('is deterministic', () => {
    expect(parsePage('barca', BARCA)).toEqual(parsePage('barca', BARCA));
  });

  it('numbers consecutive senses from one', () => {
    [1, 3, 7].forEach((count) => {
      const senses = Array.from({ length: count }, (_, index) => `# Sentit ${index + 1}.`);
      const { corpus } = parseCorpus([{ headword: 'mot', text: ['{{-ca-}}', '{{ca-nom}}', ...senses].join('\n') }], {
        logger: silentLogger()
      });

      expect(sensesOf(corpus, 'mot', 'ca', 'noun').map((sense) => [sense.number, sense.gloss])).toEqual(
        senses.map((_, index) => [index + 1, `Sentit ${index + 1}.`])
      );
    });
  });

  it('propagates cancellation', () => {
    const controller = new AbortController();
    controller.abort();

    expect(() => parsePage('barca', BARCA, { signal: controller.signal })).toThrow(ParseCancelledError);
  });
});

describe('parseCorpus', () => {
  const pages: RawPage[] = [
    { headword: 'barca', text: BARCA },
    { headword: 'buit', text: '{{-ca-}}' },
    { headword: 'odre', text: ['== Català ==', '=== Nom ===', '# Recipient de pell.'].join('\n') }
  ];

  it('keeps the pages that parsed and lists the ones that failed', () => {
    const logger = silentLogger();
    const result = parseCorpus(pages, { logger });

    expect(Array.from(result.corpus.keys())).toEqual(['barca', 'odre']);
    expect(result.failures.map((failure) => failure.headword)).toEqual(['buit']);
    expect(logger.warn).toHaveBeenCalledWith(
      '[lexicon:parse] Failed to parse "buit": Invalid entry: language section "ca" has no part of speech, etymology or pronunciation'
    );
    expect(logger.log).toHaveBeenCalledWith('[lexicon:parse] Parsed 2 pages, 1 failed.');
  });

  it('lets a later page replace an earlier one with the same headword', () => {
    const replacement = ['{{-ca-}}', '=== Verb ===', '# Navegar.'].join('\n');
    const result = parseCorpus(
      [
        { headword: 'barca', text: BARCA },
        { headword: 'barca', text: replacement }
      ],
      { logger: silentLogger() }
    );

    expect(result.corpus.get('barca')?.languages[0].partsOfSpeech[0].kind).toBe('verb');
    expect(result.diagnostics.get('barca')).toEqual([
      { code: 'DuplicateHeadword', message: 'A later page for "barca" replaced an earlier one' }
    ]);
  });

  it('stops before the first page when aborted', () => {
    const controller = new AbortController();
    controller.abort();

    expect(() => parseCorpus(pages, { signal: controller.signal, logger: silentLogger() })).toThrow(
      'Parsing of "barca" was cancelled'
    );
  });
});

describe('parseCorpusAsync', () => {
  it('produces the same corpus as the synchronous run', async () => {
    const pages: RawPage[] = [
      { headword: 'barca', text: BARCA },
      { headword: 'odre', text: ['{{-ca-}}', '{{ca-nom|m}}', '# Recipient de pell.'].join('\n') }
    ];

    const asyncResult = await parseCorpusAsync(pages, { batchSize: 1, logger: silentLogger() });
    const syncResult = parseCorpus(pages, { logger: silentLogger() });

    expect(asyncResult.corpus).toEqual(syncResult.corpus);
    expect(asyncResult.failures).toEqual([]);
  });

  it('accepts async page sources', async () => {
    async function* source(): AsyncGenerator<RawPage> {
      yield { headword: 'barca', text: BARCA };
    }

    const result = await parseCorpusAsync(source(), { logger: silentLogger() });

    expect(result.corpus.size).toBe(1);
  });

  it('rejects when the signal fires during the run', async () => {
    const controller = new AbortController();
    async function* source(): AsyncGenerator<RawPage> {
      yield { headword: 'barca', text: BARCA };
      controller.abort();
      yield { headword: 'odre', text: BARCA };
    }

    await expect(parseCorpusAsync(source(), { signal: controller.signal, logger: silentLogger() })).rejects.toThrow(
      new ParseCancelledError('odre')
    );
  });
});
