import { setImmediate as yieldToEventLoop } from 'node:timers/promises';

import { describeError, LexiconError, ParseCancelledError } from './errors';
import { assemble } from './parser/assembler';
import { resolve } from './parser/resolver';
import { tokenize } from './parser/tokenizer';
import { getDefaultVocabulary, type Vocabulary } from './parser/vocabulary';
import type { Corpus, Diagnostic, Logger, Page, RawPage } from './types';

const LOG_PREFIX = '[lexicon:parse]';

export interface ParseOptions {
  signal?: AbortSignal;
  vocabulary?: Vocabulary;
  logger?: Logger;
}

export type PageResult =
  | { ok: true; page: Page; diagnostics: Diagnostic[] }
  | { ok: false; headword: string; error: LexiconError; diagnostics: Diagnostic[] };

export interface PageFailure {
  headword: string;
  error: LexiconError;
}

export interface CorpusResult {
  corpus: Corpus;
  failures: PageFailure[];
  diagnostics: Map<string, Diagnostic[]>;
}

/** Titles the ingestion skips: one-character titles and namespaced pages. */
export const isIgnoredTitle = (title: string): boolean => {
  const trimmed = title.trim();
  return trimmed.length < 2 || trimmed.includes(':');
};

/**
 * Runs tokenize → resolve → assemble for one page. Invariant violations
 * become a failed result; cancellation and programming errors propagate.
 */
export const parsePage = (headword: string, text: string, options: ParseOptions = {}): PageResult => {
  const diagnostics: Diagnostic[] = [];
  const vocabulary = options.vocabulary ?? getDefaultVocabulary();
  try {
    const page = assemble(headword, resolve(tokenize(text), vocabulary), {
      signal: options.signal,
      report: (diagnostic) => diagnostics.push(diagnostic)
    });
    return { ok: true, page, diagnostics };
  } catch (error) {
    if (error instanceof ParseCancelledError || !(error instanceof LexiconError)) {
      throw error;
    }
    return { ok: false, headword, error, diagnostics };
  }
};

const collect = (results: PageResult[], logger: Logger): CorpusResult => {
  const pages = new Map<string, Page>();
  const failures: PageFailure[] = [];
  const diagnostics = new Map<string, Diagnostic[]>();

  results.forEach((result) => {
    const headword = result.ok ? result.page.headword : result.headword;
    const pageDiagnostics = [...(diagnostics.get(headword) ?? []), ...result.diagnostics];
    if (!result.ok) {
      logger.warn(`${LOG_PREFIX} Failed to parse "${headword}": ${describeError(result.error)}`);
      failures.push({ headword, error: result.error });
    } else {
      if (pages.has(headword)) {
        pageDiagnostics.push({
          code: 'DuplicateHeadword',
          message: `A later page for "${headword}" replaced an earlier one`
        });
      }
      pages.set(headword, result.page);
    }
    if (pageDiagnostics.length) {
      diagnostics.set(headword, pageDiagnostics);
    }
  });

  logger.log(`${LOG_PREFIX} Parsed ${pages.size} pages, ${failures.length} failed.`);
  return { corpus: pages, failures, diagnostics };
};

/**
 * Parses every page independently and builds the corpus only after all of
 * them finished. Failed pages are reported next to the corpus.
 */
export const parseCorpus = (pages: Iterable<RawPage>, options: ParseOptions = {}): CorpusResult => {
  const logger = options.logger ?? console;
  const results: PageResult[] = [];
  for (const { headword, text } of pages) {
    if (options.signal?.aborted) {
      throw new ParseCancelledError(headword);
    }
    results.push(parsePage(headword, text, options));
  }
  return collect(results, logger);
};

export interface AsyncParseOptions extends ParseOptions {
  /** Pages parsed between two yields to the event loop. */
  batchSize?: number;
}

/**
 * Same as parseCorpus, but yields to the event loop between batches so that
 * a caller can abort a long run through `signal`.
 */
export const parseCorpusAsync = async (
  pages: Iterable<RawPage> | AsyncIterable<RawPage>,
  options: AsyncParseOptions = {}
): Promise<CorpusResult> => {
  const logger = options.logger ?? console;
  const batchSize = Math.max(1, options.batchSize ?? 500);
  const results: PageResult[] = [];
  let sinceYield = 0;
  for await (const { headword, text } of pages) {
    if (options.signal?.aborted) {
      throw new ParseCancelledError(headword);
    }
    results.push(parsePage(headword, text, options));
    sinceYield += 1;
    if (sinceYield >= batchSize) {
      sinceYield = 0;
      await yieldToEventLoop();
    }
  }
  if (options.signal?.aborted) {
    throw new ParseCancelledError();
  }
  return collect(results, logger);
};
