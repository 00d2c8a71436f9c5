import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import { parseCorpus } from './corpus';
import { readMediaWikiExport } from './sources/mediawiki-xml';
import type { Corpus, Logger } from './types';

const SAMPLE_EXPORT = fileURLToPath(new URL('../data/sample-export.xml', import.meta.url));

export const quietLogger: Logger = { warn: () => undefined, log: () => undefined };

/** Corpus built from `data/sample-export.xml`, shared by the query and export tests. */
export const loadSampleCorpus = (): Corpus =>
  parseCorpus(readMediaWikiExport(readFileSync(SAMPLE_EXPORT, 'utf-8')), { logger: quietLogger }).corpus;
