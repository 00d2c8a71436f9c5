#!/usr/bin/env tsx
import { mkdir, writeFile } from 'node:fs/promises';
import { basename, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { parseCorpusAsync } from '../../src/corpus';
import { describeError } from '../../src/errors';
import { checksum, writeCorpusJson } from '../../src/export/files';
import { writeCorpusSqlite } from '../../src/export/sqlite';
import { deepFreeze } from '../../src/model/freeze';
import { readExportFile } from '../../src/sources/mediawiki-xml';
import type { Corpus, Page } from '../../src/types';

import type { BuildManifest, BuildOptions } from './types';

const LOG_PREFIX = '[lexicon:build]';

const DEFAULT_OUTPUT_DIR = fileURLToPath(new URL('../../resources/lexicon/', import.meta.url));
const SAMPLE_EXPORT = fileURLToPath(new URL('../../data/sample-export.xml', import.meta.url));

export const parseArgs = (args: string[]): BuildOptions => {
  const options: BuildOptions = {
    mode: 'production',
    force: false,
    languages: []
  };

  args.forEach((arg) => {
    if (arg === '--sample') {
      options.mode = 'sample';
      return;
    }
    if (arg === '--force') {
      options.force = true;
      return;
    }
    if (arg.startsWith('--input=')) {
      options.input = arg.substring('--input='.length);
      return;
    }
    if (arg.startsWith('--out=')) {
      options.outDir = arg.substring('--out='.length);
      return;
    }
    if (arg.startsWith('--languages=')) {
      const raw = arg.substring('--languages='.length);
      options.languages = raw
        .split(',')
        .map((value) => value.trim())
        .filter(Boolean);
      return;
    }
    console.warn(`${LOG_PREFIX} Ignoring unknown argument "${arg}".`);
  });

  return options;
};

/** Keeps only the requested language sections; pages left empty are dropped. */
export const filterLanguages = (corpus: Corpus, languages: string[]): Corpus => {
  if (!languages.length) {
    return corpus;
  }
  const wanted = new Set(languages);
  const filtered = new Map<string, Page>();
  corpus.forEach((page, headword) => {
    const sections = page.languages.filter((section) => wanted.has(section.code));
    if (sections.length) {
      filtered.set(headword, deepFreeze({ headword: page.headword, languages: sections }));
    }
  });
  return filtered;
};

const build = async (): Promise<void> => {
  const options = parseArgs(process.argv.slice(2));
  const source = options.mode === 'sample' ? SAMPLE_EXPORT : options.input;
  if (!source) {
    console.error(`${LOG_PREFIX} Missing --input=<export.xml[.gz]> (or use --sample).`);
    process.exitCode = 1;
    return;
  }

  const outDir = options.outDir ?? DEFAULT_OUTPUT_DIR;
  await mkdir(outDir, { recursive: true });

  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.warn(`${LOG_PREFIX} Interrupted, abandoning the current run.`);
    controller.abort();
  });

  const rawPages = await readExportFile(source);
  console.log(`${LOG_PREFIX} Read ${rawPages.length} pages from ${source}`);

  const result = await parseCorpusAsync(rawPages, { signal: controller.signal });
  const corpus = filterLanguages(result.corpus, options.languages);
  if (!corpus.size) {
    console.warn(`${LOG_PREFIX} No pages produced, nothing written.`);
    return;
  }

  const jsonPath = join(outDir, 'lexicon.json.gz');
  const sqlitePath = join(outDir, 'lexicon.sqlite');
  await writeCorpusJson(jsonPath, corpus, options.force);
  const senses = await writeCorpusSqlite(sqlitePath, corpus, options.force);

  let diagnostics = 0;
  result.diagnostics.forEach((entries) => {
    diagnostics += entries.length;
  });

  const manifest: BuildManifest = {
    generatedAt: new Date().toISOString(),
    mode: options.mode,
    source: basename(source),
    pages: corpus.size,
    senses,
    json: basename(jsonPath),
    jsonSha256: await checksum(jsonPath),
    sqlite: basename(sqlitePath),
    sqliteSha256: await checksum(sqlitePath),
    diagnostics,
    failures: result.failures.map((failure) => ({ headword: failure.headword, reason: describeError(failure.error) }))
  };

  const manifestPath = join(outDir, 'manifest.json');
  await writeFile(manifestPath, JSON.stringify(manifest, null, 2), 'utf-8');
  console.log(`${LOG_PREFIX} Built lexicon with ${corpus.size} pages and ${senses} senses.`);
  console.log(`${LOG_PREFIX} Manifest written to ${manifestPath}`);
};

if (process.argv[1] && fileURLToPath(import.meta.url) === resolve(process.argv[1])) {
  build().catch((error: unknown) => {
    console.error(`${LOG_PREFIX} Build failed: ${describeError(error)}`);
    process.exitCode = 1;
  });
}
