import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { gzipSync } from 'node:zlib';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { readExportFile, readMediaWikiExport } from './mediawiki-xml';

const SAMPLE_EXPORT = fileURLToPath(new URL('../../data/sample-export.xml', import.meta.url));

const exportOf = (...pages: string[]) =>
  `<mediawiki xmlns="http://www.mediawiki.org/xml/export-0.10/" version="0.10">${pages.join('')}</mediawiki>`;

describe('readMediaWikiExport', () => {
  it('keeps main-namespace pages and skips redirects and project pages', async () => {
    const pages = readMediaWikiExport(await readFile(SAMPLE_EXPORT, 'utf-8'));

    expect(pages.map((page) => page.headword)).toEqual(['bot', 'odre']);
    expect(pages[1].text).toBe('== Català ==\n=== Nom ===\n{{ca-nom|m}}\n# Recipient de pell per a líquids.\n');
  });

  it('uses the last revision of a page', () => {
    const xml = exportOf(
      '<page><title>mar</title><ns>0</ns>',
      '<revision><text>vell</text></revision>',
      '<revision><text xml:space="preserve">nou</text></revision>',
      '</page>'
    );

    expect(readMediaWikiExport(xml)).toEqual([{ headword: 'mar', text: 'nou' }]);
  });

  it('skips short titles and empty pages', () => {
    const xml = exportOf(
      '<page><title>a</title><ns>0</ns><revision><text>== Català ==</text></revision></page>',
      '<page><title>buit</title><ns>0</ns><revision><text>  </text></revision></page>'
    );

    expect(readMediaWikiExport(xml)).toEqual([]);
  });

  it('returns nothing for documents that are not exports', () => {
    expect(readMediaWikiExport('<html><body /></html>')).toEqual([]);
  });
});

describe('readExportFile', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'lexicon-export-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('reads gzip-compressed exports', async () => {
    const filePath = join(directory, 'export.xml.gz');
    const xml = exportOf('<page><title>mar</title><ns>0</ns><revision><text>== {{-ca-}} ==</text></revision></page>');
    await writeFile(filePath, gzipSync(xml));

    expect(await readExportFile(filePath)).toEqual([{ headword: 'mar', text: '== {{-ca-}} ==' }]);
  });
});
