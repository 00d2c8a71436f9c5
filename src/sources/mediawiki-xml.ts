import { readFile } from 'node:fs/promises';

import { XMLParser } from 'fast-xml-parser';

import { isIgnoredTitle } from '../corpus';
import { readGzipFile } from '../export/files';
import type { RawPage } from '../types';

type XmlNode = Record<string, unknown>;

const isNode = (value: unknown): value is XmlNode => typeof value === 'object' && value !== null && !Array.isArray(value);

const ensureArray = (value: unknown): unknown[] => {
  if (value === undefined || value === null) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
};

/** Text content of an element that may carry attributes (`<text xml:space="preserve">`). */
const textOf = (value: unknown): string => {
  if (typeof value === 'string') {
    return value;
  }
  if (isNode(value) && typeof value['#text'] === 'string') {
    return value['#text'];
  }
  return '';
};

const createParser = () =>
  new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '',
    removeNSPrefix: true,
    trimValues: false,
    parseTagValue: false,
    parseAttributeValue: false,
    isArray: (name) => ['page', 'revision'].includes(name)
  });

const toRawPage = (page: unknown): RawPage | null => {
  if (!isNode(page)) {
    return null;
  }
  const headword = textOf(page.title).trim();
  if (!headword || isIgnoredTitle(headword)) {
    return null;
  }
  const namespace = textOf(page.ns).trim();
  if ((namespace && namespace !== '0') || page.redirect !== undefined) {
    return null;
  }
  const revisions = ensureArray(page.revision).filter(isNode);
  const latest = revisions[revisions.length - 1];
  const text = latest ? textOf(latest.text) : '';
  if (!text.trim()) {
    return null;
  }
  return { headword, text };
};

/**
 * Extracts `(headword, text)` pairs from a MediaWiki XML export, skipping
 * redirects, other namespaces, ignored titles and pages without text.
 */
export const readMediaWikiExport = (xml: string): RawPage[] => {
  const document: unknown = createParser().parse(xml);
  const root = isNode(document) ? document.mediawiki : undefined;
  if (!isNode(root)) {
    return [];
  }
  return ensureArray(root.page)
    .map(toRawPage)
    .filter((page): page is RawPage => page !== null);
};

export const readExportFile = async (filePath: string): Promise<RawPage[]> => {
  const xml = filePath.endsWith('.gz') ? await readGzipFile(filePath) : await readFile(filePath, 'utf-8');
  return readMediaWikiExport(xml);
};
