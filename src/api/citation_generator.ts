/**
 * @fileoverview BibTeX export for bibliographic records
 */

import { UnsupportedItemTypeError } from '../core/errors.js';
import type { WorkRecord, ZoteroRecord } from '../zotero/types.js';
import { extractYear, formatCreatorName, NO_YEAR } from './metadata_formatter.js';

const BIBTEX_TYPES: Readonly<Record<string, string>> = {
  journalArticle: 'article',
  book: 'book',
  bookSection: 'incollection',
  conferencePaper: 'inproceedings',
  thesis: 'phdthesis',
  report: 'techreport',
  webpage: 'misc',
  manuscript: 'unpublished',
};

type CitationField = [keyof WorkRecord, string];

const SLIM_FIELDS: readonly CitationField[] = [
  ['title', 'title'],
  ['publicationTitle', 'journal'],
  ['volume', 'volume'],
  ['issue', 'number'],
  ['pages', 'pages'],
  ['publisher', 'publisher'],
  ['DOI', 'doi'],
  ['url', 'url'],
];

const FULL_FIELDS: readonly CitationField[] = [...SLIM_FIELDS, ['abstractNote', 'abstract']];

export interface CitationOptions {
  /** Leave out long free-text fields such as the abstract. Default true. */
  slim?: boolean;
}

export function bibtexTypeFor(itemType: string): string {
  return BIBTEX_TYPES[itemType] ?? 'misc';
}

function escapeBraces(value: string): string {
  return value.replace(/\{/g, '\\{').replace(/\}/g, '\\}');
}

function citeKeyAuthor(record: WorkRecord): string {
  const first = record.creators[0];
  if (!first) {
    return '';
  }
  const words = (first.name ?? '').trim().split(/\s+/);
  const fromName = first.name?.trim() ? (words[words.length - 1] ?? '') : '';
  return (first.lastName ?? fromName).replace(/ /g, '');
}

function readField(record: WorkRecord, field: keyof WorkRecord): string | null {
  const value = record[field];
  if (typeof value === 'string' && value.length > 0) {
    return value;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return null;
}

/**
 * @throws UnsupportedItemTypeError for attachments and notes, which have no
 * bibliographic identity
 */
export function generateCitation(record: ZoteroRecord, options: CitationOptions = {}): string {
  if (record.kind !== 'work') {
    throw new UnsupportedItemTypeError(record.itemType);
  }

  const year = extractYear(record.date);
  const citeKey = `${citeKeyAuthor(record)}${year}_${record.key}`;
  const lines = [`@${bibtexTypeFor(record.itemType)}{${citeKey},`];

  const fields = options.slim === false ? FULL_FIELDS : SLIM_FIELDS;
  for (const [recordField, bibtexField] of fields) {
    const value = readField(record, recordField);
    if (value !== null) {
      lines.push(`  ${bibtexField} = {${escapeBraces(value)}},`);
    }
  }

  const authors: string[] = [];
  for (const creator of record.creators) {
    if (creator.creatorType !== 'author') continue;
    const name = formatCreatorName(creator);
    if (name !== null) {
      authors.push(name);
    }
  }
  if (authors.length > 0) {
    lines.push(`  author = {${authors.join(' and ')}},`);
  }

  if (year !== NO_YEAR) {
    lines.push(`  year = {${year}},`);
  }

  const last = lines.length - 1;
  const lastLine = lines[last];
  if (lastLine !== undefined && lastLine.endsWith(',')) {
    lines[last] = lastLine.slice(0, -1);
  }
  lines.push('}');

  return lines.join('\n');
}
