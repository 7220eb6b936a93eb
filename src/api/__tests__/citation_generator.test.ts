import { describe, expect, it } from 'vitest';
import { itemEnvelope, noteEnvelope } from '../../__tests__/fixtures/zotero_fixtures.js';
import { UnsupportedItemTypeError } from '../../core/errors.js';
import { parseRecord } from '../../zotero/records.js';
import { bibtexTypeFor, generateCitation } from '../citation_generator.js';

const article = parseRecord(
  itemEnvelope('ABCD2345', {
    itemType: 'journalArticle',
    title: 'Analytical {Engines}',
    date: '2021-03-04',
    creators: [
      { creatorType: 'author', firstName: 'Ada', lastName: 'Lovelace' },
      { creatorType: 'editor', firstName: 'Charles', lastName: 'Babbage' },
      { creatorType: 'author', firstName: 'Mary', lastName: 'Somerville' },
    ],
    publicationTitle: 'Journal of Tests',
    volume: '7',
    pages: '10-20',
    DOI: '10.1000/test',
    abstractNote: 'We test things.',
  })
);

describe('generateCitation', () => {
  it('renders a slim entry with escaped braces and authors only', () => {
    expect(generateCitation(article, { slim: true })).toBe(
      [
        '@article{Lovelace2021_ABCD2345,',
        '  title = {Analytical \\{Engines\\}},',
        '  journal = {Journal of Tests},',
        '  volume = {7},',
        '  pages = {10-20},',
        '  doi = {10.1000/test},',
        '  author = {Lovelace, Ada and Somerville, Mary},',
        '  year = {2021}',
        '}',
      ].join('\n')
    );
  });

  it('includes the abstract in full mode', () => {
    const lines = generateCitation(article, { slim: false }).split('\n');

    expect(lines).toContain('  abstract = {We test things.},');
  });

  it('builds the cite key from a single-field name and drops the missing year', () => {
    const report = parseRecord(
      itemEnvelope('REPT0001', {
        itemType: 'report',
        title: 'Annual Report',
        creators: [{ creatorType: 'author', name: 'World Testing Organization' }],
      })
    );

    expect(generateCitation(report)).toBe(
      [
        '@techreport{Organizationnodate_REPT0001,',
        '  title = {Annual Report},',
        '  author = {World Testing Organization}',
        '}',
      ].join('\n')
    );
  });

  it('removes spaces from compound last names', () => {
    const book = parseRecord(
      itemEnvelope('BOOK0001', {
        itemType: 'book',
        title: 'A Book',
        date: '1999',
        creators: [{ creatorType: 'author', firstName: 'Guido', lastName: 'van Rossum' }],
      })
    );

    expect(generateCitation(book).split('\n')[0]).toBe('@book{vanRossum1999_BOOK0001,');
  });

  it('falls back to misc for unmapped types', () => {
    expect(bibtexTypeFor('podcast')).toBe('misc');
    expect(bibtexTypeFor('conferencePaper')).toBe('inproceedings');
  });

  it('refuses notes and attachments', () => {
    expect(() => generateCitation(parseRecord(noteEnvelope('NOTE0001', 'x')))).toThrow(UnsupportedItemTypeError);
  });
});
