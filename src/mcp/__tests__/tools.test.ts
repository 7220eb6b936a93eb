/**
 * @fileoverview Tests for the Zotero MCP tool handlers and their markdown
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  attachmentEnvelope,
  buildZoteroDatabase,
  connectionRefused,
  itemEnvelope,
  jsonResponse,
  makeConfig,
  makeTempDir,
  noteEnvelope,
  paperEnvelope,
  routeFetch,
  textResponse,
} from '../../__tests__/fixtures/zotero_fixtures.js';
import { WORKFLOW_MENU } from '../../api/prompt_library.js';
import { SourceUnavailableError, UnsupportedItemTypeError } from '../../core/errors.js';
import { parseRecord } from '../../zotero/records.js';
import type { NoteRecord } from '../../zotero/types.js';
import {
  createZoteroToolContext,
  formatAnnotationLines,
  formatChildrenView,
  formatCollectionTree,
  TOOL_DEFINITIONS,
  type ZoteroToolContext,
} from '../tools.js';

const ITEM = '/api/users/0/items/PAPER001';

describe('formatting helpers', () => {
  it('formats an annotation with page, type, color and comment', () => {
    expect(
      formatAnnotationLines({
        type: 'highlight',
        text: 'attention is sparse',
        comment: 'key claim',
        color: '#ffd400',
        pageLabel: '3',
        attachmentName: 'paper.pdf',
      })
    ).toEqual(['[P.3] (Highlight/#ffd400) "attention is sparse"', '  -> Comment: key claim', '']);
  });

  it('formats a comment-only annotation', () => {
    expect(
      formatAnnotationLines({ type: 'note', text: null, comment: 'see p. 7', color: null, pageLabel: null, attachmentName: null })
    ).toEqual(['  -> Comment: see p. 7', '']);
  });

  it('nests collections and shows orphans as roots', () => {
    expect(
      formatCollectionTree([
        { key: 'BBBB', name: 'Child', parentCollection: 'AAAA' },
        { key: 'AAAA', name: 'Root' },
        { key: 'CCCC', name: 'Orphan', parentCollection: 'GONE' },
      ])
    ).toBe(
      ['# Zotero Collections', '', '- **Root** (Key: AAAA)', '  - **Child** (Key: BBBB)', '- **Orphan** (Key: CCCC)'].join(
        '\n'
      )
    );
  });

  it('lists collections whose parents form a cycle', () => {
    expect(
      formatCollectionTree([
        { key: 'LOOP0002', name: 'Loop B', parentCollection: 'LOOP0001' },
        { key: 'AAAA', name: 'Root' },
        { key: 'LOOP0001', name: 'Loop A', parentCollection: 'LOOP0002' },
      ])
    ).toBe(
      [
        '# Zotero Collections',
        '',
        '- **Root** (Key: AAAA)',
        '- **Loop A** (Key: LOOP0001)',
        '  - **Loop B** (Key: LOOP0002)',
      ].join('\n')
    );
  });

  it('renders a children view grouped by attachment', () => {
    const attachment = parseRecord(attachmentEnvelope('PDF00001', 'application/pdf'));
    const note = parseRecord(noteEnvelope('NOTE0001', '<p>Short note</p>'));
    if (attachment.kind !== 'attachment' || note.kind !== 'note') throw new Error('unexpected record kinds');

    const text = formatChildrenView({
      parentTitle: 'Attention Is Everywhere',
      attachments: [attachment],
      notes: [note],
      annotations: [
        { type: 'highlight', text: 't1', comment: null, color: null, pageLabel: '1', attachmentName: 'a.pdf' },
        { type: 'highlight', text: 't2', comment: null, color: null, pageLabel: null, attachmentName: null },
      ],
    });

    expect(text).toBe(
      [
        '# Children of: Attention Is Everywhere',
        '',
        '## Attachments',
        'Use `zotero_get_item_fulltext` with the item key for full text.',
        '',
        '- **PDF00001 attachment**',
        '  - Key: `PDF00001`',
        '  - Type: application/pdf',
        '  - File: pdf00001.pdf',
        '',
        '## Notes',
        '',
        '- **Note** (Key: `NOTE0001`)',
        '  - Preview: Short note',
        '',
        '## PDF Annotations',
        '',
        '### a.pdf',
        '',
        '[P.1] (Highlight) "t1"',
        '',
        '### PDF',
        '',
        '[] (Highlight) "t2"',
        '',
      ].join('\n')
    );
  });

  it('truncates long note previews', () => {
    const note = parseRecord(noteEnvelope('NOTE0001', `<p>${'x'.repeat(250)}</p>`));
    if (note.kind !== 'note') throw new Error('expected a note');
    const notes: NoteRecord[] = [note];

    const text = formatChildrenView({ parentTitle: 'P', attachments: [], notes, annotations: [] });

    expect(text.split('\n')).toContain(`  - Preview: ${'x'.repeat(200)}...`);
  });

  it('shows the annotation warning when no annotations could be read', () => {
    expect(
      formatChildrenView({
        parentTitle: 'P',
        attachments: [],
        notes: [],
        annotations: [],
        annotationWarning: 'Could not retrieve annotations: locked',
      })
    ).toBe('# Children of: P\n\n## PDF Annotations\nWarning: Could not retrieve annotations: locked\n');
  });
});

describe('TOOL_DEFINITIONS', () => {
  const fetchMock = vi.fn<typeof globalThis.fetch>();
  let dataDir: string;
  let promptsDir: string;
  let context: ZoteroToolContext;

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
    dataDir = makeTempDir('zotero-tools-data-');
    promptsDir = makeTempDir('zotero-tools-prompts-');
    const databasePath = path.join(dataDir, 'zotero.sqlite');
    buildZoteroDatabase(databasePath, [
      {
        key: 'PAPER001',
        title: 'Attention Is Everywhere',
        attachments: [
          {
            key: 'PDF00001',
            path: 'storage:paper.pdf',
            annotations: [
              { type: 1, text: 'attention is sparse', comment: 'key claim', color: '#ffd400', pageLabel: '3' },
              { type: 1, text: 'more attention', pageLabel: '4' },
            ],
          },
        ],
      },
    ]);
    context = createZoteroToolContext(makeConfig({ databasePath, promptsDir }));
  });

  afterEach(() => {
    fs.rmSync(dataDir, { recursive: true, force: true });
    fs.rmSync(promptsDir, { recursive: true, force: true });
  });

  it('marks only the write tools as not read-only', () => {
    const writers = Object.entries(TOOL_DEFINITIONS)
      .filter(([, definition]) => !definition.readOnly)
      .map(([name]) => name);

    expect(writers).toEqual(['zotero_create_note', 'zotero_create_review']);
  });

  it('suggests the workflow menu for an unrecognised task', async () => {
    await expect(TOOL_DEFINITIONS.zotero_suggest_workflow.run(context, { task: 'hello' })).resolves.toBe(WORKFLOW_MENU);
  });

  it('lists search results', async () => {
    routeFetch(fetchMock, {
      'GET /api/users/0/items': () => jsonResponse([paperEnvelope('PAPER001', { tags: [{ tag: 'ml' }] })]),
    });

    const text = await TOOL_DEFINITIONS.zotero_search_items.run(context, { query: 'attention' });

    expect(text).toBe(
      [
        "# Search Results for 'attention'",
        '',
        '## 1. Attention Is Everywhere',
        '**Key:** PAPER001',
        '**Type:** journalArticle',
        '**Date:** 2021-03-04',
        '**Authors:** Lovelace, Ada',
        '**Tags:** `ml`',
        '',
      ].join('\n')
    );
  });

  it('returns the empty reason as text', async () => {
    routeFetch(fetchMock, { 'GET /api/users/0/items': () => jsonResponse([]) });

    await expect(TOOL_DEFINITIONS.zotero_search_items.run(context, { query: 'nothing' })).resolves.toBe(
      "No items found matching query: 'nothing'"
    );
  });

  it('throws failed outcomes', async () => {
    routeFetch(fetchMock, { 'GET /api/users/0/items': connectionRefused });

    await expect(TOOL_DEFINITIONS.zotero_search_items.run(context, { query: 'x' })).rejects.toThrow(
      SourceUnavailableError
    );
  });

  it('labels recent items by the sort field', async () => {
    routeFetch(fetchMock, {
      'GET /api/users/0/items': () =>
        jsonResponse([paperEnvelope('PAPER001', { dateAdded: '2024-01-02T00:00:00Z' })]),
    });

    const text = await TOOL_DEFINITIONS.zotero_get_recent.run(context, { sort_by: 'dateAdded' });

    expect(text.split('\n').slice(0, 6)).toEqual([
      '# 1 Recently Added Items',
      '',
      '## 1. Attention Is Everywhere',
      '**Key:** PAPER001',
      '**Type:** journalArticle',
      '**Added:** 2024-01-02T00:00:00Z',
    ]);
  });

  it('renders the collection tree', async () => {
    routeFetch(fetchMock, {
      'GET /api/users/0/collections': () => jsonResponse([{ key: 'COLL0001', data: { name: 'Reading', parentCollection: false } }]),
    });

    await expect(TOOL_DEFINITIONS.zotero_get_collections.run(context, {})).resolves.toBe(
      '# Zotero Collections\n\n- **Reading** (Key: COLL0001)'
    );
  });

  it('names the collection when it has no items', async () => {
    routeFetch(fetchMock, {
      'GET /api/users/0/collections/COLL0001': () => jsonResponse({ key: 'COLL0001', data: { name: 'Reading' } }),
      'GET /api/users/0/collections/COLL0001/items': () => jsonResponse([]),
    });

    await expect(TOOL_DEFINITIONS.zotero_get_collection_items.run(context, { collection_key: 'COLL0001' })).resolves.toBe(
      'No items found in collection: Reading'
    );
  });

  it('lists tags with their counts', async () => {
    routeFetch(fetchMock, {
      'GET /api/users/0/tags': () => jsonResponse([{ tag: 'ml', meta: { numItems: 3 } }, { tag: 'todo' }]),
    });

    await expect(TOOL_DEFINITIONS.zotero_get_tags.run(context, {})).resolves.toBe('# Zotero Tags\n\n- `ml` (3 items)\n- `todo`');
  });

  it('groups annotation search results by paper and flags the limit', async () => {
    const text = await TOOL_DEFINITIONS.zotero_search_annotations.run(context, { query: 'attention', limit: 1 });

    expect(text).toBe(
      [
        "# Annotations matching 'attention'",
        '',
        'Showing first 1 results. Prioritize the most relevant ones.',
        '',
        '## Attention Is Everywhere',
        '**Key:** `PAPER001`',
        '',
        '[P.3] (Highlight/#ffd400) "attention is sparse"',
        '  -> Comment: key claim',
        '',
      ].join('\n')
    );
  });

  it('finds a term that only appears in a comment, without a limit notice', async () => {
    const text = await TOOL_DEFINITIONS.zotero_search_annotations.run(context, { query: 'claim', limit: 10 });

    expect(text).toBe(
      [
        "# Annotations matching 'claim'",
        '',
        '## Attention Is Everywhere',
        '**Key:** `PAPER001`',
        '',
        '[P.3] (Highlight/#ffd400) "attention is sparse"',
        '  -> Comment: key claim',
        '',
      ].join('\n')
    );
  });

  it('appends BibTeX to the metadata', async () => {
    routeFetch(fetchMock, { [`GET ${ITEM}`]: () => jsonResponse(paperEnvelope('PAPER001')) });

    const text = await TOOL_DEFINITIONS.zotero_get_item_metadata.run(context, { item_key: 'PAPER001', include_bibtex: true });

    expect(text.slice(text.indexOf('## BibTeX'))).toBe(
      [
        '## BibTeX',
        '```bibtex',
        '@article{Lovelace2021_PAPER001,',
        '  title = {Attention Is Everywhere},',
        '  author = {Lovelace, Ada},',
        '  year = {2021}',
        '}',
        '```',
      ].join('\n')
    );
  });

  it('refuses BibTeX for a note', async () => {
    routeFetch(fetchMock, {
      'GET /api/users/0/items/NOTE0001': () => jsonResponse(itemEnvelope('NOTE0001', { itemType: 'note', note: 'x' })),
    });

    await expect(
      TOOL_DEFINITIONS.zotero_get_item_metadata.run(context, { item_key: 'NOTE0001', include_bibtex: true })
    ).rejects.toThrow(UnsupportedItemTypeError);
  });

  it('includes database annotations in the children view', async () => {
    routeFetch(fetchMock, {
      [`GET ${ITEM}`]: () => jsonResponse(paperEnvelope('PAPER001')),
      [`GET ${ITEM}/children`]: () => jsonResponse([]),
    });

    const text = await TOOL_DEFINITIONS.zotero_get_item_children.run(context, { item_key: 'PAPER001' });

    expect(text.split('\n')).toEqual([
      '# Children of: Attention Is Everywhere',
      '',
      '## PDF Annotations',
      '',
      '### paper.pdf',
      '',
      '[P.3] (Highlight/#ffd400) "attention is sparse"',
      '  -> Comment: key claim',
      '',
      '[P.4] (Highlight) "more attention"',
      '',
    ]);
  });

  it('adds a truncation notice to long full text', async () => {
    routeFetch(fetchMock, {
      [`GET ${ITEM}`]: () => jsonResponse(paperEnvelope('PAPER001')),
      [`GET ${ITEM}/children`]: () => jsonResponse([attachmentEnvelope('PDF00001', 'application/pdf')]),
      'GET /api/users/0/items/PDF00001/fulltext': () => jsonResponse({ content: 'abcdefghij' }),
    });

    await expect(
      TOOL_DEFINITIONS.zotero_get_item_fulltext.run(context, { item_key: 'PAPER001', max_chars: 4 })
    ).resolves.toBe('abcd\n\n[... truncated, 6 more characters ...]\nTip: Ask about specific sections for detailed content.');
  });

  it('confirms note creation', async () => {
    routeFetch(fetchMock, { 'POST /connector/saveItems': () => textResponse('', 201) });

    await expect(TOOL_DEFINITIONS.zotero_create_note.run(context, { content: 'Idea' })).resolves.toBe(
      'Standalone note created successfully'
    );
    await expect(
      TOOL_DEFINITIONS.zotero_create_note.run(context, { content: 'Idea', parent_key: 'PAPER009' })
    ).resolves.toBe('Note created for item PAPER009');
  });

  it('reports a review for an unknown item as an error line', async () => {
    routeFetch(fetchMock, {});

    await expect(
      TOOL_DEFINITIONS.zotero_create_review.run(context, { item_key: 'MISSING1', analysis: { methods: 'm' } })
    ).resolves.toBe('Error: No item found with key: MISSING1');
  });

  it('confirms a saved review', async () => {
    fs.writeFileSync(path.join(promptsDir, 'literature_review_template.html'), '<h1>${title}</h1>');
    routeFetch(fetchMock, {
      [`GET ${ITEM}`]: () => jsonResponse(paperEnvelope('PAPER001')),
      'POST /connector/saveItems': () => textResponse('', 201),
    });

    await expect(
      TOOL_DEFINITIONS.zotero_create_review.run(context, { item_key: 'PAPER001', analysis: {} })
    ).resolves.toBe('Review note created for "Attention Is Everywhere"');
  });
});
