/**
 * @fileoverview Parsing raw query-API JSON into typed records
 *
 * The local API mirrors the web API's JSON shape: an envelope with `key`,
 * `meta` and a free-form `data` dictionary. Shapes are checked with zod;
 * individual creators or tags that do not fit are dropped rather than
 * failing the whole record.
 */

import { z } from 'zod';
import type {
  AttachmentRecord,
  Collection,
  Creator,
  Fulltext,
  LibraryTag,
  NoteRecord,
  RecordMeta,
  Tag,
  WorkRecord,
  ZoteroRecord,
} from './types.js';

// ============================================================================
// SCHEMAS
// ============================================================================

const CreatorSchema = z.object({
  creatorType: z.string().default('author'),
  firstName: z.string().optional(),
  lastName: z.string().optional(),
  name: z.string().optional(),
});

const TagSchema = z.object({
  tag: z.string(),
  type: z.number().optional(),
});

const MetaSchema = z
  .object({
    numChildren: z.number().optional(),
    creatorSummary: z.string().optional(),
    parsedDate: z.string().optional(),
  })
  .passthrough();

const ItemEnvelopeSchema = z.object({
  key: z.string().optional(),
  version: z.number().optional(),
  meta: MetaSchema.optional(),
  data: z.record(z.unknown()),
});

const CollectionEnvelopeSchema = z.object({
  key: z.string().optional(),
  data: z.object({
    key: z.string().optional(),
    name: z.string().optional(),
    parentCollection: z.union([z.string(), z.literal(false)]).nullish(),
  }),
});

const TagEnvelopeSchema = z.object({
  tag: z.string(),
  meta: z.object({ numItems: z.number().optional() }).passthrough().optional(),
});

const FulltextSchema = z.object({
  content: z.string().default(''),
  indexedPages: z.number().optional(),
  totalPages: z.number().optional(),
  indexedChars: z.number().optional(),
  totalChars: z.number().optional(),
});

// ============================================================================
// FIELD HELPERS
// ============================================================================

const ENVELOPE_FIELDS = new Set(['key', 'version', 'itemType', 'creators', 'tags', 'collections']);

const BASE_FIELDS = ['title', 'date', 'dateAdded', 'dateModified'] as const;

const WORK_FIELDS = [
  'abstractNote',
  'publicationTitle',
  'publisher',
  'place',
  'volume',
  'issue',
  'pages',
  'DOI',
  'url',
] as const;

const ATTACHMENT_FIELDS = ['contentType', 'filename', 'linkMode', 'path', 'url', 'parentItem'] as const;

const NOTE_FIELDS = ['note', 'parentItem'] as const;

function readString(data: Record<string, unknown>, field: string): string | undefined {
  const value = data[field];
  if (typeof value === 'string') {
    return value.length > 0 ? value : undefined;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return undefined;
}

function pickStrings<K extends string>(
  data: Record<string, unknown>,
  fields: readonly K[]
): Partial<Record<K, string>> {
  const picked: Partial<Record<K, string>> = {};
  for (const field of fields) {
    const value = readString(data, field);
    if (value !== undefined) {
      picked[field] = value;
    }
  }
  return picked;
}

function collectOtherFields(data: Record<string, unknown>, typedFields: readonly string[]): Record<string, unknown> {
  const typed = new Set<string>([...BASE_FIELDS, ...typedFields]);
  const other: Record<string, unknown> = {};
  for (const [field, value] of Object.entries(data)) {
    if (ENVELOPE_FIELDS.has(field) || typed.has(field)) continue;
    other[field] = value;
  }
  return other;
}

function parseCreators(value: unknown): Creator[] {
  if (!Array.isArray(value)) return [];
  const creators: Creator[] = [];
  for (const entry of value) {
    const parsed = CreatorSchema.safeParse(entry);
    if (parsed.success) {
      creators.push(parsed.data);
    }
  }
  return creators;
}

function parseTags(value: unknown): Tag[] {
  if (!Array.isArray(value)) return [];
  const tags: Tag[] = [];
  for (const entry of value) {
    const parsed = TagSchema.safeParse(entry);
    if (parsed.success) {
      tags.push(parsed.data);
    }
  }
  return tags;
}

function parseCollectionKeys(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((entry): entry is string => typeof entry === 'string');
}

// ============================================================================
// PUBLIC PARSERS
// ============================================================================

export class RecordShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RecordShapeError';
  }
}

/**
 * Parse one item envelope into the matching record variant.
 *
 * @throws RecordShapeError when the envelope has no `data` object or no key
 */
export function parseRecord(raw: unknown): ZoteroRecord {
  const envelope = ItemEnvelopeSchema.safeParse(raw);
  if (!envelope.success) {
    throw new RecordShapeError('Unexpected Zotero response item shape.');
  }

  const { data } = envelope.data;
  const key = envelope.data.key || readString(data, 'key');
  if (!key) {
    throw new RecordShapeError('Zotero response item is missing key.');
  }

  const meta: RecordMeta = {
    numChildren: envelope.data.meta?.numChildren,
    creatorSummary: envelope.data.meta?.creatorSummary,
    parsedDate: envelope.data.meta?.parsedDate,
  };
  const itemType = readString(data, 'itemType') ?? 'unknown';
  const base = {
    key,
    version: envelope.data.version,
    ...pickStrings(data, BASE_FIELDS),
    creators: parseCreators(data.creators),
    tags: parseTags(data.tags),
    collections: parseCollectionKeys(data.collections),
    meta,
  };

  if (itemType === 'attachment') {
    const record: AttachmentRecord = {
      ...base,
      kind: 'attachment',
      itemType: 'attachment',
      ...pickStrings(data, ATTACHMENT_FIELDS),
      otherFields: collectOtherFields(data, ATTACHMENT_FIELDS),
    };
    return record;
  }

  if (itemType === 'note') {
    const record: NoteRecord = {
      ...base,
      kind: 'note',
      itemType: 'note',
      ...pickStrings(data, NOTE_FIELDS),
      otherFields: collectOtherFields(data, NOTE_FIELDS),
    };
    return record;
  }

  const record: WorkRecord = {
    ...base,
    kind: 'work',
    itemType,
    ...pickStrings(data, WORK_FIELDS),
    otherFields: collectOtherFields(data, WORK_FIELDS),
  };
  return record;
}

export function parseRecordList(raw: unknown): ZoteroRecord[] {
  if (!Array.isArray(raw)) {
    throw new RecordShapeError('Expected a list of Zotero items.');
  }
  return raw.map((entry) => parseRecord(entry));
}

export function parseCollection(raw: unknown): Collection {
  const parsed = CollectionEnvelopeSchema.safeParse(raw);
  if (!parsed.success) {
    throw new RecordShapeError('Unexpected Zotero collection shape.');
  }
  const key = parsed.data.key || parsed.data.data.key;
  if (!key) {
    throw new RecordShapeError('Zotero collection is missing key.');
  }
  const parent = parsed.data.data.parentCollection;
  return {
    key,
    name: parsed.data.data.name || 'Unnamed',
    parentCollection: typeof parent === 'string' && parent.length > 0 ? parent : undefined,
  };
}

export function parseCollectionList(raw: unknown): Collection[] {
  if (!Array.isArray(raw)) {
    throw new RecordShapeError('Expected a list of Zotero collections.');
  }
  return raw.map((entry) => parseCollection(entry));
}

export function parseTagList(raw: unknown): LibraryTag[] {
  if (!Array.isArray(raw)) {
    throw new RecordShapeError('Expected a list of Zotero tags.');
  }
  const tags: LibraryTag[] = [];
  for (const entry of raw) {
    const parsed = TagEnvelopeSchema.safeParse(entry);
    if (parsed.success) {
      tags.push({ tag: parsed.data.tag, numItems: parsed.data.meta?.numItems });
    }
  }
  return tags;
}

export function parseFulltext(raw: unknown): Fulltext {
  const parsed = FulltextSchema.safeParse(raw);
  if (!parsed.success) {
    throw new RecordShapeError('Unexpected Zotero full-text shape.');
  }
  return parsed.data;
}
