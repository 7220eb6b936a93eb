/**
 * @fileoverview Typed views over the records Zotero hands back
 *
 * Records are owned by the desktop application; this side only reads them
 * (and creates new ones through the connector). Fields the typed variants
 * do not name are kept in `otherFields`.
 */

export interface Creator {
  creatorType: string;
  firstName?: string;
  lastName?: string;
  /** Single-field name, used for organisations */
  name?: string;
}

export interface Tag {
  tag: string;
  type?: number;
}

export interface RecordMeta {
  numChildren?: number;
  creatorSummary?: string;
  parsedDate?: string;
}

interface RecordBase {
  key: string;
  version?: number;
  itemType: string;
  title?: string;
  date?: string;
  creators: Creator[];
  tags: Tag[];
  collections: string[];
  dateAdded?: string;
  dateModified?: string;
  meta: RecordMeta;
  /** Fields not covered by the typed properties, as sent by Zotero */
  otherFields: Record<string, unknown>;
}

export interface WorkRecord extends RecordBase {
  kind: 'work';
  abstractNote?: string;
  publicationTitle?: string;
  publisher?: string;
  place?: string;
  volume?: string;
  issue?: string;
  pages?: string;
  DOI?: string;
  url?: string;
}

export interface AttachmentRecord extends RecordBase {
  kind: 'attachment';
  itemType: 'attachment';
  contentType?: string;
  filename?: string;
  linkMode?: string;
  path?: string;
  url?: string;
  parentItem?: string;
}

export interface NoteRecord extends RecordBase {
  kind: 'note';
  itemType: 'note';
  note?: string;
  parentItem?: string;
}

export type ZoteroRecord = WorkRecord | AttachmentRecord | NoteRecord;

export interface AttachmentDetails {
  key: string;
  title: string;
  filename: string;
  contentType: string;
}

export type AnnotationType = 'highlight' | 'note' | 'image' | 'ink' | 'underline' | 'text';

export interface Annotation {
  /** Decoded type label; string values from storage pass through as-is */
  type: string;
  text: string | null;
  comment: string | null;
  color: string | null;
  pageLabel: string | null;
  attachmentName: string | null;
  /** Only set on library-wide search results */
  parentKey?: string | null;
  parentTitle?: string | null;
}

export interface Collection {
  key: string;
  name: string;
  parentCollection?: string;
}

export interface LibraryTag {
  tag: string;
  numItems?: number;
}

export interface Fulltext {
  content: string;
  indexedPages?: number;
  totalPages?: number;
  indexedChars?: number;
  totalChars?: number;
}

/** Payload accepted by the connector's saveItems endpoint */
export interface NewItemPayload {
  itemType: string;
  note?: string;
  parentItem?: string;
  tags?: Array<{ tag: string }>;
  [field: string]: unknown;
}
