/**
 * @fileoverview Read-only access to PDF annotations in zotero.sqlite
 *
 * Uses better-sqlite3 against the desktop application's own database.
 * The handle is opened read-only with a zero busy timeout so this side
 * never waits on Zotero; when Zotero holds its exclusive lock the reader
 * switches to a private snapshot copy instead of blocking. Nothing is ever
 * written to the database.
 */

import Database from 'better-sqlite3';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { InvalidInputError } from '../core/errors.js';
import { logInfo } from '../telemetry/logger.js';
import type { Annotation, AnnotationType } from '../zotero/types.js';
import { locateDatabase, type DatabaseLocatorOptions } from './database_locator.js';

export const DEFAULT_ANNOTATION_SEARCH_LIMIT = 50;

const STORAGE_PREFIX = 'storage:';

/** Integer codes from itemAnnotations.type */
export const ANNOTATION_TYPE_CODES: ReadonlyMap<number, AnnotationType> = new Map<number, AnnotationType>([
  [1, 'highlight'],
  [2, 'note'],
  [3, 'image'],
  [4, 'ink'],
  [5, 'underline'],
  [6, 'text'],
]);

// ============================================================================
// QUERIES
// ============================================================================

// Item -> attachment -> annotation; snapshots are saved web pages, not papers.
const ITEM_ANNOTATIONS_SQL = `
  SELECT
    ia.type,
    ia.text,
    ia.comment,
    ia.color,
    ia.pageLabel,
    iatt.path AS attachmentPath
  FROM itemAnnotations ia
  JOIN items att ON ia.parentItemID = att.itemID
  JOIN itemAttachments iatt ON att.itemID = iatt.itemID
  JOIN items parent ON iatt.parentItemID = parent.itemID
  WHERE parent.key = ?
    AND iatt.contentType = 'application/pdf'
    AND (iatt.path IS NULL OR iatt.path NOT LIKE '%snapshot%')
  ORDER BY att.itemID, ia.sortIndex
`;

const SEARCH_ANNOTATIONS_SQL = `
  SELECT
    ia.type,
    ia.text,
    ia.comment,
    ia.color,
    ia.pageLabel,
    iatt.path AS attachmentPath,
    parent.key AS parentKey,
    (SELECT value FROM itemData id
      JOIN itemDataValues idv ON id.valueID = idv.valueID
      JOIN fields f ON id.fieldID = f.fieldID
      WHERE id.itemID = parent.itemID AND f.fieldName = 'title'
    ) AS parentTitle
  FROM itemAnnotations ia
  JOIN items att ON ia.parentItemID = att.itemID
  JOIN itemAttachments iatt ON att.itemID = iatt.itemID
  JOIN items parent ON iatt.parentItemID = parent.itemID
  WHERE (ia.text LIKE ? ESCAPE '\\' OR ia.comment LIKE ? ESCAPE '\\')
    AND iatt.contentType = 'application/pdf'
  ORDER BY parent.itemID, ia.sortIndex
  LIMIT ?
`;

interface AnnotationRow {
  type: unknown;
  text: string | null;
  comment: string | null;
  color: string | null;
  pageLabel: string | null;
  attachmentPath: string | null;
}

interface SearchAnnotationRow extends AnnotationRow {
  parentKey: string | null;
  parentTitle: string | null;
}

// ============================================================================
// DECODING
// ============================================================================

/**
 * Unknown integer codes decode to "highlight", the dominant type; a wrong
 * label is preferable to dropping the annotation.
 */
export function decodeAnnotationType(raw: unknown): string {
  if (typeof raw === 'number') {
    return ANNOTATION_TYPE_CODES.get(raw) ?? 'highlight';
  }
  if (typeof raw === 'string') {
    return raw;
  }
  return 'highlight';
}

export function attachmentNameFromPath(storagePath: string | null): string | null {
  if (!storagePath || !storagePath.startsWith(STORAGE_PREFIX)) {
    return null;
  }
  const segments = storagePath.split(STORAGE_PREFIX).join('').split('/');
  const last = segments[segments.length - 1];
  return last ? last : null;
}

function toAnnotation(row: AnnotationRow): Annotation {
  return {
    type: decodeAnnotationType(row.type),
    text: row.text,
    comment: row.comment,
    color: row.color,
    pageLabel: row.pageLabel,
    attachmentName: attachmentNameFromPath(row.attachmentPath),
  };
}

/** `%`, `_` and the escape character itself match literally. */
export function escapeLikePattern(text: string): string {
  return text.replace(/[\\%_]/g, (char) => `\\${char}`);
}

function isLockError(error: unknown): boolean {
  return (
    error instanceof Database.SqliteError &&
    (error.code === 'SQLITE_BUSY' || error.code === 'SQLITE_LOCKED')
  );
}

// ============================================================================
// READER
// ============================================================================

export interface AnnotationReaderOptions extends DatabaseLocatorOptions {
  /** Open this file directly instead of locating the database */
  dbPath?: string;
}

/**
 * Not safe to share between concurrent callers; each session owns its own
 * reader and closes it when done.
 */
export class AnnotationReader {
  readonly dbPath: string;
  private db: Database.Database | null = null;
  private snapshotDir: string | null = null;

  /**
   * @throws DatabaseNotFoundError when no database can be located
   */
  constructor(options: AnnotationReaderOptions = {}) {
    this.dbPath = options.dbPath ?? locateDatabase(options);
  }

  /** The Zotero data directory is the database's parent. */
  getDataDirectory(): string {
    return path.dirname(this.dbPath);
  }

  /**
   * Resolve a `storage:<key>/<file>` reference to an existing file.
   * Files may have been moved or deleted by the user, so a missing target
   * yields null rather than an error.
   */
  resolveStoragePath(storagePath: string): string | null {
    if (!storagePath || !storagePath.startsWith(STORAGE_PREFIX)) {
      return null;
    }
    const storageRoot = path.join(this.getDataDirectory(), 'storage');
    const resolved = path.resolve(storageRoot, storagePath.slice(STORAGE_PREFIX.length));
    const relative = path.relative(storageRoot, resolved);
    if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) {
      return null;
    }
    return fs.existsSync(resolved) ? resolved : null;
  }

  getAnnotationsForItem(itemKey: string): Annotation[] {
    const rows = this.withConnection((db) =>
      db.prepare<[string], AnnotationRow>(ITEM_ANNOTATIONS_SQL).all(itemKey)
    );
    return rows.map(toAnnotation);
  }

  /**
   * Case-insensitive match on highlighted text or comment, across the whole
   * library. Callers detect truncation with `results.length >= limit`.
   */
  searchAnnotations(query: string, limit: number = DEFAULT_ANNOTATION_SEARCH_LIMIT): Annotation[] {
    if (!query.trim()) {
      throw new InvalidInputError('Search query cannot be empty');
    }
    const pattern = `%${escapeLikePattern(query)}%`;
    const rows = this.withConnection((db) =>
      db.prepare<[string, string, number], SearchAnnotationRow>(SEARCH_ANNOTATIONS_SQL).all(pattern, pattern, limit)
    );
    return rows.map((row) => ({
      ...toAnnotation(row),
      parentKey: row.parentKey,
      parentTitle: row.parentTitle,
    }));
  }

  /** Safe to call more than once. */
  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
    if (this.snapshotDir) {
      fs.rmSync(this.snapshotDir, { recursive: true, force: true });
      this.snapshotDir = null;
    }
  }

  private withConnection<T>(run: (db: Database.Database) => T): T {
    try {
      return run(this.getConnection());
    } catch (error) {
      if (!isLockError(error) || this.snapshotDir) {
        throw error;
      }
      this.openSnapshot();
      return run(this.getConnection());
    }
  }

  private getConnection(): Database.Database {
    if (!this.db) {
      this.db = new Database(this.dbPath, { readonly: true, fileMustExist: true, timeout: 0 });
    }
    return this.db;
  }

  /**
   * Zotero keeps its database under an exclusive lock while running. Copy
   * the file aside and read the copy rather than waiting for the lock.
   */
  private openSnapshot(): void {
    logInfo('[zotero-db] database is locked by Zotero, reading from a snapshot copy', { path: this.dbPath });
    if (this.db) {
      this.db.close();
      this.db = null;
    }
    this.snapshotDir = fs.mkdtempSync(path.join(os.tmpdir(), 'zotero-mcp-snapshot-'));
    const snapshotPath = path.join(this.snapshotDir, path.basename(this.dbPath));
    fs.copyFileSync(this.dbPath, snapshotPath);
    this.db = new Database(snapshotPath, { readonly: true, fileMustExist: true, timeout: 0 });
  }
}

/**
 * Run `fn` with a fresh reader and always close it afterwards.
 */
export function withAnnotationReader<T>(options: AnnotationReaderOptions, fn: (reader: AnnotationReader) => T): T {
  const reader = new AnnotationReader(options);
  try {
    return fn(reader);
  } finally {
    reader.close();
  }
}
