/**
 * @fileoverview Operations that combine the query API, the connector and
 * the embedded database into one view of a record
 *
 * Each source is asked separately and a failure in one is reported next to
 * the data the others returned. The database reader is opened per call and
 * closed before the call returns.
 */

import * as fs from 'node:fs/promises';
import type { ZoteroMcpConfig } from '../config/zotero_config.js';
import {
  ConfigurationError,
  InvalidInputError,
  SourceUnavailableError,
  describeError,
  getErrorMessage,
  isZoteroMcpError,
  type ZoteroMcpError,
} from '../core/errors.js';
import { empty, failed, ok, type SourceOutcome, type WriteOutcome } from '../core/outcome.js';
import { AnnotationReader, DEFAULT_ANNOTATION_SEARCH_LIMIT } from '../storage/annotation_reader.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import type {
  Annotation,
  AttachmentDetails,
  AttachmentRecord,
  NewItemPayload,
  NoteRecord,
} from '../zotero/types.js';
import { selectAttachment } from './attachment_selector.js';
import { extractPdfText } from './pdf_text.js';
import type { PromptLibrary } from './prompt_library.js';
import type { RecordClient } from './record_client.js';
import { buildTemplateMetadata, renderTemplate } from './template_engine.js';
import { cleanHtml, textToHtml, truncateText } from './text_utils.js';

export const DEFAULT_FULLTEXT_MAX_CHARS = 10_000;

export type ReaderFactory = () => AnnotationReader;

export function createReaderFactory(config: ZoteroMcpConfig): ReaderFactory {
  return () =>
    new AnnotationReader({
      databasePath: config.databasePath,
      dataDir: config.dataDir,
      appDataDir: config.appDataDir,
    });
}

export interface LibraryViewDependencies {
  client: RecordClient;
  prompts: PromptLibrary;
  openReader: ReaderFactory;
}

export interface ChildrenView {
  parentTitle: string;
  attachments: AttachmentRecord[];
  notes: NoteRecord[];
  annotations: Annotation[];
  /** Set when the query API could not list children */
  childrenWarning?: string;
  /** Set when the database could not be read; other fields still hold data */
  annotationWarning?: string;
}

export interface AnnotationSearchResult {
  annotations: Annotation[];
  limit: number;
  /** The limit was reached, so more matches may exist */
  hasMore: boolean;
}

export type FulltextSource = 'index' | 'stored_file';

export interface FulltextResult {
  attachment: AttachmentDetails;
  content: string;
  source: FulltextSource;
  totalChars: number;
  /** Characters cut off by `maxChars` */
  omittedChars: number;
}

export interface CreateNoteInput {
  content: string;
  parentKey?: string;
  tags?: string[];
}

export interface NoteCreated {
  parentKey?: string;
  /** Resolved after the write; absent when the parent could not be read back */
  parentTitle?: string;
}

export interface CreateReviewInput {
  itemKey: string;
  analysis: Record<string, string>;
  templateName?: string;
  tags?: string[];
}

export interface ReviewCreated {
  itemKey: string;
  title: string;
  templateName: string;
}

const UNINDEXED_PDF_MESSAGE =
  'No full-text content indexed for this attachment. ' +
  'Rebuild the full-text index in Zotero (Settings > Search > Rebuild Index) and try again.';

const SCANNED_PDF_MESSAGE = 'No text content found. This may be a scanned PDF without OCR.';

function toDatabaseError(error: unknown): ZoteroMcpError {
  if (isZoteroMcpError(error)) {
    return error;
  }
  return new SourceUnavailableError(`Could not read the local Zotero database: ${getErrorMessage(error)}`, 'database', error);
}

function toTagPayload(tags: readonly string[] | undefined): Array<{ tag: string }> {
  return (tags ?? []).map((tag) => ({ tag }));
}

export class LibraryView {
  private readonly client: RecordClient;
  private readonly prompts: PromptLibrary;
  private readonly openReader: ReaderFactory;

  constructor(deps: LibraryViewDependencies) {
    this.client = deps.client;
    this.prompts = deps.prompts;
    this.openReader = deps.openReader;
  }

  // ==========================================================================
  // READS
  // ==========================================================================

  async getChildrenView(itemKey: string): Promise<SourceOutcome<ChildrenView>> {
    const parent = await this.client.getItem(itemKey);
    const parentTitle = parent.status === 'ok' ? (parent.value.title ?? 'Untitled') : `Item ${itemKey}`;

    const view: ChildrenView = { parentTitle, attachments: [], notes: [], annotations: [] };

    const children = await this.client.listChildren(itemKey);
    if (children.status === 'ok') {
      for (const child of children.value) {
        if (child.kind === 'attachment') {
          view.attachments.push(child);
        } else if (child.kind === 'note') {
          view.notes.push(child);
        }
      }
    } else if (children.status === 'failed') {
      view.childrenWarning = `Could not retrieve attachments and notes: ${describeError(children.error)}`;
      logWarning('[library] children listing failed', { itemKey, kind: children.error.kind });
    }

    try {
      view.annotations = this.withReader((reader) => reader.getAnnotationsForItem(itemKey));
    } catch (error) {
      view.annotationWarning = `Could not retrieve annotations: ${describeError(error)}`;
      logWarning('[library] annotation lookup failed', { itemKey, error: getErrorMessage(error) });
    }

    const hasData = view.attachments.length > 0 || view.notes.length > 0 || view.annotations.length > 0;
    if (hasData || view.annotationWarning) {
      return ok(view);
    }
    if (children.status === 'failed') {
      return failed(children.error);
    }
    return empty(`No child items found for: ${parentTitle}`);
  }

  /**
   * @throws InvalidInputError for a blank query, before the database is opened
   */
  async searchAnnotations(
    query: string,
    limit: number = DEFAULT_ANNOTATION_SEARCH_LIMIT
  ): Promise<SourceOutcome<AnnotationSearchResult>> {
    if (!query.trim()) {
      throw new InvalidInputError('Search query cannot be empty');
    }

    let annotations: Annotation[];
    try {
      annotations = this.withReader((reader) => reader.searchAnnotations(query, limit));
    } catch (error) {
      return failed(toDatabaseError(error));
    }

    if (annotations.length === 0) {
      return empty(`No annotations found matching: '${query}'`);
    }
    return ok({ annotations, limit, hasMore: annotations.length >= limit });
  }

  /**
   * Text of the record's best attachment. Zotero's full-text index comes
   * first; PDFs and HTML snapshots fall back to the stored file itself.
   */
  async getFulltext(itemKey: string, maxChars: number = DEFAULT_FULLTEXT_MAX_CHARS): Promise<SourceOutcome<FulltextResult>> {
    const item = await this.client.getItem(itemKey);
    if (item.status !== 'ok') {
      return item;
    }

    const attachment = await selectAttachment(this.client, item.value);
    if (!attachment) {
      return empty('No suitable attachment found for this item.');
    }

    const indexed = await this.client.getFulltext(attachment.key);
    let content: string | null = null;
    let source: FulltextSource = 'index';

    if (indexed.status === 'ok') {
      content = indexed.value.content;
    } else if (attachment.contentType === 'application/pdf') {
      content = await this.readStoredPdf(attachment);
      source = 'stored_file';
      if (content !== null && !content.trim()) {
        return empty(SCANNED_PDF_MESSAGE);
      }
    } else if (attachment.contentType.startsWith('text/html')) {
      content = await this.readStoredHtml(attachment);
      source = 'stored_file';
    }

    if (content === null || !content.trim()) {
      if (indexed.status === 'failed') {
        return failed(indexed.error);
      }
      return empty(
        attachment.contentType === 'application/pdf' ? UNINDEXED_PDF_MESSAGE : 'No text content found for this attachment.'
      );
    }

    const truncated = truncateText(content, maxChars);
    return ok({
      attachment,
      content: truncated.text,
      source,
      totalChars: content.length,
      omittedChars: truncated.omitted,
    });
  }

  // ==========================================================================
  // WRITES
  // ==========================================================================

  /**
   * @throws InvalidInputError for empty content
   */
  async createNote(input: CreateNoteInput): Promise<WriteOutcome<NoteCreated>> {
    if (!input.content.trim()) {
      throw new InvalidInputError('Note content cannot be empty');
    }

    const payload: NewItemPayload = {
      itemType: 'note',
      note: textToHtml(input.content),
      tags: toTagPayload(input.tags),
    };
    if (input.parentKey) {
      payload.parentItem = input.parentKey;
    }

    const written = await this.client.createItems([payload]);
    if (written.status === 'failed') {
      return written;
    }

    if (!input.parentKey) {
      return ok({});
    }
    const parent = await this.client.getItem(input.parentKey);
    return ok({
      parentKey: input.parentKey,
      parentTitle: parent.status === 'ok' ? (parent.value.title ?? 'Untitled') : undefined,
    });
  }

  /**
   * Render a review template from the record's metadata and the supplied
   * analysis, and attach it to the record as a note. A missing record is
   * `empty`; a missing template is a configuration failure.
   */
  async createReview(input: CreateReviewInput): Promise<SourceOutcome<ReviewCreated>> {
    const templateName = input.templateName ?? 'literature_review';

    const item = await this.client.getItem(input.itemKey);
    if (item.status !== 'ok') {
      return item;
    }
    const metadata = buildTemplateMetadata(item.value);

    const template = await this.prompts.loadTemplate(templateName);
    if (template === null) {
      return failed(
        new ConfigurationError(
          `Template '${templateName}_template.html' not found.\n` +
            'Please ensure the template exists in:\n' +
            `  - ${this.prompts.promptsDir}/${templateName}_template.html (user config)\n` +
            `  - or the packaged prompts/ directory`,
          'ZOTERO_MCP_PROMPTS_DIR'
        )
      );
    }

    const written = await this.client.createItems([
      {
        itemType: 'note',
        note: renderTemplate(template, metadata, input.analysis),
        tags: toTagPayload(input.tags),
        parentItem: input.itemKey,
      },
    ]);
    if (written.status === 'failed') {
      return written;
    }

    return ok({ itemKey: input.itemKey, title: metadata.title, templateName });
  }

  // ==========================================================================
  // HELPERS
  // ==========================================================================

  private withReader<T>(run: (reader: AnnotationReader) => T): T {
    const reader = this.openReader();
    try {
      return run(reader);
    } finally {
      reader.close();
    }
  }

  /** Null when the file is gone or the database cannot be opened. */
  private resolveStoredFile(attachment: AttachmentDetails): string | null {
    if (!attachment.filename) {
      return null;
    }
    try {
      return this.withReader((reader) =>
        reader.resolveStoragePath(`storage:${attachment.key}/${attachment.filename}`)
      );
    } catch (error) {
      logDebug('[library] storage directory not available', { key: attachment.key, error: getErrorMessage(error) });
      return null;
    }
  }

  private async readStoredHtml(attachment: AttachmentDetails): Promise<string | null> {
    const filePath = this.resolveStoredFile(attachment);
    if (!filePath) {
      return null;
    }
    try {
      return cleanHtml(await fs.readFile(filePath, 'utf8'));
    } catch (error) {
      logDebug('[library] stored attachment not readable', { key: attachment.key, error: getErrorMessage(error) });
      return null;
    }
  }

  private async readStoredPdf(attachment: AttachmentDetails): Promise<string | null> {
    const filePath = this.resolveStoredFile(attachment);
    if (!filePath) {
      return null;
    }
    try {
      return await extractPdfText(new Uint8Array(await fs.readFile(filePath)));
    } catch (error) {
      logWarning('[library] stored PDF could not be read', { key: attachment.key, error: getErrorMessage(error) });
      return null;
    }
  }
}
