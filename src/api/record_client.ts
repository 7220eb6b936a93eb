/**
 * @fileoverview Client for Zotero's two local HTTP endpoints
 *
 * Reads go to the local query API (`/api/...`), which mirrors the web API
 * but is read-only. Writes go to the connector endpoint
 * (`/connector/saveItems`), the only local interface that accepts new
 * items. Reads return a SourceOutcome and are never retried; retry policy
 * belongs to the caller.
 */

import type { ZoteroMcpConfig } from '../config/zotero_config.js';
import {
  InvalidInputError,
  InvalidResponseError,
  SourceTimeoutError,
  SourceUnavailableError,
  UpstreamStatusError,
  getErrorMessage,
  isZoteroMcpError,
  type ZoteroSource,
} from '../core/errors.js';
import { empty, failed, fromList, ok, type SourceOutcome, type WriteOutcome } from '../core/outcome.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import {
  parseCollection,
  parseCollectionList,
  parseFulltext,
  parseRecord,
  parseRecordList,
  parseTagList,
} from '../zotero/records.js';
import type { Collection, Fulltext, LibraryTag, NewItemPayload, ZoteroRecord } from '../zotero/types.js';

const API_VERSION = '3';
const NOT_RUNNING_MESSAGE = 'Cannot connect to Zotero. Ensure Zotero desktop is running with local API enabled.';

export type SearchMode = 'titleCreatorYear' | 'everything';
export type RecentSort = 'dateModified' | 'dateAdded';

export interface SearchItemsOptions {
  query: string;
  qmode?: SearchMode;
  /** Zotero itemType filter, e.g. "-attachment" or "book || journalArticle" */
  itemType?: string;
  limit?: number;
  tags?: string[];
}

export interface RecentItemsOptions {
  limit?: number;
  sort?: RecentSort;
  itemType?: string;
}

export interface CollectionItemsOptions {
  limit?: number;
  itemType?: string;
}

export interface CreateItemsResult {
  created: number;
}

type QueryParams = Record<string, string | number | string[] | undefined>;

function isAbortError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'name' in error && error.name === 'AbortError';
}

async function readBody(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch {
    return '';
  }
}

export class RecordClient {
  private readonly config: ZoteroMcpConfig;

  constructor(config: ZoteroMcpConfig) {
    this.config = config;
  }

  private get libraryPrefix(): string {
    if (this.config.libraryType === 'group') {
      return `/groups/${encodeURIComponent(this.config.libraryId)}`;
    }
    return `/users/${encodeURIComponent(this.config.libraryId)}`;
  }

  // ==========================================================================
  // READS
  // ==========================================================================

  async searchItems(options: SearchItemsOptions): Promise<SourceOutcome<ZoteroRecord[]>> {
    if (!options.query.trim()) {
      throw new InvalidInputError('Search query cannot be empty');
    }
    return this.getList(
      '/items',
      {
        q: options.query,
        qmode: options.qmode ?? 'titleCreatorYear',
        itemType: options.itemType ?? '-attachment',
        limit: options.limit ?? 10,
        tag: options.tags ?? [],
      },
      parseRecordList,
      `No items found matching query: '${options.query}'`
    );
  }

  async getRecentItems(options: RecentItemsOptions = {}): Promise<SourceOutcome<ZoteroRecord[]>> {
    const limit = Math.max(1, Math.min(options.limit ?? 10, 100));
    const itemType = options.itemType ?? '-attachment -note';
    return this.getList(
      '/items',
      {
        limit,
        sort: options.sort ?? 'dateModified',
        direction: 'desc',
        itemType: itemType || undefined,
      },
      parseRecordList,
      'No items found in your Zotero library.'
    );
  }

  async getItem(itemKey: string): Promise<SourceOutcome<ZoteroRecord>> {
    return this.getJson(
      `/items/${encodeURIComponent(itemKey)}`,
      {},
      parseRecord,
      `No item found with key: ${itemKey}`
    );
  }

  async listChildren(itemKey: string): Promise<SourceOutcome<ZoteroRecord[]>> {
    return this.getList(
      `/items/${encodeURIComponent(itemKey)}/children`,
      {},
      parseRecordList,
      `No child items found for: ${itemKey}`
    );
  }

  async listCollections(limit?: number): Promise<SourceOutcome<Collection[]>> {
    return this.getList('/collections', { limit }, parseCollectionList, 'No collections found in your Zotero library.');
  }

  async getCollection(collectionKey: string): Promise<SourceOutcome<Collection>> {
    return this.getJson(
      `/collections/${encodeURIComponent(collectionKey)}`,
      {},
      parseCollection,
      `No collection found with key: ${collectionKey}`
    );
  }

  async listCollectionItems(
    collectionKey: string,
    options: CollectionItemsOptions = {}
  ): Promise<SourceOutcome<ZoteroRecord[]>> {
    const itemType = options.itemType ?? '-attachment -note';
    return this.getList(
      `/collections/${encodeURIComponent(collectionKey)}/items`,
      { limit: options.limit ?? 50, itemType: itemType || undefined },
      parseRecordList,
      `No items found in collection: ${collectionKey}`
    );
  }

  async listTags(limit?: number): Promise<SourceOutcome<LibraryTag[]>> {
    return this.getList('/tags', { limit }, parseTagList, 'No tags found in your Zotero library.');
  }

  /**
   * Text from Zotero's full-text index for an attachment. An attachment
   * that has not been indexed comes back empty.
   */
  async getFulltext(attachmentKey: string): Promise<SourceOutcome<Fulltext>> {
    const outcome = await this.getJson(
      `/items/${encodeURIComponent(attachmentKey)}/fulltext`,
      {},
      parseFulltext,
      `No full-text content indexed for attachment: ${attachmentKey}`
    );
    if (outcome.status === 'ok' && !outcome.value.content) {
      return empty(`No full-text content indexed for attachment: ${attachmentKey}`);
    }
    return outcome;
  }

  // ==========================================================================
  // WRITES
  // ==========================================================================

  /**
   * Create items through the connector. Unreachable, timed out and rejected
   * requests are reported as distinct errors since the fix differs for each
   * (start Zotero, retry, fix the payload).
   */
  async createItems(items: NewItemPayload[]): Promise<WriteOutcome<CreateItemsResult>> {
    const url = `${this.config.baseUrl}/connector/saveItems`;
    const payload = {
      libraryID: this.config.connectorLibraryId,
      items,
    };

    let response: Response;
    try {
      response = await this.send(
        url,
        {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify(payload),
        },
        'connector',
        this.config.requestTimeoutMs
      );
    } catch (error) {
      if (isZoteroMcpError(error)) {
        logWarning('[zotero-connector] saveItems failed', { kind: error.kind });
        return failed(error);
      }
      throw error;
    }

    if (!response.ok) {
      const body = await readBody(response);
      logWarning('[zotero-connector] saveItems rejected', { status: response.status });
      return failed(new UpstreamStatusError('connector', response.status, body));
    }

    return ok({ created: items.length });
  }

  /**
   * Liveness probe. Never throws; every failure reads as "not running".
   */
  async isRunning(): Promise<boolean> {
    try {
      const text = await this.exchange(
        `${this.config.baseUrl}/connector/ping`,
        { method: 'GET' },
        'connector',
        this.config.pingTimeoutMs,
        (response) => response.text()
      );
      return text.includes('Zotero');
    } catch (error) {
      logDebug('[zotero-connector] ping failed', { error: getErrorMessage(error) });
      return false;
    }
  }

  // ==========================================================================
  // TRANSPORT
  // ==========================================================================

  private buildQueryUrl(pathname: string, params: QueryParams): string {
    const url = new URL(`${this.config.baseUrl}/api${this.libraryPrefix}${pathname}`);
    url.searchParams.set('format', 'json');
    for (const [key, value] of Object.entries(params)) {
      if (value === undefined) continue;
      if (Array.isArray(value)) {
        for (const entry of value) {
          url.searchParams.append(key, entry);
        }
        continue;
      }
      url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  /**
   * @throws SourceTimeoutError when the timeout fires first
   * @throws SourceUnavailableError when the endpoint cannot be reached
   */
  private async send(url: string, init: RequestInit, source: ZoteroSource, timeoutMs: number): Promise<Response> {
    return this.exchange(url, init, source, timeoutMs, async (response) => response);
  }

  /**
   * Like `send`, with `read` run before the timer is cleared so reading the
   * body is bounded by the same timeout.
   */
  private async exchange<T>(
    url: string,
    init: RequestInit,
    source: ZoteroSource,
    timeoutMs: number,
    read: (response: Response) => Promise<T>
  ): Promise<T> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetch(url, { ...init, signal: controller.signal });
      return await read(response);
    } catch (error) {
      if (isAbortError(error)) {
        throw new SourceTimeoutError(source, timeoutMs);
      }
      throw new SourceUnavailableError(NOT_RUNNING_MESSAGE, source, error);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async getJson<T>(
    pathname: string,
    params: QueryParams,
    parse: (raw: unknown) => T,
    notFoundReason: string
  ): Promise<SourceOutcome<T>> {
    const url = this.buildQueryUrl(pathname, params);
    logDebug('[zotero-api] GET', { url });

    let response: Response;
    try {
      response = await this.send(
        url,
        { headers: { Accept: 'application/json', 'Zotero-API-Version': API_VERSION } },
        'query_api',
        this.config.requestTimeoutMs
      );
    } catch (error) {
      if (isZoteroMcpError(error)) {
        return failed(error);
      }
      throw error;
    }

    if (response.status === 404) {
      return empty(notFoundReason);
    }
    if (!response.ok) {
      return failed(new UpstreamStatusError('query_api', response.status, await readBody(response)));
    }

    let raw: unknown;
    try {
      raw = await response.json();
    } catch (error) {
      return failed(new InvalidResponseError('Zotero returned a malformed JSON response.', 'query_api', error));
    }

    try {
      return ok(parse(raw));
    } catch (error) {
      return failed(new InvalidResponseError(getErrorMessage(error), 'query_api', error));
    }
  }

  private async getList<T>(
    pathname: string,
    params: QueryParams,
    parse: (raw: unknown) => T[],
    emptyReason: string
  ): Promise<SourceOutcome<T[]>> {
    const outcome = await this.getJson(pathname, params, parse, emptyReason);
    if (outcome.status !== 'ok') {
      return outcome;
    }
    return fromList(outcome.value, emptyReason);
  }
}
