/**
 * @fileoverview Error taxonomy for the Zotero data sources
 *
 * Every failure that crosses a source boundary (query API, connector,
 * embedded database) is one of these classes. `kind` drives the
 * caller-facing wording, `remediation` is the hint shown to the user.
 */

export type ZoteroSource = 'query_api' | 'connector' | 'database' | 'config' | 'input';

export type ZoteroErrorKind =
  | 'configuration'
  | 'invalid_input'
  | 'unsupported_item_type'
  | 'database_not_found'
  | 'source_unavailable'
  | 'timeout'
  | 'http_status'
  | 'invalid_response';

// ============================================================================
// BASE
// ============================================================================

export class ZoteroMcpError extends Error {
  readonly kind: ZoteroErrorKind;
  readonly retriable: boolean = false;
  readonly source: ZoteroSource;
  readonly remediation?: string;

  constructor(
    kind: ZoteroErrorKind,
    message: string,
    options: { source: ZoteroSource; remediation?: string; cause?: unknown }
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ZoteroMcpError';
    this.kind = kind;
    this.source = options.source;
    this.remediation = options.remediation;
  }
}

// ============================================================================
// MALFORMED INPUT / CONFIG
// ============================================================================

export class ConfigurationError extends ZoteroMcpError {
  constructor(
    message: string,
    public readonly variable?: string
  ) {
    super('configuration', message, {
      source: 'config',
      remediation: variable ? `Check the ${variable} environment variable.` : undefined,
    });
    this.name = 'ConfigurationError';
  }
}

export class InvalidInputError extends ZoteroMcpError {
  constructor(message: string, kind: 'invalid_input' | 'unsupported_item_type' = 'invalid_input') {
    super(kind, message, { source: 'input' });
    this.name = 'InvalidInputError';
  }
}

/**
 * Attachments and notes have no bibliographic identity to cite.
 */
export class UnsupportedItemTypeError extends InvalidInputError {
  constructor(public readonly itemType: string) {
    super(`Cannot export BibTeX for item type '${itemType}'`, 'unsupported_item_type');
    this.name = 'UnsupportedItemTypeError';
  }
}

// ============================================================================
// SOURCE FAILURES
// ============================================================================

export class DatabaseNotFoundError extends ZoteroMcpError {
  constructor(
    message: string,
    public readonly checkedPaths: readonly string[],
    public readonly variable?: string
  ) {
    super('database_not_found', message, {
      source: 'database',
      remediation: 'Set ZOTERO_DATA_DIR or ZOTERO_DATABASE_PATH to point at your Zotero data.',
    });
    this.name = 'DatabaseNotFoundError';
  }
}

export class SourceUnavailableError extends ZoteroMcpError {
  constructor(message: string, source: ZoteroSource, cause?: unknown) {
    super('source_unavailable', message, {
      source,
      cause,
      remediation: 'Start Zotero desktop and enable "Allow other applications on this computer to communicate with Zotero".',
    });
    this.name = 'SourceUnavailableError';
  }
}

export class SourceTimeoutError extends ZoteroMcpError {
  override readonly retriable = true;

  constructor(
    source: ZoteroSource,
    public readonly timeoutMs: number
  ) {
    super('timeout', `Request to Zotero timed out after ${timeoutMs / 1000} seconds.`, {
      source,
      remediation: 'Try again or increase ZOTERO_REQUEST_TIMEOUT_MS.',
    });
    this.name = 'SourceTimeoutError';
  }
}

export class UpstreamStatusError extends ZoteroMcpError {
  constructor(
    source: ZoteroSource,
    public readonly status: number,
    public readonly body: string
  ) {
    super('http_status', `Zotero returned an error: ${status} - ${body}`, {
      source,
      remediation: status >= 500 ? undefined : 'Check the request payload and item keys.',
    });
    this.name = 'UpstreamStatusError';
  }
}

export class InvalidResponseError extends ZoteroMcpError {
  constructor(message: string, source: ZoteroSource, cause?: unknown) {
    super('invalid_response', message, { source, cause });
    this.name = 'InvalidResponseError';
  }
}

// ============================================================================
// HELPERS
// ============================================================================

export function isZoteroMcpError(error: unknown): error is ZoteroMcpError {
  return error instanceof ZoteroMcpError;
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * One line for the caller: the message, then the remediation when present.
 */
export function describeError(error: unknown): string {
  const message = getErrorMessage(error);
  if (isZoteroMcpError(error) && error.remediation) {
    return `${message} ${error.remediation}`;
  }
  return message;
}
