/**
 * @fileoverview Process-wide configuration for the Zotero MCP server
 *
 * Built once at startup from the environment and handed to each component
 * constructor. Components never read process.env themselves.
 */

import * as os from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';

export const DEFAULT_LOCAL_URL = 'http://127.0.0.1:23119';
export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;
export const PING_TIMEOUT_MS = 3_000;

export type LibraryType = 'user' | 'group';

export interface ZoteroMcpConfig {
  /** Library for the query API; "0" is the always-present local library */
  libraryId: string;
  libraryType: LibraryType;
  /** Library id the connector writes into */
  connectorLibraryId: number;
  /** Explicit zotero.sqlite path (ZOTERO_DATABASE_PATH) */
  databasePath?: string;
  /** Explicit Zotero data directory (ZOTERO_DATA_DIR) */
  dataDir?: string;
  baseUrl: string;
  requestTimeoutMs: number;
  pingTimeoutMs: number;
  promptsDir: string;
  /** %APPDATA% on Windows, one of the database search roots */
  appDataDir?: string;
}

const optionalPath = z.string().trim().optional();

const EnvSchema = z.object({
  ZOTERO_LIBRARY_ID: z.string().trim().min(1).default('0'),
  ZOTERO_LIBRARY_TYPE: z.enum(['user', 'group']).default('user'),
  ZOTERO_CONNECTOR_LIBRARY_ID: z.coerce.number().int().nonnegative().default(1),
  ZOTERO_DATABASE_PATH: optionalPath,
  ZOTERO_DATA_DIR: optionalPath,
  ZOTERO_LOCAL_URL: z.string().url().default(DEFAULT_LOCAL_URL),
  ZOTERO_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_REQUEST_TIMEOUT_MS),
  ZOTERO_MCP_PROMPTS_DIR: optionalPath,
  APPDATA: optionalPath,
});

export function getDefaultPromptsDir(homeDir: string = os.homedir()): string {
  return path.join(homeDir, '.zotero-mcp', 'prompts');
}

/** Unset and blank variables both mean "use the default". */
function withoutBlankValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const entries = Object.entries(env).filter(
    (entry): entry is [string, string] => typeof entry[1] === 'string' && entry[1].trim().length > 0
  );
  return Object.fromEntries(entries);
}

export function resolveZoteroMcpConfig(env: NodeJS.ProcessEnv = process.env): ZoteroMcpConfig {
  const parsed = EnvSchema.safeParse(withoutBlankValues(env));
  if (!parsed.success) {
    const issue = parsed.error.errors[0];
    const variable = issue ? String(issue.path[0] ?? '') : '';
    throw new ConfigurationError(
      `Invalid configuration${variable ? ` for ${variable}` : ''}: ${issue?.message ?? 'unknown error'}`,
      variable || undefined
    );
  }

  const values = parsed.data;
  return {
    libraryId: values.ZOTERO_LIBRARY_ID,
    libraryType: values.ZOTERO_LIBRARY_TYPE,
    connectorLibraryId: values.ZOTERO_CONNECTOR_LIBRARY_ID,
    databasePath: values.ZOTERO_DATABASE_PATH,
    dataDir: values.ZOTERO_DATA_DIR,
    baseUrl: values.ZOTERO_LOCAL_URL.replace(/\/+$/, ''),
    requestTimeoutMs: values.ZOTERO_REQUEST_TIMEOUT_MS,
    pingTimeoutMs: PING_TIMEOUT_MS,
    promptsDir: values.ZOTERO_MCP_PROMPTS_DIR ?? getDefaultPromptsDir(),
    appDataDir: values.APPDATA,
  };
}
