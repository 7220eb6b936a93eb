/**
 * Centralized Vitest setup
 *
 * Keeps test output quiet unless a run asks for logs, and makes sure no
 * suite inherits the developer's own Zotero configuration.
 */

import { afterEach, vi } from 'vitest';

const ZOTERO_ENV_VARIABLES = [
  'ZOTERO_LIBRARY_ID',
  'ZOTERO_LIBRARY_TYPE',
  'ZOTERO_CONNECTOR_LIBRARY_ID',
  'ZOTERO_DATABASE_PATH',
  'ZOTERO_DATA_DIR',
  'ZOTERO_LOCAL_URL',
  'ZOTERO_REQUEST_TIMEOUT_MS',
  'ZOTERO_MCP_PROMPTS_DIR',
];

for (const variable of ZOTERO_ENV_VARIABLES) {
  delete process.env[variable];
}

// Set ZOTERO_MCP_LOG_LEVEL=debug when running tests to see log output.
if (!process.env.ZOTERO_MCP_LOG_LEVEL) {
  process.env.ZOTERO_MCP_LOG_LEVEL = 'silent';
}

afterEach(() => {
  vi.unstubAllGlobals();
  vi.unstubAllEnvs();
});
