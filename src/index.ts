/**
 * @fileoverview Public API of zotero-mcp-lite
 *
 * @packageDocumentation
 */

export * from './config/zotero_config.js';
export * from './core/errors.js';
export * from './core/outcome.js';
export * from './zotero/types.js';
export { parseRecord, parseRecordList, RecordShapeError } from './zotero/records.js';
export * from './storage/database_locator.js';
export * from './storage/annotation_reader.js';
export * from './api/record_client.js';
export * from './api/attachment_selector.js';
export * from './api/metadata_formatter.js';
export * from './api/citation_generator.js';
export * from './api/template_engine.js';
export * from './api/text_utils.js';
export * from './api/pdf_text.js';
export * from './api/prompt_library.js';
export * from './api/library_view.js';
export { logDebug, logError, logInfo, logWarning } from './telemetry/logger.js';
export {
  createZoteroMCPServer,
  main,
  parseItemKeys,
  SERVER_NAME,
  SERVER_VERSION,
  startStdioServer,
  ZoteroMCPServer,
  type ZoteroMCPServerOptions,
} from './mcp/server.js';
export { createZoteroToolContext, TOOL_DEFINITIONS, type ZoteroToolContext } from './mcp/tools.js';
export { TOOL_INPUT_SCHEMAS, validateToolInput, type ToolName } from './mcp/schema.js';
