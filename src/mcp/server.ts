#!/usr/bin/env node
/**
 * @fileoverview MCP server exposing a local Zotero library
 *
 * Registers the Zotero tools and the research workflow prompts on a
 * low-level MCP `Server` and serves them over stdio. stdout belongs to the
 * transport; all logging goes to stderr.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  GetPromptRequestSchema,
  ListPromptsRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
  type GetPromptResult,
  type ListPromptsResult,
  type ListToolsResult,
  type Prompt,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';
import { renderWorkflowPrompt, WORKFLOW_PROMPT_NAMES, type WorkflowPromptName } from '../api/prompt_library.js';
import { resolveZoteroMcpConfig, type ZoteroMcpConfig } from '../config/zotero_config.js';
import { describeError, getErrorMessage, InvalidInputError, isZoteroMcpError } from '../core/errors.js';
import { logDebug, logError, logInfo, logWarning } from '../telemetry/logger.js';
import { isToolName, listToolSchemas, TOOL_JSON_SCHEMAS, validateToolInput } from './schema.js';
import { createZoteroToolContext, TOOL_DEFINITIONS, type ZoteroToolContext } from './tools.js';

export const SERVER_NAME = 'zotero-mcp-lite';
export const SERVER_VERSION = '0.4.0';

export interface ZoteroMCPServerOptions {
  name: string;
  version: string;
  config: ZoteroMcpConfig;
  /** Replaces the clients built from `config` */
  context?: ZoteroToolContext;
}

// ============================================================================
// PROMPTS
// ============================================================================

interface PromptDefinition {
  description: string;
  argument: { name: string; description: string };
}

const PROMPT_DEFINITIONS: Record<WorkflowPromptName, PromptDefinition> = {
  knowledge_discovery: {
    description: 'Explore your personal knowledge base on a topic',
    argument: { name: 'query', description: 'Topic or question to explore' },
  },
  literature_review: {
    description: 'Deep academic analysis of a single paper',
    argument: { name: 'item_key', description: 'Zotero item key of the paper' },
  },
  comparative_review: {
    description: 'Synthesize multiple papers into a comparative review',
    argument: { name: 'item_keys', description: 'Item keys, comma separated or as a JSON array' },
  },
  bibliography_export: {
    description: 'Export formatted citations and BibTeX for selected papers',
    argument: { name: 'item_keys', description: 'Item keys, comma separated or as a JSON array' },
  },
};

function isWorkflowPromptName(name: string): name is WorkflowPromptName {
  return WORKFLOW_PROMPT_NAMES.some((promptName) => promptName === name);
}

/**
 * Prompt arguments arrive as strings. Accept a JSON array of keys or a
 * comma/whitespace separated list.
 */
export function parseItemKeys(raw: string | undefined): string[] {
  const trimmed = (raw ?? '').trim();
  if (!trimmed) return [];
  if (trimmed.startsWith('[')) {
    try {
      const parsed: unknown = JSON.parse(trimmed);
      if (Array.isArray(parsed)) {
        return parsed.filter((entry): entry is string => typeof entry === 'string' && entry.length > 0);
      }
    } catch (error) {
      logDebug('[MCP] item_keys is not JSON, splitting as text', { error: getErrorMessage(error) });
    }
  }
  return trimmed.split(/[\s,]+/).filter((key) => key.length > 0);
}

// ============================================================================
// SERVER IMPLEMENTATION
// ============================================================================

export class ZoteroMCPServer {
  private server: Server;
  private options: ZoteroMCPServerOptions;
  private context: ZoteroToolContext;
  private transport: StdioServerTransport | null = null;

  constructor(options: Partial<ZoteroMCPServerOptions> = {}) {
    const config = options.config ?? resolveZoteroMcpConfig();
    this.options = {
      name: options.name ?? SERVER_NAME,
      version: options.version ?? SERVER_VERSION,
      config,
      context: options.context,
    };
    this.context = options.context ?? createZoteroToolContext(config);

    this.server = new Server(
      { name: this.options.name, version: this.options.version },
      { capabilities: { tools: {}, prompts: {} } }
    );
    this.registerHandlers();
  }

  private registerHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async (): Promise<ListToolsResult> => {
      return { tools: this.listTools() };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request): Promise<CallToolResult> => {
      return this.callTool(request.params.name, request.params.arguments);
    });

    this.server.setRequestHandler(ListPromptsRequestSchema, async (): Promise<ListPromptsResult> => {
      return { prompts: this.listPrompts() };
    });

    this.server.setRequestHandler(GetPromptRequestSchema, async (request): Promise<GetPromptResult> => {
      return this.getPrompt(request.params.name, request.params.arguments ?? {});
    });
  }

  listTools(): Tool[] {
    return listToolSchemas().map((name) => ({
      name,
      description: TOOL_DEFINITIONS[name].description,
      inputSchema: TOOL_JSON_SCHEMAS[name],
      annotations: { readOnlyHint: TOOL_DEFINITIONS[name].readOnly },
    }));
  }

  /**
   * Run a tool. Failures never escape: they come back as `isError` results
   * whose text carries the remediation hint.
   */
  async callTool(name: string, args: unknown): Promise<CallToolResult> {
    const startTime = Date.now();
    try {
      if (!isToolName(name)) {
        throw new InvalidInputError(`Unknown tool: ${name}`);
      }
      const validation = validateToolInput(name, args);
      if (!validation.valid) {
        const issues = validation.errors.map((e) => (e.path === '/' ? e.message : `${e.path}: ${e.message}`));
        throw new InvalidInputError(`Invalid input: ${issues.join(', ')}`);
      }

      const text = await TOOL_DEFINITIONS[name].run(this.context, validation.data);
      logDebug('[MCP] tool call completed', { name, durationMs: Date.now() - startTime });
      return { content: [{ type: 'text', text }] };
    } catch (error) {
      const log = isZoteroMcpError(error) ? logWarning : logError;
      log('[MCP] tool call failed', { name, error: getErrorMessage(error), durationMs: Date.now() - startTime });
      return {
        content: [{ type: 'text', text: `Error: ${describeError(error)}` }],
        isError: true,
      };
    }
  }

  listPrompts(): Prompt[] {
    return WORKFLOW_PROMPT_NAMES.map((name) => ({
      name,
      description: PROMPT_DEFINITIONS[name].description,
      arguments: [{ ...PROMPT_DEFINITIONS[name].argument, required: true }],
    }));
  }

  async getPrompt(name: string, args: Record<string, string>): Promise<GetPromptResult> {
    if (!isWorkflowPromptName(name)) {
      throw new InvalidInputError(`Unknown prompt: ${name}`);
    }
    const text = await renderWorkflowPrompt(this.context.prompts, name, {
      query: args.query,
      itemKey: args.item_key,
      itemKeys: parseItemKeys(args.item_keys),
    });
    return {
      description: PROMPT_DEFINITIONS[name].description,
      messages: [{ role: 'user', content: { type: 'text', text } }],
    };
  }

  // ============================================================================
  // SERVER LIFECYCLE
  // ============================================================================

  async start(): Promise<void> {
    this.transport = new StdioServerTransport();
    await this.server.connect(this.transport);
    logInfo(`[MCP] ${this.options.name} server started (v${this.options.version})`, {
      baseUrl: this.options.config.baseUrl,
    });

    if (!(await this.context.client.isRunning())) {
      logWarning('[MCP] Zotero does not answer on the connector endpoint; start Zotero desktop to use the tools', {
        baseUrl: this.options.config.baseUrl,
      });
    }
  }

  async stop(): Promise<void> {
    if (this.transport) {
      await this.server.close();
      this.transport = null;
    }
    logInfo(`[MCP] ${this.options.name} server stopped`);
  }
}

// ============================================================================
// FACTORY FUNCTIONS
// ============================================================================

export function createZoteroMCPServer(options?: Partial<ZoteroMCPServerOptions>): ZoteroMCPServer {
  return new ZoteroMCPServer(options);
}

export async function startStdioServer(options?: Partial<ZoteroMCPServerOptions>): Promise<ZoteroMCPServer> {
  const server = createZoteroMCPServer(options);
  await server.start();
  return server;
}

// ============================================================================
// CLI ENTRY POINT
// ============================================================================

export async function main(): Promise<void> {
  const server = await startStdioServer();

  const shutdown = async (): Promise<void> => {
    await server.stop();
    process.exit(0);
  };
  const onSignal = (): void => {
    shutdown().catch((error: unknown) => {
      logError('[MCP] Shutdown failed', { error: getErrorMessage(error) });
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

/**
 * Whether the module at `moduleUrl` is the script node was started with.
 * npm installs bins as symlinks, so both sides are compared after
 * resolving links.
 */
export function isEntryPoint(moduleUrl: string, scriptPath: string | undefined): boolean {
  if (!scriptPath) {
    return false;
  }
  try {
    return fs.realpathSync(scriptPath) === fs.realpathSync(fileURLToPath(moduleUrl));
  } catch (error) {
    logDebug('[MCP] entry point check failed', { scriptPath, error: getErrorMessage(error) });
    return false;
  }
}

// Run if executed directly
if (isEntryPoint(import.meta.url, process.argv[1])) {
  main().catch((error: unknown) => {
    logError('[MCP] Fatal error', { error: describeError(error) });
    process.exit(1);
  });
}
