/**
 * @fileoverview JSON Schema definitions and Zod validators for MCP tool inputs
 *
 * The JSON Schemas are what clients see in `tools/list`; the Zod schemas
 * are what every call is validated against. Both use the snake_case
 * argument names MCP clients send.
 *
 * @packageDocumentation
 */

import { z } from 'zod';

// ============================================================================
// SCHEMA VERSION
// ============================================================================

export const SCHEMA_VERSION = '1.0.0';
export const JSON_SCHEMA_DRAFT = 'http://json-schema.org/draft-07/schema#';

// ============================================================================
// ZOD SCHEMAS
// ============================================================================

const ItemKeySchema = z.string().trim().min(1).describe('Zotero item key, e.g. "ABCD2345"');
const TagListSchema = z.array(z.string().min(1));

export const SearchModeSchema = z.enum(['titleCreatorYear', 'everything']);
export const RecentSortSchema = z.enum(['dateModified', 'dateAdded']);

export const SuggestWorkflowToolInputSchema = z.object({
  task: z.string().min(1).describe('What the user wants to do, in their words'),
}).strict();

export const SearchItemsToolInputSchema = z.object({
  query: z.string().describe('Keywords to search for'),
  qmode: SearchModeSchema.optional().default('titleCreatorYear'),
  item_type: z.string().optional().default('-attachment'),
  limit: z.number().int().min(1).max(100).optional().default(10),
  tag: TagListSchema.optional(),
}).strict();

export const GetRecentToolInputSchema = z.object({
  limit: z.number().int().optional().default(10),
  sort_by: RecentSortSchema.optional().default('dateModified'),
  item_type: z.string().optional().default('-attachment -note'),
}).strict();

export const GetCollectionsToolInputSchema = z.object({
  limit: z.number().int().positive().optional(),
}).strict();

export const GetCollectionItemsToolInputSchema = z.object({
  collection_key: z.string().trim().min(1),
  limit: z.number().int().positive().optional().default(50),
  item_type: z.string().optional().default('-attachment -note'),
}).strict();

export const GetTagsToolInputSchema = z.object({
  limit: z.number().int().positive().optional(),
}).strict();

export const SearchAnnotationsToolInputSchema = z.object({
  query: z.string(),
  limit: z.number().int().positive().optional().default(50),
}).strict();

export const GetItemMetadataToolInputSchema = z.object({
  item_key: ItemKeySchema,
  include_bibtex: z.boolean().optional().default(false),
}).strict();

export const GetItemChildrenToolInputSchema = z.object({
  item_key: ItemKeySchema,
}).strict();

export const GetItemFulltextToolInputSchema = z.object({
  item_key: ItemKeySchema,
  max_chars: z.number().int().positive().optional().default(10_000),
}).strict();

export const CreateNoteToolInputSchema = z.object({
  content: z.string().min(1),
  parent_key: z.string().trim().min(1).optional(),
  tags: TagListSchema.optional(),
}).strict();

export const CreateReviewToolInputSchema = z.object({
  item_key: ItemKeySchema,
  analysis: z.record(z.string()),
  template_name: z.string().regex(/^[\w-]+$/, 'Template names may only contain letters, digits, "_" and "-"')
    .optional()
    .default('literature_review'),
  tags: TagListSchema.optional(),
}).strict();

export const TOOL_INPUT_SCHEMAS = {
  zotero_suggest_workflow: SuggestWorkflowToolInputSchema,
  zotero_search_items: SearchItemsToolInputSchema,
  zotero_get_recent: GetRecentToolInputSchema,
  zotero_get_collections: GetCollectionsToolInputSchema,
  zotero_get_collection_items: GetCollectionItemsToolInputSchema,
  zotero_get_tags: GetTagsToolInputSchema,
  zotero_search_annotations: SearchAnnotationsToolInputSchema,
  zotero_get_item_metadata: GetItemMetadataToolInputSchema,
  zotero_get_item_children: GetItemChildrenToolInputSchema,
  zotero_get_item_fulltext: GetItemFulltextToolInputSchema,
  zotero_create_note: CreateNoteToolInputSchema,
  zotero_create_review: CreateReviewToolInputSchema,
} as const;

export type ToolName = keyof typeof TOOL_INPUT_SCHEMAS;

export type SearchItemsToolInput = z.infer<typeof SearchItemsToolInputSchema>;
export type GetRecentToolInput = z.infer<typeof GetRecentToolInputSchema>;
export type CreateReviewToolInput = z.infer<typeof CreateReviewToolInputSchema>;

export function isToolName(name: string): name is ToolName {
  return Object.prototype.hasOwnProperty.call(TOOL_INPUT_SCHEMAS, name);
}

// ============================================================================
// JSON SCHEMA REPRESENTATIONS
// ============================================================================

/** JSON Schema type definition (simplified for docs) */
export type JSONSchema = {
  $schema?: string;
  title?: string;
  description?: string;
  type: 'object';
  properties: Record<string, JSONSchemaProperty>;
  required: string[];
  additionalProperties?: boolean;
};

export type JSONSchemaProperty = {
  type: string;
  description?: string;
  enum?: string[];
  items?: { type: string };
  additionalProperties?: boolean | { type: string };
  minimum?: number;
  maximum?: number;
  default?: unknown;
};

function objectSchema(title: string, properties: Record<string, JSONSchemaProperty>, required: string[] = []): JSONSchema {
  return {
    $schema: JSON_SCHEMA_DRAFT,
    title,
    type: 'object',
    properties,
    required,
    additionalProperties: false,
  };
}

const itemKeyProperty: JSONSchemaProperty = { type: 'string', description: 'Zotero item key, e.g. "ABCD2345"' };
const tagsProperty: JSONSchemaProperty = { type: 'array', items: { type: 'string' }, description: 'Tags to add' };

export const TOOL_JSON_SCHEMAS: Record<ToolName, JSONSchema> = {
  zotero_suggest_workflow: objectSchema(
    'SuggestWorkflowToolInput',
    { task: { type: 'string', description: 'What the user wants to do, e.g. "literature review of this paper"' } },
    ['task']
  ),
  zotero_search_items: objectSchema(
    'SearchItemsToolInput',
    {
      query: { type: 'string', description: 'Keywords to search for' },
      qmode: {
        type: 'string',
        enum: ['titleCreatorYear', 'everything'],
        default: 'titleCreatorYear',
        description: '"everything" also searches notes and indexed full text',
      },
      item_type: { type: 'string', default: '-attachment', description: 'Zotero itemType filter' },
      limit: { type: 'number', minimum: 1, maximum: 100, default: 10, description: 'Maximum results' },
      tag: { type: 'array', items: { type: 'string' }, description: 'Only items carrying all of these tags' },
    },
    ['query']
  ),
  zotero_get_recent: objectSchema('GetRecentToolInput', {
    limit: { type: 'number', minimum: 1, maximum: 100, default: 10, description: 'Number of items (1-100)' },
    sort_by: {
      type: 'string',
      enum: ['dateModified', 'dateAdded'],
      default: 'dateModified',
      description: '"dateAdded" for new imports, "dateModified" for recent reading activity',
    },
    item_type: {
      type: 'string',
      default: '-attachment -note',
      description: 'Zotero itemType filter; "" includes standalone notes',
    },
  }),
  zotero_get_collections: objectSchema('GetCollectionsToolInput', {
    limit: { type: 'number', minimum: 1, description: 'Maximum collections to list' },
  }),
  zotero_get_collection_items: objectSchema(
    'GetCollectionItemsToolInput',
    {
      collection_key: { type: 'string', description: 'Collection key from zotero_get_collections' },
      limit: { type: 'number', minimum: 1, default: 50, description: 'Maximum items' },
      item_type: { type: 'string', default: '-attachment -note', description: 'Zotero itemType filter' },
    },
    ['collection_key']
  ),
  zotero_get_tags: objectSchema('GetTagsToolInput', {
    limit: { type: 'number', minimum: 1, description: 'Maximum tags to list' },
  }),
  zotero_search_annotations: objectSchema(
    'SearchAnnotationsToolInput',
    {
      query: { type: 'string', description: 'Text to look for in highlights and comments' },
      limit: { type: 'number', minimum: 1, default: 50, description: 'Maximum annotations' },
    },
    ['query']
  ),
  zotero_get_item_metadata: objectSchema(
    'GetItemMetadataToolInput',
    {
      item_key: itemKeyProperty,
      include_bibtex: { type: 'boolean', default: false, description: 'Append a BibTeX entry' },
    },
    ['item_key']
  ),
  zotero_get_item_children: objectSchema('GetItemChildrenToolInput', { item_key: itemKeyProperty }, ['item_key']),
  zotero_get_item_fulltext: objectSchema(
    'GetItemFulltextToolInput',
    {
      item_key: itemKeyProperty,
      max_chars: { type: 'number', minimum: 1, default: 10_000, description: 'Truncate after this many characters' },
    },
    ['item_key']
  ),
  zotero_create_note: objectSchema(
    'CreateNoteToolInput',
    {
      content: { type: 'string', description: 'Note text; plain text is converted to HTML' },
      parent_key: { type: 'string', description: 'Attach the note to this item' },
      tags: tagsProperty,
    },
    ['content']
  ),
  zotero_create_review: objectSchema(
    'CreateReviewToolInput',
    {
      item_key: itemKeyProperty,
      analysis: {
        type: 'object',
        additionalProperties: { type: 'string' },
        description: 'Analysis fields named as the workflow prompt specifies, e.g. objective, methods, gaps',
      },
      template_name: { type: 'string', default: 'literature_review', description: 'Review template to render' },
      tags: tagsProperty,
    },
    ['item_key', 'analysis']
  ),
};

// ============================================================================
// VALIDATION UTILITIES
// ============================================================================

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  data?: unknown;
}

export interface ValidationError {
  path: string;
  message: string;
  code: string;
}

/**
 * Validate tool input against schema
 */
export function validateToolInput(toolName: string, input: unknown): ValidationResult {
  if (!isToolName(toolName)) {
    return {
      valid: false,
      errors: [{ path: '', message: `Unknown tool: ${toolName}`, code: 'unknown_tool' }],
    };
  }

  const result = TOOL_INPUT_SCHEMAS[toolName].safeParse(input ?? {});
  if (result.success) {
    return { valid: true, errors: [], data: result.data };
  }

  const errors: ValidationError[] = result.error.errors.map((err) => ({
    path: err.path.join('.') || '/',
    message: err.message,
    code: err.code,
  }));
  return { valid: false, errors };
}

export function listToolSchemas(): ToolName[] {
  return Object.keys(TOOL_JSON_SCHEMAS).filter(isToolName);
}
