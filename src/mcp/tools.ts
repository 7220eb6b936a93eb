/**
 * @fileoverview MCP tool handlers: validated input in, markdown text out
 *
 * Empty outcomes are ordinary answers ("No item found ..."); failed
 * outcomes are thrown so the server can turn them into error results
 * carrying the remediation hint.
 */

import type { ZoteroMcpConfig } from '../config/zotero_config.js';
import { generateCitation } from '../api/citation_generator.js';
import { LibraryView, createReaderFactory, type ChildrenView } from '../api/library_view.js';
import { formatCreators, formatRecordSummary } from '../api/metadata_formatter.js';
import { PromptLibrary, suggestWorkflow } from '../api/prompt_library.js';
import { RecordClient } from '../api/record_client.js';
import { cleanHtml } from '../api/text_utils.js';
import type { SourceOutcome } from '../core/outcome.js';
import type { Annotation, Collection, ZoteroRecord } from '../zotero/types.js';
import {
  CreateNoteToolInputSchema,
  CreateReviewToolInputSchema,
  GetCollectionItemsToolInputSchema,
  GetCollectionsToolInputSchema,
  GetItemChildrenToolInputSchema,
  GetItemFulltextToolInputSchema,
  GetItemMetadataToolInputSchema,
  GetRecentToolInputSchema,
  GetTagsToolInputSchema,
  SearchAnnotationsToolInputSchema,
  SearchItemsToolInputSchema,
  SuggestWorkflowToolInputSchema,
  type ToolName,
} from './schema.js';

export interface ZoteroToolContext {
  client: RecordClient;
  view: LibraryView;
  prompts: PromptLibrary;
}

export function createZoteroToolContext(config: ZoteroMcpConfig): ZoteroToolContext {
  const client = new RecordClient(config);
  const prompts = new PromptLibrary(config.promptsDir);
  const view = new LibraryView({ client, prompts, openReader: createReaderFactory(config) });
  return { client, view, prompts };
}

export interface ToolDefinition {
  description: string;
  /** Read-only tools never write through the connector */
  readOnly: boolean;
  run(context: ZoteroToolContext, args: unknown): Promise<string>;
}

const MAX_CHILD_ANNOTATIONS = 50;
const NOTE_PREVIEW_CHARS = 200;

// ============================================================================
// RENDERING HELPERS
// ============================================================================

/** The value, or the empty outcome's reason; failures are thrown. */
function unwrap<T>(outcome: SourceOutcome<T>): { value: T } | { reason: string } {
  if (outcome.status === 'failed') {
    throw outcome.error;
  }
  return outcome.status === 'ok' ? { value: outcome.value } : { reason: outcome.reason };
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

function formatTagLine(record: ZoteroRecord): string | null {
  if (record.tags.length === 0) return null;
  return `**Tags:** ${record.tags.map((tag) => `\`${tag.tag}\``).join(' ')}`;
}

export function formatAnnotationLines(annotation: Annotation): string[] {
  const page = annotation.pageLabel ? `P.${annotation.pageLabel}` : '';
  const color = annotation.color ? `/${annotation.color}` : '';
  const type = annotation.type ? capitalize(annotation.type) : 'Highlight';
  const lines: string[] = [];
  if (annotation.text) {
    lines.push(`[${page}] (${type}${color}) "${annotation.text}"`);
  }
  if (annotation.comment) {
    lines.push(`  -> Comment: ${annotation.comment}`);
  }
  lines.push('');
  return lines;
}

/**
 * Indented collection tree. A collection whose parent is not in the list is
 * shown as a root. Collections whose parents form a cycle are never reached
 * from a root; each such group is shown from its lowest key, with the cycle
 * cut where it returns to a collection already listed.
 */
export function formatCollectionTree(collections: readonly Collection[]): string {
  const byKey = new Map(collections.map((collection) => [collection.key, collection]));
  const childrenOf = new Map<string | null, string[]>();
  for (const collection of collections) {
    const parent =
      collection.parentCollection && byKey.has(collection.parentCollection) ? collection.parentCollection : null;
    const siblings = childrenOf.get(parent) ?? [];
    siblings.push(collection.key);
    childrenOf.set(parent, siblings);
  }

  const output = ['# Zotero Collections', ''];
  const visited = new Set<string>();
  const visit = (key: string, level: number): void => {
    const collection = byKey.get(key);
    if (!collection || visited.has(key)) return;
    visited.add(key);
    output.push(`${'  '.repeat(level)}- **${collection.name}** (Key: ${key})`);
    for (const childKey of [...(childrenOf.get(key) ?? [])].sort()) {
      visit(childKey, level + 1);
    }
  };
  for (const key of [...(childrenOf.get(null) ?? [])].sort()) {
    visit(key, 0);
  }
  for (const key of [...byKey.keys()].sort()) {
    visit(key, 0);
  }
  return output.join('\n');
}

export function formatChildrenView(view: ChildrenView): string {
  const output = [`# Children of: ${view.parentTitle}`, ''];

  if (view.childrenWarning) {
    output.push(`Warning: ${view.childrenWarning}`, '');
  }

  if (view.attachments.length > 0) {
    output.push('## Attachments', 'Use `zotero_get_item_fulltext` with the item key for full text.', '');
    for (const attachment of view.attachments) {
      output.push(`- **${attachment.title ?? 'Untitled'}**`);
      output.push(`  - Key: \`${attachment.key}\``);
      output.push(`  - Type: ${attachment.contentType ?? 'Unknown'}`);
      if (attachment.filename) {
        output.push(`  - File: ${attachment.filename}`);
      }
      output.push('');
    }
  }

  if (view.notes.length > 0) {
    output.push('## Notes', '');
    for (const note of view.notes) {
      const text = cleanHtml(note.note ?? '');
      const preview = text.length > NOTE_PREVIEW_CHARS ? `${text.slice(0, NOTE_PREVIEW_CHARS)}...` : text;
      output.push(`- **Note** (Key: \`${note.key}\`)`);
      output.push(`  - Preview: ${preview}`);
      output.push('');
    }
  }

  if (view.annotations.length > 0) {
    output.push('## PDF Annotations');
    if (view.annotations.length > MAX_CHILD_ANNOTATIONS) {
      output.push(`Showing ${MAX_CHILD_ANNOTATIONS} of ${view.annotations.length} annotations.`);
    }
    output.push('');

    let currentAttachment: string | null | undefined;
    for (const annotation of view.annotations.slice(0, MAX_CHILD_ANNOTATIONS)) {
      if (annotation.attachmentName !== currentAttachment) {
        currentAttachment = annotation.attachmentName;
        output.push(`### ${currentAttachment ?? 'PDF'}`, '');
      }
      output.push(...formatAnnotationLines(annotation));
    }
  } else if (view.annotationWarning) {
    output.push('## PDF Annotations', `Warning: ${view.annotationWarning}`, '');
  }

  return output.join('\n');
}

// ============================================================================
// TOOLS
// ============================================================================

export const TOOL_DEFINITIONS: Record<ToolName, ToolDefinition> = {
  zotero_suggest_workflow: {
    description:
      'Get workflow instructions for a research task. Call this FIRST when the user asks for a literature review, ' +
      'comparative analysis, or bibliography export. Returns instructions to follow step by step.',
    readOnly: true,
    async run(context, args) {
      const input = SuggestWorkflowToolInputSchema.parse(args);
      return suggestWorkflow(context.prompts, input.task);
    },
  },

  zotero_search_items: {
    description:
      'Search the reference library for papers, articles, books, or notes by keyword. ' +
      "Default searches title/author/year; use qmode='everything' to search full text and note contents. " +
      'Returns item keys for zotero_get_item_metadata (details) or zotero_get_item_children (highlights/notes).',
    readOnly: true,
    async run(context, args) {
      const input = SearchItemsToolInputSchema.parse(args);
      const result = unwrap(
        await context.client.searchItems({
          query: input.query,
          qmode: input.qmode,
          itemType: input.item_type,
          limit: input.limit,
          tags: input.tag,
        })
      );
      if ('reason' in result) return result.reason;

      const output = [`# Search Results for '${input.query}'`, ''];
      result.value.forEach((record, index) => {
        output.push(`## ${index + 1}. ${record.title ?? 'Untitled'}`);
        output.push(`**Key:** ${record.key}`);
        output.push(`**Type:** ${record.itemType}`);
        output.push(`**Date:** ${record.date ?? 'No date'}`);
        output.push(`**Authors:** ${formatCreators(record.creators)}`);
        const tagLine = formatTagLine(record);
        if (tagLine) output.push(tagLine);
        output.push('');
      });
      return output.join('\n');
    },
  },

  zotero_get_recent: {
    description:
      'Get recently read, modified, or imported papers. Default shows papers only; use item_type="" to include ' +
      'standalone notes. Use sort_by="dateAdded" for new imports, "dateModified" for recent reading activity.',
    readOnly: true,
    async run(context, args) {
      const input = GetRecentToolInputSchema.parse(args);
      const label = input.sort_by === 'dateModified' ? 'Modified' : 'Added';
      const result = unwrap(
        await context.client.getRecentItems({ limit: input.limit, sort: input.sort_by, itemType: input.item_type })
      );
      if ('reason' in result) return result.reason;

      const output = [`# ${result.value.length} Recently ${label} Items`, ''];
      result.value.forEach((record, index) => {
        output.push(`## ${index + 1}. ${record.title ?? 'Untitled'}`);
        output.push(`**Key:** ${record.key}`);
        output.push(`**Type:** ${record.itemType}`);
        output.push(`**${label}:** ${record[input.sort_by] ?? 'Unknown'}`);
        output.push(`**Authors:** ${formatCreators(record.creators)}`);
        output.push('');
      });
      return output.join('\n');
    },
  },

  zotero_get_collections: {
    description:
      'List all collections (folders) in the library with their hierarchy. ' +
      'Use a collection key with zotero_get_collection_items to browse its papers.',
    readOnly: true,
    async run(context, args) {
      const input = GetCollectionsToolInputSchema.parse(args);
      const result = unwrap(await context.client.listCollections(input.limit));
      if ('reason' in result) return result.reason;
      return formatCollectionTree(result.value);
    },
  },

  zotero_get_collection_items: {
    description:
      'List the papers in one collection. Default shows papers only; use item_type="" to include notes. ' +
      'Returns item keys for zotero_get_item_metadata or zotero_get_item_children.',
    readOnly: true,
    async run(context, args) {
      const input = GetCollectionItemsToolInputSchema.parse(args);
      const collection = await context.client.getCollection(input.collection_key);
      const name = collection.status === 'ok' ? collection.value.name : `Collection ${input.collection_key}`;

      const items = await context.client.listCollectionItems(input.collection_key, {
        limit: input.limit,
        itemType: input.item_type,
      });
      const result = unwrap(items);
      if ('reason' in result) return `No items found in collection: ${name}`;

      const output = [`# Items in Collection: ${name}`, ''];
      result.value.forEach((record, index) => {
        output.push(`## ${index + 1}. ${record.title ?? 'Untitled'}`);
        output.push(`**Key:** ${record.key}`);
        output.push(`**Type:** ${record.itemType}`);
        output.push(`**Authors:** ${formatCreators(record.creators)}`);
        output.push('');
      });
      return output.join('\n');
    },
  },

  zotero_get_tags: {
    description: 'List the tags used in the library with how many items carry each. Use a tag with zotero_search_items.',
    readOnly: true,
    async run(context, args) {
      const input = GetTagsToolInputSchema.parse(args);
      const result = unwrap(await context.client.listTags(input.limit));
      if ('reason' in result) return result.reason;

      const output = ['# Zotero Tags', ''];
      for (const tag of result.value) {
        output.push(tag.numItems === undefined ? `- \`${tag.tag}\`` : `- \`${tag.tag}\` (${tag.numItems} items)`);
      }
      return output.join('\n');
    },
  },

  zotero_search_annotations: {
    description:
      'Search all PDF highlights and comments across the library by keyword. Returns highlighted text, ' +
      'comments, page numbers and the parent paper, for cross-paper synthesis of reading notes.',
    readOnly: true,
    async run(context, args) {
      const input = SearchAnnotationsToolInputSchema.parse(args);
      const result = unwrap(await context.view.searchAnnotations(input.query, input.limit));
      if ('reason' in result) return result.reason;

      const output = [`# Annotations matching '${input.query}'`, ''];
      if (result.value.hasMore) {
        output.push(`Showing first ${result.value.limit} results. Prioritize the most relevant ones.`, '');
      }

      let currentParent: string | null | undefined;
      for (const annotation of result.value.annotations) {
        if (annotation.parentKey !== currentParent) {
          currentParent = annotation.parentKey;
          output.push(`## ${annotation.parentTitle || 'Untitled'}`);
          output.push(`**Key:** \`${annotation.parentKey ?? ''}\``);
          output.push('');
        }
        output.push(...formatAnnotationLines(annotation));
      }
      return output.join('\n');
    },
  },

  zotero_get_item_metadata: {
    description:
      'Get complete bibliographic metadata for a paper: title, authors, abstract, venue, DOI, date and tags. ' +
      'Set include_bibtex for a BibTeX entry. For annotations use zotero_get_item_children.',
    readOnly: true,
    async run(context, args) {
      const input = GetItemMetadataToolInputSchema.parse(args);
      const result = unwrap(await context.client.getItem(input.item_key));
      if ('reason' in result) return result.reason;

      let text = formatRecordSummary(result.value, { includeAbstract: true });
      if (input.include_bibtex) {
        text += `\n\n## BibTeX\n\`\`\`bibtex\n${generateCitation(result.value, { slim: true })}\n\`\`\``;
      }
      return text;
    },
  },

  zotero_get_item_children: {
    description:
      'Get the reading annotations and notes for a paper: PDF highlights with colors, margin comments, ' +
      'attachments and notes.',
    readOnly: true,
    async run(context, args) {
      const input = GetItemChildrenToolInputSchema.parse(args);
      const result = unwrap(await context.view.getChildrenView(input.item_key));
      if ('reason' in result) return result.reason;
      return formatChildrenView(result.value);
    },
  },

  zotero_get_item_fulltext: {
    description:
      "Read the full text of a paper's best attachment (PDF first, then HTML). " +
      'Long papers are truncated; ask about specific sections if needed.',
    readOnly: true,
    async run(context, args) {
      const input = GetItemFulltextToolInputSchema.parse(args);
      const result = unwrap(await context.view.getFulltext(input.item_key, input.max_chars));
      if ('reason' in result) return result.reason;

      const { content, omittedChars } = result.value;
      if (omittedChars === 0) return content;
      return (
        `${content}\n\n[... truncated, ${omittedChars} more characters ...]\n` +
        'Tip: Ask about specific sections for detailed content.'
      );
    },
  },

  zotero_create_note: {
    description:
      'Create a NEW note in Zotero, such as a paper summary or research memo. Attach it to a paper with ' +
      'parent_key. Plain text is converted to HTML. Creates new notes only; check existing notes first.',
    readOnly: false,
    async run(context, args) {
      const input = CreateNoteToolInputSchema.parse(args);
      const outcome = await context.view.createNote({
        content: input.content,
        parentKey: input.parent_key,
        tags: input.tags,
      });
      if (outcome.status === 'failed') throw outcome.error;

      const { parentKey, parentTitle } = outcome.value;
      if (!parentKey) return 'Standalone note created successfully';
      return parentTitle === undefined ? `Note created for item ${parentKey}` : `Note created for "${parentTitle}"`;
    },
  },

  zotero_create_review: {
    description:
      'Create a templated review note. Use ONLY with the literature_review or comparative_review workflows, ' +
      'which define the analysis field names. Title, authors, year, DOI and abstract are filled in from Zotero.',
    readOnly: false,
    async run(context, args) {
      const input = CreateReviewToolInputSchema.parse(args);
      const result = unwrap(
        await context.view.createReview({
          itemKey: input.item_key,
          analysis: input.analysis,
          templateName: input.template_name,
          tags: input.tags,
        })
      );
      if ('reason' in result) return `Error: ${result.reason}`;
      return `Review note created for "${result.value.title}"`;
    },
  },
};
