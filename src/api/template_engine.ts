/**
 * @fileoverview `${name}` substitution for review note templates
 *
 * Metadata comes from the Zotero record; analysis comes from the assistant
 * and uses whatever field names it chose, so analysis keys are first
 * collapsed onto the template's names through the alias table in
 * data/field_aliases.json. On a name clash the metadata value wins.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { ZoteroRecord } from '../zotero/types.js';
import { extractYear, formatCreators } from './metadata_formatter.js';

const PLACEHOLDER_PATTERN = /\$\{(\w+)\}/g;

const AliasTableSchema = z.record(z.string());

function loadFieldAliases(): ReadonlyMap<string, string> {
  const moduleDir = path.dirname(fileURLToPath(import.meta.url));
  const tablePath = path.resolve(moduleDir, '..', '..', 'data', 'field_aliases.json');
  const parsed = AliasTableSchema.parse(JSON.parse(fs.readFileSync(tablePath, 'utf8')));
  return new Map(Object.entries(parsed));
}

/** Alternate analysis field name (lower case) to the template's name */
export const FIELD_ALIASES: ReadonlyMap<string, string> = loadFieldAliases();

export type TemplateMetadata = {
  title: string;
  authors: string;
  year: string;
  publicationTitle: string;
  DOI: string;
  abstractNote: string;
  tags: string;
  itemLink: string;
  itemKey: string;
};

/**
 * Keys are matched case-insensitively against the alias table; keys without
 * an alias are kept as given. When two keys collapse onto the same name the
 * first one seen wins.
 */
export function normalizeAnalysisFields(analysis: Readonly<Record<string, string>>): Record<string, string> {
  const normalized = new Map<string, string>();
  for (const [key, value] of Object.entries(analysis)) {
    const canonical = FIELD_ALIASES.get(key.toLowerCase()) ?? key;
    if (!normalized.has(canonical)) {
      normalized.set(canonical, value);
    }
  }
  return Object.fromEntries(normalized);
}

/**
 * Unknown placeholders render as the empty string; this never throws.
 */
export function renderTemplate(
  template: string,
  metadata: Readonly<Record<string, string>>,
  analysis: Readonly<Record<string, string>>
): string {
  const fields = normalizeAnalysisFields(analysis);
  const variables = new Map<string, string>(Object.entries(fields));
  for (const [key, value] of Object.entries(metadata)) {
    variables.set(key, value);
  }
  return template.replace(PLACEHOLDER_PATTERN, (_match, name: string) => variables.get(name) ?? '');
}

export function buildTemplateMetadata(record: ZoteroRecord): TemplateMetadata {
  const work = record.kind === 'work' ? record : null;
  return {
    title: record.title ?? 'Untitled',
    authors: formatCreators(record.creators),
    year: extractYear(record.date),
    publicationTitle: work?.publicationTitle ?? '',
    DOI: work?.DOI ?? '',
    abstractNote: work?.abstractNote ?? '',
    tags: record.tags.map((tag) => tag.tag).join(', '),
    itemLink: `zotero://select/library/items/${record.key}`,
    itemKey: record.key,
  };
}
