/**
 * @fileoverview Markdown summaries of bibliographic records
 */

import type { Creator, ZoteroRecord } from '../zotero/types.js';

export const NO_AUTHORS_PLACEHOLDER = 'No authors listed';
export const NO_YEAR = 'nodate';

const YEAR_PATTERN = /\b(19|20)\d{2}\b/;

/**
 * `Last, First` when both name parts are present, the single `name`
 * otherwise; creators with neither are skipped.
 */
export function formatCreatorName(creator: Creator): string | null {
  if (creator.firstName !== undefined && creator.lastName !== undefined) {
    return `${creator.lastName}, ${creator.firstName}`;
  }
  if (creator.name !== undefined) {
    return creator.name;
  }
  return null;
}

export function formatCreators(creators: readonly Creator[]): string {
  const names: string[] = [];
  for (const creator of creators) {
    const name = formatCreatorName(creator);
    if (name !== null) {
      names.push(name);
    }
  }
  return names.length > 0 ? names.join('; ') : NO_AUTHORS_PLACEHOLDER;
}

/**
 * First standalone year between 1900 and 2099, whatever the date format
 * ("2024-08-01", "March 2024", "10 月 22, 2021").
 */
export function extractYear(date: string | undefined): string {
  if (!date) {
    return NO_YEAR;
  }
  const match = YEAR_PATTERN.exec(date);
  return match ? match[0] : NO_YEAR;
}

export interface RecordSummaryOptions {
  includeAbstract?: boolean;
}

function formatVenue(record: ZoteroRecord): string | null {
  if (record.kind !== 'work') {
    return null;
  }
  if (record.itemType === 'journalArticle' && record.publicationTitle) {
    let info = `**Journal:** ${record.publicationTitle}`;
    if (record.volume) info += `, Vol. ${record.volume}`;
    if (record.issue) info += `, No. ${record.issue}`;
    if (record.pages) info += `, pp. ${record.pages}`;
    return info;
  }
  if (record.itemType === 'book' && record.publisher) {
    let info = `**Publisher:** ${record.publisher}`;
    if (record.place) info += `, ${record.place}`;
    return info;
  }
  return null;
}

export function formatRecordSummary(record: ZoteroRecord, options: RecordSummaryOptions = {}): string {
  const includeAbstract = options.includeAbstract ?? true;
  const lines = [`# ${record.title ?? 'Untitled'}`, `**Type:** ${record.itemType}`, `**Key:** ${record.key}`];

  if (record.date) {
    lines.push(`**Date:** ${record.date}`);
  }
  if (record.creators.length > 0) {
    lines.push(`**Authors:** ${formatCreators(record.creators)}`);
  }

  const venue = formatVenue(record);
  if (venue) {
    lines.push(venue);
  }

  if (record.kind === 'work') {
    if (record.DOI) lines.push(`**DOI:** ${record.DOI}`);
    if (record.url) lines.push(`**URL:** ${record.url}`);
  } else if (record.kind === 'attachment' && record.url) {
    lines.push(`**URL:** ${record.url}`);
  }

  if (record.tags.length > 0) {
    lines.push(`**Tags:** ${record.tags.map((tag) => `\`${tag.tag}\``).join(' ')}`);
  }

  if (includeAbstract && record.kind === 'work' && record.abstractNote) {
    lines.push('', '## Abstract', record.abstractNote);
  }

  if (record.collections.length > 0) {
    lines.push(`**Collections:** ${record.collections.length}`);
  }

  const childCount = record.meta.numChildren ?? 0;
  if (childCount > 0) {
    lines.push(`**Attachments/Notes:** ${childCount}`);
  }

  return lines.join('\n\n');
}
