/**
 * @fileoverview Text extraction from PDF files in Zotero's storage directory
 *
 * Used when Zotero's own full-text index has nothing for an attachment.
 */

import { extractText } from 'unpdf';

/**
 * Text of every page that has any, pages joined by a newline. A PDF without
 * a text layer (a scan that was never OCR'd) yields the empty string.
 *
 * @throws when `data` is not a readable PDF
 */
export async function extractPdfText(data: Uint8Array): Promise<string> {
  const { text } = await extractText(data);
  const pages: string[] = typeof text === 'string' ? [text] : text;
  return pages
    .map((page) => page.trim())
    .filter((page) => page.length > 0)
    .join('\n');
}
