import { describe, expect, it } from 'vitest';
import { buildPdf } from '../../__tests__/fixtures/zotero_fixtures.js';
import { extractPdfText } from '../pdf_text.js';

describe('extractPdfText', () => {
  it('joins the pages that carry text', async () => {
    await expect(extractPdfText(new Uint8Array(buildPdf(['Abstract', 'Methods'])))).resolves.toBe('Abstract\nMethods');
  });

  it('returns an empty string for pages without a text layer', async () => {
    await expect(extractPdfText(new Uint8Array(buildPdf(['', ''])))).resolves.toBe('');
  });

  it('rejects data that is not a PDF', async () => {
    await expect(extractPdfText(new TextEncoder().encode('plain text'))).rejects.toThrow();
  });
});
