const HTML_TAG_PATTERN = /<.*?>/g;

// A paired or self-closing structural tag; a bare "<p>" mentioned in prose does not count.
const HTML_STRUCTURE_PATTERN = /<(p|div|span|br|h[1-6]|ul|ol|li|a|strong|em|b|i)(?:\s[^>]*)?>.*?<\/\1>|<br\s*\/?>/is;

export function cleanHtml(html: string): string {
  return html.replace(HTML_TAG_PATTERN, '');
}

/**
 * Plain text becomes Zotero note HTML: blank lines separate paragraphs and
 * single newlines become `<br/>`. Content that already has HTML structure
 * is returned unchanged.
 */
export function textToHtml(content: string): string {
  if (HTML_STRUCTURE_PATTERN.test(content)) {
    return content;
  }
  return content
    .split('\n\n')
    .map((paragraph) => `<p>${paragraph.replace(/\n/g, '<br/>')}</p>`)
    .join('');
}

export function truncateText(text: string, maxChars: number): { text: string; omitted: number } {
  if (text.length <= maxChars) {
    return { text, omitted: 0 };
  }
  return { text: text.slice(0, maxChars), omitted: text.length - maxChars };
}
