/**
 * Normalize plain-text documents for chunking
 */
export class TextNormalizer {
  /**
   * Collapse newlines and whitespace runs to single spaces
   */
  normalize(text: string): string {
    return text
      .replace(/\n+/g, ' ')
      .replace(/\s+/g, ' ')
      .trim();
  }

  /**
   * Drop "== Heading ==" lines from plain-text wiki extracts
   */
  stripSectionHeadings(text: string): string {
    return text.replace(/^[ \t]*={2,}[^=\n]*={2,}[ \t]*$/gm, '');
  }
}
