/**
 * Citation Formatter
 *
 * Terminal and JSON rendering of the sources behind an answer.
 *
 * @example
 * ```typescript
 * formatCitations([{ title: 'MCP - Lesson 1', url: 'https://example.com/1' }]);
 * // "[1] MCP - Lesson 1\n    https://example.com/1"
 * ```
 */

import type { SourceCitation } from './tools/types.js';

/**
 * JSON output format for a single citation.
 */
export interface CitationJSON {
  /** 1-based index, matching the "[n]" in text output */
  index: number;
  title: string;
  url: string | null;
}

/**
 * Drop repeated title + URL pairs, keeping first occurrences.
 */
export function dedupeCitations(citations: SourceCitation[]): SourceCitation[] {
  const seen = new Set<string>();
  return citations.filter((citation) => {
    const key = `${citation.title}\u0000${citation.url ?? ''}`;
    if (seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });
}

/**
 * Numbered lines, with the URL indented beneath its title when present.
 * Returns "" for an empty list.
 */
export function formatCitations(citations: SourceCitation[]): string {
  const lines: string[] = [];
  dedupeCitations(citations).forEach((citation, i) => {
    lines.push(`[${i + 1}] ${citation.title}`);
    if (citation.url) {
      lines.push(`    ${citation.url}`);
    }
  });

  return lines.join('\n');
}

export function citationsToJSON(citations: SourceCitation[]): CitationJSON[] {
  return dedupeCitations(citations).map((citation, i) => ({
    index: i + 1,
    title: citation.title,
    url: citation.url,
  }));
}
