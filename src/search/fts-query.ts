/**
 * FTS5 query building
 *
 * User text can contain FTS5 syntax (quotes, NEAR, column filters), so it
 * is never passed to MATCH directly. Each word is quoted and the words are
 * OR-ed; bm25 then ranks chunks that contain more of them higher.
 */

const WORD_PATTERN = /[\p{L}\p{N}]+/gu;

/**
 * Split free text into FTS5-safe terms.
 */
export function tokenize(text: string): string[] {
  return text.match(WORD_PATTERN) ?? [];
}

/**
 * Turn free text into a MATCH expression, or null when it has no words.
 *
 * @example
 * toMatchExpression('what is "MCP"?') // '"what" OR "is" OR "MCP"'
 */
export function toMatchExpression(text: string): string | null {
  const terms = tokenize(text);
  if (terms.length === 0) {
    return null;
  }
  return terms.map((term) => `"${term}"`).join(' OR ');
}
