/**
 * SearchResults constructors
 *
 * The only way results are built, so the three parallel lists can never
 * drift apart.
 */

import type { ChunkMetadata, SearchResults } from './types.js';

/**
 * Build results from parallel lists.
 *
 * @throws RangeError when the lists differ in length
 */
export function createSearchResults(
  documents: readonly string[],
  metadata: readonly ChunkMetadata[],
  distances: readonly number[]
): SearchResults {
  if (documents.length !== metadata.length || documents.length !== distances.length) {
    throw new RangeError(
      `Search results length mismatch: ${documents.length} documents, ` +
        `${metadata.length} metadata, ${distances.length} distances`
    );
  }

  return {
    documents: [...documents],
    metadata: [...metadata],
    distances: [...distances],
    error: null,
  };
}

/**
 * Results with no documents, optionally explaining why.
 */
export function emptySearchResults(error?: string): SearchResults {
  return { documents: [], metadata: [], distances: [], error: error ?? null };
}

export function isEmptyResults(results: SearchResults): boolean {
  return results.documents.length === 0;
}
