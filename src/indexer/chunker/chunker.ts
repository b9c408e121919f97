/**
 * Transcript Chunker
 *
 * Splits lesson transcripts into sentence-aligned chunks of at most
 * `chunkSize` characters. A sentence longer than that becomes a chunk of
 * its own. Trailing sentences that fit within `chunkOverlap` characters
 * are repeated at the start of the next chunk.
 */

import type { ChunkInsertInput } from '../../database/index.js';
import type { ChunkingOptions, CourseFile } from '../types.js';

// Break after . ! or ? when the next sentence starts with a capital letter
const SENTENCE_BOUNDARY = /(?<=[.!?])\s+(?=[A-Z])/;

export function splitSentences(text: string): string[] {
  const normalized = text.replace(/\s+/g, ' ').trim();
  if (normalized === '') {
    return [];
  }
  return normalized
    .split(SENTENCE_BOUNDARY)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
}

/**
 * Number of sentences at the end of `chunk` that fit in `overlap` characters,
 * counting the joining spaces.
 */
function overlapCount(chunk: string[], overlap: number): number {
  let size = 0;
  let count = 0;
  for (let k = chunk.length - 1; k >= 0; k--) {
    const length = chunk[k].length + (k < chunk.length - 1 ? 1 : 0);
    if (size + length > overlap) {
      break;
    }
    size += length;
    count++;
  }
  return count;
}

export function chunkText(text: string, options: ChunkingOptions): string[] {
  const sentences = splitSentences(text);
  const chunks: string[] = [];

  let start = 0;
  while (start < sentences.length) {
    const current: string[] = [];
    let size = 0;

    for (let j = start; j < sentences.length; j++) {
      const length = sentences[j].length + (current.length > 0 ? 1 : 0);
      if (current.length > 0 && size + length > options.chunkSize) {
        break;
      }
      current.push(sentences[j]);
      size += length;
    }

    chunks.push(current.join(' '));

    const carried = options.chunkOverlap > 0 ? overlapCount(current, options.chunkOverlap) : 0;
    // Always advance, even when the whole chunk fits in the overlap
    start = Math.max(start + current.length - carried, start + 1);
  }

  return chunks;
}

/**
 * Chunk every lesson of a course. Chunk indexes run across the whole
 * course; the first chunk of each lesson names its lesson number.
 */
export function chunkCourse(course: CourseFile, options: ChunkingOptions): ChunkInsertInput[] {
  const result: ChunkInsertInput[] = [];

  for (const lesson of course.lessons) {
    chunkText(lesson.content, options).forEach((chunk, i) => {
      result.push({
        lessonNumber: lesson.lessonNumber,
        chunkIndex: result.length,
        content: i === 0 ? `Lesson ${lesson.lessonNumber} content: ${chunk}` : chunk,
      });
    });
  }

  return result;
}
