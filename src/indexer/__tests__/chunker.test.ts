/**
 * Chunker Tests
 */

import { describe, it, expect } from 'vitest';
import { chunkText, chunkCourse, splitSentences } from '../chunker/index.js';
import { CourseFileSchema } from '../types.js';

describe('splitSentences', () => {
  it('splits before capitalised sentences and normalises whitespace', () => {
    expect(splitSentences('First one.  Second   one! third?\nFourth.')).toEqual([
      'First one.',
      'Second one! third?',
      'Fourth.',
    ]);
  });

  it('returns nothing for blank text', () => {
    expect(splitSentences('  \n ')).toEqual([]);
  });
});

describe('chunkText', () => {
  it('packs sentences up to the chunk size', () => {
    expect(chunkText('One. Two. Three.', { chunkSize: 10, chunkOverlap: 0 })).toEqual([
      'One. Two.',
      'Three.',
    ]);
  });

  it('carries trailing sentences that fit in the overlap', () => {
    expect(
      chunkText('Hi there. Ok. Next one here.', { chunkSize: 20, chunkOverlap: 6 })
    ).toEqual(['Hi there. Ok.', 'Ok. Next one here.']);
  });

  it('keeps an oversized sentence whole', () => {
    expect(chunkText('This is long.', { chunkSize: 5, chunkOverlap: 0 })).toEqual(['This is long.']);
  });

  it('returns no chunks for empty text', () => {
    expect(chunkText('', { chunkSize: 800, chunkOverlap: 100 })).toEqual([]);
  });
});

describe('chunkCourse', () => {
  it('prefixes the first chunk of each lesson and numbers chunks across the course', () => {
    const course = CourseFileSchema.parse({
      title: 'Course',
      instructor: 'Someone',
      lessons: [
        { lessonNumber: 0, lessonTitle: 'Intro', content: 'Intro sentence. Another one.' },
        { lessonNumber: 1, lessonTitle: 'Empty' },
        { lessonNumber: 2, lessonTitle: 'End', content: 'Last.' },
      ],
    });

    expect(chunkCourse(course, { chunkSize: 800, chunkOverlap: 100 })).toEqual([
      { lessonNumber: 0, chunkIndex: 0, content: 'Lesson 0 content: Intro sentence. Another one.' },
      { lessonNumber: 2, chunkIndex: 1, content: 'Lesson 2 content: Last.' },
    ]);
  });

  it('leaves later chunks of a lesson unprefixed', () => {
    const course = CourseFileSchema.parse({
      title: 'Course',
      lessons: [{ lessonNumber: 3, lessonTitle: 'Long', content: 'One. Two. Three.' }],
    });

    expect(
      chunkCourse(course, { chunkSize: 10, chunkOverlap: 0 }).map((chunk) => chunk.content)
    ).toEqual(['Lesson 3 content: One. Two.', 'Three.']);
  });
});

describe('CourseFileSchema', () => {
  it('fills defaults', () => {
    expect(CourseFileSchema.parse({ title: 'Only a title' })).toEqual({
      title: 'Only a title',
      instructor: 'Unknown',
      lessons: [],
    });
  });

  it('rejects duplicate lesson numbers', () => {
    const result = CourseFileSchema.safeParse({
      title: 'Dup',
      lessons: [
        { lessonNumber: 1, lessonTitle: 'A' },
        { lessonNumber: 1, lessonTitle: 'B' },
      ],
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe('Duplicate lesson number 1');
      expect(result.error.issues[0]?.path).toEqual(['lessons', 1, 'lessonNumber']);
    }
  });
});
