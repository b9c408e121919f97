export { chunkText, chunkCourse, splitSentences } from './chunker.js';
