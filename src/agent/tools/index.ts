/**
 * Agent Tools
 *
 * Tools the model can call while answering a course question.
 */

export type {
  SourceCitation,
  Tool,
  ToolDefinition,
  ToolInputSchema,
  ToolParameter,
  ToolParameterType,
} from './types.js';
export { ValidatedTool } from './base-tool.js';
export { CourseSearchTool } from './search-tool.js';
export { CourseOutlineTool, renderOutline, outlineCitations } from './outline-tool.js';
export { ToolRegistry } from './registry.js';
