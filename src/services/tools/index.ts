// Tool System Initialization
// Builds a registry with the course tools; the HTTP layer creates one per request

import { env } from '../../env.js';
import type { CourseContentStore } from '../course-store.js';
import { ToolRegistry } from './registry.js';
import { CourseSearchTool } from './course-search-tool.js';
import { CourseOutlineTool } from './course-outline-tool.js';

export { ToolRegistry } from './registry.js';
export { CourseSearchTool, COURSE_SEARCH_TOOL_NAME } from './course-search-tool.js';
export { CourseOutlineTool, COURSE_OUTLINE_TOOL_NAME } from './course-outline-tool.js';
export type { Tool, ToolDefinition, ToolOutput, ToolOutcome, ToolParameter, CallHistoryEntry } from './types.js';

export function createToolRegistry(
  store: CourseContentStore,
  options: { enabled?: boolean } = {}
): ToolRegistry {
  const registry = new ToolRegistry();

  if (options.enabled ?? env.TOOLS_ENABLED) {
    registry.register(new CourseSearchTool(store));
    registry.register(new CourseOutlineTool(store));
  }

  return registry;
}
