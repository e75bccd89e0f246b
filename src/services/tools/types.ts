// Tool system types and interfaces
// A tool describes itself with a parameter list and returns text plus the provenance of that text

export interface ToolParameter {
  name: string;
  type: 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object';
  description: string;
  required: boolean;
  enum?: string[];
  default?: string | number | boolean;
}

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: ToolParameter[];
}

export interface ToolOutput {
  content: string;
  // Plain-text citations for the hits behind `content`, e.g. "Course X - Lesson 2"
  sources?: string[];
  isError?: boolean;
}

export interface Tool {
  definition(): ToolDefinition;
  execute(args: Record<string, unknown>): Promise<ToolOutput>;
}

export interface ToolOutcome {
  content: string;
  success: boolean;
}

export interface CallHistoryEntry {
  tool: string;
  params: Record<string, unknown>;
  timestamp: number;
}
