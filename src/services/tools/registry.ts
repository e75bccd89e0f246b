// Tool Registry
// Holds tools by name, executes them and tracks call history and sources across a session.
// One registry belongs to one orchestration session at a time; see runExclusive.

import type { JsonSchemaProperty, ToolSchema } from '../../providers/types.js';
import { componentLogger } from '../../logger.js';
import { DuplicateToolError, ToolDefinitionError, describeError } from '../../utils/errors.js';
import type { CallHistoryEntry, Tool, ToolOutcome, ToolParameter } from './types.js';

const log = componentLogger('tool-registry');

export class ToolRegistry {
  private tools: Map<string, Tool> = new Map();
  private sources: string[] = [];
  private seenSources: Set<string> = new Set();
  private history: CallHistoryEntry[] = [];
  private recentSources: string[] = [];
  private sessionTail: Promise<void> = Promise.resolve();

  constructor(private now: () => number = Date.now) {}

  /**
   * Registers a tool under the name its definition declares.
   * Re-registering a name is rejected with DuplicateToolError.
   */
  register(tool: Tool): void {
    const name = tool.definition().name?.trim();
    if (!name) {
      throw new ToolDefinitionError('Tool must declare a name in its definition');
    }
    if (this.tools.has(name)) {
      throw new DuplicateToolError(name);
    }
    this.tools.set(name, tool);
    log.debug({ tool: name }, 'Tool registered');
  }

  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  names(): string[] {
    return Array.from(this.tools.keys());
  }

  /** Schemas of every registered tool, in registration order. */
  definitions(): ToolSchema[] {
    return Array.from(this.tools.values()).map(tool => {
      const def = tool.definition();
      return {
        name: def.name,
        description: def.description,
        parameters: {
          type: 'object',
          properties: this.parametersToSchema(def.parameters),
          required: def.parameters.filter(p => p.required).map(p => p.name),
        },
      };
    });
  }

  /**
   * Executes a tool by name. Never throws: unknown tools and tool failures
   * come back as unsuccessful outcomes whose content describes the problem.
   */
  async execute(name: string, args: Record<string, unknown>): Promise<ToolOutcome> {
    const tool = this.tools.get(name);
    if (!tool) {
      log.warn({ tool: name }, 'Model requested an unknown tool');
      return { content: `Tool '${name}' not found`, success: false };
    }

    this.history.push({ tool: name, params: { ...args }, timestamp: this.now() });

    try {
      const output = await tool.execute(args);
      const sources = output.sources ?? [];
      if (!output.isError) {
        this.recentSources = [...sources];
      }
      for (const source of sources) {
        if (!this.seenSources.has(source)) {
          this.seenSources.add(source);
          this.sources.push(source);
        }
      }
      return { content: output.content, success: !output.isError };
    } catch (error) {
      const message = describeError(error);
      log.warn({ tool: name, err: message }, 'Tool execution failed');
      return { content: `Error executing tool '${name}': ${message}`, success: false };
    }
  }

  allSources(): string[] {
    return [...this.sources];
  }

  /** Sources reported by the most recent successful tool execution. */
  lastSources(): string[] {
    return [...this.recentSources];
  }

  callHistory(): CallHistoryEntry[] {
    return this.history.map(entry => ({ ...entry, params: { ...entry.params } }));
  }

  reset(): void {
    this.sources = [];
    this.seenSources.clear();
    this.history = [];
    this.recentSources = [];
  }

  summary(): string {
    if (this.history.length === 0) {
      return '';
    }

    const lines = [`Executed ${this.history.length} tool call(s):`];

    this.history.forEach((call, i) => {
      let line = `${i + 1}. ${call.tool}`;
      const { query, course_name: courseName, lesson_number: lessonNumber } = call.params;
      if (query !== undefined) line += ` - '${String(query)}'`;
      if (courseName !== undefined) line += ` (course: ${String(courseName)})`;
      if (lessonNumber !== undefined) line += ` (lesson: ${String(lessonNumber)})`;
      lines.push(line);
    });

    lines.push(`Sources from ${this.sources.length} locations`);
    return lines.join('\n');
  }

  /**
   * Runs `fn` once every previously queued session on this registry has settled.
   * Sessions that share a registry therefore never interleave their history.
   */
  runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.sessionTail.then(fn);
    this.sessionTail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private parametersToSchema(params: ToolParameter[]): Record<string, JsonSchemaProperty> {
    const schema: Record<string, JsonSchemaProperty> = {};

    for (const param of params) {
      const paramSchema: JsonSchemaProperty = {
        type: param.type,
        description: param.description,
      };

      if (param.enum) {
        paramSchema.enum = param.enum;
      }

      if (param.default !== undefined) {
        paramSchema.default = param.default;
      }

      schema[param.name] = paramSchema;
    }

    return schema;
  }
}
