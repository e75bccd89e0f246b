// Course Search Tool
// Searches lesson content with partial course-name matching and lesson filtering

import { z } from 'zod';
import type { CourseContentStore, SearchMetadata, SearchResults } from '../course-store.js';
import { AppError } from '../../utils/errors.js';
import type { Tool, ToolDefinition, ToolOutput } from './types.js';

export const COURSE_SEARCH_TOOL_NAME = 'search_course_content';

const SearchArgsSchema = z.object({
  query: z.string().trim().min(1, 'query is required'),
  course_name: z.string().trim().min(1).nullish(),
  lesson_number: z.coerce.number().int().nonnegative().nullish(),
});

export function formatSource(meta: SearchMetadata): string {
  return meta.lessonNumber !== undefined
    ? `${meta.courseTitle} - Lesson ${meta.lessonNumber}`
    : meta.courseTitle;
}

export class CourseSearchTool implements Tool {
  constructor(private store: CourseContentStore) {}

  definition(): ToolDefinition {
    return {
      name: COURSE_SEARCH_TOOL_NAME,
      description: 'Search course materials with smart course name matching and lesson filtering',
      parameters: [
        {
          name: 'query',
          type: 'string',
          description: 'What to search for in the course content',
          required: true,
        },
        {
          name: 'course_name',
          type: 'string',
          description: "Course title (partial matches work, e.g. 'MCP', 'Introduction')",
          required: false,
        },
        {
          name: 'lesson_number',
          type: 'integer',
          description: 'Specific lesson number to search within (e.g. 1, 2, 3)',
          required: false,
        },
      ],
    };
  }

  async execute(args: Record<string, unknown>): Promise<ToolOutput> {
    const parsed = SearchArgsSchema.safeParse(args);
    if (!parsed.success) {
      throw AppError.validationError(
        `Invalid arguments: ${parsed.error.issues.map(i => `${i.path.join('.') || 'args'} ${i.message}`).join('; ')}`,
      );
    }

    const { query } = parsed.data;
    const courseName = parsed.data.course_name ?? undefined;
    const lessonNumber = parsed.data.lesson_number ?? undefined;

    const results = await this.store.search({ query, courseName, lessonNumber });

    if (results.error) {
      return { content: results.error, isError: true };
    }

    if (results.documents.length === 0) {
      let filterInfo = '';
      if (courseName) filterInfo += ` in course '${courseName}'`;
      if (lessonNumber !== undefined) filterInfo += ` in lesson ${lessonNumber}`;
      return { content: `No relevant content found${filterInfo}.`, sources: [] };
    }

    return this.formatResults(results);
  }

  private formatResults(results: SearchResults): ToolOutput {
    const formatted: string[] = [];
    const sources: string[] = [];

    results.documents.forEach((doc, i) => {
      const meta = results.metadata[i] ?? { courseTitle: 'unknown' };
      let header = `[${formatSource(meta)}]`;
      if (meta.lessonLink) {
        header += ` (${meta.lessonLink})`;
      }
      formatted.push(`${header}\n${doc}`);
      sources.push(formatSource(meta));
    });

    return { content: formatted.join('\n\n'), sources };
  }
}
