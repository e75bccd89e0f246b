// Course Outline Tool
// Returns a course's title, link, instructor and lesson list

import { z } from 'zod';
import type { CourseContentStore } from '../course-store.js';
import { AppError } from '../../utils/errors.js';
import type { Tool, ToolDefinition, ToolOutput } from './types.js';

export const COURSE_OUTLINE_TOOL_NAME = 'get_course_outline';

const OutlineArgsSchema = z.object({
  course_name: z.string().trim().min(1, 'course_name is required'),
});

export class CourseOutlineTool implements Tool {
  constructor(private store: CourseContentStore) {}

  definition(): ToolDefinition {
    return {
      name: COURSE_OUTLINE_TOOL_NAME,
      description: 'Get the outline of a course: its title, link, instructor and the complete lesson list',
      parameters: [
        {
          name: 'course_name',
          type: 'string',
          description: "Course title (partial matches work, e.g. 'MCP', 'Introduction')",
          required: true,
        },
      ],
    };
  }

  async execute(args: Record<string, unknown>): Promise<ToolOutput> {
    const parsed = OutlineArgsSchema.safeParse(args);
    if (!parsed.success) {
      throw AppError.validationError(`Invalid arguments: ${parsed.error.issues.map(i => i.message).join('; ')}`);
    }

    const courseName = parsed.data.course_name;
    const outline = await this.store.getCourseOutline(courseName);
    if (!outline) {
      return { content: `No course found matching '${courseName}'`, isError: true };
    }

    const lines = [`Course: ${outline.title}`];
    if (outline.link) lines.push(`Course Link: ${outline.link}`);
    if (outline.instructor) lines.push(`Instructor: ${outline.instructor}`);
    lines.push(`Lessons (${outline.lessons.length}):`);
    for (const lesson of outline.lessons) {
      lines.push(`${lesson.lessonNumber}. ${lesson.title}${lesson.link ? ` - ${lesson.link}` : ''}`);
    }

    return { content: lines.join('\n'), sources: [outline.title] };
  }
}
