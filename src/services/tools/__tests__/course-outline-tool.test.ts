import { describe, it, expect } from 'vitest';
import { CourseOutlineTool } from '../course-outline-tool.js';
import { emptyResults, type CourseContentStore, type CourseOutline } from '../../course-store.js';

function storeWithOutline(outline: CourseOutline | null): CourseContentStore {
  return {
    search: async () => emptyResults(),
    getCourseOutline: async () => outline,
  };
}

describe('CourseOutlineTool', () => {
  it('should list the course details and lessons', async () => {
    const tool = new CourseOutlineTool(storeWithOutline({
      title: 'Building Retrieval Systems',
      link: 'https://courses.example.com/retrieval',
      instructor: 'Sam Okafor',
      lessons: [
        { lessonNumber: 1, title: 'Chunking Documents', link: 'https://courses.example.com/retrieval/lesson-1' },
        { lessonNumber: 2, title: 'Embeddings and Similarity' },
      ],
    }));

    const output = await tool.execute({ course_name: 'retrieval' });

    expect(output.content).toBe([
      'Course: Building Retrieval Systems',
      'Course Link: https://courses.example.com/retrieval',
      'Instructor: Sam Okafor',
      'Lessons (2):',
      '1. Chunking Documents - https://courses.example.com/retrieval/lesson-1',
      '2. Embeddings and Similarity',
    ].join('\n'));
    expect(output.sources).toEqual(['Building Retrieval Systems']);
  });

  it('should report an unknown course as an error', async () => {
    const tool = new CourseOutlineTool(storeWithOutline(null));

    expect(await tool.execute({ course_name: 'Cooking' })).toEqual({
      content: "No course found matching 'Cooking'",
      isError: true,
    });
  });

  it('should require a course name', async () => {
    const tool = new CourseOutlineTool(storeWithOutline(null));

    await expect(tool.execute({})).rejects.toThrow('Invalid arguments');
  });
});
