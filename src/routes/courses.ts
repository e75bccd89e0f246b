import type { FastifyInstance } from 'fastify';
import type { RagService } from '../services/rag.js';

export interface CourseRoutesOptions {
  rag: RagService;
}

export async function courseRoutes(server: FastifyInstance, opts: CourseRoutesOptions) {
  // Public: catalog statistics for the frontend sidebar.
  server.get('/courses', async () => {
    const analytics = opts.rag.getCourseAnalytics();
    return {
      total_courses: analytics.totalCourses,
      course_titles: analytics.courseTitles,
    };
  });
}
