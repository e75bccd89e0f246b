// Course catalog loading
// Reads the JSON catalog, validates it and indexes every course into the store

import { readFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import type { Course, CourseStore } from './course-store.js';
import { AppError } from '../utils/errors.js';
import { componentLogger } from '../logger.js';

const log = componentLogger('course-loader');

const LessonSchema = z.object({
  lessonNumber: z.number().int().nonnegative(),
  title: z.string().min(1),
  link: z.string().url().optional(),
  content: z.string().min(1),
});

const CourseSchema = z.object({
  title: z.string().min(1),
  link: z.string().url().optional(),
  instructor: z.string().optional(),
  lessons: z.array(LessonSchema).min(1),
});

export const CourseCatalogSchema = z.object({
  courses: z.array(CourseSchema),
});

export function parseCourseCatalog(raw: unknown): Course[] {
  const result = CourseCatalogSchema.safeParse(raw);
  if (!result.success) {
    throw AppError.validationError('Invalid course catalog', result.error.flatten());
  }
  return result.data.courses;
}

export async function readCourseCatalog(catalogPath: string): Promise<Course[]> {
  const fullPath = path.resolve(process.cwd(), catalogPath);
  const text = await readFile(fullPath, 'utf-8');

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw AppError.validationError(`Course catalog ${fullPath} is not valid JSON`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  return parseCourseCatalog(raw);
}

export async function loadCourses(
  store: CourseStore,
  courses: Course[]
): Promise<{ courses: number; chunks: number }> {
  let added = 0;
  let chunks = 0;

  for (const course of courses) {
    const count = await store.addCourse(course);
    if (count > 0) {
      added++;
      chunks += count;
    }
  }

  log.info({ courses: added, chunks }, 'Course catalog loaded');
  return { courses: added, chunks };
}
