/**
 * Course Store
 * In-memory index of course lessons, searchable by embedding similarity
 * with a term-overlap fallback when no embeddings are configured
 */

import { chunkText, type ChunkOptions } from './chunking.js';
import { cosineSimilarity, type EmbedFn } from './embeddings.js';
import { componentLogger } from '../logger.js';

const log = componentLogger('course-store');

export interface Lesson {
  lessonNumber: number;
  title: string;
  link?: string;
  content: string;
}

export interface Course {
  title: string;
  link?: string;
  instructor?: string;
  lessons: Lesson[];
}

export interface SearchMetadata {
  courseTitle: string;
  lessonNumber?: number;
  lessonLink?: string;
}

export interface SearchResults {
  documents: string[];
  metadata: SearchMetadata[];
  distances: number[];
  error?: string;
}

export interface SearchParams {
  query: string;
  courseName?: string;
  lessonNumber?: number;
  limit?: number;
}

export interface CourseOutline {
  title: string;
  link?: string;
  instructor?: string;
  lessons: Array<{ lessonNumber: number; title: string; link?: string }>;
}

export interface CourseAnalytics {
  totalCourses: number;
  courseTitles: string[];
}

/** What the course tools need from a content store. */
export interface CourseContentStore {
  search(params: SearchParams): Promise<SearchResults>;
  getCourseOutline(courseName: string): Promise<CourseOutline | null>;
}

interface IndexedChunk {
  courseTitle: string;
  lessonNumber: number;
  lessonLink?: string;
  content: string;
  terms: Set<string>;
  embedding: number[] | null;
}

interface IndexedCourse {
  course: Course;
  embedding: number[] | null;
}

export interface CourseStoreOptions extends ChunkOptions {
  maxResults: number;
  embed?: EmbedFn;
}

export function emptyResults(error?: string): SearchResults {
  return { documents: [], metadata: [], distances: [], ...(error ? { error } : {}) };
}

function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
}

function termScore(queryTerms: string[], terms: Set<string>): number {
  if (queryTerms.length === 0) return 0;
  const matched = queryTerms.filter(t => terms.has(t)).length;
  return matched / queryTerms.length;
}

export class CourseStore implements CourseContentStore {
  private courses: Map<string, IndexedCourse> = new Map();
  private chunks: IndexedChunk[] = [];

  constructor(private options: CourseStoreOptions) {}

  get courseCount(): number {
    return this.courses.size;
  }

  get chunkCount(): number {
    return this.chunks.length;
  }

  /**
   * Indexes a course. A course whose title is already present is skipped;
   * returns the number of chunks added.
   */
  async addCourse(course: Course): Promise<number> {
    if (this.courses.has(course.title)) {
      log.debug({ course: course.title }, 'Course already indexed, skipping');
      return 0;
    }

    const pending: Array<Omit<IndexedChunk, 'embedding'>> = [];
    for (const lesson of course.lessons) {
      const pieces = chunkText(lesson.content, this.options);
      pieces.forEach((piece, i) => {
        const content = i === 0 ? `Lesson ${lesson.lessonNumber} content: ${piece}` : piece;
        pending.push({
          courseTitle: course.title,
          lessonNumber: lesson.lessonNumber,
          lessonLink: lesson.link,
          content,
          terms: new Set(tokenize(content)),
        });
      });
    }

    const vectors = this.options.embed
      ? await this.options.embed([course.title, ...pending.map(c => c.content)])
      : [];

    this.courses.set(course.title, { course, embedding: vectors[0] ?? null });
    pending.forEach((chunk, i) => {
      this.chunks.push({ ...chunk, embedding: vectors[i + 1] ?? null });
    });

    log.info({ course: course.title, chunks: pending.length }, 'Course indexed');
    return pending.length;
  }

  /**
   * Resolves a possibly partial course name to a stored title: exact match,
   * then substring, then the most similar title.
   */
  async resolveCourseName(name: string): Promise<string | null> {
    const wanted = name.trim().toLowerCase();
    if (!wanted) return null;

    const titles = Array.from(this.courses.keys());
    const exact = titles.find(t => t.toLowerCase() === wanted);
    if (exact) return exact;

    const partial = titles.find(t => t.toLowerCase().includes(wanted));
    if (partial) return partial;

    const queryVector = await this.embedQuery(name);
    const indexedCourses = Array.from(this.courses.values());
    const semantic = queryVector !== null && indexedCourses.every(c => c.embedding !== null);
    let best: { title: string; score: number } | null = null;

    for (const [title, indexed] of this.courses) {
      const score = semantic && queryVector && indexed.embedding
        ? cosineSimilarity(queryVector, indexed.embedding)
        : termScore(tokenize(name), new Set(tokenize(title)));
      if (score > 0 && (!best || score > best.score)) {
        best = { title, score };
      }
    }

    return best?.title ?? null;
  }

  async search({ query, courseName, lessonNumber, limit }: SearchParams): Promise<SearchResults> {
    let courseTitle: string | undefined;
    if (courseName) {
      const resolved = await this.resolveCourseName(courseName);
      if (!resolved) {
        return emptyResults(`No course found matching '${courseName}'`);
      }
      courseTitle = resolved;
    }

    const candidates = this.chunks.filter(chunk =>
      (courseTitle === undefined || chunk.courseTitle === courseTitle) &&
      (lessonNumber === undefined || chunk.lessonNumber === lessonNumber),
    );

    const queryVector = await this.embedQuery(query);
    const queryTerms = Array.from(new Set(tokenize(query)));
    // One scale per search: cosine only when every candidate has a vector
    const semantic = queryVector !== null && candidates.every(chunk => chunk.embedding !== null);

    const scored = candidates
      .map(chunk => ({
        chunk,
        score: semantic && queryVector && chunk.embedding
          ? cosineSimilarity(queryVector, chunk.embedding)
          : termScore(queryTerms, chunk.terms),
      }))
      // term scoring only keeps chunks that share at least one term with the query
      .filter(entry => semantic || entry.score > 0)
      .sort((a, b) => b.score - a.score)
      .slice(0, limit ?? this.options.maxResults);

    return {
      documents: scored.map(s => s.chunk.content),
      metadata: scored.map(s => ({
        courseTitle: s.chunk.courseTitle,
        lessonNumber: s.chunk.lessonNumber,
        ...(s.chunk.lessonLink ? { lessonLink: s.chunk.lessonLink } : {}),
      })),
      distances: scored.map(s => 1 - s.score),
    };
  }

  async getCourseOutline(courseName: string): Promise<CourseOutline | null> {
    const title = await this.resolveCourseName(courseName);
    if (!title) return null;

    const indexed = this.courses.get(title);
    if (!indexed) return null;

    const { course } = indexed;
    return {
      title: course.title,
      link: course.link,
      instructor: course.instructor,
      lessons: [...course.lessons]
        .sort((a, b) => a.lessonNumber - b.lessonNumber)
        .map(({ lessonNumber, title: lessonTitle, link }) => ({ lessonNumber, title: lessonTitle, link })),
    };
  }

  getCourseAnalytics(): CourseAnalytics {
    const courseTitles = Array.from(this.courses.keys());
    return { totalCourses: courseTitles.length, courseTitles };
  }

  private async embedQuery(text: string): Promise<number[] | null> {
    if (!this.options.embed) return null;
    const [vector] = await this.options.embed([text]);
    return vector ?? null;
  }
}
