/**
 * RAG Service
 * Ties sessions, the per-request tool registry and the orchestrator together
 */

import type { CourseAnalytics, CourseContentStore } from './course-store.js';
import type { SessionManager } from './sessions.js';
import type { ToolOrchestrator } from './orchestrator/index.js';
import { createToolRegistry, type ToolRegistry } from './tools/index.js';
import { componentLogger } from '../logger.js';

const log = componentLogger('rag');

export interface CourseIndex extends CourseContentStore {
  getCourseAnalytics(): CourseAnalytics;
}

export interface RagAnswer {
  answer: string;
  sources: string[];
  sessionId: string;
}

export interface RagServiceDeps {
  store: CourseIndex;
  orchestrator: ToolOrchestrator;
  sessions: SessionManager;
  createRegistry?: (store: CourseContentStore) => ToolRegistry;
}

export class RagService {
  private createRegistry: (store: CourseContentStore) => ToolRegistry;

  constructor(private deps: RagServiceDeps) {
    this.createRegistry = deps.createRegistry ?? (store => createToolRegistry(store));
  }

  async query(query: string, sessionId?: string): Promise<RagAnswer> {
    const { sessions, orchestrator, store } = this.deps;
    const id = sessionId || sessions.createSession();
    const history = sessions.getConversationHistory(id);

    // A fresh registry per request keeps call history and sources private to it
    const registry = this.createRegistry(store);
    const tools = registry.definitions();

    const startedAt = Date.now();
    const { answer, sources } = await orchestrator.respondWithSources(query, history, tools, registry);

    log.info(
      {
        sessionId: id,
        toolCalls: registry.callHistory().length,
        sources: sources.length,
        durationMs: Date.now() - startedAt,
      },
      'Query answered',
    );

    sessions.addExchange(id, query, answer);

    return { answer, sources, sessionId: id };
  }

  getCourseAnalytics(): CourseAnalytics {
    return this.deps.store.getCourseAnalytics();
  }

  clearSession(sessionId: string): boolean {
    return this.deps.sessions.clearSession(sessionId);
  }
}
