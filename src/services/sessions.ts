/**
 * Session Manager
 * Keeps the last few exchanges per session so follow-up questions carry context
 */

import { TTLCache } from '../utils/ttl-cache.js';

export interface SessionMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface SessionManagerOptions {
  maxHistory: number;
  ttlMs: number;
  now?: () => number;
}

export class SessionManager {
  private sessions: TTLCache<string, SessionMessage[]>;
  private counter = 0;
  private maxHistory: number;

  constructor(options: SessionManagerOptions) {
    this.maxHistory = options.maxHistory;
    this.sessions = new TTLCache(options.ttlMs, 60 * 1000, options.now);
  }

  createSession(): string {
    let sessionId: string;
    // Clients may pick their own ids, so skip any already in use
    do {
      this.counter += 1;
      sessionId = `session_${this.counter}`;
    } while (this.sessions.has(sessionId));
    this.sessions.set(sessionId, []);
    return sessionId;
  }

  hasSession(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  addMessage(sessionId: string, role: SessionMessage['role'], content: string): void {
    const messages = this.sessions.get(sessionId) ?? [];
    messages.push({ role, content });

    // maxHistory counts exchanges, two messages each
    const keep = this.maxHistory * 2;
    this.sessions.set(sessionId, keep > 0 ? messages.slice(-keep) : []);
  }

  addExchange(sessionId: string, userMessage: string, assistantMessage: string): void {
    this.addMessage(sessionId, 'user', userMessage);
    this.addMessage(sessionId, 'assistant', assistantMessage);
  }

  /** History as `User: ...` / `Assistant: ...` lines, or undefined when there is none. */
  getConversationHistory(sessionId: string | undefined): string | undefined {
    if (!sessionId) return undefined;
    const messages = this.sessions.get(sessionId);
    if (!messages || messages.length === 0) return undefined;

    return messages
      .map(m => `${m.role === 'user' ? 'User' : 'Assistant'}: ${m.content}`)
      .join('\n');
  }

  clearSession(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  destroy(): void {
    this.sessions.destroy();
  }
}
