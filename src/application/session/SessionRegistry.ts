import { randomUUID } from 'crypto';
import { SessionNotFoundError } from '../../core/errors.js';
import type { Logger } from '../../utils/logger.js';
import { SessionContext } from './SessionContext.js';
import { DEFAULT_CONTEXT_WINDOW } from './ConversationHistory.js';

export interface SessionRegistryOptions {
  contextWindow?: number;
  sessionTimeoutMinutes?: number;
  /** Sweep interval; 0 disables the background sweep */
  cleanupIntervalMs?: number;
  logger?: Logger;
}

/**
 * Owns the live sessions and expires the ones left idle
 */
export class SessionRegistry {
  private sessions = new Map<string, SessionContext>();
  private contextWindow: number;
  private sessionTimeout: number; // milliseconds
  private cleanupTimer: NodeJS.Timeout | null = null;
  private logger?: Logger;

  constructor(options: SessionRegistryOptions = {}) {
    this.contextWindow = options.contextWindow ?? DEFAULT_CONTEXT_WINDOW;
    this.sessionTimeout = (options.sessionTimeoutMinutes ?? 60) * 60 * 1000;
    this.logger = options.logger;

    // Cleanup stale sessions every 5 minutes
    const interval = options.cleanupIntervalMs ?? 5 * 60 * 1000;
    if (interval > 0) {
      this.cleanupTimer = setInterval(() => this.cleanupStaleSessions(), interval);
      this.cleanupTimer.unref();
    }
  }

  create(sessionId: string = randomUUID()): SessionContext {
    const existing = this.sessions.get(sessionId);
    if (existing) {
      return existing;
    }
    const session = new SessionContext(sessionId, this.contextWindow);
    this.sessions.set(sessionId, session);
    this.logger?.debug(`Session created: ${sessionId}`);
    return session;
  }

  get(sessionId: string): SessionContext {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    return session;
  }

  getOrCreate(sessionId?: string): SessionContext {
    return sessionId ? this.create(sessionId) : this.create();
  }

  /**
   * Run a handler against one session, serialized with its other handlers
   */
  withSession<T>(sessionId: string, handler: (session: SessionContext) => T | Promise<T>): Promise<T> {
    return this.get(sessionId).run(handler);
  }

  remove(sessionId: string): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) return false;

    this.sessions.delete(sessionId);
    session.dispose();
    this.logger?.debug(`Session removed: ${sessionId}`);
    return true;
  }

  /**
   * Drop sessions inactive for longer than the timeout
   */
  cleanupStaleSessions(now: number = Date.now()): string[] {
    const staleSessionIds: string[] = [];

    for (const [sessionId, session] of this.sessions) {
      if (now - session.lastActivity.getTime() > this.sessionTimeout) {
        staleSessionIds.push(sessionId);
      }
    }

    if (staleSessionIds.length > 0) {
      this.logger?.info(`Cleaning up ${staleSessionIds.length} stale sessions`);
      staleSessionIds.forEach((id) => this.remove(id));
    }
    return staleSessionIds;
  }

  getSessionInfo(): Array<{
    sessionId: string;
    createdAt: Date;
    lastActivity: Date;
    ageMinutes: number;
    inactiveMinutes: number;
    messageCount: number;
  }> {
    const now = Date.now();
    return Array.from(this.sessions.values()).map((session) => ({
      sessionId: session.id,
      createdAt: session.createdAt,
      lastActivity: session.lastActivity,
      ageMinutes: Math.floor((now - session.createdAt.getTime()) / 60000),
      inactiveMinutes: Math.floor((now - session.lastActivity.getTime()) / 60000),
      messageCount: session.history('cultural').length + session.history('emotional').length,
    }));
  }

  getActiveSessionCount(): number {
    return this.sessions.size;
  }

  closeAll(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
    for (const sessionId of Array.from(this.sessions.keys())) {
      this.remove(sessionId);
    }
  }
}
