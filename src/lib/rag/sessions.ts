/**
 * Conversation history per session.
 *
 * A session longer than `maxTurns` is cut back to its newest
 * `retainTurns` turns, in memory and in Postgres alike.
 */

import { and, count, desc, eq, notInArray } from 'drizzle-orm';
import type { Database } from '@/db';
import { sessionTurns } from '@/db/schema';
import type { ConversationTurn } from '@/types/rag';
import { ConfigurationError, getErrorMessage } from '@/lib/errors';
import { loggers, logDbOperation, Timer } from '@/lib/logger';
import { withTimeout } from '@/lib/utils/timeout';
import { DEFAULT_SESSION_MAX_TURNS, DEFAULT_SESSION_RETAIN_TURNS } from './config';
import { toIndexError } from './vector-index';

const log = loggers.rag.child({ service: 'SessionStore' });

export interface SessionStore {
  getHistory(sessionId: string): Promise<ConversationTurn[]>;
  append(sessionId: string, turns: ConversationTurn[]): Promise<void>;
  clear(sessionId: string): Promise<void>;
}

export interface SessionLimits {
  /** A session longer than this is trimmed */
  maxTurns: number;
  /** Turns kept after trimming */
  retainTurns: number;
}

function resolveLimits(limits: Partial<SessionLimits>): SessionLimits {
  const resolved = {
    maxTurns: limits.maxTurns ?? DEFAULT_SESSION_MAX_TURNS,
    retainTurns: limits.retainTurns ?? DEFAULT_SESSION_RETAIN_TURNS,
  };
  if (resolved.retainTurns > resolved.maxTurns) {
    throw new ConfigurationError(
      `retainTurns (${resolved.retainTurns}) must not exceed maxTurns (${resolved.maxTurns})`
    );
  }
  return resolved;
}

// =============================================================================
// In-Memory Implementation
// =============================================================================

export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, ConversationTurn[]>();
  private readonly limits: SessionLimits;

  constructor(limits: Partial<SessionLimits> = {}) {
    this.limits = resolveLimits(limits);
  }

  async getHistory(sessionId: string): Promise<ConversationTurn[]> {
    return (this.sessions.get(sessionId) ?? []).map((turn) => ({ ...turn }));
  }

  async append(sessionId: string, turns: ConversationTurn[]): Promise<void> {
    let history = [...(this.sessions.get(sessionId) ?? []), ...turns.map((turn) => ({ ...turn }))];

    if (history.length > this.limits.maxTurns) {
      log.debug(
        { event: 'session_trimmed', sessionId, from: history.length, to: this.limits.retainTurns },
        'Trimmed session history'
      );
      history = history.slice(-this.limits.retainTurns);
    }

    this.sessions.set(sessionId, history);
  }

  async clear(sessionId: string): Promise<void> {
    this.sessions.delete(sessionId);
  }

  get size(): number {
    return this.sessions.size;
  }
}

// =============================================================================
// Postgres Implementation
// =============================================================================

const pgLog = loggers.db.child({ service: 'PgSessionStore' });

export interface PgSessionStoreOptions extends Partial<SessionLimits> {
  /** Per-call limit; omit for none */
  timeoutMs?: number;
}

/**
 * Sessions in `session_turns`, one row per turn, ordered by insertion.
 */
export class PgSessionStore implements SessionStore {
  private readonly limits: SessionLimits;
  private readonly timeoutMs?: number;

  constructor(
    private readonly db: Database,
    options: PgSessionStoreOptions = {}
  ) {
    this.limits = resolveLimits(options);
    this.timeoutMs = options.timeoutMs;
  }

  async getHistory(sessionId: string): Promise<ConversationTurn[]> {
    const rows = await this.run('getHistory', () => this.buildHistoryQuery(sessionId));
    return rows.reverse().map((row) => ({ role: row.role, content: row.content }));
  }

  /**
   * Newest turns first, at most `maxTurns`.
   */
  buildHistoryQuery(sessionId: string) {
    return this.db
      .select({ role: sessionTurns.role, content: sessionTurns.content })
      .from(sessionTurns)
      .where(eq(sessionTurns.sessionId, sessionId))
      .orderBy(desc(sessionTurns.id))
      .limit(this.limits.maxTurns);
  }

  async append(sessionId: string, turns: ConversationTurn[]): Promise<void> {
    if (turns.length === 0) return;

    await this.run('append', () =>
      this.db.transaction(async (tx) => {
        await tx
          .insert(sessionTurns)
          .values(turns.map((turn) => ({ sessionId, role: turn.role, content: turn.content })));

        const rows = await tx
          .select({ value: count() })
          .from(sessionTurns)
          .where(eq(sessionTurns.sessionId, sessionId));
        const total = rows[0]?.value ?? 0;
        if (total <= this.limits.maxTurns) return;

        const newest = tx
          .select({ id: sessionTurns.id })
          .from(sessionTurns)
          .where(eq(sessionTurns.sessionId, sessionId))
          .orderBy(desc(sessionTurns.id))
          .limit(this.limits.retainTurns);
        await tx
          .delete(sessionTurns)
          .where(and(eq(sessionTurns.sessionId, sessionId), notInArray(sessionTurns.id, newest)));

        pgLog.debug(
          { event: 'session_trimmed', sessionId, from: total, to: this.limits.retainTurns },
          'Trimmed session history'
        );
      })
    );
  }

  async clear(sessionId: string): Promise<void> {
    await this.run('clear', () => this.db.delete(sessionTurns).where(eq(sessionTurns.sessionId, sessionId)));
  }

  private async run<T>(operation: string, fn: () => PromiseLike<T>): Promise<T> {
    const timer = new Timer();

    try {
      const result = await withTimeout(fn(), { timeoutMs: this.timeoutMs, operation: `sessions ${operation}` });
      logDbOperation(pgLog, operation, { table: 'session_turns', duration_ms: timer.elapsed() });
      return result;
    } catch (error) {
      logDbOperation(pgLog, operation, {
        table: 'session_turns',
        duration_ms: timer.elapsed(),
        error: getErrorMessage(error),
      });
      throw toIndexError(operation, error, 'Session store');
    }
  }
}
