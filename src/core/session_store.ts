// src/core/session_store.ts
/**
 * Session Store
 * Owns per-user conversation history with an explicit lifecycle: sessions are
 * created on first access, replaced at the end of each turn and evicted from
 * memory after a period of inactivity. Optionally mirrored to JSON files.
 */
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { config } from '../config.js';
import { logger } from '../utils/logger.js';
import { describeError } from './errors.js';
import type { ConversationMessage, Session } from '../types/index.js';

const contentPartSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('text'), text: z.string() }),
  z.object({ type: z.literal('image'), data: z.string(), mimeType: z.string().optional() }),
]);

const messageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant']),
  content: z.union([z.string(), z.array(contentPartSchema)]),
  timestamp: z.number(),
});

const sessionFileSchema = z.object({
  userId: z.string(),
  messages: z.array(messageSchema),
});

export interface SessionStoreOptions {
  /** Idle time after which a session leaves memory */
  ttlMs?: number;
  reaperIntervalMs?: number;
  /** Directory for JSON copies; null keeps sessions in memory only */
  persistDir?: string | null;
  now?: () => number;
}

interface SessionEntry {
  messages: readonly ConversationMessage[];
  lastAccess: number;
}

export class SessionStore {
  private readonly sessions = new Map<string, SessionEntry>();
  private readonly ttlMs: number;
  private readonly reaperIntervalMs: number;
  private readonly persistDir: string | null;
  private readonly now: () => number;
  private reaper: NodeJS.Timeout | null = null;

  constructor(options: SessionStoreOptions = {}) {
    this.ttlMs = options.ttlMs ?? config.session.ttlMs;
    this.reaperIntervalMs = options.reaperIntervalMs ?? config.session.reaperIntervalMs;
    this.persistDir = options.persistDir === undefined
      ? (config.session.persist ? config.paths.sessionsDir : null)
      : options.persistDir;
    this.now = options.now ?? Date.now;
  }

  /**
   * Returns the history for a user, creating an empty one (or loading the
   * persisted copy) on first access.
   */
  get(userId: string): Session {
    const entry = this.sessions.get(userId);
    if (entry) {
      entry.lastAccess = this.now();
      return entry.messages;
    }

    const messages = this.load(userId);
    this.sessions.set(userId, { messages, lastAccess: this.now() });
    return messages;
  }

  /**
   * Replaces the history for a user.
   */
  set(userId: string, messages: readonly ConversationMessage[]): void {
    const snapshot = [...messages];
    this.sessions.set(userId, { messages: snapshot, lastAccess: this.now() });
    this.persist(userId, snapshot);
  }

  /**
   * Forgets a user's history, in memory and on disk.
   * @returns True if anything was removed
   */
  delete(userId: string): boolean {
    const existed = this.sessions.delete(userId);
    const file = this.fileFor(userId);
    if (file && fs.existsSync(file)) {
      try {
        fs.rmSync(file);
        return true;
      } catch (e) {
        logger.error('Failed to delete session file', e);
      }
    }
    return existed;
  }

  /**
   * Drops sessions idle for longer than the TTL from memory.
   * Persisted copies stay on disk and are reloaded on next access.
   * @returns Ids of evicted sessions
   */
  evictIdle(): string[] {
    const cutoff = this.now() - this.ttlMs;
    const evicted: string[] = [];
    for (const [userId, entry] of this.sessions) {
      if (entry.lastAccess < cutoff) {
        this.sessions.delete(userId);
        evicted.push(userId);
      }
    }
    if (evicted.length > 0) {
      logger.info('Evicted idle sessions', { count: evicted.length });
    }
    return evicted;
  }

  startReaper(): void {
    this.stopReaper();
    this.reaper = setInterval(() => this.evictIdle(), this.reaperIntervalMs);
    this.reaper.unref();
  }

  stopReaper(): void {
    if (this.reaper) {
      clearInterval(this.reaper);
      this.reaper = null;
    }
  }

  private fileFor(userId: string): string | null {
    if (!this.persistDir) return null;
    // percent-encoding keeps distinct ids in distinct files
    const safe = encodeURIComponent(userId).replace(
      /[.!~*'()]/g,
      ch => `%${ch.charCodeAt(0).toString(16).toUpperCase()}`
    );
    return path.join(this.persistDir, `${safe}.json`);
  }

  private load(userId: string): ConversationMessage[] {
    const file = this.fileFor(userId);
    if (!file || !fs.existsSync(file)) return [];

    try {
      const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
      const parsed = sessionFileSchema.safeParse(raw);
      if (!parsed.success) {
        logger.warn('Ignoring malformed session file', { file, issues: parsed.error.issues.length });
        return [];
      }
      return parsed.data.messages;
    } catch (e) {
      logger.warn('Failed to load session', { file, error: describeError(e) });
      return [];
    }
  }

  private persist(userId: string, messages: readonly ConversationMessage[]): void {
    const file = this.fileFor(userId);
    if (!file) return;

    try {
      fs.mkdirSync(path.dirname(file), { recursive: true });
      fs.writeFileSync(file, JSON.stringify({ userId, messages }, null, 2));
    } catch (e) {
      logger.error('Failed to save session', e);
    }
  }
}
