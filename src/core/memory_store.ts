// src/core/memory_store.ts
/**
 * Memory Store Module
 * JSON-file long-term memory keyed by user, with keyword retrieval.
 */
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { config } from '../config.js';
import { logger } from '../utils/logger.js';
import type { MemoryBackend, MemoryItem } from '../types/index.js';

const memoryFileSchema = z.array(z.object({
  id: z.string(),
  userId: z.string(),
  content: z.string(),
  category: z.string(),
  source: z.string(),
  createdAt: z.string(),
}));

/** Words too common to say anything about relevance */
const STOP_WORDS = new Set([
  'the', 'and', 'for', 'are', 'but', 'not', 'you', 'all', 'any', 'can', 'had', 'her', 'was', 'one',
  'our', 'out', 'has', 'him', 'his', 'how', 'its', 'may', 'new', 'now', 'see', 'who', 'did', 'get',
  'let', 'say', 'she', 'too', 'use', 'what', 'when', 'with', 'this', 'that', 'from', 'have', 'your',
]);

export function keywords(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter(word => word.length >= 3 && !STOP_WORDS.has(word));
}

/**
 * FileMemoryStore - Long-term memory persisted to a single JSON file.
 */
export class FileMemoryStore implements MemoryBackend {
  private memories: MemoryItem[] = [];
  private readonly memoryFile: string | null;

  /**
   * @param memoryFile - Backing file; null keeps memories in memory only
   */
  constructor(memoryFile: string | null = config.paths.memoryFile) {
    this.memoryFile = memoryFile;
    this.load();
  }

  /**
   * Loads memories from persistent storage.
   */
  private load(): void {
    if (!this.memoryFile || !fs.existsSync(this.memoryFile)) return;

    try {
      const parsed = memoryFileSchema.safeParse(JSON.parse(fs.readFileSync(this.memoryFile, 'utf-8')));
      if (parsed.success) {
        this.memories = parsed.data;
        logger.info('Memory store loaded', { count: this.memories.length });
      } else {
        logger.warn('Memory file has an unexpected shape; starting empty', { file: this.memoryFile });
      }
    } catch (e) {
      logger.warn('Failed to load memory store', e);
      this.memories = [];
    }
  }

  /**
   * Saves memories to persistent storage.
   */
  private save(): void {
    if (!this.memoryFile) return;
    try {
      fs.mkdirSync(path.dirname(this.memoryFile), { recursive: true });
      fs.writeFileSync(this.memoryFile, JSON.stringify(this.memories, null, 2));
    } catch (e) {
      logger.error('Failed to save memory store', e);
    }
  }

  /**
   * Generates a unique ID for a memory item.
   */
  private generateId(): string {
    const timestamp = Date.now().toString(36);
    const random = Math.random().toString(36).substring(2, 10);
    return `${timestamp}-${random}`;
  }

  /**
   * Stores a new memory.
   * @throws Error when content is blank
   */
  async addMemory(userId: string, content: string, category: string, source: string): Promise<MemoryItem> {
    const text = content.trim();
    if (!text) {
      throw new Error('Memory content cannot be empty');
    }

    const item: MemoryItem = {
      id: this.generateId(),
      userId,
      content: text,
      category: category || 'general',
      source,
      createdAt: new Date().toISOString(),
    };

    this.memories.push(item);
    this.save();

    logger.info('Memory stored', { id: item.id, userId, category: item.category, source });
    return item;
  }

  /**
   * Returns a user's memories ranked by keyword overlap with the query,
   * newest first among equals. A blank query returns the newest memories.
   */
  async retrieveMemory(userId: string, query: string, limit: number): Promise<MemoryItem[]> {
    if (limit <= 0) return [];

    const own = this.memories
      .map((item, index) => ({ item, index }))
      .filter(({ item }) => item.userId === userId);
    const terms = new Set(keywords(query));

    if (terms.size === 0) {
      return own.reverse().slice(0, limit).map(({ item }) => item);
    }

    return own
      .map(({ item, index }) => ({
        item,
        index,
        score: keywords(item.content).filter(word => terms.has(word)).length,
      }))
      .filter(entry => entry.score > 0)
      .sort((a, b) => b.score - a.score || b.index - a.index)
      .slice(0, limit)
      .map(entry => entry.item);
  }
}
