// src/core/context.ts
/**
 * Session context helpers: message construction, text flattening and the
 * priority-aware trim run once at the end of every turn.
 */
import type { ConversationMessage, MessageContent, Role, Session } from '../types/index.js';

/**
 * Substrings that mark a message as carrying tool context.
 * Such messages survive trimming ahead of ordinary older messages.
 */
export const PRIORITY_MARKERS: readonly string[] = [
  '[Tool result',
  '[Tool error]',
  'TOOL_CALL',
  'BROWSER_ACTION',
  'SCHEDULE_TASK',
  'MEMORY_SAVE',
  '🔧',
  '⚒',
];

export function createMessage(role: Role, content: MessageContent, timestamp: number = Date.now()): ConversationMessage {
  return { role, content, timestamp };
}

/**
 * Text of a message; multi-part content contributes its text parts only.
 */
export function messageText(content: MessageContent): string {
  if (typeof content === 'string') return content;
  return content
    .map(part => (part.type === 'text' ? part.text : ''))
    .filter(text => text.length > 0)
    .join('\n');
}

export function isPriorityMessage(message: ConversationMessage): boolean {
  const text = messageText(message.content);
  return PRIORITY_MARKERS.some(marker => text.includes(marker));
}

/** Number of trailing messages `trimSession` always keeps */
export function recentWindow(maxMessages: number): number {
  return Math.max(0, Math.max(maxMessages - 4, Math.floor(maxMessages / 2)));
}

/**
 * Bounds a session to `maxMessages`.
 *
 * The most recent `max(N - 4, N / 2)` messages are kept as they are. The
 * remaining slots go to the newest older messages that carry a priority
 * marker, which are placed (in their original order) before the recent ones
 * even though that breaks chronology.
 *
 * @returns A new array; the input is not modified
 */
export function trimSession(session: Session, maxMessages: number): ConversationMessage[] {
  if (session.length <= maxMessages) return [...session];
  if (maxMessages <= 0) return [];

  const recentCount = recentWindow(maxMessages);
  const splitAt = session.length - recentCount;
  const recent = session.slice(splitAt);
  const older = session.slice(0, splitAt);

  const slots = maxMessages - recent.length;
  const priority = older.filter(isPriorityMessage);
  const kept = slots > 0 ? priority.slice(-slots) : [];

  return [...kept, ...recent];
}
