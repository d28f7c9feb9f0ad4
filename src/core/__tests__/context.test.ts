import { describe, it, expect } from 'vitest';
import {
  createMessage,
  isPriorityMessage,
  messageText,
  recentWindow,
  trimSession,
} from '../context.js';
import type { ConversationMessage } from '../../types/index.js';

function buildSession(length: number, markerAt: number[]): ConversationMessage[] {
  return Array.from({ length }, (_, i) =>
    createMessage(
      i % 2 === 0 ? 'user' : 'assistant',
      markerAt.includes(i) ? `[Tool result ddg-search.search]\nresult ${i}` : `message ${i}`,
      1000 + i
    )
  );
}

describe('messageText', () => {
  it('joins the text parts of multi-part content and skips images', () => {
    const text = messageText([
      { type: 'text', text: 'first' },
      { type: 'image', data: 'aGVsbG8=', mimeType: 'image/png' },
      { type: 'text', text: 'second' },
    ]);
    expect(text).toBe('first\nsecond');
  });
});

describe('isPriorityMessage', () => {
  it('detects markers in any text part', () => {
    const message = createMessage('assistant', [
      { type: 'text', text: 'looking it up' },
      { type: 'text', text: 'SCHEDULE_TASK = {"action": "list"}' },
    ]);
    expect(isPriorityMessage(message)).toBe(true);
  });

  it('ignores ordinary messages', () => {
    expect(isPriorityMessage(createMessage('user', 'hello there'))).toBe(false);
  });
});

describe('recentWindow', () => {
  it('keeps max(N - 4, N / 2) messages', () => {
    expect(recentWindow(10)).toBe(6);
    expect(recentWindow(6)).toBe(3);
    expect(recentWindow(20)).toBe(16);
    expect(recentWindow(1)).toBe(0);
  });
});

describe('trimSession', () => {
  it('returns a copy when the session already fits', () => {
    const session = buildSession(5, []);
    const trimmed = trimSession(session, 10);
    expect(trimmed).toEqual(session);
    expect(trimmed).not.toBe(session);
  });

  it('keeps the newest tool messages ahead of the recent window', () => {
    const session = buildSession(30, [2, 7, 12, 18, 21]);
    const trimmed = trimSession(session, 10);

    expect(trimmed).toHaveLength(10);
    expect(trimmed.slice(0, 4)).toEqual([session[7], session[12], session[18], session[21]]);
    expect(trimmed.slice(4)).toEqual(session.slice(24));
  });

  it('fills fewer slots when few older messages carry markers', () => {
    const session = buildSession(30, [3]);
    const trimmed = trimSession(session, 10);
    expect(trimmed).toEqual([session[3], ...session.slice(24)]);
  });

  it('always keeps the recent window untouched for N >= 4', () => {
    const session = buildSession(30, [0, 4, 9, 13, 17, 22, 26]);
    for (let n = 4; n <= 30; n++) {
      const trimmed = trimSession(session, n);
      const recent = recentWindow(n);
      expect(trimmed.length).toBeLessThanOrEqual(n);
      expect(trimmed.slice(trimmed.length - recent)).toEqual(session.slice(session.length - recent));
    }
  });

  it('returns an empty session for a non-positive limit', () => {
    expect(trimSession(buildSession(3, [1]), 0)).toEqual([]);
  });

  it('does not modify the input', () => {
    const session = buildSession(12, [1]);
    const before = [...session];
    trimSession(session, 4);
    expect(session).toEqual(before);
  });
});
