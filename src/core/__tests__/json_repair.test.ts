import { describe, it, expect } from 'vitest';
import {
  isToolCallPayload,
  normalizeCommandJson,
  normalizeCommandJsonExtended,
  parseCommandObject,
  parseLiteral,
  stripComments,
} from '../json_repair.js';

describe('normalizeCommandJson', () => {
  it('leaves valid JSON byte-identical', () => {
    const valid = '{ "mcp": "ddg-search", "tool": "search", "arguments": { "query": "weather" } }';
    expect(normalizeCommandJson(valid)).toBe(valid);
    expect(normalizeCommandJson(normalizeCommandJson(valid))).toBe(valid);
  });

  it('straightens curly quotes', () => {
    const raw = '{ “content”: “remember X”, “category”: “facts” }';
    expect(parseCommandObject(raw)).toEqual({ content: 'remember X', category: 'facts' });
  });

  it('removes trailing commas', () => {
    expect(normalizeCommandJson('{ "action": "list", }')).toBe('{ "action": "list" }');
  });

  it('removes comments but not slashes inside strings', () => {
    const raw = '{\n  // server\n  "mcp": "files", /* the tool */ "tool": "read",\n  "arguments": {"path": "http://x/y"}\n}';
    expect(parseCommandObject(raw)).toEqual({ mcp: 'files', tool: 'read', arguments: { path: 'http://x/y' } });
    expect(stripComments.apply('{"url": "https://a.b"} // tail')).toBe('{"url": "https://a.b"} ');
  });

  it('unwraps a fenced payload', () => {
    expect(parseCommandObject('```json\n{"a": 1,}\n```')).toEqual({ a: 1 });
  });

  it('drops backslashes escaping structural quotes', () => {
    const raw = '{\\"mcp\\": \\"x\\", \\"tool\\": \\"y\\"}';
    expect(parseCommandObject(raw)).toEqual({ mcp: 'x', tool: 'y' });
  });
});

describe('parseCommandObject', () => {
  it('accepts True/False/None literals and single quotes', () => {
    const raw = "{'action': 'create', 'task': {'name': 'Tea', 'message': 'Brew tea', 'cron': '0 9 * * *'}, 'enabled': True}";
    expect(parseCommandObject(raw)).toEqual({
      action: 'create',
      task: { name: 'Tea', message: 'Brew tea', cron: '0 9 * * *' },
      enabled: true,
    });
  });

  it('returns null for payloads nothing can repair', () => {
    expect(parseCommandObject('{ action: list oops')).toBeNull();
  });

  it('returns null for arrays and scalars', () => {
    expect(parseCommandObject('[1, 2]')).toBeNull();
    expect(parseCommandObject('"text"')).toBeNull();
  });

  it('handles escaped apostrophes in single-quoted strings', () => {
    expect(parseLiteral("{'note': 'it\\'s \"fine\"', 'n': None}")).toEqual({ note: 'it\'s "fine"', n: null });
  });
});

describe('isToolCallPayload', () => {
  it('needs both an mcp and a tool key', () => {
    expect(isToolCallPayload("{'mcp': 'files', 'tool': 'read'}")).toBe(true);
    expect(isToolCallPayload('{"mcp": "files"}')).toBe(false);
    expect(isToolCallPayload('{ mcp oops')).toBe(false);
  });
});

describe('normalizeCommandJsonExtended', () => {
  it('quotes bare keys, nulls undefined and keeps the first of two glued objects', () => {
    const raw = '{query: "weather", limit: undefined}{"other": 1}';
    expect(JSON.parse(normalizeCommandJsonExtended(raw))).toEqual({ query: 'weather', limit: null });
  });

  it('escapes raw newlines inside strings', () => {
    const raw = '{"text": "line one\nline two"}';
    expect(parseCommandObject(raw)).toBeNull();
    expect(parseCommandObject(raw, { extended: true })).toEqual({ text: 'line one\nline two' });
  });
});
