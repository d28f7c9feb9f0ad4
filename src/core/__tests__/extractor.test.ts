import { describe, it, expect } from 'vitest';
import {
  extractCommandBlocks,
  extractCommandTexts,
  extractToolCallBlocks,
  findCommandBlocks,
  findCommandBlocksLoose,
  findToolCallBlocksRawJson,
  findToolCallBlocksRelaxed,
  naiveMatcher,
  stringAwareMatcher,
} from '../extractor.js';
import { isToolCallPayload } from '../json_repair.js';

describe('extractCommandBlocks', () => {
  it('finds a single block surrounded by prose', () => {
    const text =
      'Sure, checking now.\nTOOL_CALL = {"mcp": "ddg-search", "tool": "search", "arguments": {"query": "weather"}}\nDone.';
    const blocks = extractCommandBlocks(text, 'TOOL_CALL');

    expect(blocks).toHaveLength(1);
    expect(blocks[0].rawText).toBe('{"mcp": "ddg-search", "tool": "search", "arguments": {"query": "weather"}}');
    expect(blocks[0].startOffset).toBe(text.indexOf('{'));
    expect(blocks[0].endOffset).toBe(blocks[0].startOffset + blocks[0].rawText.length);
    expect(blocks[0].keyword).toBe('TOOL_CALL');
  });

  it('matches the keyword case-insensitively and skips a json fence', () => {
    const text = 'tool_call = ```json\n{"mcp": "a", "tool": "b"}\n```';
    expect(extractCommandTexts(text, 'TOOL_CALL')).toEqual(['{"mcp": "a", "tool": "b"}']);
  });

  it('returns several blocks in text order', () => {
    const text = 'TOOL_CALL = {"tool": "first"} and then TOOL_CALL={"tool": "second"}';
    expect(extractCommandTexts(text, 'TOOL_CALL')).toEqual(['{"tool": "first"}', '{"tool": "second"}']);
  });

  it('ignores braces inside string values', () => {
    const text = 'MEMORY_SAVE = {"content": "use {curly} and }", "category": "notes"} trailing }';
    expect(extractCommandTexts(text, 'MEMORY_SAVE')).toEqual([
      '{"content": "use {curly} and }", "category": "notes"}',
    ]);
  });

  it('falls back to naive counting when an escaped quote never closes', () => {
    const text = 'TOOL_CALL = {"mcp": "x", "tool": "y\\"} end';
    const open = text.indexOf('{');

    expect(stringAwareMatcher.match(text, open)).toBeNull();
    expect(naiveMatcher.match(text, open)).toEqual({ start: open, end: text.indexOf('} end') + 1 });
    expect(extractCommandTexts(text, 'TOOL_CALL')).toEqual(['{"mcp": "x", "tool": "y\\"}']);
  });

  it('recovers blocks separated from the equals sign by prose', () => {
    const text = 'TOOL_CALL = here is the call: {"mcp": "a", "tool": "b"}';

    expect(findCommandBlocks(text, 'TOOL_CALL')).toEqual([]);
    expect(extractCommandTexts(text, 'TOOL_CALL')).toEqual(['{"mcp": "a", "tool": "b"}']);
  });

  it('does not look further than 400 characters past the equals sign', () => {
    const text = 'TOOL_CALL = ' + 'x'.repeat(400) + '{"a": 1}';
    expect(findCommandBlocksLoose(text, 'TOOL_CALL')).toEqual([]);
  });

  it('yields nothing without an equals sign or a closing brace', () => {
    expect(extractCommandBlocks('TOOL_CALL {"mcp": "a"}', 'TOOL_CALL')).toEqual([]);
    expect(extractCommandBlocks('TOOL_CALL = {"mcp": "a"', 'TOOL_CALL')).toEqual([]);
    expect(extractCommandBlocks('', 'TOOL_CALL')).toEqual([]);
  });

  it('returns exactly one balanced block for one object in arbitrary noise', () => {
    const noise = ['', 'a } stray', '{ open', 'text with "quotes"', '```'];
    for (const before of noise) {
      for (const after of noise) {
        const text = `${before}\nBROWSER_ACTION = {"action": "navigate", "params": {"url": "https://example.com"}}\n${after}`;
        const texts = extractCommandTexts(text, 'BROWSER_ACTION');
        expect(texts).toEqual(['{"action": "navigate", "params": {"url": "https://example.com"}}']);
      }
    }
  });
});

describe('findToolCallBlocksRelaxed', () => {
  it('reads tool calls written with special tokens', () => {
    const text = 'to=TOOL_CALL <|constrain|>json<|message|>{"mcp": "ddg-search", "tool": "search", "arguments": {"query": "news"}}';
    const blocks = findToolCallBlocksRelaxed(text, isToolCallPayload);

    expect(blocks.map(b => b.rawText)).toEqual(['{"mcp": "ddg-search", "tool": "search", "arguments": {"query": "news"}}']);
    expect(blocks[0].keyword).toBe('TOOL_CALL');
  });

  it('accepts "tool call" only inside a token', () => {
    expect(findToolCallBlocksRelaxed('<|channel|>tool call<|message|>{"mcp": "a", "tool": "b"}', isToolCallPayload)
      .map(b => b.rawText)).toEqual(['{"mcp": "a", "tool": "b"}']);
    expect(findToolCallBlocksRelaxed('We need tool call to fetch {"mcp": "a", "tool": "b"}', isToolCallPayload)).toEqual([]);
  });

  it('skips objects without both mcp and tool', () => {
    expect(findToolCallBlocksRelaxed('to=TOOL_CALL <|message|>{"query": "x"}', isToolCallPayload)).toEqual([]);
  });

  it('does not look further than 1200 characters past the marker', () => {
    const text = 'TOOL_CALL ' + 'x'.repeat(1200) + '{"mcp": "a", "tool": "b"}';
    expect(findToolCallBlocksRelaxed(text, isToolCallPayload)).toEqual([]);
  });
});

describe('findToolCallBlocksRawJson', () => {
  it('finds bare objects with an mcp key', () => {
    const text = 'Now writing files... {"mcp": "files", "tool": "write", "arguments": {"path": "/tmp/a"}} and {"mcp": "c", "tool": "d"}';
    expect(findToolCallBlocksRawJson(text, isToolCallPayload).map(b => b.rawText)).toEqual([
      '{"mcp": "files", "tool": "write", "arguments": {"path": "/tmp/a"}}',
      '{"mcp": "c", "tool": "d"}',
    ]);
  });

  it('needs the opening brace within 80 characters of the key', () => {
    const text = '{"note": "' + 'y'.repeat(90) + '", "mcp": "a", "tool": "b"}';
    expect(findToolCallBlocksRawJson(text, isToolCallPayload)).toEqual([]);
  });

  it('skips objects the filter rejects', () => {
    expect(findToolCallBlocksRawJson('{"mcp": "a"}', isToolCallPayload)).toEqual([]);
  });
});

describe('extractToolCallBlocks', () => {
  it('prefers keyword blocks over bare objects', () => {
    const text = 'TOOL_CALL = {"mcp": "a", "tool": "b"} and {"mcp": "c", "tool": "d"}';
    expect(extractToolCallBlocks(text, isToolCallPayload).map(b => b.rawText)).toEqual(['{"mcp": "a", "tool": "b"}']);
  });

  it('falls back to bare objects when nothing else matches', () => {
    const text = 'Calling it now: {"mcp": "c", "tool": "d"}';
    expect(extractToolCallBlocks(text, isToolCallPayload).map(b => b.rawText)).toEqual(['{"mcp": "c", "tool": "d"}']);
  });
});
