// src/core/extractor.ts
/**
 * Command Extractor
 * Locates `KEYWORD = { ... }` command blocks in model output and cuts out the
 * balanced object text. Models routinely break their own JSON, so brace
 * matching runs through two interchangeable strategies.
 */
import type { CommandBlock } from '../types/index.js';

/** Half-open span `[start, end)` covering one object */
export interface BraceSpan {
  start: number;
  end: number;
}

/**
 * Finds the closing brace for the `{` at `openIndex`.
 * Returns null when the braces never balance.
 */
export interface BraceMatcher {
  readonly name: string;
  match(text: string, openIndex: number): BraceSpan | null;
}

/** Characters scanned after `KEYWORD =` when no brace follows directly */
export const FALLBACK_SCAN_WINDOW = 400;

/** Characters scanned after a special-token tool call marker */
export const RELAXED_SCAN_WINDOW = 1200;

/** How far before an `"mcp":` key its opening brace may sit */
export const RAW_JSON_LOOKBEHIND = 80;

/** Accepts or rejects the raw text of a candidate object */
export type ObjectFilter = (raw: string) => boolean;

/**
 * Tracks quoted strings (double or single quotes, backslash escapes) so that
 * braces inside values do not change the depth.
 */
export const stringAwareMatcher: BraceMatcher = {
  name: 'string-aware',
  match(text, openIndex) {
    if (text[openIndex] !== '{') return null;

    let depth = 0;
    let quote: string | null = null;
    let escaped = false;

    for (let i = openIndex; i < text.length; i++) {
      const ch = text[i];

      if (quote !== null) {
        if (escaped) {
          escaped = false;
        } else if (ch === '\\') {
          escaped = true;
        } else if (ch === quote) {
          quote = null;
        }
        continue;
      }

      if (ch === '"' || ch === "'") {
        quote = ch;
      } else if (ch === '{') {
        depth++;
      } else if (ch === '}') {
        depth--;
        if (depth === 0) return { start: openIndex, end: i + 1 };
      }
    }
    return null;
  },
};

/** Pure brace counting. Survives escaping that confuses the string tracker. */
export const naiveMatcher: BraceMatcher = {
  name: 'naive',
  match(text, openIndex) {
    if (text[openIndex] !== '{') return null;

    let depth = 0;
    for (let i = openIndex; i < text.length; i++) {
      if (text[i] === '{') {
        depth++;
      } else if (text[i] === '}') {
        depth--;
        if (depth === 0) return { start: openIndex, end: i + 1 };
      }
    }
    return null;
  },
};

/** Strategies in the order they are tried */
export const DEFAULT_MATCHERS: readonly BraceMatcher[] = [stringAwareMatcher, naiveMatcher];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function balance(text: string, openIndex: number): BraceSpan | null {
  for (const matcher of DEFAULT_MATCHERS) {
    const span = matcher.match(text, openIndex);
    if (span) return span;
  }
  return null;
}

function toBlock(keyword: string, text: string, span: BraceSpan): CommandBlock {
  return {
    keyword,
    rawText: text.slice(span.start, span.end),
    startOffset: span.start,
    endOffset: span.end,
  };
}

/**
 * Finds every `KEYWORD = {` occurrence (optionally with a ``` or ```json fence
 * between `=` and `{`) and returns the balanced object that follows it.
 * Keyword matching is case-insensitive. Occurrences that fall inside an
 * already extracted block are ignored.
 */
export function findCommandBlocks(
  text: string,
  keyword: string,
  matchers: readonly BraceMatcher[] = DEFAULT_MATCHERS
): CommandBlock[] {
  if (!text || !keyword) return [];

  const pattern = new RegExp(`${escapeRegExp(keyword)}\\s*=\\s*(?:\`\`\`(?:json)?\\s*)?\\{`, 'gi');
  const blocks: CommandBlock[] = [];
  let consumedUntil = 0;

  for (const match of text.matchAll(pattern)) {
    const at = match.index ?? 0;
    if (at < consumedUntil) continue;

    const openIndex = at + match[0].length - 1;
    for (const matcher of matchers) {
      const span = matcher.match(text, openIndex);
      if (span) {
        blocks.push(toBlock(keyword, text, span));
        consumedUntil = span.end;
        break;
      }
    }
  }

  return blocks;
}

/**
 * Recovery path for `KEYWORD = some words {...}`: looks for the first `{`
 * within {@link FALLBACK_SCAN_WINDOW} characters after the `=` and counts
 * braces from there.
 */
export function findCommandBlocksLoose(text: string, keyword: string): CommandBlock[] {
  if (!text || !keyword) return [];

  const pattern = new RegExp(`${escapeRegExp(keyword)}\\s*=`, 'gi');
  const blocks: CommandBlock[] = [];
  let consumedUntil = 0;

  for (const match of text.matchAll(pattern)) {
    const afterEquals = (match.index ?? 0) + match[0].length;
    if (afterEquals <= consumedUntil) continue;

    const window = text.slice(afterEquals, afterEquals + FALLBACK_SCAN_WINDOW);
    const relative = window.indexOf('{');
    if (relative === -1) continue;

    const span = naiveMatcher.match(text, afterEquals + relative);
    if (span) {
      blocks.push(toBlock(keyword, text, span));
      consumedUntil = span.end;
    }
  }

  return blocks;
}

/**
 * TOOL_CALL recovery for special-token output such as
 * `to=TOOL_CALL <|constrain|>json<|message|>{...}`. After each marker the
 * first `{` within {@link RELAXED_SCAN_WINDOW} characters is balanced, and
 * the object is kept only when `accept` passes it.
 */
export function findToolCallBlocksRelaxed(text: string, accept: ObjectFilter): CommandBlock[] {
  if (!text) return [];

  // "tool call" only counts when it sits inside a token, not in prose
  const pattern = /TOOL_CALL|(?<=[>=|\s])tool\s*call(?=\s*[<|]|\s*$)/gi;
  const blocks: CommandBlock[] = [];
  const seen = new Set<number>();

  for (const match of text.matchAll(pattern)) {
    const afterMatch = (match.index ?? 0) + match[0].length;
    const relative = text.slice(afterMatch, afterMatch + RELAXED_SCAN_WINDOW).indexOf('{');
    if (relative === -1) continue;

    const span = balance(text, afterMatch + relative);
    if (!span || seen.has(span.start)) continue;
    seen.add(span.start);

    const block = toBlock('TOOL_CALL', text, span);
    if (accept(block.rawText)) blocks.push(block);
  }

  return blocks;
}

/**
 * TOOL_CALL recovery for bare objects like `{"mcp": "x", "tool": "y"}` with
 * no keyword at all. Each `"mcp":` key is traced back to the nearest `{`
 * within {@link RAW_JSON_LOOKBEHIND} characters.
 */
export function findToolCallBlocksRawJson(text: string, accept: ObjectFilter): CommandBlock[] {
  if (!text) return [];

  const blocks: CommandBlock[] = [];
  const seen = new Set<number>();

  for (const match of text.matchAll(/"mcp"\s*:\s*/gi)) {
    const keyAt = match.index ?? 0;
    const from = Math.max(0, keyAt - RAW_JSON_LOOKBEHIND);
    const relative = text.slice(from, keyAt + 1).lastIndexOf('{');
    if (relative === -1) continue;

    const span = balance(text, from + relative);
    if (!span || seen.has(span.start)) continue;
    seen.add(span.start);

    const block = toBlock('TOOL_CALL', text, span);
    if (accept(block.rawText)) blocks.push(block);
  }

  return blocks;
}

/**
 * Extracts command blocks for one keyword, anchored search first and the
 * loose search only when the anchored one found nothing. Never throws.
 */
export function extractCommandBlocks(text: string, keyword: string): CommandBlock[] {
  const anchored = findCommandBlocks(text, keyword);
  return anchored.length > 0 ? anchored : findCommandBlocksLoose(text, keyword);
}

/**
 * TOOL_CALL extraction: the keyword strategies, then the relaxed and raw
 * JSON recoveries, each tried only while nothing has been found.
 */
export function extractToolCallBlocks(text: string, accept: ObjectFilter): CommandBlock[] {
  const keyed = extractCommandBlocks(text, 'TOOL_CALL');
  if (keyed.length > 0) return keyed;

  const relaxed = findToolCallBlocksRelaxed(text, accept);
  return relaxed.length > 0 ? relaxed : findToolCallBlocksRawJson(text, accept);
}

/** Raw object texts for one keyword, in text order */
export function extractCommandTexts(text: string, keyword: string): string[] {
  return extractCommandBlocks(text, keyword).map(block => block.rawText);
}
