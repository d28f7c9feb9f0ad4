// src/core/json_repair.ts
/**
 * JSON Normalizer / Repairer
 *
 * Command payloads come from a language model and are JSON-like rather than
 * JSON. Repair is an ordered list of pure text steps; the runner stops at the
 * first step after which the text parses, so valid input passes through
 * byte-identical.
 */
import { naiveMatcher, stringAwareMatcher } from './extractor.js';

/** One pure text transform */
export interface RepairStep {
  readonly name: string;
  apply(text: string): string;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}

/**
 * Applies `transform` to the text between double-quoted strings, leaving the
 * strings themselves untouched.
 */
export function mapOutsideStrings(text: string, transform: (segment: string) => string): string {
  let result = '';
  let segmentStart = 0;
  let i = 0;

  while (i < text.length) {
    if (text[i] !== '"') {
      i++;
      continue;
    }
    result += transform(text.slice(segmentStart, i));

    let end = i + 1;
    while (end < text.length && text[end] !== '"') {
      end += text[end] === '\\' ? 2 : 1;
    }
    end = Math.min(end + 1, text.length);
    result += text.slice(i, end);
    segmentStart = end;
    i = end;
  }

  return result + transform(text.slice(segmentStart));
}

export const stripCodeFence: RepairStep = {
  name: 'strip-code-fence',
  apply(text) {
    const trimmed = text.trim();
    const fenced = /^```(?:json|javascript|js)?\s*\n?([\s\S]*?)\n?\s*```$/i.exec(trimmed);
    if (fenced) return fenced[1].trim();
    // a fence opened before the brace and never closed
    return trimmed.replace(/^```(?:json)?\s*/i, '').replace(/\s*```$/, '');
  },
};

export const stripComments: RepairStep = {
  name: 'strip-comments',
  apply(text) {
    let out = '';
    let quote: string | null = null;
    let escaped = false;

    for (let i = 0; i < text.length; i++) {
      const ch = text[i];

      if (quote !== null) {
        out += ch;
        if (escaped) escaped = false;
        else if (ch === '\\') escaped = true;
        else if (ch === quote) quote = null;
        continue;
      }

      if (ch === '"' || ch === "'") {
        quote = ch;
        out += ch;
      } else if (ch === '/' && text[i + 1] === '/') {
        const newline = text.indexOf('\n', i);
        if (newline === -1) break;
        i = newline - 1;
      } else if (ch === '/' && text[i + 1] === '*') {
        const close = text.indexOf('*/', i + 2);
        if (close === -1) break;
        i = close + 1;
      } else {
        out += ch;
      }
    }
    return out;
  },
};

export const normalizeQuotes: RepairStep = {
  name: 'normalize-quotes',
  apply(text) {
    return text
      .replace(/[“”„‟«»]/g, '"')
      .replace(/[‘’‚‛]/g, "'");
  },
};

/** `{\"mcp\": \"x\"}` as produced by models that escape twice */
export const stripSpuriousBackslashes: RepairStep = {
  name: 'strip-spurious-backslashes',
  apply(text) {
    return text
      .replace(/([{,]\s*)\\+"/g, '$1"')
      .replace(/\\+":/g, '":')
      .replace(/\\+",/g, '",')
      .replace(/\\+"(\s*)}/g, '"$1}')
      .replace(/:(\s*)\\+"/g, ':$1"');
  },
};

export const removeTrailingCommas: RepairStep = {
  name: 'remove-trailing-commas',
  apply(text) {
    return mapOutsideStrings(text, segment => segment.replace(/,(\s*[}\]])/g, '$1'));
  },
};

/** Keeps the first object when two are glued together: `{...}{...}` */
export const extractFirstObject: RepairStep = {
  name: 'extract-first-object',
  apply(text) {
    const open = text.indexOf('{');
    if (open === -1) return text;
    const span = stringAwareMatcher.match(text, open) ?? naiveMatcher.match(text, open);
    return span ? text.slice(span.start, span.end) : text;
  },
};

export const replaceUndefinedNaN: RepairStep = {
  name: 'replace-undefined-nan',
  apply(text) {
    return mapOutsideStrings(text, segment => segment.replace(/\b(?:undefined|NaN)\b/g, 'null'));
  },
};

export const quoteUnquotedKeys: RepairStep = {
  name: 'quote-unquoted-keys',
  apply(text) {
    return mapOutsideStrings(text, segment =>
      segment.replace(/([{,]\s*)([A-Za-z_$][\w$]*)\s*:/g, '$1"$2":')
    );
  },
};

export const escapeNewlinesInStrings: RepairStep = {
  name: 'escape-newlines-in-strings',
  apply(text) {
    let out = '';
    let inString = false;
    let escaped = false;

    for (const ch of text) {
      if (!inString) {
        if (ch === '"') inString = true;
        out += ch;
        continue;
      }
      if (escaped) {
        escaped = false;
        out += ch;
      } else if (ch === '\\') {
        escaped = true;
        out += ch;
      } else if (ch === '"') {
        inString = false;
        out += ch;
      } else if (ch === '\n') {
        out += '\\n';
      } else if (ch === '\r') {
        out += '\\r';
      } else if (ch === '\t') {
        out += '\\t';
      } else {
        out += ch;
      }
    }
    return out;
  },
};

export const BASE_STEPS: readonly RepairStep[] = [
  stripCodeFence,
  stripComments,
  normalizeQuotes,
  stripSpuriousBackslashes,
  removeTrailingCommas,
];

/** Used for tool-call arguments that arrive as a JSON string */
export const EXTENDED_STEPS: readonly RepairStep[] = [
  extractFirstObject,
  ...BASE_STEPS,
  replaceUndefinedNaN,
  quoteUnquotedKeys,
  escapeNewlinesInStrings,
];

/**
 * Runs steps in order until the text parses as strict JSON.
 * Returns the last transformed text either way.
 */
export function runRepairPipeline(text: string, steps: readonly RepairStep[]): string {
  let current = text;
  if (tryParse(current).ok) return current;

  for (const step of steps) {
    current = step.apply(current);
    if (tryParse(current).ok) return current;
  }
  return current;
}

export function normalizeCommandJson(text: string): string {
  return runRepairPipeline(text, BASE_STEPS);
}

export function normalizeCommandJsonExtended(text: string): string {
  return runRepairPipeline(text, EXTENDED_STEPS);
}

/**
 * Rewrites single-quoted strings as double-quoted ones.
 */
function convertSingleQuotedStrings(text: string): string {
  let out = '';
  let i = 0;

  while (i < text.length) {
    const ch = text[i];

    if (ch === '"') {
      let end = i + 1;
      while (end < text.length && text[end] !== '"') {
        end += text[end] === '\\' ? 2 : 1;
      }
      out += text.slice(i, end + 1);
      i = end + 1;
      continue;
    }

    if (ch === "'") {
      let body = '';
      let end = i + 1;
      while (end < text.length && text[end] !== "'") {
        if (text[end] === '\\' && text[end + 1] === "'") {
          body += "'";
          end += 2;
        } else if (text[end] === '\\') {
          body += text.slice(end, end + 2);
          end += 2;
        } else if (text[end] === '"') {
          body += '\\"';
          end++;
        } else {
          body += text[end];
          end++;
        }
      }
      out += `"${body}"`;
      i = end + 1;
      continue;
    }

    out += ch;
    i++;
  }
  return out;
}

/**
 * Literal-style parse for payloads written as object literals:
 * single-quoted strings, `True`/`False`/`None`, trailing commas.
 * Returns undefined when even that fails.
 */
export function parseLiteral(text: string): unknown {
  const doubled = convertSingleQuotedStrings(text);
  const literals = mapOutsideStrings(doubled, segment =>
    segment
      .replace(/\bTrue\b/g, 'true')
      .replace(/\bFalse\b/g, 'false')
      .replace(/\bNone\b/g, 'null')
      .replace(/,(\s*[}\]])/g, '$1')
  );
  const parsed = tryParse(literals);
  return parsed.ok ? parsed.value : undefined;
}

/**
 * Normalizes and parses one command payload. Returns null when nothing
 * usable comes out; arrays and scalars count as unusable. Never throws.
 */
export function parseCommandObject(
  raw: string,
  options: { extended?: boolean } = {}
): Record<string, unknown> | null {
  const normalized = options.extended ? normalizeCommandJsonExtended(raw) : normalizeCommandJson(raw);

  const strict = tryParse(normalized);
  if (strict.ok) return isRecord(strict.value) ? strict.value : null;

  const literal = parseLiteral(normalized);
  return isRecord(literal) ? literal : null;
}

/** True when `raw` parses to an object naming both an `mcp` server and a `tool` */
export function isToolCallPayload(raw: string): boolean {
  const data = parseCommandObject(raw);
  return data !== null && 'mcp' in data && 'tool' in data;
}
