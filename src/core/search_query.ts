// src/core/search_query.ts
/**
 * Search intent detection and query tuning for the web search tool.
 * Word lists live in data/search_lexicon.json.
 */
import * as fs from 'fs';
import { z } from 'zod';
import { config } from '../config.js';

const lexiconSchema = z.object({
  triggers: z.array(z.string()),
  stripPhrases: z.array(z.string()),
  typoFixes: z.array(z.object({
    typo: z.string(),
    fix: z.string(),
    context: z.array(z.string()),
  })),
  fillerWords: z.array(z.string()),
  productWords: z.array(z.string()),
  noResultMarkers: z.array(z.string()),
});

export type SearchLexicon = z.infer<typeof lexiconSchema>;

let cachedLexicon: SearchLexicon | null = null;

/**
 * Reads and validates a lexicon file.
 * @throws Error when the file is missing or malformed
 */
export function readSearchLexicon(file: string): SearchLexicon {
  return lexiconSchema.parse(JSON.parse(fs.readFileSync(file, 'utf-8')));
}

/** The bundled lexicon, read on first use */
export function loadSearchLexicon(): SearchLexicon {
  if (!cachedLexicon) {
    cachedLexicon = readSearchLexicon(config.paths.searchLexiconFile);
  }
  return cachedLexicon;
}

/**
 * Decides whether a user message asks for a web search.
 */
export interface SearchIntentDetector {
  /** The query to search for, or null when no search was asked for */
  detect(message: string): string | null;
}

/**
 * Substring matching against a fixed trigger list. The query is whatever
 * follows the first matching lead-in phrase ("search for", "look up", ...).
 */
export class PhraseSearchIntentDetector implements SearchIntentDetector {
  constructor(private readonly lexicon: SearchLexicon = loadSearchLexicon()) {}

  detect(message: string): string | null {
    const lower = message.toLowerCase().trim();
    if (!this.lexicon.triggers.some(trigger => lower.includes(trigger))) return null;

    let query = lower;
    for (const phrase of this.lexicon.stripPhrases) {
      const at = query.indexOf(phrase);
      if (at !== -1) {
        query = query.slice(at + phrase.length).trim();
        break;
      }
    }
    if (query.length < 2) {
      query = message.trim().slice(0, 100);
    }
    return query;
  }
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Fixes known typos when the query looks like it is about hardware. */
export function correctSearchQuery(query: string, lexicon: SearchLexicon = loadSearchLexicon()): string {
  if (query.length < 3) return query;

  let corrected = query;
  for (const { typo, fix, context } of lexicon.typoFixes) {
    const lower = corrected.toLowerCase();
    if (lower.includes(typo) && context.some(word => lower.includes(word))) {
      corrected = corrected.replace(new RegExp(`\\b${escapeRegExp(typo)}\\b`, 'gi'), fix);
    }
  }
  return corrected;
}

/**
 * Drops filler words. The shorter form is only used when at least ten
 * characters remain.
 */
export function simplifySearchQuery(query: string, lexicon: SearchLexicon = loadSearchLexicon()): string {
  if (query.length <= 10) return query;

  const filler = new RegExp(`\\b(?:${lexicon.fillerWords.map(escapeRegExp).join('|')})\\b`, 'gi');
  const simplified = query.replace(filler, ' ').replace(/\s+/g, ' ').trim();
  return simplified.length >= 10 && simplified.length < query.length ? simplified : query;
}

/**
 * Harder simplification for a second attempt after an empty result: keep
 * product-like words, else the first five significant words.
 */
export function simplifySearchQueryForRetry(query: string, lexicon: SearchLexicon = loadSearchLexicon()): string {
  const simplified = simplifySearchQuery(query, lexicon);
  if (simplified.length <= 30) return simplified;

  const words = simplified.split(' ');
  const productWords: string[] = [];
  for (const word of words) {
    if (/\d/.test(word) || lexicon.productWords.includes(word)) {
      productWords.push(word);
    } else if (productWords.length > 0 && !['the', 'and', 'for'].includes(word.toLowerCase())) {
      productWords.push(word);
    }
  }
  const productQuery = productWords.join(' ');
  if (productQuery.length >= 10) return productQuery;

  const significant = words.filter(word => word.length > 2 && !['the', 'for', 'and', 'are'].includes(word.toLowerCase()));
  return significant.length > 0 ? significant.slice(0, 5).join(' ') : simplified;
}

export function tuneSearchQuery(query: string, lexicon: SearchLexicon = loadSearchLexicon()): string {
  return simplifySearchQuery(correctSearchQuery(query, lexicon), lexicon);
}

/** True when a search tool answered but found nothing */
export function isEmptySearchResult(result: string, lexicon: SearchLexicon = loadSearchLexicon()): boolean {
  const lower = result.toLowerCase();
  return lexicon.noResultMarkers.some(marker => lower.includes(marker));
}
