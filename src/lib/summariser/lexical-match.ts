/**
 * Lexical Matching
 *
 * Token-overlap retrieval used when a model-declared evidence list is empty
 * or entirely invalid. Scores are the share of query tokens found in a
 * record's answer text.
 *
 * @module summariser/lexical-match
 */

import type { ResponseRecord } from "./types";

export const MIN_MATCH_SCORE = 0.08;

/** Results returned when nothing clears MIN_MATCH_SCORE but something overlapped */
const WEAK_MATCH_LIMIT = 3;

// Common English words plus consultation boilerplate ("please provide your reasoning").
const STOPWORDS: ReadonlySet<string> = new Set([
  "the",
  "and",
  "for",
  "with",
  "that",
  "this",
  "from",
  "into",
  "our",
  "your",
  "you",
  "are",
  "was",
  "were",
  "have",
  "has",
  "had",
  "what",
  "when",
  "where",
  "which",
  "would",
  "could",
  "should",
  "their",
  "them",
  "they",
  "about",
  "please",
  "provide",
  "reasoning",
  "approach",
  "agree",
  "disagree",
  "question",
  "response",
  "option",
  "page",
]);

/**
 * Lower-case, split on anything non-alphanumeric, drop short tokens and stopwords.
 */
export function tokenize(text: string): Set<string> {
  const tokens = new Set<string>();
  for (const token of text.toLowerCase().replace(/[^\p{L}\p{N}]/gu, " ").split(/\s+/)) {
    if (token.length > 2 && !STOPWORDS.has(token)) tokens.add(token);
  }
  return tokens;
}

export function tokenOverlapScore(queryTokens: ReadonlySet<string>, docTokens: ReadonlySet<string>): number {
  if (queryTokens.size === 0 || docTokens.size === 0) return 0;
  let overlap = 0;
  for (const token of queryTokens) {
    if (docTokens.has(token)) overlap++;
  }
  return overlap / queryTokens.size;
}

/**
 * Rank records against `queryText` and return up to `topK` record ids.
 *
 * Ties keep record order. When no record reaches MIN_MATCH_SCORE but at least
 * one overlaps, the best `min(topK, 3)` are returned anyway.
 */
export function matchRecordIds(queryText: string, records: readonly ResponseRecord[], topK: number): string[] {
  const queryTokens = tokenize(queryText);
  if (queryTokens.size === 0) return [];

  const scored: Array<{ score: number; recordId: string }> = [];
  for (const record of records) {
    const score = tokenOverlapScore(queryTokens, tokenize(record.answerText));
    if (score > 0) scored.push({ score, recordId: record.recordId });
  }

  // Array.prototype.sort is stable, so equal scores keep record order
  scored.sort((a, b) => b.score - a.score);

  const selected = scored
    .filter((entry) => entry.score >= MIN_MATCH_SCORE)
    .slice(0, Math.max(topK, 0))
    .map((entry) => entry.recordId);

  if (selected.length === 0 && scored.length > 0) {
    return scored.slice(0, Math.min(topK, WEAK_MATCH_LIMIT)).map((entry) => entry.recordId);
  }
  return selected;
}
