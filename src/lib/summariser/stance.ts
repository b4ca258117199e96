/**
 * Stance Classification
 *
 * Rule cascade: canonical choice label first, then keyword substrings in the
 * answer text, then "other".
 *
 * @module summariser/stance
 */

import { CONCERN_CHOICES, NEUTRAL_CHOICES, SUPPORT_CHOICES, normalizeChoice } from "../processing";
import { STANCES, type ResponseRecord, type Stance } from "./types";

const SUPPORT_KEYWORDS = ["support", "welcome", "agree"];
const CONCERN_KEYWORDS = ["concern", "risk", "oppose", "disagree"];

export function classifyStance(record: Pick<ResponseRecord, "choiceValue" | "answerText">): Stance {
  const label = normalizeChoice(record.choiceValue);
  if (SUPPORT_CHOICES.has(label)) return "support";
  if (CONCERN_CHOICES.has(label)) return "concern";
  if (NEUTRAL_CHOICES.has(label)) return "neutral";

  // Support keywords are tested first, so "disagree" (which contains "agree") lands on support.
  const text = record.answerText.toLowerCase();
  if (SUPPORT_KEYWORDS.some((word) => text.includes(word))) return "support";
  if (CONCERN_KEYWORDS.some((word) => text.includes(word))) return "concern";
  return "other";
}

/**
 * Map a free-form stance string (as carried on clusters) onto the closed union.
 * Returns null for anything outside it, e.g. "mixed".
 */
export function toStance(value: string): Stance | null {
  const normalized = value.trim().toLowerCase();
  return STANCES.find((stance) => stance === normalized) ?? null;
}

export function titleCase(value: string): string {
  return value.replace(/[A-Za-z]+/g, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}
