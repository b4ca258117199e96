/**
 * Bullet Reconciliation
 *
 * Turns raw bullet candidates from a model payload into evidence-linked,
 * support-annotated bullet points. Each candidate is reconciled on its own;
 * identical texts are not merged.
 *
 * @module summariser/bullets
 */

import { validateIds } from "./evidence-validation";
import { matchRecordIds } from "./lexical-match";
import { parseBulletCandidates } from "./payload";
import { summariseSupport, type RecordUniverse } from "./record-universe";
import type { BulletPoint } from "./types";

export const BULLET_MATCH_TOP_K = 8;

export interface ReconcileBulletsOptions {
  /**
   * Search the universe for evidence when none of the declared ids survive
   * validation. Defaults to true.
   */
  lexicalFallback?: boolean;
}

/**
 * Reconcile a raw payload value (expected: list of `{text, evidence_ids, count}`).
 *
 * - evidence ids are filtered to the universe; when none survive and the
 *   lexical fallback is on, the best token-overlap matches for the text are used
 * - supporting response ids / organisations come from the evidence records
 * - count is the declared count when non-zero, else the distinct response ids
 */
export function reconcileBullets(
  raw: unknown,
  universe: RecordUniverse,
  options: ReconcileBulletsOptions = {},
): BulletPoint[] {
  const lexicalFallback = options.lexicalFallback ?? true;

  return parseBulletCandidates(raw).map((candidate) => {
    let evidenceIds = validateIds(candidate.evidenceIds, universe);
    if (evidenceIds.length === 0 && lexicalFallback) {
      evidenceIds = matchRecordIds(candidate.text, universe.records, BULLET_MATCH_TOP_K);
    }

    const support = summariseSupport(universe.resolve(evidenceIds));
    return {
      text: candidate.text,
      evidenceIds,
      count: candidate.count || support.responseIds.length,
      supportingResponseIds: support.responseIds,
      supportingOrganisations: support.organisations,
    };
  });
}
