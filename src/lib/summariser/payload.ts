/**
 * Model Payload Boundary
 *
 * Model output arrives as untyped JSON. Everything in this module accepts
 * `unknown` and returns typed candidates; nothing untyped leaves it.
 *
 * Lenient schemas: a wrong-typed field falls back to its empty value instead
 * of failing the whole element, and unknown keys are stripped.
 *
 * @module summariser/payload
 */

import { z } from "zod";
import { coerceId } from "./evidence-validation";

// ============================================================================
// CANDIDATE TYPES
// ============================================================================

export interface BulletCandidate {
  text: string;
  /** Declared ids, coerced to strings but not yet checked against a universe */
  evidenceIds: string[];
  /** 0 when the model declared no usable count */
  count: number;
}

export interface ClusterCandidate {
  clusterId: string;
  label: string;
  stance: string;
  memberRecordIds: string[];
  evidenceIds: string[];
  significance: string;
  description: string;
  memberCount: number;
  responseCount: number;
  organisationCount: number;
}

/** Untyped JSON object as returned by the model layer */
export type ModelPayload = Record<string, unknown>;

// ============================================================================
// LENIENT FIELD SCHEMAS
// ============================================================================

function toIdList(values: unknown[]): string[] {
  const ids: string[] = [];
  for (const value of values) {
    const id = coerceId(value);
    if (id !== null) ids.push(id);
  }
  return ids;
}

function toCount(value: number | string): number {
  const parsed = typeof value === "number" ? value : Number(value.trim());
  if (!Number.isFinite(parsed)) return 0;
  return Math.max(0, Math.trunc(parsed));
}

const LenientText = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((value) => String(value).trim())
  .catch("");

const LenientIdList = z.array(z.unknown()).catch([]).transform(toIdList);

const LenientCount = z.union([z.number(), z.string()]).transform(toCount).catch(0);

const BulletCandidateSchema = z.object({
  text: LenientText,
  evidence_ids: LenientIdList,
  count: LenientCount,
});

const ClusterCandidateSchema = z.object({
  cluster_id: LenientText,
  label: LenientText,
  stance: LenientText,
  member_record_ids: LenientIdList,
  evidence_ids: LenientIdList,
  significance: LenientText,
  description: LenientText,
  member_count: LenientCount,
  response_count: LenientCount,
  organisation_count: LenientCount,
});

// ============================================================================
// PARSERS
// ============================================================================

/**
 * Read bullet candidates from a payload value expected to be a list.
 *
 * Object elements are read field by field; any other element becomes a
 * bare-text candidate with no evidence. Candidates with empty text are dropped.
 */
export function parseBulletCandidates(raw: unknown): BulletCandidate[] {
  if (!Array.isArray(raw)) return [];

  const candidates: BulletCandidate[] = [];
  for (const element of raw) {
    const parsed = BulletCandidateSchema.safeParse(element);
    const candidate: BulletCandidate = parsed.success
      ? { text: parsed.data.text, evidenceIds: parsed.data.evidence_ids, count: parsed.data.count }
      : { text: LenientText.parse(element), evidenceIds: [], count: 0 };
    if (candidate.text) candidates.push(candidate);
  }
  return candidates;
}

/**
 * Read cluster candidates from a payload value expected to be a list.
 * Non-object elements are skipped. Defaults (ids, labels) are applied later
 * by the reconciler, which knows the fallback prefix.
 */
export function parseClusterCandidates(raw: unknown): ClusterCandidate[] {
  if (!Array.isArray(raw)) return [];

  const candidates: ClusterCandidate[] = [];
  for (const element of raw) {
    const parsed = ClusterCandidateSchema.safeParse(element);
    if (!parsed.success) continue;
    const data = parsed.data;
    candidates.push({
      clusterId: data.cluster_id,
      label: data.label,
      stance: data.stance.toLowerCase() || "neutral",
      memberRecordIds: data.member_record_ids,
      evidenceIds: data.evidence_ids,
      significance: data.significance,
      description: data.description,
      memberCount: data.member_count,
      responseCount: data.response_count,
      organisationCount: data.organisation_count,
    });
  }
  return candidates;
}

/**
 * Read a scalar text field; anything that is not a string, number or boolean
 * yields `fallback`.
 */
export function readText(payload: ModelPayload, key: string, fallback = ""): string {
  return LenientText.parse(payload[key]) || fallback;
}
