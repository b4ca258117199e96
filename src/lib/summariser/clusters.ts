/**
 * Cluster Reconciliation
 *
 * Normalises model cluster candidates into clusters whose members and
 * evidence all exist in the record universe. Membership falls through
 * successively weaker tiers until something is found:
 *
 *   1. declared member ids that exist in the universe
 *   2. token-overlap match on label + significance/description
 *   3. records whose classified stance equals the cluster's stance
 *   4. the first records of the universe
 *
 * Tier 4 can attach records with no connection to the label. That is known
 * and kept: a cluster over a non-empty universe always has members.
 *
 * @module summariser/clusters
 */

import { validateIds } from "./evidence-validation";
import { matchRecordIds } from "./lexical-match";
import { parseClusterCandidates, type ClusterCandidate } from "./payload";
import { summariseSupport, type RecordUniverse } from "./record-universe";
import { classifyStance, titleCase, toStance } from "./stance";
import { STANCES, type QuestionCluster, type ResponseRecord, type Stance } from "./types";

export const CLUSTER_MATCH_TOP_K = 14;
export const STANCE_BUCKET_LIMIT = 14;
export const SAMPLE_MEMBER_LIMIT = 8;
export const CLUSTER_EVIDENCE_LIMIT = 8;

// ============================================================================
// FALLBACK CLUSTERS
// ============================================================================

/**
 * One cluster per non-empty stance bucket, largest first. Equal sizes keep
 * the order support, concern, neutral, other.
 */
export function buildFallbackClusters(universe: RecordUniverse, prefix: string): ClusterCandidate[] {
  const buckets = new Map<Stance, ResponseRecord[]>(STANCES.map((stance) => [stance, []]));
  for (const record of universe.records) {
    buckets.get(classifyStance(record))?.push(record);
  }

  const ordered = [...buckets.entries()]
    .filter(([, records]) => records.length > 0)
    .sort((a, b) => b[1].length - a[1].length);

  return ordered.map(([stance, records], index) => {
    const ids = records.map((record) => record.recordId);
    return {
      clusterId: `${prefix}_${index + 1}`,
      label: `${titleCase(stance)} viewpoint`,
      stance,
      memberRecordIds: ids,
      evidenceIds: ids.slice(0, CLUSTER_EVIDENCE_LIMIT),
      significance: `Auto-clustered by stance: ${stance}.`,
      description: "",
      memberCount: 0,
      responseCount: 0,
      organisationCount: 0,
    };
  });
}

// ============================================================================
// RECONCILIATION
// ============================================================================

function resolveMembers(candidate: ClusterCandidate, universe: RecordUniverse): string[] {
  const declared = validateIds(candidate.memberRecordIds, universe);
  if (declared.length > 0) return declared;

  const query = `${candidate.label}. ${candidate.significance || candidate.description}`.trim();
  const matched = matchRecordIds(query || candidate.label, universe.records, CLUSTER_MATCH_TOP_K);
  if (matched.length > 0) return matched;

  const stance = toStance(candidate.stance);
  if (stance !== null) {
    const stanceBucket = universe.records
      .filter((record) => classifyStance(record) === stance)
      .map((record) => record.recordId);
    if (stanceBucket.length > 0) return stanceBucket.slice(0, STANCE_BUCKET_LIMIT);
  }

  return universe.records.slice(0, SAMPLE_MEMBER_LIMIT).map((record) => record.recordId);
}

function reconcileCluster(
  candidate: ClusterCandidate,
  universe: RecordUniverse,
  fallbackPrefix: string,
  index: number,
): QuestionCluster {
  const memberRecordIds = resolveMembers(candidate, universe);

  let evidenceIds = validateIds(candidate.evidenceIds, universe);
  if (evidenceIds.length === 0) {
    evidenceIds = memberRecordIds.slice(0, CLUSTER_EVIDENCE_LIMIT);
  }

  const support = summariseSupport(universe.resolve(memberRecordIds));
  const memberCount = candidate.memberCount || memberRecordIds.length;
  const responseCount = candidate.responseCount || support.responseIds.length;
  const organisationCount = candidate.organisationCount || support.organisations.length;

  const description =
    candidate.description ||
    candidate.significance ||
    `${responseCount} responses from ${organisationCount} organisations with ${candidate.stance || "mixed"} stance.`;

  return {
    clusterId: candidate.clusterId || `${fallbackPrefix}_${index}`,
    label: candidate.label || `${titleCase(fallbackPrefix)} cluster ${index}`,
    stance: candidate.stance || "neutral",
    memberRecordIds,
    evidenceIds,
    significance: candidate.significance,
    description,
    memberCount,
    responseCount,
    organisationCount,
    supportingResponseIds: support.responseIds,
    supportingOrganisations: support.organisations,
  };
}

/**
 * Reconcile a raw payload value (expected: list of cluster objects).
 *
 * When the value yields no candidates, stance-based fallback clusters are
 * built from the universe instead. Every returned cluster has at least one
 * member unless the universe itself is empty.
 */
export function reconcileClusters(raw: unknown, universe: RecordUniverse, fallbackPrefix: string): QuestionCluster[] {
  const parsed = parseClusterCandidates(raw);
  const candidates = parsed.length > 0 ? parsed : buildFallbackClusters(universe, fallbackPrefix);

  return candidates
    .map((candidate, i) => reconcileCluster(candidate, universe, fallbackPrefix, i + 1))
    .filter((cluster) => cluster.label.trim().length > 0);
}
