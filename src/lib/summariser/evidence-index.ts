/**
 * Evidence Index
 *
 * Joins every record id cited by bullets or clusters back to its source
 * excerpt for display.
 *
 * @module summariser/evidence-index
 */

import type { RecordUniverse } from "./record-universe";
import type { BulletPoint, EvidenceRef, QuestionCluster } from "./types";

export function referencedIdsFromBullets(bullets: readonly BulletPoint[]): Set<string> {
  const ids = new Set<string>();
  for (const bullet of bullets) {
    for (const id of bullet.evidenceIds) ids.add(id);
  }
  return ids;
}

export function referencedIdsFromClusters(clusters: readonly QuestionCluster[]): Set<string> {
  const ids = new Set<string>();
  for (const cluster of clusters) {
    for (const id of cluster.memberRecordIds) ids.add(id);
    for (const id of cluster.evidenceIds) ids.add(id);
  }
  return ids;
}

/**
 * Evidence refs sorted by record id. Ids missing from the universe are skipped.
 */
export function buildEvidenceIndex(universe: RecordUniverse, referencedIds: Iterable<string>): EvidenceRef[] {
  const unique = [...new Set(referencedIds)].sort();
  const index: EvidenceRef[] = [];
  for (const recordId of unique) {
    const record = universe.get(recordId);
    if (record) index.push({ recordId, excerpt: record.excerpt });
  }
  return index;
}
