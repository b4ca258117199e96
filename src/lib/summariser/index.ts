/**
 * Summarisation: evidence reconciliation core plus the two summary approaches.
 *
 * @module summariser
 */

export * from "./types";
export { RecordUniverse, summariseSupport } from "./record-universe";
export { classifyStance, toStance } from "./stance";
export { validateIds } from "./evidence-validation";
export { matchRecordIds, tokenize } from "./lexical-match";
export { reconcileBullets } from "./bullets";
export { buildFallbackClusters, reconcileClusters } from "./clusters";
export { buildEvidenceIndex, referencedIdsFromBullets, referencedIdsFromClusters } from "./evidence-index";
export { buildMetrics, detectConflictingSignals } from "./metrics";
export { summariseOrganisation } from "./organisation-summary";
export { summariseQuestion } from "./question-summary";
export { parseOrganisationSummary, parseQuestionSummary } from "./result-schemas";
export type { SummarySettings } from "./settings";
