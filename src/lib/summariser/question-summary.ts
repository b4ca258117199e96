/**
 * Question Summary (Approach 2)
 *
 * One model call over every response to a question. Viewpoint bullets are
 * reconciled with lexical evidence fallback and clusters with the tiered
 * membership fallback, so a failed or empty model call still yields
 * stance-based clusters grounded in the responses.
 *
 * @module summariser/question-summary
 */

import { debugLog } from "../debug";
import { classifyLLMError } from "../error-classification";
import type { LLMProvider } from "../llm/types";
import { calculateDistribution } from "../processing";
import { reconcileBullets } from "./bullets";
import { reconcileClusters } from "./clusters";
import { buildEvidenceIndex, referencedIdsFromBullets, referencedIdsFromClusters } from "./evidence-index";
import { buildMetrics, detectConflictingSignals } from "./metrics";
import { readText, type ModelPayload } from "./payload";
import { buildQuestionPrompt } from "./prompts";
import { RecordUniverse } from "./record-universe";
import type { SummarySettings } from "./settings";
import type { BulletPoint, QuestionCluster, QuestionSlice, QuestionSummaryResult } from "./types";

export interface SummariseQuestionInput {
  llm: LLMProvider;
  settings: SummarySettings;
  slice: QuestionSlice;
  /** Coverage denominator: organisations in the whole dataset */
  totalOrganisations: number;
}

/**
 * Deterministic payload used when the model call fails. Lists are left empty
 * so clusters come from the stance fallback.
 */
export function buildFallbackPayload(distribution: Record<string, number>, errorName: string): ModelPayload {
  let dominant: [string, number] | null = null;
  for (const entry of Object.entries(distribution)) {
    if (dominant === null || entry[1] > dominant[1]) dominant = entry;
  }

  const headline = dominant
    ? `Fallback summary (LLM timeout): dominant stance is ${dominant[0]} at ${dominant[1].toFixed(1)}%.`
    : "Fallback summary (LLM timeout): no structured distribution available.";

  return {
    headline,
    narrative:
      `Generated without model response due to: ${errorName}. ` +
      "Viewpoints and clusters are inferred from local response signals.",
    majority_view: [],
    minority_view: [],
    key_arguments_for: [],
    key_arguments_against: [],
    mainstream_clusters: [],
    minority_clusters: [],
  };
}

/**
 * Single bullet standing in for a cluster: text from its description or
 * significance, count from its response or member count.
 */
export function bulletFromCluster(cluster: QuestionCluster, fallbackText: string): BulletPoint {
  return {
    text: cluster.description || cluster.significance || fallbackText,
    evidenceIds: [...cluster.evidenceIds],
    count: cluster.responseCount || cluster.memberCount,
    supportingResponseIds: [...cluster.supportingResponseIds],
    supportingOrganisations: [...cluster.supportingOrganisations],
  };
}

export async function summariseQuestion(input: SummariseQuestionInput): Promise<QuestionSummaryResult> {
  const { llm, settings, slice, totalOrganisations } = input;
  const startedAt = performance.now();
  const universe = new RecordUniverse(slice.items);
  const distribution = calculateDistribution(slice.items);
  const prompt = buildQuestionPrompt(slice, distribution);

  let payload: ModelPayload;
  let inputTokens = 0;
  let outputTokens = 0;
  let usedFallback = false;
  try {
    const result = await llm.completeJson({ ...prompt, temperature: 0.1 });
    payload = result.payload;
    inputTokens = result.usage.inputTokens;
    outputTokens = result.usage.outputTokens;
  } catch (err) {
    const classified = classifyLLMError(err);
    debugLog(`[Approach-2] Model call for ${slice.question.questionId} failed, using fallback payload`, classified);
    payload = buildFallbackPayload(distribution, classified.name);
    usedFallback = true;
  }

  let majorityView = reconcileBullets(payload.majority_view, universe);
  let minorityView = reconcileBullets(payload.minority_view, universe);
  let keyArgumentsFor = reconcileBullets(payload.key_arguments_for, universe);
  let keyArgumentsAgainst = reconcileBullets(payload.key_arguments_against, universe);

  const mainstreamClusters = reconcileClusters(payload.mainstream_clusters, universe, "mainstream");
  const minorityClusters = reconcileClusters(payload.minority_clusters, universe, "minority");

  if (majorityView.length === 0 && mainstreamClusters.length > 0) {
    const cluster = mainstreamClusters[0];
    majorityView = [bulletFromCluster(cluster, `Mainstream view: ${cluster.label}`)];
  }
  if (minorityView.length === 0 && minorityClusters.length > 0) {
    const cluster = minorityClusters[0];
    minorityView = [bulletFromCluster(cluster, `Minority view: ${cluster.label}`)];
  }
  if (keyArgumentsFor.length === 0) {
    const supportCluster = mainstreamClusters.find((c) => c.stance === "support");
    if (supportCluster) keyArgumentsFor = [bulletFromCluster(supportCluster, supportCluster.label)];
  }
  if (keyArgumentsAgainst.length === 0) {
    const concernCluster = minorityClusters.find((c) => c.stance === "concern");
    if (concernCluster) keyArgumentsAgainst = [bulletFromCluster(concernCluster, concernCluster.label)];
  }

  const allBullets = [...majorityView, ...minorityView, ...keyArgumentsFor, ...keyArgumentsAgainst];
  const referencedIds = new Set<string>([
    ...referencedIdsFromBullets(allBullets),
    ...referencedIdsFromClusters(mainstreamClusters),
    ...referencedIdsFromClusters(minorityClusters),
  ]);
  const evidenceIndex = buildEvidenceIndex(universe, referencedIds);

  const metrics = buildMetrics({
    coverageNumerator: slice.items.length,
    coverageDenominator: totalOrganisations,
    bullets: allBullets,
    inputChars: prompt.userPrompt.length,
    outputChars: JSON.stringify(payload).length,
    inputTokens,
    outputTokens,
    latencySeconds: (performance.now() - startedAt) / 1000,
    lowSampleThreshold: settings.lowSampleThreshold,
    highMissingnessThreshold: settings.highMissingnessThreshold,
    costPer1kInput: settings.inputCostPer1kTokens,
    costPer1kOutput: settings.outputCostPer1kTokens,
    conflictingSignals: detectConflictingSignals(slice.items),
    usedFallback,
  });

  debugLog(`[Approach-2] Summarised ${slice.question.questionId}`, {
    records: slice.items.length,
    mainstreamClusters: mainstreamClusters.length,
    minorityClusters: minorityClusters.length,
    evidence: evidenceIndex.length,
    usedFallback,
  });

  return {
    approach: "approach_2",
    questionId: slice.question.questionId,
    questionText: slice.question.questionText,
    section: slice.question.section,
    headline: readText(payload, "headline"),
    narrative: readText(payload, "narrative"),
    majorityView,
    minorityView,
    keyArgumentsFor,
    keyArgumentsAgainst,
    distribution,
    mainstreamClusters,
    minorityClusters,
    evidenceIndex,
    metrics,
  };
}
