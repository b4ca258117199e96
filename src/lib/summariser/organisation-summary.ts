/**
 * Organisation Summary (Approach 1)
 *
 * One model call per section of an organisation's submission, then a roll-up
 * call over the section summaries. Bullet evidence is checked against the
 * organisation's own records.
 *
 * @module summariser/organisation-summary
 */

import { debugLog } from "../debug";
import { classifyLLMError } from "../error-classification";
import type { LLMProvider, LLMUsage } from "../llm/types";
import { reconcileBullets } from "./bullets";
import { buildEvidenceIndex, referencedIdsFromBullets } from "./evidence-index";
import { buildMetrics, detectConflictingSignals } from "./metrics";
import { readText, type ModelPayload } from "./payload";
import { buildRollupPrompt, buildSectionPrompt, type PromptPair } from "./prompts";
import { RecordUniverse } from "./record-universe";
import type { SummarySettings } from "./settings";
import type {
  BulletPoint,
  OrganisationCatalog,
  OrganisationSummaryResult,
  ResponseRecord,
  SectionSummary,
} from "./types";

export interface SummariseOrganisationInput {
  llm: LLMProvider;
  settings: SummarySettings;
  catalog: OrganisationCatalog;
}

interface CallOutcome {
  payload: ModelPayload;
  usage: LLMUsage;
  inputChars: number;
  outputChars: number;
  failed: boolean;
}

async function callModel(llm: LLMProvider, prompt: PromptPair, context: string): Promise<CallOutcome> {
  try {
    const result = await llm.completeJson({ ...prompt, temperature: 0.1 });
    return {
      payload: result.payload,
      usage: result.usage,
      inputChars: prompt.userPrompt.length,
      outputChars: JSON.stringify(result.payload).length,
      failed: false,
    };
  } catch (err) {
    const classified = classifyLLMError(err);
    debugLog(`[Approach-1] ${context} failed, continuing with an empty payload`, classified);
    return {
      payload: {},
      usage: { inputTokens: 0, outputTokens: 0 },
      inputChars: prompt.userPrompt.length,
      outputChars: 0,
      failed: true,
    };
  }
}

function groupBySection(records: readonly ResponseRecord[]): Map<string, ResponseRecord[]> {
  const bySection = new Map<string, ResponseRecord[]>();
  for (const record of records) {
    const bucket = bySection.get(record.section);
    if (bucket) bucket.push(record);
    else bySection.set(record.section, [record]);
  }
  return bySection;
}

export async function summariseOrganisation(input: SummariseOrganisationInput): Promise<OrganisationSummaryResult> {
  const { llm, settings, catalog } = input;
  const startedAt = performance.now();
  const universe = new RecordUniverse(catalog.items);
  // Organisation bullets keep only the evidence the model cited
  const reconcile = (raw: unknown): BulletPoint[] => reconcileBullets(raw, universe, { lexicalFallback: false });

  let inputTokens = 0;
  let outputTokens = 0;
  let inputChars = 0;
  let outputChars = 0;
  let usedFallback = false;

  const record = (outcome: CallOutcome): void => {
    inputTokens += outcome.usage.inputTokens;
    outputTokens += outcome.usage.outputTokens;
    inputChars += outcome.inputChars;
    outputChars += outcome.outputChars;
    if (outcome.failed) usedFallback = true;
  };

  const sectionSummaries: SectionSummary[] = [];
  for (const [section, records] of groupBySection(catalog.items)) {
    const outcome = await callModel(
      llm,
      buildSectionPrompt(catalog, section, records),
      `section "${section}" for ${catalog.responseId}`,
    );
    record(outcome);

    sectionSummaries.push({
      section,
      mainPoints: reconcile(outcome.payload.main_points),
      concerns: reconcile(outcome.payload.concerns),
      asks: reconcile(outcome.payload.asks),
      nuances: reconcile(outcome.payload.nuances),
      recordsSummarised: records.length,
      totalRecords: records.length,
    });
  }

  const rollup = await callModel(llm, buildRollupPrompt(catalog, sectionSummaries), `roll-up for ${catalog.responseId}`);
  record(rollup);

  const keySupports = reconcile(rollup.payload.key_supports);
  const keyConcerns = reconcile(rollup.payload.key_concerns);
  const asksOrRecommendations = reconcile(rollup.payload.asks_or_recommendations);

  const allBullets: BulletPoint[] = [...keySupports, ...keyConcerns, ...asksOrRecommendations];
  for (const summary of sectionSummaries) {
    allBullets.push(...summary.mainPoints, ...summary.concerns, ...summary.asks, ...summary.nuances);
  }

  const evidenceIndex = buildEvidenceIndex(universe, referencedIdsFromBullets(allBullets));
  outputChars += JSON.stringify(sectionSummaries).length;

  const metrics = buildMetrics({
    coverageNumerator: catalog.answeredQuestions,
    coverageDenominator: catalog.totalQuestions,
    bullets: allBullets,
    inputChars,
    outputChars,
    inputTokens,
    outputTokens,
    latencySeconds: (performance.now() - startedAt) / 1000,
    lowSampleThreshold: settings.lowSampleThreshold,
    highMissingnessThreshold: settings.highMissingnessThreshold,
    costPer1kInput: settings.inputCostPer1kTokens,
    costPer1kOutput: settings.outputCostPer1kTokens,
    conflictingSignals: detectConflictingSignals(catalog.items),
    usedFallback,
  });

  debugLog(`[Approach-1] Summarised ${catalog.responseId}`, {
    sections: sectionSummaries.length,
    bullets: allBullets.length,
    evidence: evidenceIndex.length,
    usedFallback,
  });

  return {
    approach: "approach_1",
    responseId: catalog.responseId,
    organisationName: catalog.organisationName,
    organisationType: catalog.organisationType,
    region: catalog.region,
    overallStance: readText(rollup.payload, "overall_stance", "mixed"),
    keySupports,
    keyConcerns,
    asksOrRecommendations,
    sectionSummaries,
    evidenceIndex,
    metrics,
  };
}
