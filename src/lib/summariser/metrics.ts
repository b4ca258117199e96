/**
 * Summary Metrics
 *
 * Deterministic quality and cost KPIs for one summary run.
 *
 * @module summariser/metrics
 */

import { CONCERN_CHOICES, SUPPORT_CHOICES, normalizeChoice } from "../processing";
import type { BulletPoint, ResponseRecord, SummaryMetrics, UncertaintyFlag } from "./types";

/** Minimum share each side needs before stance signals count as conflicting */
const CONFLICT_RATIO = 0.25;

export interface MetricsInput {
  coverageNumerator: number;
  coverageDenominator: number;
  bullets: readonly BulletPoint[];
  inputChars: number;
  outputChars: number;
  inputTokens: number;
  outputTokens: number;
  latencySeconds: number;
  lowSampleThreshold: number;
  highMissingnessThreshold: number;
  costPer1kInput: number;
  costPer1kOutput: number;
  conflictingSignals: boolean;
  /** Set when at least one model call failed and a fallback payload was used */
  usedFallback?: boolean;
}

function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function ratio(numerator: number, denominator: number): number {
  if (denominator <= 0) return 0;
  return roundTo(numerator / denominator, 3);
}

export function buildMetrics(input: MetricsInput): SummaryMetrics {
  const coverage = ratio(input.coverageNumerator, input.coverageDenominator);
  const withEvidence = input.bullets.filter((b) => b.evidenceIds.length > 0).length;
  const evidenceCoverage = ratio(withEvidence, input.bullets.length);
  const compressionRatio = roundTo(input.inputChars / Math.max(input.outputChars, 1), 3);
  const missingness = 1 - coverage;

  const flags: UncertaintyFlag[] = [];
  if (input.coverageNumerator < input.lowSampleThreshold) flags.push("low_sample_size");
  if (input.conflictingSignals) flags.push("conflicting_stance_signals");
  if (missingness >= input.highMissingnessThreshold) flags.push("high_missingness");
  if (input.usedFallback) flags.push("llm_fallback");

  const costEstimate =
    (input.inputTokens / 1000) * input.costPer1kInput + (input.outputTokens / 1000) * input.costPer1kOutput;

  return {
    coverage,
    evidenceCoverage,
    compressionRatio,
    uncertaintyFlags: flags,
    latencySeconds: roundTo(input.latencySeconds, 3),
    costEstimateUsd: roundTo(costEstimate, 6),
    inputChars: input.inputChars,
    outputChars: input.outputChars,
    inputTokens: input.inputTokens,
    outputTokens: input.outputTokens,
  };
}

/**
 * True when both supportive and opposing choice labels make up at least a
 * quarter of the categorical answers.
 */
export function detectConflictingSignals(items: readonly ResponseRecord[]): boolean {
  let supportive = 0;
  let concern = 0;
  for (const item of items) {
    if (!item.choiceValue) continue;
    const label = normalizeChoice(item.choiceValue);
    if (SUPPORT_CHOICES.has(label)) supportive++;
    else if (CONCERN_CHOICES.has(label)) concern++;
  }

  const total = supportive + concern;
  if (total === 0) return false;
  return supportive / total >= CONFLICT_RATIO && concern / total >= CONFLICT_RATIO;
}
