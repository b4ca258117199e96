/**
 * Schemas for summary results read back from the cache. A cached payload
 * that does not match is treated as a cache miss.
 *
 * @module summariser/result-schemas
 */

import { z } from "zod";
import type { OrganisationSummaryResult, QuestionSummaryResult } from "./types";

const BulletPointSchema = z.object({
  text: z.string(),
  evidenceIds: z.array(z.string()),
  count: z.number().int().nonnegative(),
  supportingResponseIds: z.array(z.string()),
  supportingOrganisations: z.array(z.string()),
});

const QuestionClusterSchema = z.object({
  clusterId: z.string(),
  label: z.string(),
  stance: z.string(),
  memberRecordIds: z.array(z.string()),
  evidenceIds: z.array(z.string()),
  significance: z.string(),
  description: z.string(),
  memberCount: z.number().int().nonnegative(),
  responseCount: z.number().int().nonnegative(),
  organisationCount: z.number().int().nonnegative(),
  supportingResponseIds: z.array(z.string()),
  supportingOrganisations: z.array(z.string()),
});

const EvidenceRefSchema = z.object({
  recordId: z.string(),
  excerpt: z.string(),
});

const SummaryMetricsSchema = z.object({
  coverage: z.number(),
  evidenceCoverage: z.number(),
  compressionRatio: z.number(),
  uncertaintyFlags: z.array(
    z.enum(["low_sample_size", "conflicting_stance_signals", "high_missingness", "llm_fallback"]),
  ),
  latencySeconds: z.number(),
  costEstimateUsd: z.number(),
  inputChars: z.number().int(),
  outputChars: z.number().int(),
  inputTokens: z.number().int(),
  outputTokens: z.number().int(),
});

const SectionSummarySchema = z.object({
  section: z.string(),
  mainPoints: z.array(BulletPointSchema),
  concerns: z.array(BulletPointSchema),
  asks: z.array(BulletPointSchema),
  nuances: z.array(BulletPointSchema),
  recordsSummarised: z.number().int(),
  totalRecords: z.number().int(),
});

export const OrganisationSummaryResultSchema = z.object({
  approach: z.literal("approach_1"),
  responseId: z.string(),
  organisationName: z.string(),
  organisationType: z.string(),
  region: z.string(),
  overallStance: z.string(),
  keySupports: z.array(BulletPointSchema),
  keyConcerns: z.array(BulletPointSchema),
  asksOrRecommendations: z.array(BulletPointSchema),
  sectionSummaries: z.array(SectionSummarySchema),
  evidenceIndex: z.array(EvidenceRefSchema),
  metrics: SummaryMetricsSchema,
});

export const QuestionSummaryResultSchema = z.object({
  approach: z.literal("approach_2"),
  questionId: z.string(),
  questionText: z.string(),
  section: z.string(),
  headline: z.string(),
  narrative: z.string(),
  majorityView: z.array(BulletPointSchema),
  minorityView: z.array(BulletPointSchema),
  keyArgumentsFor: z.array(BulletPointSchema),
  keyArgumentsAgainst: z.array(BulletPointSchema),
  distribution: z.record(z.string(), z.number()),
  mainstreamClusters: z.array(QuestionClusterSchema),
  minorityClusters: z.array(QuestionClusterSchema),
  evidenceIndex: z.array(EvidenceRefSchema),
  metrics: SummaryMetricsSchema,
});

export function parseOrganisationSummary(payload: unknown): OrganisationSummaryResult | null {
  const result = OrganisationSummaryResultSchema.safeParse(payload);
  return result.success ? result.data : null;
}

export function parseQuestionSummary(payload: unknown): QuestionSummaryResult | null {
  const result = QuestionSummaryResultSchema.safeParse(payload);
  return result.success ? result.data : null;
}
