/**
 * Prompt builders for the summarisers. Every prompt lists source records as
 * `recordId | ... | excerpt` lines so the model can cite record ids.
 *
 * @module summariser/prompts
 */

import type { OrganisationCatalog, QuestionSlice, ResponseRecord, SectionSummary } from "./types";

export interface PromptPair {
  systemPrompt: string;
  userPrompt: string;
}

const JSON_ONLY = "Respond with a single JSON object. No markdown, no commentary outside the JSON.";

export function buildSectionPrompt(
  catalog: OrganisationCatalog,
  section: string,
  records: readonly ResponseRecord[],
): PromptPair {
  const lines = records.map((r) => `${r.recordId} | ${r.questionText} | ${r.excerpt}`);
  const userPrompt = [
    `Organisation: ${catalog.organisationName}`,
    `Section: ${section}`,
    "Summarise what this organisation said in this section. Keep minority, conditional and nuanced points.",
    "Source responses:",
    ...lines,
    "",
    "JSON keys: main_points, concerns, asks, nuances.",
    "Each key holds a list of {text, evidence_ids}.",
    "evidence_ids may only contain record ids listed above.",
  ].join("\n");

  return {
    systemPrompt: `You summarise responses to a public policy consultation. ${JSON_ONLY}`,
    userPrompt,
  };
}

function sectionEvidenceIds(summary: SectionSummary): string[] {
  const ids = new Set<string>();
  for (const bullet of [...summary.mainPoints, ...summary.concerns, ...summary.asks, ...summary.nuances]) {
    for (const id of bullet.evidenceIds) ids.add(id);
  }
  return [...ids].sort();
}

export function buildRollupPrompt(catalog: OrganisationCatalog, sections: readonly SectionSummary[]): PromptPair {
  const sectionPayload = sections.map((summary) => ({
    section: summary.section,
    main_points: summary.mainPoints.map((b) => b.text),
    concerns: summary.concerns.map((b) => b.text),
    asks: summary.asks.map((b) => b.text),
    nuances: summary.nuances.map((b) => b.text),
    record_ids: sectionEvidenceIds(summary),
  }));

  const userPrompt = [
    `Organisation: ${catalog.organisationName}`,
    `Type: ${catalog.organisationType}`,
    `Region: ${catalog.region}`,
    `Answered questions: ${catalog.answeredQuestions}/${catalog.totalQuestions}`,
    "",
    "Combine the section summaries below into one organisation-level summary.",
    "Keep minority and nuanced points and cite record ids as evidence.",
    `Section summaries: ${JSON.stringify(sectionPayload)}`,
    "",
    "JSON keys: overall_stance, key_supports, key_concerns, asks_or_recommendations.",
    "List entries are {text, evidence_ids}.",
  ].join("\n");

  return {
    systemPrompt: `You write evidence-linked summaries of consultation responses. Do not add keys. ${JSON_ONLY}`,
    userPrompt,
  };
}

export function buildQuestionPrompt(slice: QuestionSlice, distribution: Record<string, number>): PromptPair {
  const lines = slice.items.map(
    (r) => `${r.recordId} | ${r.organisationName} | ${r.choiceValue ?? ""} | ${r.excerpt}`,
  );
  const userPrompt = [
    `Question ID: ${slice.question.questionId}`,
    `Question text: ${slice.question.questionText}`,
    `Section: ${slice.question.section}`,
    `Choice distribution (%): ${JSON.stringify(distribution)}`,
    "Summarise the arguments made, group mainstream positions into clusters and keep minority or outlier views.",
    "Responses:",
    ...lines,
    "",
    "JSON keys:",
    "headline (string), narrative (string), majority_view, minority_view, key_arguments_for,",
    "key_arguments_against, mainstream_clusters, minority_clusters (lists).",
    "Bullet lists hold {text, evidence_ids}.",
    "Cluster lists hold {cluster_id, label, stance, member_record_ids, evidence_ids, significance}.",
    "Cite only record ids from the responses above.",
  ].join("\n");

  return {
    systemPrompt: `You summarise policy consultation responses across many organisations and keep minority perspectives visible. ${JSON_ONLY}`,
    userPrompt,
  };
}
