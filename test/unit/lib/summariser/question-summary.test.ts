/**
 * Question Summary (Approach 2) Tests
 *
 * @module summariser/question-summary.test
 */

import { describe, expect, it } from "vitest";
import { buildFallbackPayload, summariseQuestion } from "@/lib/summariser/question-summary";
import type { QuestionSlice } from "@/lib/summariser/types";
import { FakeLLMProvider, TEST_SUMMARY_SETTINGS, makeRecord } from "@test/helpers/records";

function makeSlice(): QuestionSlice {
  return {
    question: {
      questionId: "Q01",
      questionText: "Do you agree with the proposal?",
      section: "General",
      primaryColumn: { uniqueName: "Q1", rawName: "Q1", index: 4 },
      supplementalColumns: [],
    },
    items: [
      makeRecord({
        responseId: "R_A",
        choiceValue: "Strongly agree",
        answerText: "Choice: Strongly agree. Faster grid connections",
      }),
      makeRecord({ responseId: "R_B", choiceValue: "Yes", answerText: "Yes" }),
      makeRecord({ responseId: "R_C", choiceValue: "No", answerText: "Choice: No. Cost of the reforms" }),
    ],
  };
}

function timeoutError(): Error {
  const err = new Error("The operation timed out");
  err.name = "TimeoutError";
  return err;
}

describe("buildFallbackPayload", () => {
  it("names the first dominant label", () => {
    const payload = buildFallbackPayload({ Yes: 40, No: 40, Maybe: 20 }, "TimeoutError");
    expect(payload.headline).toBe("Fallback summary (LLM timeout): dominant stance is Yes at 40.0%.");
    expect(payload.narrative).toBe(
      "Generated without model response due to: TimeoutError. Viewpoints and clusters are inferred from local response signals.",
    );
    expect(payload.mainstream_clusters).toEqual([]);
  });

  it("handles an empty distribution", () => {
    expect(buildFallbackPayload({}, "Error").headline).toBe(
      "Fallback summary (LLM timeout): no structured distribution available.",
    );
  });
});

describe("summariseQuestion", () => {
  it("reconciles a model payload and fills empty views from clusters", async () => {
    const llm = new FakeLLMProvider([
      {
        headline: "Broad support",
        narrative: "Most respondents agree.",
        majority_view: [{ text: "Faster connections", evidence_ids: ["R_A:Q01", "R_X:Q01"] }],
        mainstream_clusters: [
          {
            cluster_id: "m1",
            label: "Speed",
            stance: "Support",
            member_record_ids: ["R_A:Q01", "R_B:Q01"],
            evidence_ids: ["R_A:Q01"],
            significance: "Most respondents",
          },
        ],
        minority_clusters: [],
      },
    ]);

    const result = await summariseQuestion({
      llm,
      settings: TEST_SUMMARY_SETTINGS,
      slice: makeSlice(),
      totalOrganisations: 4,
    });

    expect(llm.requests).toHaveLength(1);
    expect(llm.requests[0].temperature).toBe(0.1);
    expect(llm.requests[0].userPrompt).toContain("R_A:Q01 | Org R_A | Strongly agree | Choice: Strongly agree.");

    expect(result.headline).toBe("Broad support");
    expect(result.distribution).toEqual({ "Strongly agree": 33.33, Yes: 33.33, No: 33.33 });
    expect(result.majorityView).toEqual([
      {
        text: "Faster connections",
        evidenceIds: ["R_A:Q01"],
        count: 1,
        supportingResponseIds: ["R_A"],
        supportingOrganisations: ["Org R_A"],
      },
    ]);

    expect(result.mainstreamClusters).toHaveLength(1);
    expect(result.mainstreamClusters[0]).toMatchObject({
      clusterId: "m1",
      stance: "support",
      memberRecordIds: ["R_A:Q01", "R_B:Q01"],
      evidenceIds: ["R_A:Q01"],
      description: "Most respondents",
      memberCount: 2,
      responseCount: 2,
      organisationCount: 2,
    });

    // No minority clusters from the model: stance buckets stand in
    expect(result.minorityClusters.map((c) => [c.clusterId, c.label, c.memberRecordIds])).toEqual([
      ["minority_1", "Support viewpoint", ["R_A:Q01", "R_B:Q01"]],
      ["minority_2", "Concern viewpoint", ["R_C:Q01"]],
    ]);

    expect(result.keyArgumentsFor.map((b) => b.text)).toEqual(["Most respondents"]);
    expect(result.minorityView.map((b) => b.text)).toEqual(["Auto-clustered by stance: support."]);
    expect(result.keyArgumentsAgainst).toEqual([
      {
        text: "Auto-clustered by stance: concern.",
        evidenceIds: ["R_C:Q01"],
        count: 1,
        supportingResponseIds: ["R_C"],
        supportingOrganisations: ["Org R_C"],
      },
    ]);

    expect(result.evidenceIndex.map((e) => e.recordId)).toEqual(["R_A:Q01", "R_B:Q01", "R_C:Q01"]);
    expect(result.metrics.coverage).toBe(0.75);
    expect(result.metrics.inputTokens).toBe(100);
    expect(result.metrics.outputTokens).toBe(50);
    expect(result.metrics.costEstimateUsd).toBeCloseTo(0.00024, 6);
    expect(result.metrics.uncertaintyFlags).toEqual(["low_sample_size", "conflicting_stance_signals"]);
  });

  it("uses the deterministic fallback when the model call fails", async () => {
    const llm = new FakeLLMProvider([timeoutError()]);
    const result = await summariseQuestion({
      llm,
      settings: TEST_SUMMARY_SETTINGS,
      slice: makeSlice(),
      totalOrganisations: 3,
    });

    expect(result.headline).toBe("Fallback summary (LLM timeout): dominant stance is Strongly agree at 33.3%.");
    expect(result.narrative).toBe(
      "Generated without model response due to: TimeoutError. Viewpoints and clusters are inferred from local response signals.",
    );
    expect(result.mainstreamClusters.map((c) => [c.clusterId, c.stance, c.memberRecordIds])).toEqual([
      ["mainstream_1", "support", ["R_A:Q01", "R_B:Q01"]],
      ["mainstream_2", "concern", ["R_C:Q01"]],
    ]);
    expect(result.majorityView).toEqual([
      {
        text: "Auto-clustered by stance: support.",
        evidenceIds: ["R_A:Q01", "R_B:Q01"],
        count: 2,
        supportingResponseIds: ["R_A", "R_B"],
        supportingOrganisations: ["Org R_A", "Org R_B"],
      },
    ]);
    expect(result.keyArgumentsAgainst.map((b) => b.evidenceIds)).toEqual([["R_C:Q01"]]);
    expect(result.metrics.inputTokens).toBe(0);
    expect(result.metrics.costEstimateUsd).toBe(0);
    expect(result.metrics.evidenceCoverage).toBe(1);
    expect(result.metrics.uncertaintyFlags).toEqual([
      "low_sample_size",
      "conflicting_stance_signals",
      "llm_fallback",
    ]);
  });

  it("keeps every cited id inside the question's records", async () => {
    const llm = new FakeLLMProvider([
      {
        majority_view: [{ text: "Unrelated words entirely", evidence_ids: ["R_Z:Q09"] }],
        mainstream_clusters: [{ label: "Ghost", stance: "support", member_record_ids: ["R_Z:Q09"] }],
      },
    ]);
    const slice = makeSlice();
    const result = await summariseQuestion({ llm, settings: TEST_SUMMARY_SETTINGS, slice, totalOrganisations: 3 });

    const known = new Set(slice.items.map((r) => r.recordId));
    const cited = [
      ...result.majorityView.flatMap((b) => b.evidenceIds),
      ...result.mainstreamClusters.flatMap((c) => [...c.memberRecordIds, ...c.evidenceIds]),
      ...result.evidenceIndex.map((e) => e.recordId),
    ];
    expect(cited.every((id) => known.has(id))).toBe(true);
    expect(result.mainstreamClusters[0].memberRecordIds.length).toBeGreaterThan(0);
  });
});
