/**
 * Consultation Service Tests
 *
 * Data, fingerprint, cache and model are all in-process stand-ins.
 *
 * @module consultation-service.test
 */

import { describe, expect, it } from "vitest";
import { loadSettings, modelIdentity } from "@/lib/config";
import { ConsultationService } from "@/lib/consultation-service";
import { consultationDataFromRows } from "@/lib/ingestion";
import { ProcessingError, prepareData } from "@/lib/processing";
import { makeSummaryCacheKey, type SummaryCache } from "@/lib/summary-cache";
import type { PreparedData } from "@/lib/summariser/types";
import { FakeLLMProvider } from "@test/helpers/records";
import { SURVEY_HEADER, SURVEY_ROWS } from "@test/helpers/survey";

class MemorySummaryCache implements SummaryCache {
  readonly entries = new Map<string, string>();
  closed = false;

  async get(cacheKey: string): Promise<Record<string, unknown> | null> {
    const stored = this.entries.get(cacheKey);
    if (stored === undefined) return null;
    const parsed: unknown = JSON.parse(stored);
    return typeof parsed === "object" && parsed !== null && !Array.isArray(parsed) ? { ...parsed } : null;
  }

  async set(cacheKey: string, payload: object): Promise<void> {
    this.entries.set(cacheKey, JSON.stringify(payload));
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

function setup(responses: Array<Record<string, unknown> | Error> = []) {
  const settings = loadSettings({ CACHE_ENABLED: "false" });
  const llm = new FakeLLMProvider(responses);
  const cache = new MemorySummaryCache();
  let loads = 0;
  const loadData = (): PreparedData => {
    loads++;
    return prepareData(consultationDataFromRows([SURVEY_HEADER, ...SURVEY_ROWS]));
  };
  const service = new ConsultationService({ settings, llm, cache, loadData, dataFingerprint: () => "fp-1" });
  return { settings, llm, cache, service, loadCount: () => loads };
}

describe("ConsultationService", () => {
  it("loads the dataset once and lists options", () => {
    const { service, loadCount } = setup();
    expect(service.listOrganisations().map(([id]) => id)).toEqual(["R_002", "R_003", "R_001"]);
    expect(service.listQuestions().map(([id]) => id)).toEqual(["Q01", "Q02", "Q03"]);
    expect(loadCount()).toBe(1);
  });

  it("serves a repeated question summary from the cache", async () => {
    const { service, llm, cache } = setup([{ headline: "Mixed views" }]);

    const first = await service.summariseQuestion("Q01");
    const second = await service.summariseQuestion("Q01");

    expect(llm.requests).toHaveLength(1);
    expect(second).toEqual(first);
    expect(cache.entries.size).toBe(1);
  });

  it("bypasses the cache read when asked, but still writes", async () => {
    const { service, llm, cache } = setup([{ headline: "First" }, { headline: "Second" }]);

    await service.summariseQuestion("Q01");
    const fresh = await service.summariseQuestion("Q01", { useCache: false });

    expect(llm.requests).toHaveLength(2);
    expect(fresh.headline).toBe("Second");
    expect((await service.summariseQuestion("Q01")).headline).toBe("Second");
    expect(cache.entries.size).toBe(1);
  });

  it("measures question coverage against every organisation", async () => {
    const { service } = setup();
    const result = await service.summariseQuestion("Q02");
    expect(result.metrics.coverage).toBe(0.333);
  });

  it("ignores a cached entry that is not a summary", async () => {
    const { service, llm, cache, settings } = setup();
    const key = makeSummaryCacheKey({
      approach: "approach_1",
      targetId: "R_002",
      model: modelIdentity(settings),
      dataFingerprint: "fp-1",
    });
    await cache.set(key, { headline: "stale shape" });

    const result = await service.summariseOrganisation("R_002");

    // One section plus the roll-up
    expect(llm.requests).toHaveLength(2);
    expect(result.responseId).toBe("R_002");
    expect(result.organisationName).toBe("acme Storage");
  });

  it("rejects unknown targets", async () => {
    const { service } = setup();
    await expect(service.summariseQuestion("Q99")).rejects.toThrow(ProcessingError);
    await expect(service.summariseOrganisation("R_999")).rejects.toThrow("No records found for response ID: R_999");
  });

  it("closes the cache", async () => {
    const { service, cache } = setup();
    await service.close();
    expect(cache.closed).toBe(true);
  });
});
