import path from "path";
import { describe, expect, it } from "vitest";
import { SettingsError, loadSettings, modelIdentity } from "@/lib/config";

describe("loadSettings", () => {
  it("applies defaults", () => {
    const settings = loadSettings({});
    expect(settings).toEqual({
      dataCsvPath: path.resolve("data/data.csv"),
      sectionMappingPath: path.resolve("data/section-mapping.xlsx"),
      cachePath: path.resolve(".cache/summaries.sqlite"),
      cacheEnabled: true,
      llmProvider: "openai",
      openaiApiKey: "",
      openaiModel: "gpt-4.1-mini",
      openaiBaseUrl: null,
      azureOpenaiEndpoint: "",
      azureOpenaiApiVersion: "2024-06-01",
      azureOpenaiDeployment: "",
      azureOpenaiApiKey: "",
      llmTimeoutSeconds: 300,
      llmMaxRetries: 2,
      promptExcerptChars: 280,
      lowSampleThreshold: 8,
      highMissingnessThreshold: 0.35,
      inputCostPer1kTokens: 0.0008,
      outputCostPer1kTokens: 0.0032,
    });
  });

  it("reads overrides", () => {
    const settings = loadSettings({
      LLM_PROVIDER: " Azure ",
      CACHE_ENABLED: "false",
      OPENAI_BASE_URL: "http://localhost:8080/v1",
      LOW_SAMPLE_THRESHOLD: "3",
      PROMPT_EXCERPT_CHARS: "",
    });
    expect(settings.llmProvider).toBe("azure");
    expect(settings.cacheEnabled).toBe(false);
    expect(settings.openaiBaseUrl).toBe("http://localhost:8080/v1");
    expect(settings.lowSampleThreshold).toBe(3);
    expect(settings.promptExcerptChars).toBe(280);
  });

  it("raises the timeout to at least 30 seconds", () => {
    expect(loadSettings({ LLM_TIMEOUT_SECONDS: "5" }).llmTimeoutSeconds).toBe(30);
    expect(loadSettings({ LLM_TIMEOUT_SECONDS: "45" }).llmTimeoutSeconds).toBe(45);
  });

  it("reports every invalid variable at once", () => {
    let error: unknown;
    try {
      loadSettings({ LLM_MAX_RETRIES: "abc", HIGH_MISSINGNESS_THRESHOLD: "2", LLM_TIMEOUT_SECONDS: "soon" });
    } catch (err) {
      error = err;
    }
    expect(error).toBeInstanceOf(SettingsError);
    const message = error instanceof Error ? error.message : "";
    expect(message).toContain("LLM_MAX_RETRIES");
    expect(message).toContain("HIGH_MISSINGNESS_THRESHOLD");
    expect(message).toContain("LLM_TIMEOUT_SECONDS");
  });
});

describe("modelIdentity", () => {
  const base = { openaiModel: "gpt-4.1-mini", azureOpenaiDeployment: "summaries-prod" };

  it("uses the OpenAI model for openai", () => {
    expect(modelIdentity({ ...base, llmProvider: "openai" })).toBe("gpt-4.1-mini");
  });

  it("uses the deployment for azure, falling back to the model", () => {
    expect(modelIdentity({ ...base, llmProvider: "azure" })).toBe("summaries-prod");
    expect(modelIdentity({ ...base, llmProvider: "azure", azureOpenaiDeployment: "" })).toBe("gpt-4.1-mini");
  });
});
