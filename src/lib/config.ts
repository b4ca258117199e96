/**
 * Runtime settings
 *
 * Environment variables are read once into a `Settings` object and checked
 * against a zod schema. Numeric variables that do not parse are collected and
 * reported together in a single `SettingsError`.
 *
 * @module config
 */

import path from "path";
import dotenv from "dotenv";
import { z } from "zod";

// ============================================================================
// ERRORS
// ============================================================================

export class SettingsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SettingsError";
  }
}

// ============================================================================
// SCHEMA
// ============================================================================

/** Lower bound applied to LLM_TIMEOUT_SECONDS */
export const MIN_LLM_TIMEOUT_SECONDS = 30;

export const SettingsSchema = z.object({
  dataCsvPath: z.string().min(1),
  sectionMappingPath: z.string().min(1),
  cachePath: z.string().min(1),
  cacheEnabled: z.boolean(),
  llmProvider: z.string().min(1),
  openaiApiKey: z.string(),
  openaiModel: z.string().min(1),
  openaiBaseUrl: z.string().url().nullable(),
  azureOpenaiEndpoint: z.string(),
  azureOpenaiApiVersion: z.string().min(1),
  azureOpenaiDeployment: z.string(),
  azureOpenaiApiKey: z.string(),
  llmTimeoutSeconds: z.number().positive(),
  llmMaxRetries: z.number().int().min(0).max(10),
  promptExcerptChars: z.number().int().min(20),
  lowSampleThreshold: z.number().int().min(0),
  highMissingnessThreshold: z.number().min(0).max(1),
  inputCostPer1kTokens: z.number().min(0),
  outputCostPer1kTokens: z.number().min(0),
});

export type Settings = z.infer<typeof SettingsSchema>;

/** Settings field -> environment variable, used in error messages */
const ENV_NAMES: Record<keyof Settings, string> = {
  dataCsvPath: "DATA_CSV_PATH",
  sectionMappingPath: "SECTION_MAPPING_PATH",
  cachePath: "CACHE_PATH",
  cacheEnabled: "CACHE_ENABLED",
  llmProvider: "LLM_PROVIDER",
  openaiApiKey: "OPENAI_API_KEY",
  openaiModel: "OPENAI_MODEL",
  openaiBaseUrl: "OPENAI_BASE_URL",
  azureOpenaiEndpoint: "AZURE_OPENAI_ENDPOINT",
  azureOpenaiApiVersion: "AZURE_OPENAI_API_VERSION",
  azureOpenaiDeployment: "AZURE_OPENAI_DEPLOYMENT",
  azureOpenaiApiKey: "AZURE_OPENAI_API_KEY",
  llmTimeoutSeconds: "LLM_TIMEOUT_SECONDS",
  llmMaxRetries: "LLM_MAX_RETRIES",
  promptExcerptChars: "PROMPT_EXCERPT_CHARS",
  lowSampleThreshold: "LOW_SAMPLE_THRESHOLD",
  highMissingnessThreshold: "HIGH_MISSINGNESS_THRESHOLD",
  inputCostPer1kTokens: "INPUT_COST_PER_1K_TOKENS",
  outputCostPer1kTokens: "OUTPUT_COST_PER_1K_TOKENS",
};

function isSettingsKey(value: unknown): value is keyof Settings {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(ENV_NAMES, value);
}

// ============================================================================
// LOADING
// ============================================================================

export type EnvSource = Readonly<Record<string, string | undefined>>;

/**
 * Load `.env` from the working directory into process.env. Variables that
 * are already set win.
 */
export function loadDotEnv(envPath: string = path.resolve(".env")): void {
  dotenv.config({ path: envPath, override: false });
}

function readString(env: EnvSource, name: string, fallback: string): string {
  const value = env[name];
  if (value === undefined) return fallback;
  return value.trim();
}

function readNumber(env: EnvSource, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  // NaN is rejected by the schema and reported against the variable name
  return Number(raw.trim());
}

function readBoolean(env: EnvSource, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  return ["1", "true", "yes", "on"].includes(raw.trim().toLowerCase());
}

function resolvePath(value: string): string {
  return path.resolve(value);
}

/**
 * Build validated settings from an environment map.
 *
 * @throws SettingsError listing every variable that failed validation
 */
export function loadSettings(env: EnvSource = process.env): Settings {
  const baseUrl = readString(env, "OPENAI_BASE_URL", "");
  const timeout = readNumber(env, "LLM_TIMEOUT_SECONDS", 300);

  const candidate = {
    dataCsvPath: resolvePath(readString(env, "DATA_CSV_PATH", "data/data.csv")),
    sectionMappingPath: resolvePath(readString(env, "SECTION_MAPPING_PATH", "data/section-mapping.xlsx")),
    cachePath: resolvePath(readString(env, "CACHE_PATH", ".cache/summaries.sqlite")),
    cacheEnabled: readBoolean(env, "CACHE_ENABLED", true),
    llmProvider: readString(env, "LLM_PROVIDER", "openai").toLowerCase(),
    openaiApiKey: readString(env, "OPENAI_API_KEY", ""),
    openaiModel: readString(env, "OPENAI_MODEL", "gpt-4.1-mini"),
    openaiBaseUrl: baseUrl === "" ? null : baseUrl,
    azureOpenaiEndpoint: readString(env, "AZURE_OPENAI_ENDPOINT", ""),
    azureOpenaiApiVersion: readString(env, "AZURE_OPENAI_API_VERSION", "2024-06-01"),
    azureOpenaiDeployment: readString(env, "AZURE_OPENAI_DEPLOYMENT", ""),
    azureOpenaiApiKey: readString(env, "AZURE_OPENAI_API_KEY", ""),
    llmTimeoutSeconds: Number.isNaN(timeout) ? timeout : Math.max(timeout, MIN_LLM_TIMEOUT_SECONDS),
    llmMaxRetries: readNumber(env, "LLM_MAX_RETRIES", 2),
    promptExcerptChars: readNumber(env, "PROMPT_EXCERPT_CHARS", 280),
    lowSampleThreshold: readNumber(env, "LOW_SAMPLE_THRESHOLD", 8),
    highMissingnessThreshold: readNumber(env, "HIGH_MISSINGNESS_THRESHOLD", 0.35),
    inputCostPer1kTokens: readNumber(env, "INPUT_COST_PER_1K_TOKENS", 0.0008),
    outputCostPer1kTokens: readNumber(env, "OUTPUT_COST_PER_1K_TOKENS", 0.0032),
  };

  const result = SettingsSchema.safeParse(candidate);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => {
      const field = issue.path[0];
      const name = isSettingsKey(field) ? ENV_NAMES[field] : issue.path.join(".");
      return `${name}: ${issue.message}`;
    });
    throw new SettingsError(`Invalid configuration: ${problems.join("; ")}`);
  }
  return result.data;
}

/**
 * Model name recorded in cache keys: the Azure deployment for azure
 * (OpenAI model when no deployment is set), otherwise the OpenAI model.
 */
export function modelIdentity(settings: Pick<Settings, "llmProvider" | "openaiModel" | "azureOpenaiDeployment">): string {
  if (settings.llmProvider === "azure") {
    return settings.azureOpenaiDeployment || settings.openaiModel;
  }
  return settings.openaiModel;
}
