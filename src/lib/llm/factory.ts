/**
 * Builds the configured LLM provider.
 *
 * @module llm/factory
 */

import { createAzure } from "@ai-sdk/azure";
import { createOpenAI } from "@ai-sdk/openai";
import type { LanguageModel } from "ai";
import { SettingsError, modelIdentity, type Settings } from "../config";
import { AiSdkProvider } from "./ai-sdk-provider";
import { NoOpLLMProvider } from "./noop-provider";
import type { LLMProvider } from "./types";

export const SUPPORTED_PROVIDERS = ["openai", "azure"] as const;

export interface BuildLLMProviderOptions {
  /** When false a NoOpLLMProvider is returned and no credentials are checked */
  requireLlm: boolean;
}

function azureResourceName(endpoint: string): string | null {
  try {
    const host = new URL(endpoint).hostname;
    const match = /^([a-z0-9-]+)\.openai\.azure\.com$/i.exec(host);
    return match ? match[1] : null;
  } catch {
    return null;
  }
}

function buildOpenAIModel(settings: Settings): LanguageModel {
  if (!settings.openaiApiKey) {
    throw new SettingsError("OPENAI_API_KEY is required when LLM_PROVIDER=openai");
  }
  const openai = createOpenAI({
    apiKey: settings.openaiApiKey,
    ...(settings.openaiBaseUrl ? { baseURL: settings.openaiBaseUrl } : {}),
  });
  return openai.chat(settings.openaiModel);
}

function buildAzureModel(settings: Settings): LanguageModel {
  const missing = [
    settings.azureOpenaiEndpoint ? null : "AZURE_OPENAI_ENDPOINT",
    settings.azureOpenaiDeployment ? null : "AZURE_OPENAI_DEPLOYMENT",
    settings.azureOpenaiApiKey ? null : "AZURE_OPENAI_API_KEY",
  ].filter((name): name is string => name !== null);
  if (missing.length > 0) {
    throw new SettingsError(`Missing Azure OpenAI settings: ${missing.join(", ")}`);
  }

  const resourceName = azureResourceName(settings.azureOpenaiEndpoint);
  const azure = createAzure({
    apiKey: settings.azureOpenaiApiKey,
    apiVersion: settings.azureOpenaiApiVersion,
    ...(resourceName
      ? { resourceName }
      : { baseURL: `${settings.azureOpenaiEndpoint.replace(/\/+$/, "")}/openai` }),
  });
  return azure.chat(settings.azureOpenaiDeployment);
}

export function buildLLMProvider(settings: Settings, options: BuildLLMProviderOptions): LLMProvider {
  if (!options.requireLlm) {
    return new NoOpLLMProvider();
  }

  let model: LanguageModel;
  switch (settings.llmProvider) {
    case "openai":
      model = buildOpenAIModel(settings);
      break;
    case "azure":
      model = buildAzureModel(settings);
      break;
    default:
      throw new SettingsError(
        `Unsupported LLM_PROVIDER "${settings.llmProvider}" (expected one of: ${SUPPORTED_PROVIDERS.join(", ")})`,
      );
  }

  return new AiSdkProvider({
    model,
    label: `${settings.llmProvider}:${modelIdentity(settings)}`,
    timeoutSeconds: settings.llmTimeoutSeconds,
    maxRetries: settings.llmMaxRetries,
  });
}
