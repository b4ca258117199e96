/**
 * AI SDK Provider
 *
 * Sends one system + user prompt pair through the Vercel AI SDK and parses
 * the text reply as a JSON object. Retries are left to the SDK
 * (`maxRetries`); the whole call, retries included, is bounded by an abort
 * signal.
 *
 * @module llm/ai-sdk-provider
 */

import { generateText, type LanguageModel } from "ai";
import { classifyLLMError } from "../error-classification";
import { parseModelJsonObject } from "./json";
import type { LLMJsonRequest, LLMJsonResult, LLMProvider } from "./types";

export interface AiSdkProviderOptions {
  model: LanguageModel;
  label: string;
  timeoutSeconds: number;
  maxRetries: number;
}

export class AiSdkProvider implements LLMProvider {
  readonly label: string;
  private readonly model: LanguageModel;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;

  constructor(options: AiSdkProviderOptions) {
    this.model = options.model;
    this.label = options.label;
    this.timeoutMs = Math.round(options.timeoutSeconds * 1000);
    this.maxRetries = options.maxRetries;
  }

  async completeJson(request: LLMJsonRequest): Promise<LLMJsonResult> {
    const startedAt = Date.now();
    try {
      const result = await generateText({
        model: this.model,
        messages: [
          { role: "system", content: request.systemPrompt },
          { role: "user", content: request.userPrompt },
        ],
        temperature: request.temperature ?? 0.1,
        maxRetries: this.maxRetries,
        abortSignal: AbortSignal.timeout(this.timeoutMs),
      });

      const payload = parseModelJsonObject(result.text);
      const usage = {
        inputTokens: result.usage.inputTokens ?? 0,
        outputTokens: result.usage.outputTokens ?? 0,
      };
      console.log(
        `[LLM] ${this.label} responded in ${Date.now() - startedAt}ms (${usage.inputTokens} in / ${usage.outputTokens} out, ${Object.keys(payload).length} keys)`,
      );
      return { payload, usage };
    } catch (err) {
      const classified = classifyLLMError(err);
      console.error(`[LLM] ${this.label} call failed (${classified.category}): ${classified.message}`);
      throw err;
    }
  }
}
