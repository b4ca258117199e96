/**
 * LLM provider contract used by the summarisers.
 *
 * @module llm/types
 */

export interface LLMUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface LLMJsonRequest {
  systemPrompt: string;
  userPrompt: string;
  temperature?: number;
}

export interface LLMJsonResult {
  /** Parsed model output; `{}` when nothing usable came back */
  payload: Record<string, unknown>;
  usage: LLMUsage;
}

export interface LLMProvider {
  /** Short label for logs, e.g. "openai:gpt-4.1-mini" */
  readonly label: string;
  completeJson(request: LLMJsonRequest): Promise<LLMJsonResult>;
}
