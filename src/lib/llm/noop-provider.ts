/**
 * Provider used when a command needs no model (listing organisations or
 * questions). Any call is a programming error and fails loudly.
 *
 * @module llm/noop-provider
 */

import type { LLMJsonRequest, LLMJsonResult, LLMProvider } from "./types";

export class LLMUnavailableError extends Error {
  constructor(message = "No LLM provider is configured for this command") {
    super(message);
    this.name = "LLMUnavailableError";
  }
}

export class NoOpLLMProvider implements LLMProvider {
  readonly label = "noop";

  async completeJson(_request: LLMJsonRequest): Promise<LLMJsonResult> {
    throw new LLMUnavailableError();
  }
}
