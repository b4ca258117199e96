/**
 * Error Classification Tests
 *
 * Model-call failures are classified as timeouts, rate limits, provider
 * outages or unknown errors.
 */

import { describe, expect, it } from "vitest";
import { classifyLLMError } from "@/lib/error-classification";

describe("classifyLLMError", () => {
  it("classifies abort-signal timeouts", () => {
    const err = Object.assign(new Error("The operation was aborted due to timeout"), { name: "TimeoutError" });
    const result = classifyLLMError(err);
    expect(result.category).toBe("timeout");
    expect(result.name).toBe("TimeoutError");
    expect(result.retriable).toBe(true);
  });

  it("classifies timeout messages", () => {
    expect(classifyLLMError(new Error("Request timed out")).category).toBe("timeout");
  });

  it("classifies status 429 as rate_limit", () => {
    const err = Object.assign(new Error("Too Many Requests"), { statusCode: 429 });
    expect(classifyLLMError(err)).toEqual({
      category: "rate_limit",
      name: "Error",
      message: "Too Many Requests",
      retriable: true,
    });
  });

  it("classifies auth failures as provider_outage", () => {
    const byStatus = Object.assign(new Error("Forbidden"), { status: 403 });
    expect(classifyLLMError(byStatus).category).toBe("provider_outage");
    expect(classifyLLMError(new Error("Incorrect API key provided")).category).toBe("provider_outage");
  });

  it("classifies quota messages as rate_limit", () => {
    expect(classifyLLMError(new Error("You exceeded your current quota")).category).toBe("rate_limit");
  });

  it("falls back to unknown for anything else", () => {
    const result = classifyLLMError("boom");
    expect(result).toEqual({ category: "unknown", name: "string", message: "boom", retriable: false });
  });
});
