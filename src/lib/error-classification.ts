/**
 * Error Classification
 *
 * Classifies model-call failures so fallback summaries and logs can say
 * whether the provider timed out, was rate limited, rejected the
 * credentials, or failed for an unknown reason.
 *
 * @module error-classification
 */

export type ErrorCategory = "provider_outage" | "rate_limit" | "timeout" | "unknown";

export type ClassifiedError = {
  category: ErrorCategory;
  /** Error class name, e.g. "TimeoutError" */
  name: string;
  message: string;
  retriable: boolean;
};

const RATE_LIMIT_PATTERNS = [
  /status\s*(?:code\s*)?429/i,
  /status\s*(?:code\s*)?503/i,
  /rate\s*limit/i,
  /too\s*many\s*requests/i,
  /overloaded/i,
  /quota/i,
];

const AUTH_PATTERNS = [
  /api\s*key/i,
  /authentication/i,
  /unauthorized/i,
  /invalid.*key/i,
  /status\s*(?:code\s*)?401/i,
  /status\s*(?:code\s*)?403/i,
];

const TIMEOUT_PATTERNS = [/timeout/i, /timed?\s*out/i, /AbortError/i, /ETIMEDOUT/i, /ECONNRESET/i];

function readStatusCode(error: unknown): number | null {
  if (!error || typeof error !== "object") return null;
  for (const key of ["status", "statusCode"]) {
    const value: unknown = Reflect.get(error, key);
    if (typeof value === "number") return value;
  }
  return null;
}

export function classifyLLMError(error: unknown): ClassifiedError {
  const message = error instanceof Error ? error.message : String(error);
  const name = error instanceof Error ? error.name : typeof error;

  if (name === "TimeoutError" || name === "AbortError" || TIMEOUT_PATTERNS.some((p) => p.test(message))) {
    return { category: "timeout", name, message, retriable: true };
  }

  // Status codes set by the AI SDK's APICallError take precedence over message text
  const statusCode = readStatusCode(error);
  if (statusCode === 429 || statusCode === 503 || statusCode === 529) {
    return { category: "rate_limit", name, message, retriable: true };
  }
  if (statusCode === 401 || statusCode === 403) {
    return { category: "provider_outage", name, message, retriable: false };
  }

  if (AUTH_PATTERNS.some((p) => p.test(message))) {
    return { category: "provider_outage", name, message, retriable: false };
  }
  if (RATE_LIMIT_PATTERNS.some((p) => p.test(message))) {
    return { category: "rate_limit", name, message, retriable: true };
  }

  return { category: "unknown", name, message, retriable: false };
}
