/**
 * JSON recovery for model text output.
 *
 * Models asked for "JSON only" still wrap it in code fences, prepend prose,
 * or get cut off at the token limit. These helpers locate the first JSON
 * object and, failing a clean parse, close a truncated one.
 *
 * @module llm/json
 */

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Strip a surrounding ```json ... ``` fence, if any.
 */
export function stripCodeFences(text: string): string {
  return text
    .trim()
    .replace(/^```(?:json)?\s*/i, "")
    .replace(/\s*```$/, "")
    .trim();
}

/**
 * Extract the first balanced `{...}` substring. Braces inside string
 * literals are ignored.
 */
export function extractFirstJsonObjectFromText(text: string): string | null {
  const start = text.indexOf("{");
  if (start < 0) return null;

  let depth = 0;
  let inString = false;
  let escape = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escape) {
        escape = false;
      } else if (ch === "\\") {
        escape = true;
      } else if (ch === "\"") {
        inString = false;
      }
      continue;
    }

    if (ch === "\"") {
      inString = true;
      continue;
    }
    if (ch === "{") depth++;
    if (ch === "}") depth--;
    if (depth === 0) return text.slice(start, i + 1);
  }

  return null;
}

/**
 * Close a truncated JSON object after its last complete nested value.
 *
 * Everything after the last `}` or `]` that closed a nested structure is
 * dropped, then the still-open brackets are closed in reverse order.
 * Returns null when nothing complete can be salvaged.
 */
export function repairTruncatedJson(text: string): JsonObject | null {
  const start = text.indexOf("{");
  if (start < 0) return null;

  let inString = false;
  let escape = false;
  let lastCompleteEnd = -1;
  const open: string[] = [];
  let openAtLastComplete: string[] = [];

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escape) {
        escape = false;
      } else if (ch === "\\") {
        escape = true;
      } else if (ch === "\"") {
        inString = false;
      }
      continue;
    }

    if (ch === "\"") {
      inString = true;
    } else if (ch === "{") {
      open.push("}");
    } else if (ch === "[") {
      open.push("]");
    } else if (ch === "}" || ch === "]") {
      open.pop();
      if (open.length >= 1) {
        lastCompleteEnd = i;
        openAtLastComplete = [...open];
      }
    }
  }

  if (lastCompleteEnd < 0) return null;

  const repaired = text.slice(start, lastCompleteEnd + 1) + openAtLastComplete.reverse().join("");
  const parsed = tryParse(repaired);
  return isJsonObject(parsed) ? parsed : null;
}

/**
 * Best-effort parse of model output that should be a JSON object.
 * Anything that cannot be recovered as an object yields `{}`.
 */
export function parseModelJsonObject(text: string): JsonObject {
  const cleaned = stripCodeFences(text);
  if (!cleaned) return {};

  const direct = tryParse(cleaned);
  if (isJsonObject(direct)) return direct;

  const extracted = extractFirstJsonObjectFromText(cleaned);
  if (extracted) {
    const parsed = tryParse(extracted);
    if (isJsonObject(parsed)) return parsed;
  }

  return repairTruncatedJson(cleaned) ?? {};
}
