/**
 * Evidence Validation
 *
 * Filters model-declared record ids down to ids that exist in the current
 * record universe.
 *
 * @module summariser/evidence-validation
 */

import type { RecordUniverse } from "./record-universe";

/**
 * Accept strings and integers only; integers are stringified.
 * Returns null for every other value.
 */
export function coerceId(value: unknown): string | null {
  if (typeof value === "string") return value;
  if (typeof value === "number" && Number.isInteger(value)) return String(value);
  return null;
}

/**
 * Keep ids present in the universe, in input order. Non-array input yields [].
 * Running it again on its own output returns the same list.
 */
export function validateIds(candidateIds: unknown, universe: RecordUniverse): string[] {
  if (!Array.isArray(candidateIds)) return [];
  const out: string[] = [];
  for (const value of candidateIds) {
    const id = coerceId(value);
    if (id !== null && universe.has(id)) out.push(id);
  }
  return out;
}
