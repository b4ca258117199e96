/**
 * Consultation Processing
 *
 * Turns the flat survey table into question definitions and per-question
 * response records, and slices those records per organisation (Approach 1)
 * or per question (Approach 2).
 *
 * @module processing
 */

import type {
  ColumnSpec,
  ConsultationData,
  OrganisationCatalog,
  PreparedData,
  QuestionDefinition,
  QuestionSlice,
  ResponseRecord,
} from "./summariser/types";

// ============================================================================
// CONSTANTS
// ============================================================================

const SECTION_MARKERS = new Set(["Strategic Investment Need", "Overall"]);

const SUPPLEMENT_PREFIXES = ["if ", "please provide", "if not", "if you"];

const CATEGORICAL_HINTS = new Set([
  "strongly agree",
  "somewhat agree",
  "neither agree nor disagree",
  "somewhat disagree",
  "strongly disagree",
  "yes",
  "no",
  "maybe",
  "agree",
  "disagree",
  "neutral",
  "no comment",
]);

/**
 * Prefix aliases for canonical choice labels. Order matters: the first
 * alias the cleaned value starts with wins.
 */
const CHOICE_ALIASES: ReadonlyArray<[string, string]> = [
  ["strongly agree", "Strongly agree"],
  ["somewhat agree", "Somewhat agree"],
  ["neither agree nor disagree", "Neither agree nor disagree"],
  ["somewhat disagree", "Somewhat disagree"],
  ["strongly disagree", "Strongly disagree"],
  ["yes", "Yes"],
  ["no", "No"],
  ["maybe", "Maybe"],
  ["agree", "Agree"],
  ["disagree", "Disagree"],
  ["neutral", "Neutral"],
  ["no comment", "No comment"],
];

export const SUPPORT_CHOICES: ReadonlySet<string> = new Set(["Strongly agree", "Somewhat agree", "Agree", "Yes"]);
export const CONCERN_CHOICES: ReadonlySet<string> = new Set([
  "Strongly disagree",
  "Somewhat disagree",
  "Disagree",
  "No",
]);
export const NEUTRAL_CHOICES: ReadonlySet<string> = new Set([
  "Neither agree nor disagree",
  "Neutral",
  "Maybe",
  "No comment",
]);

const RESPONSE_ID_HEADER = "Response ID";
const ORGANISATION_NAME_HEADER = "4. What is your organisation name?";
const ORGANISATION_TYPE_HEADER =
  "6. Which category best describes your organisation? (Select all that apply) - Selected Choice";
const REGION_HEADER =
  "7. Which Nation or Region are you / your organisation located in, or interested in?";

const DEFAULT_QUESTION_START_INDEX = 13;

export class ProcessingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProcessingError";
  }
}

// ============================================================================
// TEXT HELPERS
// ============================================================================

/**
 * Normalise whitespace and drop BOM / zero-width markers.
 */
export function cleanText(text: string): string {
  return text.replace(/\uFEFF/g, "").replace(/\u200B/g, "").replace(/\s+/g, " ").trim();
}

/**
 * Map a raw choice value onto its canonical label, or "" when none applies.
 */
export function normalizeChoice(value: string | null | undefined): string {
  if (!value) return "";
  const text = cleanText(value).toLowerCase();
  for (const [alias, label] of CHOICE_ALIASES) {
    if (text.startsWith(alias)) return label;
  }
  return "";
}

export function looksCategorical(value: string): boolean {
  if (!value) return false;
  const lowered = value.toLowerCase().trim();
  if (CATEGORICAL_HINTS.has(lowered)) return true;
  if (lowered.length <= 24 && CATEGORICAL_HINTS.has(lowered.replaceAll("-", " "))) return true;
  // A short single alphabetic token ("Unsure", "Partially") is treated as a choice label
  return lowered.length <= 25 && /^\p{L}+$/u.test(lowered);
}

function isSupplementalHeader(lowered: string): boolean {
  if (lowered.includes(" - yes - text") || lowered.includes(" - maybe - text") || lowered.includes(" - no - text")) {
    return true;
  }
  return SUPPLEMENT_PREFIXES.some((prefix) => lowered.startsWith(prefix));
}

function canonicalQuestionText(raw: string): string {
  return cleanText(raw.replace(/^\d+\.\s*/, "").replaceAll(" - Selected Choice", ""));
}

function formatQuestionId(ordinal: number): string {
  return `Q${String(ordinal).padStart(2, "0")}`;
}

export function findColumn(columns: readonly ColumnSpec[], startsWith: string): ColumnSpec {
  const column = columns.find((c) => c.rawName.startsWith(startsWith));
  if (!column) {
    throw new ProcessingError(`Column not found: ${startsWith}`);
  }
  return column;
}

function rowValue(columns: readonly ColumnSpec[], row: Record<string, string>, startsWith: string): string {
  const column = findColumn(columns, startsWith);
  return cleanText(row[column.uniqueName] ?? "");
}

// ============================================================================
// QUESTIONS AND RECORDS
// ============================================================================

function findQuestionStartIndex(columns: readonly ColumnSpec[]): number {
  const first = columns.find((c) => c.rawName.startsWith("1. Do you agree"));
  return first ? first.index : DEFAULT_QUESTION_START_INDEX;
}

/**
 * Infer logical question blocks from the flat column list.
 *
 * Supplemental headers (reasoning text, yes/maybe/no free text) attach to the
 * most recent primary question. Section marker columns switch the current
 * section; a section mapping, when present, takes precedence.
 */
export function buildQuestionDefinitions(
  columns: readonly ColumnSpec[],
  sectionByIndex: ReadonlyMap<number, string> = new Map(),
): QuestionDefinition[] {
  const questions: QuestionDefinition[] = [];
  let current: QuestionDefinition | null = null;
  let currentSection = "General";

  for (const column of columns.slice(findQuestionStartIndex(columns))) {
    const raw = cleanText(column.rawName);
    const lowered = raw.toLowerCase();
    const mappedSection = cleanText(sectionByIndex.get(column.index) ?? "");

    if (SECTION_MARKERS.has(raw)) {
      currentSection = mappedSection || raw;
      continue;
    }

    if (isSupplementalHeader(lowered)) {
      if (current === null) {
        current = {
          questionId: formatQuestionId(questions.length + 1),
          questionText: raw,
          section: currentSection,
          primaryColumn: column,
          supplementalColumns: [],
        };
        questions.push(current);
        continue;
      }
      current = { ...current, supplementalColumns: [...current.supplementalColumns, column] };
      questions[questions.length - 1] = current;
      continue;
    }

    current = {
      questionId: formatQuestionId(questions.length + 1),
      questionText: canonicalQuestionText(raw),
      section: mappedSection || currentSection,
      primaryColumn: column,
      supplementalColumns: [],
    };
    if (mappedSection) currentSection = mappedSection;
    questions.push(current);
  }

  return questions;
}

/**
 * One record per answered question per submission. Choice-like primary values
 * go to `choiceValue`; free text is assembled into `answerText`.
 */
export function buildResponseItems(
  data: ConsultationData,
  questions: readonly QuestionDefinition[],
  excerptChars: number,
): ResponseRecord[] {
  const responseIdCol = findColumn(data.columns, RESPONSE_ID_HEADER);
  const orgNameCol = findColumn(data.columns, ORGANISATION_NAME_HEADER);
  const orgTypeCol = findColumn(data.columns, ORGANISATION_TYPE_HEADER);
  const regionCol = findColumn(data.columns, REGION_HEADER);

  const output: ResponseRecord[] = [];

  for (const row of data.rows) {
    const responseId = row[responseIdCol.uniqueName] ?? "";
    const organisationName = row[orgNameCol.uniqueName] ?? "Unknown organisation";
    const organisationType = row[orgTypeCol.uniqueName] ?? "";
    const region = row[regionCol.uniqueName] ?? "";

    for (const question of questions) {
      const primaryValue = cleanText(row[question.primaryColumn.uniqueName] ?? "");
      const supplementalValues = question.supplementalColumns
        .map((col) => cleanText(row[col.uniqueName] ?? ""))
        .filter((value) => value.length > 0);

      const choiceValue = looksCategorical(primaryValue) ? primaryValue : null;
      const textParts: string[] = [];
      if (primaryValue && choiceValue === null) textParts.push(primaryValue);
      textParts.push(...supplementalValues);

      let answerText: string;
      if (choiceValue && textParts.length > 0) {
        answerText = `Choice: ${choiceValue}. ${textParts.join(" ")}`;
      } else if (choiceValue) {
        answerText = choiceValue;
      } else {
        answerText = textParts.join(" ");
      }
      answerText = cleanText(answerText);
      if (!answerText) continue;

      // Code points, so an astral character is never split
      const codePoints = Array.from(answerText);
      let excerpt = codePoints.slice(0, excerptChars).join("").trim();
      if (codePoints.length > excerptChars) excerpt = `${excerpt}...`;

      output.push({
        recordId: `${responseId}:${question.questionId}`,
        responseId,
        organisationName,
        organisationType,
        region,
        questionId: question.questionId,
        questionText: question.questionText,
        section: question.section,
        choiceValue,
        answerText,
        excerpt,
      });
    }
  }

  return output;
}

export function prepareData(
  consultationData: ConsultationData,
  options: { excerptChars?: number; sectionByIndex?: ReadonlyMap<number, string> } = {},
): PreparedData {
  const questions = buildQuestionDefinitions(consultationData.columns, options.sectionByIndex);
  const responseItems = buildResponseItems(consultationData, questions, options.excerptChars ?? 280);
  return { consultationData, questions, responseItems };
}

// ============================================================================
// SECTION MAPPING ALIGNMENT
// ============================================================================

/**
 * Align mapping rows (`[header, section]`) with columns by strict row order.
 * Returns an empty map as soon as any header disagrees.
 */
export function alignSectionsByIndex(
  columns: readonly ColumnSpec[],
  dataRows: readonly string[][],
): Map<number, string> {
  if (dataRows.length < columns.length) return new Map();

  const mapping = new Map<number, string>();
  for (let i = 0; i < columns.length; i++) {
    const row = dataRows[i];
    const mappedQuestion = cleanText(row[0] ?? "");
    if (mappedQuestion !== cleanText(columns[i].rawName)) return new Map();
    const section = cleanText(row[1] ?? "");
    if (section) mapping.set(columns[i].index, section);
  }
  return mapping;
}

/**
 * Fallback alignment keyed by `(header text, occurrence number)`.
 */
export function alignSectionsByHeaderOccurrence(
  columns: readonly ColumnSpec[],
  dataRows: readonly string[][],
): Map<number, string> {
  const occurrenceMap = new Map<string, string>();
  const rowOccurrences = new Map<string, number>();

  for (const row of dataRows) {
    const question = cleanText(row[0] ?? "");
    const section = cleanText(row[1] ?? "");
    if (!question) continue;
    const n = (rowOccurrences.get(question) ?? 0) + 1;
    rowOccurrences.set(question, n);
    occurrenceMap.set(`${question}\u0000${n}`, section);
  }

  const out = new Map<number, string>();
  const columnOccurrences = new Map<string, number>();
  for (const column of columns) {
    const question = cleanText(column.rawName);
    const n = (columnOccurrences.get(question) ?? 0) + 1;
    columnOccurrences.set(question, n);
    const section = cleanText(occurrenceMap.get(`${question}\u0000${n}`) ?? "");
    if (section) out.set(column.index, section);
  }
  return out;
}

/**
 * Align raw workbook rows (header row included) with the CSV columns.
 */
export function alignSectionMapping(
  columns: readonly ColumnSpec[],
  workbookRows: readonly string[][],
): Map<number, string> {
  if (workbookRows.length <= 1) return new Map();
  const dataRows = workbookRows.slice(1);
  const byIndex = alignSectionsByIndex(columns, dataRows);
  if (byIndex.size > 0) return byIndex;
  return alignSectionsByHeaderOccurrence(columns, dataRows);
}

// ============================================================================
// SLICES AND OPTIONS
// ============================================================================

/**
 * Unique organisations as `[responseId, label]`, sorted by label (case-insensitive).
 */
export function listOrganisations(prepared: PreparedData): Array<[string, string]> {
  const { columns, rows } = prepared.consultationData;
  const seen = new Set<string>();
  const entries: Array<[string, string]> = [];

  for (const row of rows) {
    const responseId = rowValue(columns, row, RESPONSE_ID_HEADER);
    const orgName = rowValue(columns, row, ORGANISATION_NAME_HEADER);
    if (!responseId || seen.has(responseId)) continue;
    seen.add(responseId);
    entries.push([responseId, `${orgName} (${responseId})`]);
  }

  return entries.sort((a, b) => {
    const left = a[1].toLowerCase();
    const right = b[1].toLowerCase();
    return left < right ? -1 : left > right ? 1 : 0;
  });
}

export function getQuestionOptions(prepared: PreparedData): Array<[string, string]> {
  return prepared.questions.map((q) => [q.questionId, `${q.questionId} | ${q.questionText}`]);
}

export function getOrganisationCatalog(prepared: PreparedData, responseId: string): OrganisationCatalog {
  const items = prepared.responseItems.filter((item) => item.responseId === responseId);
  if (items.length === 0) {
    throw new ProcessingError(`No records found for response ID: ${responseId}`);
  }

  const first = items[0];
  return {
    responseId,
    organisationName: first.organisationName,
    organisationType: first.organisationType,
    region: first.region,
    answeredQuestions: new Set(items.map((item) => item.questionId)).size,
    totalQuestions: prepared.questions.length,
    items,
  };
}

export function getQuestionSlice(prepared: PreparedData, questionId: string): QuestionSlice {
  const question = prepared.questions.find((q) => q.questionId === questionId);
  if (!question) {
    throw new ProcessingError(`Unknown question_id: ${questionId}`);
  }
  return {
    question,
    items: prepared.responseItems.filter((item) => item.questionId === questionId),
  };
}

/**
 * Percentage distribution of canonical choice labels, rounded to 2 dp.
 * Labels keep first-seen order.
 */
export function calculateDistribution(items: readonly ResponseRecord[]): Record<string, number> {
  const counts = new Map<string, number>();
  for (const item of items) {
    if (!item.choiceValue) continue;
    const label = normalizeChoice(item.choiceValue);
    if (!label) continue;
    counts.set(label, (counts.get(label) ?? 0) + 1);
  }

  let total = 0;
  for (const count of counts.values()) total += count;
  if (total === 0) return {};

  const distribution: Record<string, number> = {};
  for (const [label, count] of counts) {
    distribution[label] = Math.round((count / total) * 100 * 100) / 100;
  }
  return distribution;
}
