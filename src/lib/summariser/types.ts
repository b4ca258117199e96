/**
 * Consultation Summariser - Type Definitions
 *
 * Records, reconciled entities and summary results shared by the
 * processing, reconciliation and summarisation layers.
 *
 * @module summariser/types
 */

// ============================================================================
// SOURCE RECORDS
// ============================================================================

export interface ColumnSpec {
  uniqueName: string;
  rawName: string;
  index: number;
}

export interface QuestionDefinition {
  questionId: string;
  questionText: string;
  section: string;
  primaryColumn: ColumnSpec;
  supplementalColumns: ColumnSpec[];
}

/**
 * One organisation's answer to one question.
 * `recordId` is `<responseId>:<questionId>` and is unique across the dataset.
 */
export interface ResponseRecord {
  readonly recordId: string;
  readonly responseId: string;
  readonly organisationName: string;
  readonly organisationType: string;
  readonly region: string;
  readonly questionId: string;
  readonly questionText: string;
  readonly section: string;
  readonly choiceValue: string | null;
  readonly answerText: string;
  /** Bounded copy of answerText, suffixed with "..." when truncated */
  readonly excerpt: string;
}

export interface ConsultationData {
  columns: ColumnSpec[];
  rows: Array<Record<string, string>>;
}

export interface PreparedData {
  consultationData: ConsultationData;
  questions: QuestionDefinition[];
  responseItems: ResponseRecord[];
}

export interface OrganisationCatalog {
  responseId: string;
  organisationName: string;
  organisationType: string;
  region: string;
  answeredQuestions: number;
  totalQuestions: number;
  items: ResponseRecord[];
}

export interface QuestionSlice {
  question: QuestionDefinition;
  items: ResponseRecord[];
}

// ============================================================================
// STANCE
// ============================================================================

export const STANCES = ["support", "concern", "neutral", "other"] as const;
export type Stance = (typeof STANCES)[number];

// ============================================================================
// RECONCILED ENTITIES
// ============================================================================

export interface BulletPoint {
  text: string;
  evidenceIds: string[];
  count: number;
  supportingResponseIds: string[];
  supportingOrganisations: string[];
}

export interface QuestionCluster {
  clusterId: string;
  label: string;
  /** Lower-cased free string; "support" | "concern" | "neutral" | "other" in practice */
  stance: string;
  memberRecordIds: string[];
  evidenceIds: string[];
  significance: string;
  description: string;
  memberCount: number;
  responseCount: number;
  organisationCount: number;
  supportingResponseIds: string[];
  supportingOrganisations: string[];
}

export interface EvidenceRef {
  recordId: string;
  excerpt: string;
}

// ============================================================================
// SUMMARY RESULTS
// ============================================================================

export type UncertaintyFlag =
  | "low_sample_size"
  | "conflicting_stance_signals"
  | "high_missingness"
  | "llm_fallback";

export interface SummaryMetrics {
  coverage: number;
  evidenceCoverage: number;
  compressionRatio: number;
  uncertaintyFlags: UncertaintyFlag[];
  latencySeconds: number;
  costEstimateUsd: number;
  inputChars: number;
  outputChars: number;
  inputTokens: number;
  outputTokens: number;
}

export interface SectionSummary {
  section: string;
  mainPoints: BulletPoint[];
  concerns: BulletPoint[];
  asks: BulletPoint[];
  nuances: BulletPoint[];
  recordsSummarised: number;
  totalRecords: number;
}

export interface OrganisationSummaryResult {
  approach: "approach_1";
  responseId: string;
  organisationName: string;
  organisationType: string;
  region: string;
  overallStance: string;
  keySupports: BulletPoint[];
  keyConcerns: BulletPoint[];
  asksOrRecommendations: BulletPoint[];
  sectionSummaries: SectionSummary[];
  evidenceIndex: EvidenceRef[];
  metrics: SummaryMetrics;
}

export interface QuestionSummaryResult {
  approach: "approach_2";
  questionId: string;
  questionText: string;
  section: string;
  headline: string;
  narrative: string;
  majorityView: BulletPoint[];
  minorityView: BulletPoint[];
  keyArgumentsFor: BulletPoint[];
  keyArgumentsAgainst: BulletPoint[];
  /** Percentage per canonical choice label, 2 dp */
  distribution: Record<string, number>;
  mainstreamClusters: QuestionCluster[];
  minorityClusters: QuestionCluster[];
  evidenceIndex: EvidenceRef[];
  metrics: SummaryMetrics;
}
