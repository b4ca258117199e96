/**
 * Consultation Service
 *
 * Orchestrates dataset loading, option listing and both summary approaches
 * for the CLI. The prepared dataset is loaded once per instance and summaries
 * are cached under a key that changes with the model and the data file.
 *
 * @module consultation-service
 */

import fs from "fs";
import path from "path";
import crypto from "crypto";
import { modelIdentity, type Settings } from "./config";
import { debugLog } from "./debug";
import { loadConsultationCsv, loadSectionMapping } from "./ingestion";
import type { LLMProvider } from "./llm/types";
import {
  getOrganisationCatalog,
  getQuestionOptions,
  getQuestionSlice,
  listOrganisations,
  prepareData,
} from "./processing";
import { makeSummaryCacheKey, type SummaryCache } from "./summary-cache";
import {
  parseOrganisationSummary,
  parseQuestionSummary,
  summariseOrganisation,
  summariseQuestion,
  type OrganisationSummaryResult,
  type PreparedData,
  type QuestionSummaryResult,
} from "./summariser";

export interface ConsultationServiceOptions {
  settings: Settings;
  llm: LLMProvider;
  cache: SummaryCache;
  /** Replaces reading the CSV and section mapping from disk */
  loadData?: () => PreparedData;
  /** Replaces the file-stat fingerprint of the CSV */
  dataFingerprint?: () => string;
}

export interface SummaryRequestOptions {
  /** Read from the cache before summarising. Results are written either way. */
  useCache?: boolean;
}

/**
 * First 16 hex chars of sha256(resolved path | size | whole-second mtime).
 */
export function fileFingerprint(filePath: string): string {
  const resolved = path.resolve(filePath);
  const stat = fs.statSync(resolved);
  const payload = `${resolved}|${stat.size}|${Math.trunc(stat.mtimeMs / 1000)}`;
  return crypto.createHash("sha256").update(payload).digest("hex").slice(0, 16);
}

export function loadPreparedData(settings: Settings): PreparedData {
  const consultationData = loadConsultationCsv(settings.dataCsvPath);
  const sectionByIndex = loadSectionMapping(consultationData.columns, settings.sectionMappingPath);
  return prepareData(consultationData, { excerptChars: settings.promptExcerptChars, sectionByIndex });
}

export class ConsultationService {
  readonly settings: Settings;
  private readonly llm: LLMProvider;
  private readonly cache: SummaryCache;
  private readonly loadData: () => PreparedData;
  private readonly fingerprint: () => string;
  private prepared: PreparedData | null = null;

  constructor(options: ConsultationServiceOptions) {
    this.settings = options.settings;
    this.llm = options.llm;
    this.cache = options.cache;
    this.loadData = options.loadData ?? (() => loadPreparedData(options.settings));
    this.fingerprint = options.dataFingerprint ?? (() => fileFingerprint(options.settings.dataCsvPath));
  }

  preparedData(): PreparedData {
    if (this.prepared === null) {
      this.prepared = this.loadData();
      debugLog("[Service] Prepared consultation data", {
        questions: this.prepared.questions.length,
        records: this.prepared.responseItems.length,
      });
    }
    return this.prepared;
  }

  listOrganisations(): Array<[string, string]> {
    return listOrganisations(this.preparedData());
  }

  listQuestions(): Array<[string, string]> {
    return getQuestionOptions(this.preparedData());
  }

  private cacheKey(approach: "approach_1" | "approach_2", targetId: string): string {
    return makeSummaryCacheKey({
      approach,
      targetId,
      model: modelIdentity(this.settings),
      dataFingerprint: this.fingerprint(),
    });
  }

  async summariseOrganisation(
    responseId: string,
    options: SummaryRequestOptions = {},
  ): Promise<OrganisationSummaryResult> {
    const data = this.preparedData();
    const cacheKey = this.cacheKey("approach_1", responseId);

    if (options.useCache ?? true) {
      const cached = parseOrganisationSummary(await this.cache.get(cacheKey));
      if (cached) return cached;
    }

    const catalog = getOrganisationCatalog(data, responseId);
    const result = await summariseOrganisation({ llm: this.llm, settings: this.settings, catalog });
    await this.cache.set(cacheKey, result);
    return result;
  }

  async summariseQuestion(questionId: string, options: SummaryRequestOptions = {}): Promise<QuestionSummaryResult> {
    const data = this.preparedData();
    const cacheKey = this.cacheKey("approach_2", questionId);

    if (options.useCache ?? true) {
      const cached = parseQuestionSummary(await this.cache.get(cacheKey));
      if (cached) return cached;
    }

    const slice = getQuestionSlice(data, questionId);
    const totalOrganisations = new Set(data.responseItems.map((item) => item.responseId)).size;
    const result = await summariseQuestion({ llm: this.llm, settings: this.settings, slice, totalOrganisations });
    await this.cache.set(cacheKey, result);
    return result;
  }

  async close(): Promise<void> {
    await this.cache.close();
  }
}
