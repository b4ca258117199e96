import type { Settings } from "../config";

/** The settings the summarisers read: metric thresholds and pricing */
export type SummarySettings = Pick<
  Settings,
  "lowSampleThreshold" | "highMissingnessThreshold" | "inputCostPer1kTokens" | "outputCostPer1kTokens"
>;
