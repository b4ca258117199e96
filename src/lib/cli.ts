/**
 * Command-line front end: argument parsing, service wiring and output files.
 * `scripts/summarise.ts` is the executable wrapper.
 *
 * @module cli
 */

import fs from "fs";
import path from "path";
import { SettingsError, loadDotEnv, loadSettings, type Settings } from "./config";
import { ConsultationService } from "./consultation-service";
import { buildLLMProvider } from "./llm/factory";
import { NoOpSummaryCache, SqliteSummaryCache, type SummaryCache } from "./summary-cache";

export const USAGE = [
  "Usage: npx tsx scripts/summarise.ts <command> [options]",
  "",
  "Commands:",
  "  list-orgs                                  List organisations (response id, label)",
  "  list-questions                             List questions (question id, label)",
  "  summary-org --response-id <id> [--no-cache]       Approach 1 organisation summary",
  "  summary-question --question-id <id> [--no-cache]  Approach 2 question summary",
].join("\n");

export type CliCommand =
  | { kind: "list-orgs" }
  | { kind: "list-questions" }
  | { kind: "summary-org"; responseId: string; useCache: boolean }
  | { kind: "summary-question"; questionId: string; useCache: boolean };

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

function readFlagValue(args: readonly string[], flag: string): string {
  const inline = args.find((arg) => arg.startsWith(`${flag}=`));
  if (inline !== undefined) return inline.slice(flag.length + 1).trim();
  const index = args.indexOf(flag);
  const value = index >= 0 ? args[index + 1] : undefined;
  if (value === undefined || value.startsWith("--") || value.trim() === "") {
    throw new CliUsageError(`${flag} is required`);
  }
  return value.trim();
}

export function parseCliArgs(argv: readonly string[]): CliCommand {
  const [command, ...rest] = argv;
  const useCache = !rest.includes("--no-cache");

  switch (command) {
    case "list-orgs":
      return { kind: "list-orgs" };
    case "list-questions":
      return { kind: "list-questions" };
    case "summary-org":
      return { kind: "summary-org", responseId: readFlagValue(rest, "--response-id"), useCache };
    case "summary-question":
      return { kind: "summary-question", questionId: readFlagValue(rest, "--question-id"), useCache };
    default:
      throw new CliUsageError(command ? `Unknown command: ${command}` : "No command given");
  }
}

/** Local time as YYYYMMDD_HHMMSS */
export function formatTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, "0");
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Write `<outputRoot>/<timestamp>/<approach>_<target>.json`; characters
 * outside `[A-Za-z0-9_.-]` in the target id become "_".
 */
export function writeOutputJson(
  payload: object,
  approach: string,
  targetId: string,
  outputRoot: string,
  now: Date = new Date(),
): string {
  const outputDir = path.join(outputRoot, formatTimestamp(now));
  fs.mkdirSync(outputDir, { recursive: true });
  const safeTarget = (targetId.trim() || "unknown").replace(/[^A-Za-z0-9_.-]/g, "_");
  const outputPath = path.join(outputDir, `${approach}_${safeTarget}.json`);
  fs.writeFileSync(outputPath, JSON.stringify(payload, null, 2) + "\n", "utf8");
  return outputPath;
}

export function buildService(settings: Settings, requireLlm: boolean): ConsultationService {
  const llm = buildLLMProvider(settings, { requireLlm });
  const cache: SummaryCache = settings.cacheEnabled
    ? new SqliteSummaryCache(settings.cachePath)
    : new NoOpSummaryCache();
  return new ConsultationService({ settings, llm, cache });
}

/**
 * Run one command; returns the process exit code. 1 is a usage error and
 * 2 a configuration error.
 */
export async function runCli(argv: readonly string[], outputRoot = path.resolve("output")): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (err) {
    if (!(err instanceof CliUsageError)) throw err;
    console.error(`${err.message}\n\n${USAGE}`);
    return 1;
  }

  loadDotEnv();
  let service: ConsultationService;
  try {
    const requireLlm = command.kind === "summary-org" || command.kind === "summary-question";
    service = buildService(loadSettings(), requireLlm);
  } catch (err) {
    if (!(err instanceof SettingsError)) throw err;
    console.error(err.message);
    return 2;
  }

  try {
    return await executeCommand(service, command, outputRoot);
  } finally {
    await service.close();
  }
}

async function executeCommand(service: ConsultationService, command: CliCommand, outputRoot: string): Promise<number> {
  switch (command.kind) {
    case "list-orgs":
      for (const [responseId, label] of service.listOrganisations()) {
        process.stdout.write(`${responseId}\t${label}\n`);
      }
      return 0;
    case "list-questions":
      for (const [questionId, label] of service.listQuestions()) {
        process.stdout.write(`${questionId}\t${label}\n`);
      }
      return 0;
    case "summary-org": {
      const result = await service.summariseOrganisation(command.responseId, { useCache: command.useCache });
      process.stdout.write(JSON.stringify(result, null, 2) + "\n");
      const saved = writeOutputJson(result, result.approach, command.responseId, outputRoot);
      console.error(`Saved summary JSON to: ${saved}`);
      return 0;
    }
    case "summary-question": {
      const result = await service.summariseQuestion(command.questionId, { useCache: command.useCache });
      process.stdout.write(JSON.stringify(result, null, 2) + "\n");
      const saved = writeOutputJson(result, result.approach, command.questionId, outputRoot);
      console.error(`Saved summary JSON to: ${saved}`);
      return 0;
    }
  }
}
