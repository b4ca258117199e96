/**
 * CLI Tests
 *
 * @module cli.test
 */

import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { CliUsageError, formatTimestamp, parseCliArgs, runCli, writeOutputJson } from "@/lib/cli";

describe("parseCliArgs", () => {
  it("parses list commands", () => {
    expect(parseCliArgs(["list-orgs"])).toEqual({ kind: "list-orgs" });
    expect(parseCliArgs(["list-questions"])).toEqual({ kind: "list-questions" });
  });

  it("parses summary commands in both flag styles", () => {
    expect(parseCliArgs(["summary-org", "--response-id", "R_001"])).toEqual({
      kind: "summary-org",
      responseId: "R_001",
      useCache: true,
    });
    expect(parseCliArgs(["summary-question", "--question-id=Q03", "--no-cache"])).toEqual({
      kind: "summary-question",
      questionId: "Q03",
      useCache: false,
    });
  });

  it("rejects a missing flag value", () => {
    expect(() => parseCliArgs(["summary-org"])).toThrow("--response-id is required");
    expect(() => parseCliArgs(["summary-question", "--question-id", "--no-cache"])).toThrow(
      "--question-id is required",
    );
  });

  it("rejects unknown or missing commands", () => {
    expect(() => parseCliArgs(["summarise"])).toThrow("Unknown command: summarise");
    expect(() => parseCliArgs([])).toThrow(CliUsageError);
  });
});

describe("formatTimestamp", () => {
  it("formats local time as YYYYMMDD_HHMMSS", () => {
    expect(formatTimestamp(new Date(2026, 0, 5, 7, 8, 9))).toBe("20260105_070809");
  });
});

describe("writeOutputJson", () => {
  let tempDir: string | null = null;

  afterEach(() => {
    if (tempDir) fs.rmSync(tempDir, { recursive: true, force: true });
    tempDir = null;
  });

  it("writes into a timestamped folder with a sanitised name", () => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "consult-cli-"));
    const now = new Date(2026, 9, 19, 14, 30, 0);

    const saved = writeOutputJson({ approach: "approach_2" }, "approach_2", "R/1 x", tempDir, now);

    expect(saved).toBe(path.join(tempDir, "20261019_143000", "approach_2_R_1_x.json"));
    expect(fs.readFileSync(saved, "utf8")).toBe('{\n  "approach": "approach_2"\n}\n');
  });

  it("falls back to 'unknown' for a blank target", () => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "consult-cli-"));
    const saved = writeOutputJson({}, "approach_1", "  ", tempDir, new Date(2026, 0, 1, 0, 0, 0));
    expect(path.basename(saved)).toBe("approach_1_unknown.json");
  });
});

describe("runCli", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns 1 with usage for bad arguments", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    expect(await runCli(["bogus"])).toBe(1);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(String(errorSpy.mock.calls[0][0])).toMatch(/^Unknown command: bogus\n\nUsage:/);
  });
});
