/**
 * Ingestion Tests
 *
 * @module ingestion.test
 */

import fs from "fs";
import os from "os";
import path from "path";
import * as XLSX from "xlsx";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  IngestionError,
  buildColumns,
  consultationDataFromRows,
  loadConsultationCsv,
  loadSectionMapping,
  parseConsultationCsv,
} from "@/lib/ingestion";

describe("buildColumns", () => {
  it("suffixes repeated headers from the second occurrence", () => {
    expect(buildColumns(["A", " Comment ", "Comment", "Comment"])).toEqual([
      { uniqueName: "A", rawName: "A", index: 0 },
      { uniqueName: "Comment", rawName: "Comment", index: 1 },
      { uniqueName: "Comment__2", rawName: "Comment", index: 2 },
      { uniqueName: "Comment__3", rawName: "Comment", index: 3 },
    ]);
  });
});

describe("consultationDataFromRows", () => {
  it("pads short rows and trims values", () => {
    const data = consultationDataFromRows([
      ["Response ID", "Name", "Comment"],
      ["R_1", "  Acme  "],
    ]);
    expect(data.rows).toEqual([{ "Response ID": "R_1", Name: "Acme", Comment: "" }]);
  });

  it("rejects an empty table", () => {
    expect(() => consultationDataFromRows([])).toThrow(IngestionError);
  });
});

describe("parseConsultationCsv", () => {
  it("keeps quoted commas and leading zeros as text", () => {
    const data = parseConsultationCsv('\uFEFFResponse ID,Name,Comment,Comment\nR_1,"Acme, Ltd",007,Good\n');
    expect(data.columns.map((c) => c.uniqueName)).toEqual(["Response ID", "Name", "Comment", "Comment__2"]);
    expect(data.rows).toEqual([{ "Response ID": "R_1", Name: "Acme, Ltd", Comment: "007", Comment__2: "Good" }]);
  });
});

describe("file loading", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "consult-ingest-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("loads a CSV from disk", () => {
    const csvPath = path.join(tempDir, "responses.csv");
    fs.writeFileSync(csvPath, "Response ID,Name\nR_1,Acme\nR_2,Beta\n", "utf8");
    const data = loadConsultationCsv(csvPath);
    expect(data.rows.map((r) => r.Name)).toEqual(["Acme", "Beta"]);
  });

  it("throws IngestionError for a missing CSV", () => {
    const csvPath = path.join(tempDir, "missing.csv");
    expect(() => loadConsultationCsv(csvPath)).toThrow(`CSV file not found: ${csvPath}`);
  });

  it("returns an empty section mapping when the workbook is missing", () => {
    const columns = buildColumns(["Response ID"]);
    expect(loadSectionMapping(columns, path.join(tempDir, "missing.xlsx")).size).toBe(0);
  });

  it("reads a section mapping workbook", () => {
    const columns = buildColumns(["Response ID", "1. Do you agree?", "Please provide your reasoning"]);
    const sheet = XLSX.utils.aoa_to_sheet([
      ["Question", "Section"],
      ["Response ID", ""],
      ["1. Do you agree?", "Approach"],
      ["Please provide your reasoning", "Approach"],
    ]);
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, sheet, "Mapping");
    const mappingPath = path.join(tempDir, "mapping.xlsx");
    fs.writeFileSync(mappingPath, XLSX.write(workbook, { type: "buffer", bookType: "xlsx" }));

    expect([...loadSectionMapping(columns, mappingPath).entries()]).toEqual([
      [1, "Approach"],
      [2, "Approach"],
    ]);
  });
});
