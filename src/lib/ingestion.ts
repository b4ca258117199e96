/**
 * Consultation Ingestion
 *
 * Reads the consultation CSV and the optional section-mapping workbook with
 * SheetJS. Cell values are kept as text; nothing is type-coerced.
 *
 * @module ingestion
 */

import fs from "fs";
import * as XLSX from "xlsx";
import { alignSectionMapping, cleanText } from "./processing";
import type { ColumnSpec, ConsultationData } from "./summariser/types";

export class IngestionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "IngestionError";
  }
}

function cellText(value: unknown): string {
  if (value === null || value === undefined) return "";
  return String(value);
}

/**
 * First worksheet as rows of text cells. Blank rows are dropped.
 */
export function readSheetRows(workbook: XLSX.WorkBook): string[][] {
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) return [];
  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: "",
    raw: true,
    blankrows: false,
  });
  return rows.map((row) => row.map(cellText));
}

/**
 * Column specs with unique names; a repeated header gets a `__N` suffix
 * from its second occurrence on.
 */
export function buildColumns(rawHeaders: readonly string[]): ColumnSpec[] {
  const nameCounts = new Map<string, number>();
  return rawHeaders.map((rawHeader, index) => {
    const normalized = cleanText(rawHeader);
    const count = (nameCounts.get(normalized) ?? 0) + 1;
    nameCounts.set(normalized, count);
    return {
      uniqueName: count === 1 ? normalized : `${normalized}__${count}`,
      rawName: normalized,
      index,
    };
  });
}

/**
 * Build consultation data from parsed rows (header row first). Short rows are
 * padded with empty values.
 */
export function consultationDataFromRows(rows: readonly string[][]): ConsultationData {
  if (rows.length === 0) {
    throw new IngestionError("CSV file has no header row");
  }
  const columns = buildColumns(rows[0]);
  const dataRows = rows.slice(1).map((row) => {
    const record: Record<string, string> = {};
    for (const column of columns) {
      record[column.uniqueName] = (row[column.index] ?? "").trim();
    }
    return record;
  });
  return { columns, rows: dataRows };
}

export function parseConsultationCsv(text: string): ConsultationData {
  const workbook = XLSX.read(text.replace(/^\uFEFF/, ""), { type: "string", raw: true });
  return consultationDataFromRows(readSheetRows(workbook));
}

export function loadConsultationCsv(filePath: string): ConsultationData {
  if (!fs.existsSync(filePath)) {
    throw new IngestionError(`CSV file not found: ${filePath}`);
  }
  const data = parseConsultationCsv(fs.readFileSync(filePath, "utf8"));
  console.log(`[Ingestion] Loaded ${data.rows.length} rows, ${data.columns.length} columns from ${filePath}`);
  return data;
}

/**
 * Column index -> section from the mapping workbook. Any read problem yields
 * an empty map and the section markers in the CSV headers are used instead.
 */
export function loadSectionMapping(columns: readonly ColumnSpec[], filePath: string): Map<number, string> {
  if (!fs.existsSync(filePath)) return new Map();
  try {
    const workbook = XLSX.read(fs.readFileSync(filePath), { type: "buffer" });
    const mapping = alignSectionMapping(columns, readSheetRows(workbook));
    console.log(`[Ingestion] Section mapping aligned ${mapping.size} of ${columns.length} columns`);
    return mapping;
  } catch (err) {
    console.warn(`[Ingestion] Could not read section mapping at ${filePath}:`, err);
    return new Map();
  }
}
