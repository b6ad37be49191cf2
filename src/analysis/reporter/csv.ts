import { mkdir, writeFile } from "fs/promises";
import { dirname } from "path";
import type { AnalysisResult, WriteResult } from "@/analysis/types";
import { errorMessage, isPermissionError } from "@/lib/fs-errors";

interface CsvSection {
  title: string;
  columns: readonly [string, string];
}

/**
 * The export holds three sections in this fixed order. Each one is a title
 * row, a column row and its data rows, and a blank row separates sections.
 */
export const CSV_SECTIONS = {
  requests: { title: "Requests per IP", columns: ["IP Address", "Request Count"] },
  endpoint: { title: "Most Accessed Endpoint", columns: ["Endpoint", "Access Count"] },
  suspicious: { title: "Suspicious Activity", columns: ["IP Address", "Failed Login Count"] },
} as const satisfies Record<string, CsvSection>;

export const CSV_NEWLINE = "\r\n";

type CsvValue = string | number;

/**
 * Quote a field only when it contains a comma, a double quote or a line
 * break; embedded quotes are doubled.
 */
export function formatCsvField(value: CsvValue): string {
  const text = String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

function formatCsvRow(fields: readonly CsvValue[]): string {
  return fields.map(formatCsvField).join(",");
}

function sectionRows(section: CsvSection, data: readonly (readonly [CsvValue, CsvValue])[]): string[] {
  return [formatCsvRow([section.title]), formatCsvRow(section.columns), ...data.map(formatCsvRow)];
}

/**
 * Render an analysis result as CSV text. Every row, including the last,
 * ends with CRLF.
 */
export function buildResultsCsv(result: AnalysisResult): string {
  const { mostAccessedEndpoint } = result;
  const rows = [
    ...sectionRows(
      CSV_SECTIONS.requests,
      result.requestsPerIp.map(({ ip, count }) => [ip, count] as const)
    ),
    "",
    ...sectionRows(CSV_SECTIONS.endpoint, [
      [mostAccessedEndpoint.endpoint, mostAccessedEndpoint.count],
    ]),
    "",
    ...sectionRows(
      CSV_SECTIONS.suspicious,
      result.suspiciousActivity.map(({ ip, failedCount }) => [ip, failedCount] as const)
    ),
  ];
  return rows.map((row) => row + CSV_NEWLINE).join("");
}

/**
 * Write the CSV export, creating the parent directory if needed.
 *
 * Never throws: a failed write is logged and returned. The file may be left
 * partially written.
 */
export async function writeResultsCsv(
  result: AnalysisResult,
  outputPath: string
): Promise<WriteResult> {
  try {
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, buildResultsCsv(result), "utf-8");
    console.log(`[Export] Results saved to ${outputPath}`);
    return { ok: true, outputPath };
  } catch (error) {
    const message = errorMessage(error);
    if (isPermissionError(error)) {
      console.error(
        `[Export] Error: Permission denied when writing to ${outputPath}. Check file permissions.`
      );
      return { ok: false, reason: "PERMISSION_DENIED", outputPath, message };
    }
    console.error(`[Export] Error while saving to CSV: ${message}`);
    return { ok: false, reason: "WRITE_ERROR", outputPath, message };
  }
}

/**
 * Split CSV text into rows of fields. Quoted fields may contain commas,
 * doubled quotes and line breaks. A trailing line break does not start a
 * new row.
 */
export function parseCsvRows(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let current = "";
  let inQuotes = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          current += '"';
          i++; // skip escaped quote
        } else {
          inQuotes = false;
        }
      } else {
        current += ch;
      }
    } else if (ch === '"') {
      inQuotes = true;
    } else if (ch === ",") {
      row.push(current);
      current = "";
    } else if (ch === "\r" || ch === "\n") {
      if (ch === "\r" && text[i + 1] === "\n") i++;
      row.push(current);
      rows.push(row);
      row = [];
      current = "";
    } else {
      current += ch;
    }
  }

  if (current !== "" || row.length > 0) {
    row.push(current);
    rows.push(row);
  }
  return rows;
}

type Parsed<T> = { ok: true; value: T } | { ok: false; message: string };

export type CsvParseResult = { ok: true; result: AnalysisResult } | { ok: false; message: string };

function isBlankRow(row: string[]): boolean {
  return row.length === 1 && row[0] === "";
}

function splitSections(rows: string[][]): string[][][] {
  const sections: string[][][] = [[]];
  for (const row of rows) {
    if (isBlankRow(row)) {
      sections.push([]);
    } else {
      sections[sections.length - 1].push(row);
    }
  }
  return sections;
}

function readSection(rows: string[][], section: CsvSection): Parsed<[string, number][]> {
  const [titleRow, columnRow, ...dataRows] = rows;

  if (!titleRow || titleRow.length !== 1 || titleRow[0] !== section.title) {
    return { ok: false, message: `Expected section header "${section.title}"` };
  }
  if (
    !columnRow ||
    columnRow.length !== 2 ||
    columnRow[0] !== section.columns[0] ||
    columnRow[1] !== section.columns[1]
  ) {
    return {
      ok: false,
      message: `Expected columns "${section.columns.join(",")}" in "${section.title}"`,
    };
  }

  const value: [string, number][] = [];
  for (const row of dataRows) {
    if (row.length !== 2 || !/^\d+$/.test(row[1])) {
      return { ok: false, message: `Invalid row in "${section.title}": ${row.join(",")}` };
    }
    value.push([row[0], Number(row[1])]);
  }
  return { ok: true, value };
}

/**
 * Read a CSV export back into an analysis result.
 */
export function parseResultsCsv(text: string): CsvParseResult {
  const sections = splitSections(parseCsvRows(text));
  if (sections.length !== 3) {
    return { ok: false, message: `Expected 3 sections, found ${sections.length}` };
  }

  const requests = readSection(sections[0], CSV_SECTIONS.requests);
  if (!requests.ok) return requests;

  const endpoint = readSection(sections[1], CSV_SECTIONS.endpoint);
  if (!endpoint.ok) return endpoint;
  if (endpoint.value.length !== 1) {
    return {
      ok: false,
      message: `Expected exactly one row in "${CSV_SECTIONS.endpoint.title}", found ${endpoint.value.length}`,
    };
  }

  const suspicious = readSection(sections[2], CSV_SECTIONS.suspicious);
  if (!suspicious.ok) return suspicious;

  const [[topEndpoint, topCount]] = endpoint.value;
  return {
    ok: true,
    result: {
      requestsPerIp: requests.value.map(([ip, count]) => ({ ip, count })),
      mostAccessedEndpoint: { endpoint: topEndpoint, count: topCount },
      suspiciousActivity: suspicious.value.map(([ip, failedCount]) => ({ ip, failedCount })),
    },
  };
}
