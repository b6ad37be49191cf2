import type { AnalysisResult } from "@/analysis/types";

const COLUMN_WIDTH = 20;

/** Pad to the column width, keeping at least one space after long values */
function padColumn(value: string): string {
  if (value.length >= COLUMN_WIDTH) return `${value} `;
  return value.padEnd(COLUMN_WIDTH);
}

/**
 * Human-readable report lines. Not meant to be machine-parsed; use the CSV
 * export for that.
 */
export function formatResults(result: AnalysisResult): string[] {
  const lines: string[] = [
    "",
    "Requests per IP:",
    `${padColumn("IP Address")}Request Count`,
  ];
  for (const { ip, count } of result.requestsPerIp) {
    lines.push(`${padColumn(ip)}${count}`);
  }

  const { endpoint, count } = result.mostAccessedEndpoint;
  lines.push("", "Most Frequently Accessed Endpoint:", `${endpoint} (Accessed ${count} times)`);

  if (result.suspiciousActivity.length === 0) {
    lines.push("", "No suspicious activity detected.", "");
    return lines;
  }

  lines.push("", "Suspicious Activity Detected:", `${padColumn("IP Address")}Failed Login Attempts`);
  for (const { ip, failedCount } of result.suspiciousActivity) {
    lines.push(`${padColumn(ip)}${failedCount}`);
  }
  return lines;
}

export function displayResults(result: AnalysisResult): void {
  for (const line of formatResults(result)) {
    console.log(line);
  }
}
