import type { Aggregate, SkippedLine, SuspiciousEntry } from "@/analysis/types";
import { DEFAULT_FAILURE_THRESHOLD } from "@/lib/constants";
import { extractIdentifier, incrementTally } from "./utils";

/**
 * Substrings that mark a failed authentication. Matched case-sensitively
 * anywhere in the line, so a "401" inside a byte count also counts.
 */
export const FAILED_LOGIN_MARKERS: readonly string[] = ["401", "Invalid credentials"];

export function isFailedLogin(line: string): boolean {
  return FAILED_LOGIN_MARKERS.some((marker) => line.includes(marker));
}

/**
 * IPs whose failed login count is strictly greater than `threshold`,
 * in the order each IP first failed.
 */
export function detectSuspiciousActivity(
  lines: Iterable<string>,
  threshold: number = DEFAULT_FAILURE_THRESHOLD
): Aggregate<SuspiciousEntry[]> {
  const failures = new Map<string, number>();
  const skippedLines: SkippedLine[] = [];
  let lineNumber = 0;

  for (const line of lines) {
    lineNumber++;
    if (!isFailedLogin(line)) continue;

    const ip = extractIdentifier(line);
    if (ip === null) {
      skippedLines.push({ lineNumber, content: line });
      continue;
    }
    incrementTally(failures, ip);
  }

  const value: SuspiciousEntry[] = [];
  for (const [ip, failedCount] of failures) {
    if (failedCount > threshold) {
      value.push({ ip, failedCount });
    }
  }

  return { value, skippedLines };
}
