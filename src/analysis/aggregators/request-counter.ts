import type { Aggregate, IpCount, SkippedLine } from "@/analysis/types";
import { extractIdentifier, incrementTally, rankByCount } from "./utils";

/**
 * Count requests per client IP.
 *
 * Lines without a leading token are reported in `skippedLines` and do not
 * stop the pass.
 */
export function countRequests(lines: Iterable<string>): Aggregate<IpCount[]> {
  const tally = new Map<string, number>();
  const skippedLines: SkippedLine[] = [];
  let lineNumber = 0;

  for (const line of lines) {
    lineNumber++;
    const ip = extractIdentifier(line);
    if (ip === null) {
      skippedLines.push({ lineNumber, content: line });
      continue;
    }
    incrementTally(tally, ip);
  }

  return {
    value: rankByCount(tally).map(([ip, count]) => ({ ip, count })),
    skippedLines,
  };
}
