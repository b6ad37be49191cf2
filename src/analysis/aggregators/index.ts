import type {
  Aggregate,
  EndpointCount,
  IpCount,
  PassResult,
  SuspiciousEntry,
} from "@/analysis/types";
import { describeReadFailure, readLogLines } from "@/analysis/log-reader";
import { NO_ENDPOINT_LABEL } from "@/lib/constants";
import { errorMessage } from "@/lib/fs-errors";
import { countRequests } from "./request-counter";
import { findMostAccessedEndpoint } from "./endpoint-extractor";
import { detectSuspiciousActivity } from "./suspicious-activity";

/**
 * One full pass over the log file with its own read and its own tally.
 *
 * A read failure, or anything thrown by the aggregation, is logged and
 * turned into the pass's fallback value; it is never rethrown, so sibling
 * passes and reporting still run.
 */
async function runPass<T>(
  tag: string,
  filePath: string,
  fallback: () => T,
  aggregate: (lines: string[]) => Aggregate<T>
): Promise<PassResult<T>> {
  try {
    const read = await readLogLines(filePath);
    if (!read.ok) {
      console.error(`[Reader] ${describeReadFailure(read.failure)}`);
      return { value: fallback(), skippedLines: [], failure: read.failure };
    }

    const result = aggregate(read.lines);
    for (const skipped of result.skippedLines) {
      console.warn(
        `[${tag}] Skipping malformed line ${skipped.lineNumber}: ${JSON.stringify(skipped.content)}`
      );
    }
    return { ...result, failure: null };
  } catch (error) {
    console.error(`[${tag}] Unexpected error while processing ${filePath}:`, errorMessage(error));
    return {
      value: fallback(),
      skippedLines: [],
      failure: { reason: "READ_ERROR", filePath, message: errorMessage(error) },
    };
  }
}

export function countRequestsPerIp(filePath: string): Promise<PassResult<IpCount[]>> {
  return runPass("RequestCounter", filePath, () => [], countRequests);
}

export function mostFrequentEndpoint(filePath: string): Promise<PassResult<EndpointCount>> {
  return runPass(
    "EndpointExtractor",
    filePath,
    () => ({ endpoint: NO_ENDPOINT_LABEL, count: 0 }),
    (lines) => ({ value: findMostAccessedEndpoint(lines), skippedLines: [] })
  );
}

export function detectSuspiciousIps(
  filePath: string,
  threshold: number
): Promise<PassResult<SuspiciousEntry[]>> {
  return runPass("SuspiciousActivity", filePath, () => [], (lines) =>
    detectSuspiciousActivity(lines, threshold)
  );
}
