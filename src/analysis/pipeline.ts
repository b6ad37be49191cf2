import type { AnalysisResult, ReadFailure } from "./types";
import {
  countRequestsPerIp,
  detectSuspiciousIps,
  mostFrequentEndpoint,
} from "./aggregators";

export interface AnalysisOptions {
  logFile: string;
  threshold: number;
}

export interface AnalysisRun {
  result: AnalysisResult;
  /** One entry per pass that could not read the input */
  failures: ReadFailure[];
  skippedLineCount: number;
}

/**
 * Run the three aggregation passes over the log file and assemble the result.
 *
 * Each pass reads the file on its own and falls back to an empty/default
 * value when it fails, so the result is always complete.
 */
export async function runAnalysis(options: AnalysisOptions): Promise<AnalysisRun> {
  const { logFile, threshold } = options;
  console.log(`[Pipeline] Analyzing ${logFile} (failure threshold ${threshold})`);

  const requests = await countRequestsPerIp(logFile);
  const endpoint = await mostFrequentEndpoint(logFile);
  const suspicious = await detectSuspiciousIps(logFile, threshold);

  const failures: ReadFailure[] = [];
  for (const pass of [requests, endpoint, suspicious]) {
    if (pass.failure) failures.push(pass.failure);
  }

  const result: AnalysisResult = {
    requestsPerIp: requests.value,
    mostAccessedEndpoint: endpoint.value,
    suspiciousActivity: suspicious.value,
  };

  console.log(
    `[Pipeline] Found ${result.requestsPerIp.length} IPs, ${result.suspiciousActivity.length} flagged as suspicious`
  );

  return {
    result,
    failures,
    skippedLineCount: requests.skippedLines.length + suspicious.skippedLines.length,
  };
}
