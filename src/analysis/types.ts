export interface IpCount {
  ip: string;
  count: number;
}

export interface EndpointCount {
  endpoint: string;
  count: number;
}

export interface SuspiciousEntry {
  ip: string;
  failedCount: number;
}

export interface AnalysisResult {
  /** Descending by count; ties keep first-seen order */
  requestsPerIp: IpCount[];
  mostAccessedEndpoint: EndpointCount;
  suspiciousActivity: SuspiciousEntry[];
}

export type ReadFailureReason =
  | "FILE_NOT_FOUND"
  | "PERMISSION_DENIED"
  | "NOT_A_FILE"
  | "READ_ERROR";

export interface ReadFailure {
  reason: ReadFailureReason;
  filePath: string;
  message: string;
}

export type LineReadResult =
  | { ok: true; lines: string[] }
  | { ok: false; failure: ReadFailure };

/** A line that should have carried a leading token but had none */
export interface SkippedLine {
  /** 1-based */
  lineNumber: number;
  content: string;
}

/** Output of a pure aggregation over a line sequence */
export interface Aggregate<T> {
  value: T;
  skippedLines: SkippedLine[];
}

/** Output of one aggregation pass over the input file */
export interface PassResult<T> extends Aggregate<T> {
  failure: ReadFailure | null;
}

export type WriteFailureReason = "PERMISSION_DENIED" | "WRITE_ERROR";

export type WriteResult =
  | { ok: true; outputPath: string }
  | { ok: false; reason: WriteFailureReason; outputPath: string; message: string };
