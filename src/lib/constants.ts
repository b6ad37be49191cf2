export const DEFAULT_LOG_FILE = "data/sample.log";
export const DEFAULT_OUTPUT_FILE = "results/log_analysis_results.csv";

/** An IP is suspicious once its failed logins exceed this count */
export const DEFAULT_FAILURE_THRESHOLD = 10;

/** Prefix for environment variables read by the CLI, e.g. LOG_ANALYZER_THRESHOLD */
export const ENV_PREFIX = "LOG_ANALYZER";

/** Reported when no line carries a recognizable request line */
export const NO_ENDPOINT_LABEL = "N/A";

export const ExitCode = {
  OK: 0,
  /** A pass could not read the input, or the export failed */
  DEGRADED: 1,
  USAGE_ERROR: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];
