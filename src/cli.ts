import yargs from "yargs";
import { runAnalysis } from "@/analysis/pipeline";
import { displayResults } from "@/analysis/reporter/console";
import { writeResultsCsv } from "@/analysis/reporter/csv";
import {
  DEFAULT_FAILURE_THRESHOLD,
  DEFAULT_LOG_FILE,
  DEFAULT_OUTPUT_FILE,
  ENV_PREFIX,
  ExitCode,
} from "@/lib/constants";
import { errorMessage } from "@/lib/fs-errors";
import { parseAnalyzerConfig, type ConfigParseResult } from "@/lib/validations/config";

/**
 * Option defaults, overridable through LOG_ANALYZER_LOG_FILE,
 * LOG_ANALYZER_OUTPUT_FILE and LOG_ANALYZER_THRESHOLD. Other variables with
 * the prefix are ignored.
 */
function envDefaults() {
  const threshold = process.env[`${ENV_PREFIX}_THRESHOLD`];
  return {
    logFile: process.env[`${ENV_PREFIX}_LOG_FILE`] ?? DEFAULT_LOG_FILE,
    outputFile: process.env[`${ENV_PREFIX}_OUTPUT_FILE`] ?? DEFAULT_OUTPUT_FILE,
    threshold: threshold === undefined ? DEFAULT_FAILURE_THRESHOLD : Number(threshold),
  };
}

function parseArgs(argv: string[]) {
  const defaults = envDefaults();
  return yargs(argv)
    .scriptName("access-log-analyzer")
    .usage("$0 [options]")
    .option("log-file", {
      alias: ["log_file", "l"],
      type: "string",
      default: defaults.logFile,
      describe: "Path to the access log file",
    })
    .option("output-file", {
      alias: ["output_file", "o"],
      type: "string",
      default: defaults.outputFile,
      describe: "Path of the CSV file to write",
    })
    .option("threshold", {
      alias: "t",
      type: "number",
      default: defaults.threshold,
      describe: "Failed logins an IP must exceed to be reported",
    })
    .demandCommand(0, 0)
    .strict()
    .help()
    .fail((message, error) => {
      throw error ?? new Error(message);
    })
    .parseSync();
}

/**
 * Parse and validate command-line options.
 */
export function resolveConfig(argv: string[]): ConfigParseResult {
  try {
    const args = parseArgs(argv);
    return parseAnalyzerConfig({
      logFile: args["log-file"],
      outputFile: args["output-file"],
      threshold: args.threshold,
    });
  } catch (error) {
    return { ok: false, errors: [errorMessage(error)] };
  }
}

/**
 * Run the analyzer and return the process exit code.
 *
 * Every step runs even when an earlier one failed; failures only show up in
 * the exit code.
 */
export async function main(argv: string[]): Promise<ExitCode> {
  const resolved = resolveConfig(argv);
  if (!resolved.ok) {
    for (const error of resolved.errors) {
      console.error(`[CLI] Invalid options: ${error}`);
    }
    return ExitCode.USAGE_ERROR;
  }

  const { logFile, outputFile, threshold } = resolved.config;
  const run = await runAnalysis({ logFile, threshold });

  displayResults(run.result);
  const written = await writeResultsCsv(run.result, outputFile);

  if (run.failures.length > 0 || !written.ok) {
    return ExitCode.DEGRADED;
  }
  return ExitCode.OK;
}
