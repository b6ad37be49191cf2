import { z } from "zod/v4";

export const analyzerConfigSchema = z.object({
  logFile: z.string().min(1, "Log file path must not be empty"),
  outputFile: z.string().min(1, "Output file path must not be empty"),
  threshold: z
    .number()
    .int("Threshold must be an integer")
    .nonnegative("Threshold must be 0 or greater"),
});

export type AnalyzerConfig = z.infer<typeof analyzerConfigSchema>;

export type ConfigParseResult =
  | { ok: true; config: AnalyzerConfig }
  | { ok: false; errors: string[] };

export function parseAnalyzerConfig(input: unknown): ConfigParseResult {
  const result = z.safeParse(analyzerConfigSchema, input);
  if (!result.success) {
    return {
      ok: false,
      errors: result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    };
  }
  return { ok: true, config: result.data };
}
