import { open, type FileHandle } from "fs/promises";
import { createInterface } from "readline";
import type { LineReadResult, ReadFailure } from "@/analysis/types";
import { errorCode, errorMessage, isPermissionError } from "@/lib/fs-errors";

/**
 * Map a filesystem error onto a tagged read failure.
 */
export function classifyReadError(filePath: string, error: unknown): ReadFailure {
  const message = errorMessage(error);

  if (isPermissionError(error)) {
    return { reason: "PERMISSION_DENIED", filePath, message };
  }

  switch (errorCode(error)) {
    case "ENOENT":
      return { reason: "FILE_NOT_FOUND", filePath, message };
    case "EISDIR":
      return { reason: "NOT_A_FILE", filePath, message };
    default:
      return { reason: "READ_ERROR", filePath, message };
  }
}

/**
 * Operator-facing description of a read failure.
 */
export function describeReadFailure(failure: ReadFailure): string {
  switch (failure.reason) {
    case "FILE_NOT_FOUND":
      return `Error: The file ${failure.filePath} does not exist.`;
    case "PERMISSION_DENIED":
      return `Error: Permission denied reading ${failure.filePath}.`;
    case "NOT_A_FILE":
      return `Error: ${failure.filePath} is not a regular file.`;
    case "READ_ERROR":
      return `Error: Could not read ${failure.filePath}: ${failure.message}`;
  }
}

/**
 * Read every line of a text file.
 *
 * CRLF and LF both end a line, and a trailing newline does not produce an
 * extra empty line. The file handle is closed whether reading succeeds or
 * fails. Never throws: failures come back as a tagged `ReadFailure`.
 */
export async function readLogLines(filePath: string): Promise<LineReadResult> {
  let handle: FileHandle | undefined;

  try {
    handle = await open(filePath, "r");

    const stats = await handle.stat();
    if (!stats.isFile()) {
      return {
        ok: false,
        failure: {
          reason: "NOT_A_FILE",
          filePath,
          message: `${filePath} is not a regular file`,
        },
      };
    }

    const rl = createInterface({
      input: handle.createReadStream({ encoding: "utf-8", autoClose: false }),
      crlfDelay: Infinity,
    });

    const lines: string[] = [];
    for await (const line of rl) {
      lines.push(line);
    }
    return { ok: true, lines };
  } catch (error) {
    return { ok: false, failure: classifyReadError(filePath, error) };
  } finally {
    await handle?.close();
  }
}
