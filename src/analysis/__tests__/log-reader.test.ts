import { describe, it, expect, afterAll } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { classifyReadError, describeReadFailure, readLogLines } from "../log-reader";

const TMP_DIR = mkdtempSync(join(tmpdir(), "log-reader-"));

function tmpFile(name: string, content: string): string {
  const filePath = join(TMP_DIR, name);
  writeFileSync(filePath, content, "utf-8");
  return filePath;
}

afterAll(() => {
  rmSync(TMP_DIR, { recursive: true, force: true });
});

describe("readLogLines", () => {
  it("returns each line without the trailing newline", async () => {
    const path = tmpFile("lf.log", "first line\nsecond line\n");

    expect(await readLogLines(path)).toEqual({ ok: true, lines: ["first line", "second line"] });
  });

  it("treats CRLF as a single line break", async () => {
    const path = tmpFile("crlf.log", "a\r\nb\r\n");

    expect(await readLogLines(path)).toEqual({ ok: true, lines: ["a", "b"] });
  });

  it("keeps a last line that has no newline", async () => {
    const path = tmpFile("no-eol.log", "a\nb");

    expect(await readLogLines(path)).toEqual({ ok: true, lines: ["a", "b"] });
  });

  it("keeps blank lines in the middle of the file", async () => {
    const path = tmpFile("blank.log", "a\n\nb\n");

    expect(await readLogLines(path)).toEqual({ ok: true, lines: ["a", "", "b"] });
  });

  it("returns no lines for an empty file", async () => {
    const path = tmpFile("empty.log", "");

    expect(await readLogLines(path)).toEqual({ ok: true, lines: [] });
  });

  it("reports a missing file as FILE_NOT_FOUND", async () => {
    const path = join(TMP_DIR, "missing.log");

    const result = await readLogLines(path);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.failure.reason).toBe("FILE_NOT_FOUND");
      expect(result.failure.filePath).toBe(path);
    }
  });

  it("reports a directory as NOT_A_FILE", async () => {
    const dir = join(TMP_DIR, "a-directory");
    mkdirSync(dir);

    const result = await readLogLines(dir);

    expect(result).toEqual({
      ok: false,
      failure: { reason: "NOT_A_FILE", filePath: dir, message: `${dir} is not a regular file` },
    });
  });

  it("can read the same file repeatedly", async () => {
    const path = tmpFile("repeat.log", "x\n");

    const first = await readLogLines(path);
    const second = await readLogLines(path);

    expect(second).toEqual(first);
  });
});

describe("classifyReadError", () => {
  function systemError(code: string): Error {
    return Object.assign(new Error(`${code}: failed`), { code });
  }

  it("maps ENOENT to FILE_NOT_FOUND", () => {
    expect(classifyReadError("a.log", systemError("ENOENT"))).toEqual({
      reason: "FILE_NOT_FOUND",
      filePath: "a.log",
      message: "ENOENT: failed",
    });
  });

  it("maps EACCES and EPERM to PERMISSION_DENIED", () => {
    expect(classifyReadError("a.log", systemError("EACCES")).reason).toBe("PERMISSION_DENIED");
    expect(classifyReadError("a.log", systemError("EPERM")).reason).toBe("PERMISSION_DENIED");
  });

  it("maps EISDIR to NOT_A_FILE", () => {
    expect(classifyReadError("a.log", systemError("EISDIR")).reason).toBe("NOT_A_FILE");
  });

  it("maps anything else to READ_ERROR", () => {
    expect(classifyReadError("a.log", systemError("EIO")).reason).toBe("READ_ERROR");
    expect(classifyReadError("a.log", "boom")).toEqual({
      reason: "READ_ERROR",
      filePath: "a.log",
      message: "boom",
    });
  });
});

describe("describeReadFailure", () => {
  it("describes each failure reason", () => {
    const base = { filePath: "logs/access.log", message: "EIO: i/o error" };

    expect(describeReadFailure({ ...base, reason: "FILE_NOT_FOUND" })).toBe(
      "Error: The file logs/access.log does not exist."
    );
    expect(describeReadFailure({ ...base, reason: "PERMISSION_DENIED" })).toBe(
      "Error: Permission denied reading logs/access.log."
    );
    expect(describeReadFailure({ ...base, reason: "NOT_A_FILE" })).toBe(
      "Error: logs/access.log is not a regular file."
    );
    expect(describeReadFailure({ ...base, reason: "READ_ERROR" })).toBe(
      "Error: Could not read logs/access.log: EIO: i/o error"
    );
  });
});
