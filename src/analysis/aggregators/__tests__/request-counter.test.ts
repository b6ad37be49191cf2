import { describe, it, expect } from "vitest";
import { countRequests } from "../request-counter";

describe("countRequests", () => {
  it("counts requests per leading IP, most frequent first", () => {
    const lines = [
      '10.0.0.1 - - "GET / HTTP/1.1" 200',
      '10.0.0.2 - - "GET /a HTTP/1.1" 200',
      '10.0.0.2 - - "GET /b HTTP/1.1" 200',
    ];

    const { value, skippedLines } = countRequests(lines);

    expect(value).toEqual([
      { ip: "10.0.0.2", count: 2 },
      { ip: "10.0.0.1", count: 1 },
    ]);
    expect(skippedLines).toEqual([]);
  });

  it("ranks equal counts by first occurrence", () => {
    const lines = ["10.0.0.9 a", "10.0.0.3 b", "10.0.0.3 c", "10.0.0.9 d", "10.0.0.5 e"];

    const { value } = countRequests(lines);

    expect(value.map((entry) => entry.ip)).toEqual(["10.0.0.9", "10.0.0.3", "10.0.0.5"]);
  });

  it("skips lines without a token and reports their line numbers", () => {
    const lines = ["10.0.0.1 GET /", "", "   ", "10.0.0.1 GET /x"];

    const { value, skippedLines } = countRequests(lines);

    expect(value).toEqual([{ ip: "10.0.0.1", count: 2 }]);
    expect(skippedLines).toEqual([
      { lineNumber: 2, content: "" },
      { lineNumber: 3, content: "   " },
    ]);
  });

  it("sums counts to the number of lines that carry a token", () => {
    const lines = ["a 1", "b 2", "", "a 3", "c 4", "\t", "b 5"];

    const { value } = countRequests(lines);
    const total = value.reduce((sum, entry) => sum + entry.count, 0);

    expect(total).toBe(5);
  });

  it("returns an empty result for empty input", () => {
    expect(countRequests([])).toEqual({ value: [], skippedLines: [] });
  });
});
