import type { EndpointCount } from "@/analysis/types";
import { NO_ENDPOINT_LABEL } from "@/lib/constants";
import { incrementTally, rankByCount } from "./utils";

/**
 * Quoted HTTP request line, e.g. `"GET /home HTTP/1.1"`.
 * The lazy group captures the path up to the first " HTTP"; it takes any
 * character but \n, so U+2028/U+2029 inside a path are kept.
 */
export const REQUEST_LINE_REGEX = /"(?:GET|POST|PUT|DELETE) ([^\n]*?) HTTP/;

export function extractEndpoint(line: string): string | null {
  const match = line.match(REQUEST_LINE_REGEX);
  return match ? match[1] : null;
}

/**
 * Access counts for every endpoint, most accessed first.
 * Lines without a request line are ignored.
 */
export function tallyEndpoints(lines: Iterable<string>): EndpointCount[] {
  const tally = new Map<string, number>();

  for (const line of lines) {
    const endpoint = extractEndpoint(line);
    if (endpoint !== null) {
      incrementTally(tally, endpoint);
    }
  }

  return rankByCount(tally).map(([endpoint, count]) => ({ endpoint, count }));
}

/**
 * The most accessed endpoint. On a tie the one seen first wins; with no
 * request lines at all the result is `{ endpoint: "N/A", count: 0 }`.
 */
export function findMostAccessedEndpoint(lines: Iterable<string>): EndpointCount {
  const ranked = tallyEndpoints(lines);
  if (ranked.length === 0) {
    return { endpoint: NO_ENDPOINT_LABEL, count: 0 };
  }
  return ranked[0];
}
