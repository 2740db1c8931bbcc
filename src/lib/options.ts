import type { CrawlOptions } from "./types.js";

export const DEFAULT_OPTIONS: Required<CrawlOptions> = {
  maxDepth: 0,
  concurrency: 4,
  timeoutMs: 5000,
  verbose: false,
};

export function normalizeOptions(options?: CrawlOptions): Required<CrawlOptions> {
  const merged = {
    ...DEFAULT_OPTIONS,
    ...(options ?? {}),
  };

  return {
    ...merged,
    maxDepth: Math.trunc(merged.maxDepth),
    concurrency: Math.max(1, Math.trunc(merged.concurrency)),
    timeoutMs: Math.max(1, merged.timeoutMs),
  };
}

function pickNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

/**
 * Read crawl options out of an untrusted request payload. Unknown fields and
 * values of the wrong type are ignored.
 */
export function parseCrawlOptions(input: unknown): CrawlOptions {
  if (typeof input !== "object" || input === null) return {};

  const source = new Map(Object.entries(input));
  const options: CrawlOptions = {};

  const maxDepth = pickNumber(source.get("maxDepth"));
  if (maxDepth !== undefined) options.maxDepth = maxDepth;

  const concurrency = pickNumber(source.get("concurrency"));
  if (concurrency !== undefined) options.concurrency = concurrency;

  const timeoutMs = pickNumber(source.get("timeoutMs"));
  if (timeoutMs !== undefined) options.timeoutMs = timeoutMs;

  const verbose = source.get("verbose");
  if (typeof verbose === "boolean") options.verbose = verbose;

  return options;
}
