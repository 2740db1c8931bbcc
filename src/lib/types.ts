export interface CrawlOptions {
  /**
   * Maximum crawl depth counted from the root page (the root is depth 0).
   * Zero or a negative number crawls without a depth limit.
   */
  maxDepth?: number;
  /**
   * Max number of pool workers, and so of pages being probed or fetched at once.
   */
  concurrency?: number;
  /**
   * Per-request timeout in ms for HEAD probes and page fetches.
   */
  timeoutMs?: number;
  /**
   * Log every page as it is scanned.
   */
  verbose?: boolean;
}

export type FailureKind = "transport" | "page-failed" | "non-html";

export interface FailureReason {
  kind: FailureKind;
  message: string;
}

export interface Status {
  readonly isLive: boolean;
  readonly isCrawlable: boolean;
  readonly lastStatusCode: number;
  readonly observedAt: Date;
  readonly failureReason?: FailureReason;
}

/**
 * One crawled page. `children` only lists the same-host links found on this
 * page, each with its own probed status; it is not a recursive site tree.
 */
export interface LinkReport {
  path: string;
  status: Status;
  children: LinkReport[];
}
