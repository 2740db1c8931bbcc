import { crawl } from "./lib/crawl.js";
import { FetchClient, type HttpClient } from "./lib/http.js";
import { WorkerPool } from "./lib/pool.js";
import { summarizeReports, type ReportSummary } from "./lib/sitemap.js";
import type { CrawlOptions, LinkReport } from "./lib/types.js";

export type { CrawlOptions } from "./lib/types.js";

export type JobStatus =
  | "pending"
  | "processing"
  | "completed"
  | "cancelled"
  | "failed";

export interface JobResult {
  summary: ReportSummary;
  reports: LinkReport[];
}

export interface Job {
  id: string;
  url: string;
  options: Required<CrawlOptions>;
  status: JobStatus;
  result: JobResult;
  error?: string;
  createdAt: Date;
  completedAt?: Date;
}

export interface JobInput {
  id: string;
  url: string;
  options: Required<CrawlOptions>;
}

export interface JobCallbacks {
  onProcessing: () => Promise<void> | void;
  onReport: (report: LinkReport) => Promise<void> | void;
  onCompleted: (summary: ReportSummary) => Promise<void> | void;
  onCancelled: (summary: ReportSummary) => Promise<void> | void;
  onFailed: (error: string) => Promise<void> | void;
}

export function emptyResult(): JobResult {
  return {
    summary: summarizeReports([]),
    reports: [],
  };
}

/**
 * Crawl a job's site on its own worker pool, handing every report to the
 * callbacks as soon as it is emitted.
 */
export async function processJob(
  job: JobInput,
  callbacks: JobCallbacks,
  signal: AbortSignal,
  client: HttpClient = new FetchClient({ timeoutMs: job.options.timeoutMs })
): Promise<void> {
  const pool = new WorkerPool({ max: job.options.concurrency, signal });

  try {
    await callbacks.onProcessing();

    const root = new URL(job.url);
    console.log(
      `Job ${job.id}: Crawling ${root.host} with ${job.options.concurrency} workers`
    );

    const reports: LinkReport[] = [];
    const stream = crawl({
      client,
      root,
      maxDepth: job.options.maxDepth,
      pool,
      signal,
      verbose: job.options.verbose,
    });

    for await (const report of stream) {
      reports.push(report);
      await callbacks.onReport(report);
    }

    const summary = summarizeReports(reports);

    if (signal.aborted) {
      console.log(`Job ${job.id} cancelled after ${summary.pages} pages`);
      await callbacks.onCancelled(summary);
      return;
    }

    console.log(
      `Job ${job.id} completed: ${summary.pages} pages, ${summary.live} live, ${summary.dead} dead, ${summary.nonCrawlable} non-html`
    );
    await callbacks.onCompleted(summary);
  } catch (error) {
    console.error(`Job ${job.id} failed:`, error);
    await callbacks.onFailed(String(error));
  } finally {
    await pool.stop();
  }
}
