import { Channel } from "./channel.js";
import { WorkCounter } from "./counter.js";
import type { HttpClient } from "./http.js";
import { extractLinks } from "./links.js";
import { WorkerPool } from "./pool.js";
import { SeenSet, normalizePath } from "./seen.js";
import { fetchBody, markUnreachable, probe } from "./status.js";
import type { LinkReport, Status } from "./types.js";

export interface CrawlArgs {
  client: HttpClient;
  root: URL;
  /** Zero or negative crawls without a depth limit. */
  maxDepth?: number;
  /**
   * Pool to dispatch pages on. Without one the crawl runs on a private
   * single-worker pool that is stopped when the crawl finishes.
   */
  pool?: WorkerPool;
  signal?: AbortSignal;
  verbose?: boolean;
}

/** Handles shared by every page of one crawl. */
interface CrawlRun {
  readonly client: HttpClient;
  readonly pool: WorkerPool;
  readonly seen: SeenSet;
  readonly pending: WorkCounter;
  readonly signal: AbortSignal;
  readonly reports: Channel<LinkReport>;
  readonly maxDepth: number;
  readonly verbose: boolean;
}

/** One page to visit. Frozen when dispatched and never changed after. */
interface CrawlTask {
  readonly target: URL;
  readonly depth: number;
  /** Status already probed by the parent page, if any. */
  readonly status?: Status;
}

/**
 * Start crawling every page on the root's host. Returns the report stream at
 * once; it closes after the last page has been reported, or after in-flight
 * pages finish when `signal` fires.
 */
export function crawl(args: CrawlArgs): Channel<LinkReport> {
  const signal = args.signal ?? new AbortController().signal;
  const ownsPool = args.pool === undefined;
  const pool = args.pool ?? new WorkerPool({ max: 1, signal });

  const run: CrawlRun = {
    client: args.client,
    pool,
    seen: new SeenSet(),
    pending: new WorkCounter(),
    signal,
    reports: new Channel<LinkReport>(),
    maxDepth: args.maxDepth ?? 0,
    verbose: args.verbose ?? false,
  };

  void monitor(run, ownsPool);
  dispatch(run, Object.freeze({ target: new URL(args.root.href), depth: 0 }));

  return run.reports;
}

/** Crawl and collect every report. */
export function crawlSite(args: CrawlArgs): Promise<LinkReport[]> {
  return crawl(args).collect();
}

async function monitor(run: CrawlRun, ownsPool: boolean): Promise<void> {
  await run.pending.drained;
  run.reports.close();
  if (ownsPool) await run.pool.stop();
}

function dispatch(run: CrawlRun, task: CrawlTask): void {
  run.pending.add();

  void run.pool
    .add(() => visit(run, task))
    .then((accepted) => {
      // The pool dropped the task, so nobody else will settle its count.
      if (!accepted) run.pending.done();
    });
}

async function visit(run: CrawlRun, task: CrawlTask): Promise<void> {
  try {
    await visitPage(run, task);
  } finally {
    run.pending.done();
  }
}

async function visitPage(run: CrawlRun, task: CrawlTask): Promise<void> {
  const { target } = task;
  const key = normalizePath(target);

  if (run.seen.has(key)) return;
  if (run.maxDepth > 0 && task.depth >= run.maxDepth) return;

  // Claim before any I/O so siblings cannot schedule the same path.
  run.seen.add(key);

  if (run.signal.aborted) return;

  if (run.verbose) console.error(`Scanning ${key} from ${target.host}`);

  const status = task.status ?? (await probe(run.client, target, run.signal));
  if (run.signal.aborted) return;

  const report: LinkReport = { path: target.href, status, children: [] };

  if (!status.isLive || !status.isCrawlable) {
    emit(run, report);
    return;
  }

  let children: LinkReport[];
  try {
    children = await scanPage(run, target);
  } catch (error) {
    if (run.signal.aborted) return;

    emit(run, { ...report, status: markUnreachable(status, error) });
    return;
  }

  if (run.signal.aborted) return;
  emit(run, { ...report, children });

  const depth = task.depth + 1;
  for (const child of children) {
    const childUrl = new URL(child.path);
    if (run.seen.has(normalizePath(childUrl))) continue;

    dispatch(run, Object.freeze({ target: childUrl, depth, status: child.status }));
  }
}

async function scanPage(run: CrawlRun, target: URL): Promise<LinkReport[]> {
  const page = await fetchBody(run.client, target, run.signal);

  try {
    return await collectChildren(run.client, target, page.body, run.signal);
  } catch (error) {
    // The page itself answered; a broken body only costs us its links.
    if (run.verbose) console.error(`Failed to read ${target.href}:`, error);
    return [];
  } finally {
    await page.close();
  }
}

/**
 * Extract the links of a page body that stay on the page's host and probe
 * each distinct path once. Probes run one after another so a page never takes
 * more than its worker's share of connections.
 */
export async function collectChildren(
  client: HttpClient,
  target: URL,
  body: AsyncIterable<Uint8Array | string>,
  signal: AbortSignal
): Promise<LinkReport[]> {
  const links = await extractLinks(body, target);
  const children: LinkReport[] = [];
  // `/a`, `/a/` and `/a?x=1` are one page; probe it once.
  const probed = new SeenSet();

  for (const link of links) {
    if (link.host !== target.host) continue;
    if (signal.aborted) break;

    const key = normalizePath(link);
    if (probed.has(key)) continue;
    probed.add(key);

    children.push({
      path: link.href,
      status: await probe(client, link, signal),
      children: [],
    });
  }

  return children;
}

function emit(run: CrawlRun, report: LinkReport): void {
  run.reports.push(report);
  if (run.verbose) {
    console.error(`Done scanning ${normalizePath(new URL(report.path))}`);
  }
}
