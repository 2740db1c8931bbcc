#!/usr/bin/env node
import { Command, InvalidArgumentError } from "commander";
import { crawl } from "./lib/crawl.js";
import { FetchClient } from "./lib/http.js";
import { normalizeOptions } from "./lib/options.js";
import { WorkerPool } from "./lib/pool.js";
import { renderSitemap } from "./lib/sitemap.js";
import type { LinkReport } from "./lib/types.js";
import { toLinkReportDto } from "./dto/job.dto.js";

type OutputFormat = "xml" | "json";

interface CrawlCommandOptions {
  depth: number;
  concurrency: number;
  timeout: number;
  verbose: boolean;
  timed: boolean;
  format: OutputFormat;
}

function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) throw new InvalidArgumentError("Not a number.");
  return parsed;
}

function parseFormat(value: string): OutputFormat {
  if (value === "xml" || value === "json") return value;
  throw new InvalidArgumentError("Expected xml or json.");
}

async function runCrawl(target: string, opts: CrawlCommandOptions): Promise<void> {
  let root: URL;
  try {
    root = new URL(target);
  } catch {
    throw new InvalidArgumentError(`url error: ${target} is not a valid URL`);
  }

  const start = Date.now();
  const options = normalizeOptions({
    maxDepth: opts.depth,
    concurrency: opts.concurrency,
    timeoutMs: opts.timeout,
    verbose: opts.verbose,
  });

  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());

  const pool = new WorkerPool({ max: options.concurrency, signal: controller.signal });
  const reports: LinkReport[] = [];

  try {
    const stream = crawl({
      client: new FetchClient({ timeoutMs: options.timeoutMs }),
      root,
      maxDepth: options.maxDepth,
      pool,
      signal: controller.signal,
      verbose: options.verbose,
    });

    for await (const report of stream) {
      if (opts.format === "json") {
        process.stdout.write(`${JSON.stringify(toLinkReportDto(report))}\n`);
      } else {
        reports.push(report);
      }
    }
  } finally {
    await pool.stop();
  }

  if (opts.format === "xml") process.stdout.write(renderSitemap(reports));

  if (opts.timed) {
    process.stderr.write(`\nFinished: ${Date.now() - start}ms.\n`);
  }
}

const program = new Command();

program
  .name("sitecrawler")
  .description("Crawl a website and report every page on its host.");

program
  .command("crawl", { isDefault: true })
  .description(
    "Crawl all pages of the given host, ignoring external links, and print a sitemap with each page's status and links."
  )
  .argument("<url>", "website URL to crawl")
  .option("-d, --depth <n>", "maximum depth to crawl (0 for no limit)", parseInteger, 0)
  .option("-c, --concurrency <n>", "number of pages crawled at once", parseInteger, 4)
  .option("-t, --timeout <ms>", "timeout for each HTTP request", parseInteger, 5000)
  .option("-f, --format <format>", "output format: xml or json", parseFormat, "xml")
  .option("-v, --verbose", "print every page as it is scanned", false)
  .option("--timed", "print the total crawl time to stderr", false)
  .action(runCrawl);

program.parseAsync(process.argv).catch((error) => {
  console.error("Crawl error:", error);
  process.exit(1);
});
