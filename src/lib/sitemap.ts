import type { LinkReport } from "./types.js";

export interface ReportSummary {
  pages: number;
  live: number;
  dead: number;
  nonCrawlable: number;
}

export function summarizeReports(reports: LinkReport[]): ReportSummary {
  const live = reports.filter((r) => r.status.isLive).length;
  const nonCrawlable = reports.filter(
    (r) => r.status.isLive && !r.status.isCrawlable
  ).length;

  return {
    pages: reports.length,
    live,
    dead: reports.length - live,
    nonCrawlable,
  };
}

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

function renderUrl(report: LinkReport): string {
  const { status } = report;
  const lines = [
    "  <url>",
    `    <loc>${escapeXml(report.path)}</loc>`,
    `    <laststatus>${status.lastStatusCode}</laststatus>`,
    `    <lastchecked>${status.observedAt.toISOString()}</lastchecked>`,
    `    <reachable>${status.isLive}</reachable>`,
    `    <crawlable>${status.isCrawlable}</crawlable>`,
  ];

  if (status.failureReason) {
    lines.push(
      `    <reachable_error>${escapeXml(status.failureReason.message)}</reachable_error>`
    );
  }

  if (report.children.length === 0) {
    lines.push("    <connects/>");
  } else {
    lines.push("    <connects>");
    for (const child of report.children) {
      lines.push(`      <link>${escapeXml(child.path)}</link>`);
    }
    lines.push("    </connects>");
  }

  lines.push("  </url>");
  return lines.join("\n");
}

/**
 * Render crawl reports as a sitemap urlset, extended with each page's last
 * status and the same-host links it points to.
 */
export function renderSitemap(reports: LinkReport[]): string {
  return [
    `<?xml version="1.0" encoding="UTF-8"?>`,
    `<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">`,
    ...reports.map(renderUrl),
    `</urlset>`,
    "",
  ].join("\n");
}
