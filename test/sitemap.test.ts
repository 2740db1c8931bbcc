import { describe, expect, it } from "vitest";
import { escapeXml, renderSitemap, summarizeReports } from "../src/lib/sitemap.js";
import type { LinkReport } from "../src/lib/types.js";

const at = new Date("2024-05-01T10:00:00.000Z");

const reports: LinkReport[] = [
  {
    path: "http://mumbo.test/",
    status: { isLive: true, isCrawlable: true, lastStatusCode: 200, observedAt: at },
    children: [
      {
        path: "http://mumbo.test/search?a=1&b=2",
        status: { isLive: true, isCrawlable: true, lastStatusCode: 200, observedAt: at },
        children: [],
      },
    ],
  },
  {
    path: "http://mumbo.test/jsoncard",
    status: {
      isLive: true,
      isCrawlable: false,
      lastStatusCode: 200,
      observedAt: at,
      failureReason: { kind: "non-html", message: "path points to a non html page" },
    },
    children: [],
  },
  {
    path: "http://mumbo.test/gone",
    status: {
      isLive: false,
      isCrawlable: false,
      lastStatusCode: 404,
      observedAt: at,
      failureReason: { kind: "page-failed", message: "url path failed to respond, possibly dead" },
    },
    children: [],
  },
];

describe("sitemap", () => {
  it("escapes xml special characters", () => {
    expect(escapeXml(`a&b<c>"d"'e'`)).toBe("a&amp;b&lt;c&gt;&quot;d&quot;&apos;e&apos;");
  });

  it("renders reports as a urlset", () => {
    expect(renderSitemap(reports.slice(0, 2))).toBe(
      [
        `<?xml version="1.0" encoding="UTF-8"?>`,
        `<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">`,
        "  <url>",
        "    <loc>http://mumbo.test/</loc>",
        "    <laststatus>200</laststatus>",
        "    <lastchecked>2024-05-01T10:00:00.000Z</lastchecked>",
        "    <reachable>true</reachable>",
        "    <crawlable>true</crawlable>",
        "    <connects>",
        "      <link>http://mumbo.test/search?a=1&amp;b=2</link>",
        "    </connects>",
        "  </url>",
        "  <url>",
        "    <loc>http://mumbo.test/jsoncard</loc>",
        "    <laststatus>200</laststatus>",
        "    <lastchecked>2024-05-01T10:00:00.000Z</lastchecked>",
        "    <reachable>true</reachable>",
        "    <crawlable>false</crawlable>",
        "    <reachable_error>path points to a non html page</reachable_error>",
        "    <connects/>",
        "  </url>",
        "</urlset>",
        "",
      ].join("\n")
    );
  });

  it("renders an empty crawl", () => {
    expect(renderSitemap([])).toBe(
      `<?xml version="1.0" encoding="UTF-8"?>\n<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">\n</urlset>\n`
    );
  });

  it("summarizes reports", () => {
    expect(summarizeReports(reports)).toEqual({
      pages: 3,
      live: 2,
      dead: 1,
      nonCrawlable: 1,
    });
  });
});
