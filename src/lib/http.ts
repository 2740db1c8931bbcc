import { failureReason } from "./errors.js";
import type { Status } from "./types.js";

export const USER_AGENT =
  process.env.CRAWLER_USER_AGENT ?? "sitecrawler/0.1 (+same-host site mapper)";

export interface HttpResponse {
  status: number;
  contentType: string;
  body: AsyncIterable<Uint8Array> | null;
  /** Releases the connection; safe to call more than once. */
  close(): Promise<void>;
}

/**
 * The only network surface the crawler needs. Implementations must abort the
 * request when `signal` fires and apply their own timeout.
 */
export interface HttpClient {
  head(url: string, signal: AbortSignal): Promise<HttpResponse>;
  get(url: string, signal: AbortSignal): Promise<HttpResponse>;
}

export interface FetchClientOptions {
  timeoutMs: number;
  userAgent?: string;
}

/** HttpClient on top of Node's global fetch. */
export class FetchClient implements HttpClient {
  private readonly timeoutMs: number;
  private readonly userAgent: string;

  constructor(options: FetchClientOptions) {
    this.timeoutMs = options.timeoutMs;
    this.userAgent = options.userAgent ?? USER_AGENT;
  }

  head(url: string, signal: AbortSignal): Promise<HttpResponse> {
    return this.request(url, "HEAD", signal, "*/*");
  }

  get(url: string, signal: AbortSignal): Promise<HttpResponse> {
    return this.request(
      url,
      "GET",
      signal,
      "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8"
    );
  }

  private async request(
    url: string,
    method: "HEAD" | "GET",
    signal: AbortSignal,
    accept: string
  ): Promise<HttpResponse> {
    const response = await fetch(url, {
      method,
      redirect: "follow",
      signal: AbortSignal.any([signal, AbortSignal.timeout(this.timeoutMs)]),
      headers: {
        "User-Agent": this.userAgent,
        Accept: accept,
        "Accept-Language": "en-US,en;q=0.9",
      },
    });

    const body = response.body;

    return {
      status: response.status,
      contentType: response.headers.get("content-type") ?? "",
      body,
      close: async () => {
        if (body && !response.bodyUsed) await body.cancel();
      },
    };
  }
}

export function isSuccess(statusCode: number): boolean {
  return statusCode >= 200 && statusCode <= 299;
}

export function isHtmlContentType(contentType: string): boolean {
  const value = contentType.toLowerCase();
  return value.includes("text/html") || value.includes("text/xhtml");
}

export function classifyResponse(
  statusCode: number,
  contentType: string,
  observedAt: Date = new Date()
): Status {
  if (!isSuccess(statusCode)) {
    return {
      isLive: false,
      isCrawlable: false,
      lastStatusCode: statusCode,
      observedAt,
      failureReason: failureReason("page-failed"),
    };
  }

  if (!isHtmlContentType(contentType)) {
    return {
      isLive: true,
      isCrawlable: false,
      lastStatusCode: statusCode,
      observedAt,
      failureReason: failureReason("non-html"),
    };
  }

  return {
    isLive: true,
    isCrawlable: true,
    lastStatusCode: statusCode,
    observedAt,
  };
}
