import { CrawlError, describeError, failureReason, toFailureReason } from "./errors.js";
import { classifyResponse, type HttpClient, type HttpResponse } from "./http.js";
import type { Status } from "./types.js";

/** Status code recorded when no response arrived at all. */
export const TRANSPORT_FAILURE_STATUS = 500;

export interface PageBody {
  body: AsyncIterable<Uint8Array>;
  close(): Promise<void>;
}

/**
 * Probe a URL with a HEAD request and classify it.
 *
 * Servers that refuse HEAD (405) are retried with GET; the body is discarded.
 * Never throws: transport failures come back as a not-live status.
 */
export async function probe(
  client: HttpClient,
  url: URL,
  signal: AbortSignal
): Promise<Status> {
  const observedAt = new Date();

  let response: HttpResponse;
  try {
    response = await client.head(url.href, signal);

    if (response.status === 405) {
      await response.close();
      response = await client.get(url.href, signal);
    }
  } catch (error) {
    return {
      isLive: false,
      isCrawlable: false,
      lastStatusCode: TRANSPORT_FAILURE_STATUS,
      observedAt,
      failureReason: failureReason("transport", describeError(error)),
    };
  }

  try {
    return classifyResponse(response.status, response.contentType, observedAt);
  } finally {
    await response.close();
  }
}

/**
 * Fetch a page's body for link extraction. The status is checked again since
 * it may have changed since the probe. The caller must close the result.
 */
export async function fetchBody(
  client: HttpClient,
  url: URL,
  signal: AbortSignal
): Promise<PageBody> {
  let response: HttpResponse;
  try {
    response = await client.get(url.href, signal);
  } catch (error) {
    throw new CrawlError("transport", url.href, {
      message: describeError(error),
      cause: error,
    });
  }

  const status = classifyResponse(response.status, response.contentType);
  const body = response.body;

  if (!status.isLive || !status.isCrawlable || body === null) {
    await response.close();
    throw new CrawlError(status.failureReason?.kind ?? "page-failed", url.href, {
      statusCode: response.status,
    });
  }

  return { body, close: () => response.close() };
}

/**
 * Status of a page whose fetch failed after a successful probe. Only
 * `isLive` flips; `isCrawlable` keeps the probe's answer.
 */
export function markUnreachable(status: Status, error: unknown): Status {
  return {
    ...status,
    isLive: false,
    lastStatusCode:
      error instanceof CrawlError
        ? error.statusCode ?? TRANSPORT_FAILURE_STATUS
        : TRANSPORT_FAILURE_STATUS,
    observedAt: new Date(),
    failureReason: toFailureReason(error),
  };
}
