import type { FailureKind, FailureReason } from "./types.js";

const MESSAGES: Record<FailureKind, string> = {
  transport: "request failed before a response arrived",
  "page-failed": "url path failed to respond, possibly dead",
  "non-html": "path points to a non html page",
};

export class CrawlError extends Error {
  readonly kind: FailureKind;
  readonly url: string;
  readonly statusCode?: number;

  constructor(
    kind: FailureKind,
    url: string,
    options: { message?: string; statusCode?: number; cause?: unknown } = {}
  ) {
    super(options.message ?? MESSAGES[kind], { cause: options.cause });
    this.name = "CrawlError";
    this.kind = kind;
    this.url = url;
    this.statusCode = options.statusCode;
  }

  toFailureReason(): FailureReason {
    return { kind: this.kind, message: this.message };
  }
}

export function failureReason(kind: FailureKind, message?: string): FailureReason {
  return { kind, message: message ?? MESSAGES[kind] };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Anything thrown that is not a CrawlError counts as a transport failure. */
export function toFailureReason(error: unknown): FailureReason {
  if (error instanceof CrawlError) return error.toFailureReason();
  return failureReason("transport", describeError(error));
}
