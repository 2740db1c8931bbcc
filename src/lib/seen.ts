/**
 * Paths claimed for crawling during one run. Entries are never removed, so a
 * path that is present stays claimed until the run is discarded.
 */
export class SeenSet {
  private readonly data = new Set<string>();

  has(key: string): boolean {
    return this.data.has(key);
  }

  add(...keys: string[]): void {
    for (const key of keys) this.data.add(key);
  }

  get size(): number {
    return this.data.size;
  }
}

/** Strip one trailing slash from the URL path; the empty path becomes "/". */
export function normalizePath(url: URL): string {
  const trimmed = url.pathname.endsWith("/")
    ? url.pathname.slice(0, -1)
    : url.pathname;
  return trimmed === "" ? "/" : trimmed;
}
