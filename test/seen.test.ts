import { describe, expect, it } from "vitest";
import { SeenSet, normalizePath } from "../src/lib/seen.js";

describe("seen", () => {
  it("remembers every added key", () => {
    const seen = new SeenSet();
    expect(seen.has("/a")).toBe(false);

    seen.add("/a", "/b");
    seen.add("/a");

    expect(seen.has("/a")).toBe(true);
    expect(seen.has("/b")).toBe(true);
    expect(seen.has("/c")).toBe(false);
    expect(seen.size).toBe(2);
  });

  it("normalizes paths", () => {
    expect(normalizePath(new URL("http://mumbo.test"))).toBe("/");
    expect(normalizePath(new URL("http://mumbo.test/"))).toBe("/");
    expect(normalizePath(new URL("http://mumbo.test/services/"))).toBe("/services");
    expect(normalizePath(new URL("http://mumbo.test/services"))).toBe("/services");
    expect(normalizePath(new URL("http://mumbo.test/a/b/?q=1#top"))).toBe("/a/b");
  });
});
