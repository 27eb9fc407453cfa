import { describe, expect, it } from "vitest";
import { fingerprint, normalizeTarget } from "./fingerprint.js";

describe("normalizeTarget", () => {
  it("lower-cases scheme and host and strips trailing slashes", () => {
    expect(normalizeTarget("HTTPS://Example.COM/Blog/Post///").url).toBe("https://example.com/Blog/Post");
  });

  it("drops the bare root slash and default ports", () => {
    expect(normalizeTarget("https://example.com:443/").url).toBe("https://example.com");
    expect(normalizeTarget("http://example.com:80").url).toBe("http://example.com");
  });

  it("keeps the query string", () => {
    expect(normalizeTarget("https://example.com/?q=1").url).toBe("https://example.com/?q=1");
    expect(normalizeTarget("https://example.com/a/?q=1").url).toBe("https://example.com/a?q=1");
  });

  it("fills in default dimensions", () => {
    expect(normalizeTarget("https://example.com")).toEqual({ url: "https://example.com", width: 1200, height: 630 });
    expect(normalizeTarget("https://example.com", undefined, undefined, { width: 800, height: 400 })).toEqual({
      url: "https://example.com",
      width: 800,
      height: 400,
    });
  });
});

describe("fingerprint", () => {
  it("is a stable sha256 hex digest", () => {
    const a = fingerprint("https://example.com", 1200, 630);
    expect(a).toMatch(/^[0-9a-f]{64}$/);
    expect(fingerprint("https://example.com", 1200, 630)).toBe(a);
  });

  it("treats equivalent spellings of a target as the same", () => {
    const base = fingerprint("https://example.com/docs", 1200, 630);
    expect(fingerprint("HTTPS://EXAMPLE.com/docs/", 1200, 630)).toBe(base);
    expect(fingerprint("https://example.com:443/docs", 1200, 630)).toBe(base);
    expect(fingerprint("https://example.com/docs")).toBe(base);
  });

  it("changes with width, height or path", () => {
    const base = fingerprint("https://example.com", 1200, 630);
    expect(fingerprint("https://example.com", 1201, 630)).not.toBe(base);
    expect(fingerprint("https://example.com", 1200, 631)).not.toBe(base);
    expect(fingerprint("https://example.com/other", 1200, 630)).not.toBe(base);
    expect(fingerprint("http://example.com", 1200, 630)).not.toBe(base);
  });

  it("does not confuse url and dimensions", () => {
    expect(fingerprint("https://example.com/1", 200, 630)).not.toBe(fingerprint("https://example.com/12", 0, 630));
  });
});
