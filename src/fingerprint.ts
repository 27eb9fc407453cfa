import { createHash } from "node:crypto";

export const DEFAULT_WIDTH = 1200;
export const DEFAULT_HEIGHT = 630;

export interface TargetDefaults {
  width: number;
  height: number;
}

export interface NormalizedTarget {
  url: string;
  width: number;
  height: number;
}

/**
 * Canonical form of a render target.
 *
 * The WHATWG parser already lower-cases scheme and host and drops default ports;
 * on top of that trailing slashes are stripped from the path and missing
 * dimensions take the defaults, so `?width=1200` and no width are the same target.
 * Throws a TypeError when the url does not parse.
 */
export function normalizeTarget(
  url: string,
  width?: number,
  height?: number,
  defaults: TargetDefaults = { width: DEFAULT_WIDTH, height: DEFAULT_HEIGHT }
): NormalizedTarget {
  const parsed = new URL(url.trim());
  parsed.pathname = parsed.pathname.replace(/\/+$/, "");

  let canonical = parsed.toString();
  // "https://a.com/" serializes with the slash back on; drop it when nothing follows
  if (parsed.pathname === "/" && !parsed.search && !parsed.hash) {
    canonical = canonical.replace(/\/$/, "");
  }

  return {
    url: canonical,
    width: width ?? defaults.width,
    height: height ?? defaults.height,
  };
}

/** Deterministic cache key for a target. Pure; stable across processes. */
export function fingerprint(url: string, width?: number, height?: number, defaults?: TargetDefaults): string {
  const t = normalizeTarget(url, width, height, defaults);
  const canonical = `${t.url}\n${t.width}x${t.height}`;
  return createHash("sha256").update(canonical).digest("hex");
}
