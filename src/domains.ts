import { InvalidRequestError } from "./errors.js";

export type DomainPredicate = (url: string) => boolean;

const ALLOWED_SCHEMES = new Set(["http:", "https:"]);

/**
 * Allow-list check: a host passes when it equals an entry or is a subdomain of one.
 * An empty list allows everything.
 */
export function createDomainAllowList(allowedDomains: readonly string[]): DomainPredicate {
  const allowed = allowedDomains.map((d) => d.trim().toLowerCase()).filter(Boolean);

  return (url: string): boolean => {
    if (allowed.length === 0) return true;
    let host: string;
    try {
      host = new URL(url).hostname.toLowerCase();
    } catch {
      return false;
    }
    return allowed.some((d) => host === d || host.endsWith(`.${d}`));
  };
}

/** Only absolute http(s) URLs with a host are renderable. */
export function parseTargetUrl(raw: string): URL {
  let parsed: URL;
  try {
    parsed = new URL(raw.trim());
  } catch {
    throw new InvalidRequestError(`Invalid URL: ${raw}`);
  }
  if (!ALLOWED_SCHEMES.has(parsed.protocol) || !parsed.hostname) {
    throw new InvalidRequestError(`Invalid or unsupported URL scheme: ${raw}`);
  }
  return parsed;
}

export function assertAllowedDomain(url: URL, isAllowed: DomainPredicate, contactEmail: string): void {
  if (isAllowed(url.toString())) return;
  throw new InvalidRequestError(
    `Domain '${url.hostname}' is not allowed. Please contact ${contactEmail} if you want to whitelist it.`
  );
}
