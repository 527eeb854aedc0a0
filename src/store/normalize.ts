/**
 * URL normalization.
 *
 * The normalized URL is the natural key of a source record: two URLs that
 * normalize to the same string are the same source.
 *
 *   - scheme and host lowercased, leading "www." removed
 *   - default ports dropped
 *   - fragment dropped
 *   - query parameters sorted by name (stable for repeated names)
 *   - trailing slash removed, except for the root path
 */

import { ValidationError } from "../errors/index.js";

const SUPPORTED_PROTOCOLS = new Set(["http:", "https:"]);

function parseUrl(raw: string): URL {
  let url: URL;
  try {
    url = new URL(raw.trim());
  } catch {
    throw new ValidationError(`Invalid URL: ${raw}`, [
      { path: ["url"], message: "Not a valid absolute URL", code: "invalid_string" },
    ]);
  }
  if (!SUPPORTED_PROTOCOLS.has(url.protocol)) {
    throw new ValidationError(`Unsupported URL scheme: ${url.protocol}`, [
      { path: ["url"], message: "Only http and https URLs are accepted", code: "invalid_string" },
    ]);
  }
  return url;
}

function stripWww(hostname: string): string {
  return hostname.startsWith("www.") ? hostname.slice(4) : hostname;
}

/**
 * Normalize a URL to its canonical form.
 *
 * @throws ValidationError when the value is not an http(s) URL
 */
export function normalizeUrl(raw: string): string {
  const url = parseUrl(raw);

  // URL already lowercases the host and drops default ports
  const host = stripWww(url.hostname) + (url.port ? `:${url.port}` : "");

  let path = url.pathname;
  if (path.length > 1) {
    path = path.replace(/\/+$/, "");
    if (path === "") path = "/";
  }

  url.searchParams.sort();
  const search = url.search;

  return `${url.protocol}//${host}${path}${search}`;
}

/**
 * Domain of a URL: lowercased host name without "www." or port.
 *
 * @throws ValidationError when the value is not an http(s) URL
 */
export function extractDomain(raw: string): string {
  return stripWww(parseUrl(raw).hostname);
}
