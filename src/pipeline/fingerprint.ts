// pattern: functional-core
import { createHash } from "node:crypto";
import type { FingerprintBasis } from "./types";

const TRACKING_PARAMS = new Set([
  "fbclid",
  "gclid",
  "dclid",
  "msclkid",
  "yclid",
  "igshid",
  "mc_cid",
  "mc_eid",
  "_hsenc",
  "_hsmi",
  "mkt_tok",
  "ref",
  "ref_src",
  "cmpid",
  "ncid",
  "sr_share",
  "spm",
]);

function isTrackingParam(name: string): boolean {
  const lower = name.toLowerCase();
  return lower.startsWith("utm_") || TRACKING_PARAMS.has(lower);
}

function sha256(input: string): string {
  return createHash("sha256").update(input, "utf8").digest("hex");
}

/**
 * Canonical form of an article link, or null when the link cannot serve as
 * an identity (missing, relative, or not http(s)).
 *
 * Scheme, host and path are lowercased; the fragment, default port, a
 * trailing slash and tracking parameters are removed; remaining query
 * parameters are sorted.
 */
export function normalizeLink(link: string | null): string | null {
  if (!link) return null;

  let url: URL;
  try {
    url = new URL(link.trim());
  } catch {
    return null;
  }

  if (url.protocol !== "http:" && url.protocol !== "https:") return null;
  if (!url.hostname) return null;

  const params = [...url.searchParams.entries()]
    .filter(([name]) => !isTrackingParam(name))
    .sort(([a, av], [b, bv]) => (a === b ? av.localeCompare(bv) : a.localeCompare(b)));

  let path = url.pathname.toLowerCase();
  if (path.length > 1 && path.endsWith("/")) {
    path = path.replace(/\/+$/, "");
  }

  const query = new URLSearchParams(params).toString();
  const host = url.port ? `${url.hostname}:${url.port}` : url.hostname;

  return `${url.protocol}//${host}${path}${query ? `?${query}` : ""}`;
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

function dateKey(publishedAt: Date | null): string {
  return publishedAt ? publishedAt.toISOString().slice(0, 10) : "unknown";
}

export type Fingerprint = {
  readonly fingerprint: string;
  readonly basis: FingerprintBasis;
};

/**
 * Stable identity of a real-world article. Link-based whenever the link
 * normalizes; otherwise derived from source name, title and publish day.
 */
export function computeFingerprint(input: {
  readonly link: string | null;
  readonly sourceName: string;
  readonly title: string;
  readonly publishedAt: Date | null;
}): Fingerprint {
  const normalized = normalizeLink(input.link);
  if (normalized) {
    return { fingerprint: sha256(`link:${normalized}`), basis: "link" };
  }

  const title = collapseWhitespace(input.title).toLowerCase();
  return {
    fingerprint: sha256(
      `meta:${input.sourceName}\n${title}\n${dateKey(input.publishedAt)}`,
    ),
    basis: "metadata",
  };
}

/**
 * Hash of the content a summary was generated from. A change in title or
 * excerpt invalidates the cached summary.
 */
export function computeContentHash(title: string, excerpt: string): string {
  return sha256(`${collapseWhitespace(title)}\n${collapseWhitespace(excerpt)}`);
}
