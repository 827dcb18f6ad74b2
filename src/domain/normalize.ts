import { SOCIAL_DOMAINS } from "./rules.js";

export function normalizeHost(host: string): string {
  return (host || "").toLowerCase().replace(/\.$/, "").replace(/^www\./, "");
}

export function hostFromUrl(u: string): string {
  try {
    return normalizeHost(new URL(u).hostname);
  } catch {
    return "";
  }
}

export function isSocialHost(host: string): boolean {
  const h = normalizeHost(host);
  if (!h) return false;

  for (const domain of SOCIAL_DOMAINS) {
    if (h === domain) return true;
    if (h.endsWith("." + domain)) return true;
  }
  return false;
}

/**
 * Canonical form used to dedupe profile links: https, bare host, no trailing
 * slash, no fragment. Returns "" for anything that is not an http(s) URL.
 */
export function normalizeProfileUrl(href: string, baseUrl: string): string {
  let u: URL;
  try {
    u = new URL(href.trim(), baseUrl || undefined);
  } catch {
    return "";
  }
  if (u.protocol !== "http:" && u.protocol !== "https:") return "";

  const host = normalizeHost(u.hostname);
  if (!host) return "";
  const path = u.pathname.replace(/\/+$/, "");
  return `https://${host}${path}${u.search}`;
}

export function collapseWhitespace(s: string): string {
  return (s || "").replace(/\s+/g, " ").trim();
}
