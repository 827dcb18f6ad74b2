import { env } from "../config/env.js";
import { errorMessage } from "./utils.js";

export type FetchResult =
  | { ok: true; status: number; html: string; finalUrl: string; contentType: string }
  | { ok: false; status: number; error: string; finalUrl: string };

function isHtmlContentType(ct: string): boolean {
  return !ct || ct.includes("text/html") || ct.includes("application/xhtml+xml") || ct.startsWith("text/");
}

/** GET a page as text. Never throws: every failure comes back as `ok: false`. */
export async function fetchHtml(url: string, timeoutMs: number = env.CRAWL_TIMEOUT_MS): Promise<FetchResult> {
  let target: URL;
  try {
    target = new URL(url);
  } catch {
    return { ok: false, status: 0, error: `invalid url: ${url}`, finalUrl: url };
  }
  if (target.protocol !== "http:" && target.protocol !== "https:") {
    return { ok: false, status: 0, error: `unsupported protocol: ${target.protocol}`, finalUrl: url };
  }

  const ctrl = new AbortController();
  const t = setTimeout(() => ctrl.abort(), timeoutMs);

  try {
    const res = await fetch(target, {
      method: "GET",
      redirect: "follow",
      headers: {
        "User-Agent": env.USER_AGENT,
        "Accept": "text/html,application/xhtml+xml,*/*"
      },
      signal: ctrl.signal
    });
    const finalUrl = res.url || url;

    if (!res.ok) {
      const reason = res.statusText ? `HTTP ${res.status} ${res.statusText}` : `HTTP ${res.status}`;
      return { ok: false, status: res.status, error: reason, finalUrl };
    }

    const contentType = (res.headers.get("content-type") || "").toLowerCase();
    if (!isHtmlContentType(contentType)) {
      return { ok: false, status: res.status, error: `non-HTML content type: ${contentType}`, finalUrl };
    }

    const html = await res.text();
    return { ok: true, status: res.status, html, finalUrl, contentType };
  } catch (e) {
    const error = ctrl.signal.aborted ? `timed out after ${timeoutMs}ms` : errorMessage(e);
    return { ok: false, status: 0, error, finalUrl: url };
  } finally {
    clearTimeout(t);
  }
}
