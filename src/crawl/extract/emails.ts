import { ASSET_TLDS } from "../../domain/rules.js";
import type { Page } from "../../types.js";

const EMAIL_RE = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;
const EMAIL_EXACT_RE = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

export function cleanEmail(raw: string): string {
  return (raw || "")
    .trim()
    .replace(/^mailto:/i, "")
    .split("?")[0]
    .replace(/[)\],.;:]+$/g, "")
    .toLowerCase();
}

function looksLikeAssetEmail(email: string): boolean {
  const at = email.lastIndexOf("@");
  if (at === -1) return true;
  const domain = email.slice(at + 1);
  const tld = domain.split(".").pop() || "";
  return ASSET_TLDS.has(tld);
}

// "jane [at] example [dot] com" -> "jane@example.com"
export function unfoldObfuscation(text: string): string {
  return (text || "")
    .replace(/\s*\[\s*at\s*\]\s*/gi, "@")
    .replace(/\s*\(\s*at\s*\)\s*/gi, "@")
    .replace(/\s*\[\s*dot\s*\]\s*/gi, ".")
    .replace(/\s*\(\s*dot\s*\)\s*/gi, ".");
}

function mailtoAddresses(page: Page): string[] {
  const { $ } = page;
  const out: string[] = [];

  for (const a of $("a[href], area[href]").toArray()) {
    const href = ($(a).attr("href") || "").trim();
    if (!/^mailto:/i.test(href)) continue;

    const raw = href.slice("mailto:".length).split("?")[0];
    const decoded = (() => {
      try { return decodeURIComponent(raw); } catch { return raw; }
    })();
    out.push(...decoded.split(/[;,]/g));
  }
  return out;
}

export function extractEmails(page: Page): string[] {
  const out = new Set<string>();

  for (const p of mailtoAddresses(page)) {
    const email = cleanEmail(p);
    if (!email || !EMAIL_EXACT_RE.test(email)) continue;
    if (looksLikeAssetEmail(email)) continue;
    out.add(email);
  }

  (unfoldObfuscation(page.text).match(EMAIL_RE) || [])
    .map(cleanEmail)
    .filter(Boolean)
    .filter(e => !looksLikeAssetEmail(e))
    .forEach(e => out.add(e));

  return Array.from(out);
}
