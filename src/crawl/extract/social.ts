import { hostFromUrl, isSocialHost, normalizeProfileUrl } from "../../domain/normalize.js";
import type { Page } from "../../types.js";

// Only hrefs count; icon classes and background images are ignored.
export function extractSocialLinks(page: Page): string[] {
  const { $ } = page;
  const out = new Set<string>();

  const hrefs = $("a[href], area[href]").toArray().map(a => ($(a).attr("href") || "").trim()).filter(Boolean);
  for (const href of hrefs) {
    const url = normalizeProfileUrl(href, page.baseUrl);
    if (!url) continue;
    if (!isSocialHost(hostFromUrl(url))) continue;
    out.add(url);
  }
  return Array.from(out);
}
