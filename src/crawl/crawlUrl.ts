import { env } from "../config/env.js";
import type { ExtractionResult } from "../types.js";
import { emptyResult, extractContacts, type ExtractOptions } from "./extract/index.js";
import { fetchHtml, type FetchResult } from "./fetch.js";
import { loadPage } from "./page.js";
import { sameUrl } from "./utils.js";

export type CrawlDeps = {
  fetchHtml: (url: string) => Promise<FetchResult>;
  options: ExtractOptions;
};

const defaultDeps: CrawlDeps = {
  fetchHtml: url => fetchHtml(url),
  options: {
    defaultRegion: env.DEFAULT_PHONE_REGION,
    maxPerCategory: env.MAX_RESULTS_PER_CATEGORY
  }
};

/**
 * Fetches one URL and extracts its contacts. A fetch failure becomes a
 * record with empty fields and a note; the record's url is always the one
 * requested.
 */
export async function crawlUrl(url: string, deps: Partial<CrawlDeps> = {}): Promise<ExtractionResult> {
  const { fetchHtml: fetcher, options } = { ...defaultDeps, ...deps };

  const res = await fetcher(url);
  if (!res.ok) return emptyResult(url, [`fetch failed: ${res.error}`]);

  const page = loadPage(res.html, url, res.finalUrl);
  if (!sameUrl(url, res.finalUrl)) page.notes.unshift(`redirected to ${res.finalUrl}`);

  return extractContacts(page, options);
}
