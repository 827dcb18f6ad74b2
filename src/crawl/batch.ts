import type { ExtractionResult } from "../types.js";
import { crawlUrl } from "./crawlUrl.js";
import { emptyResult } from "./extract/index.js";
import { errorMessage } from "./utils.js";

export type CrawlFn = (url: string) => Promise<ExtractionResult>;

// Logs go to stderr: stdout may be carrying the JSON output.
export async function crawlUrls(urls: string[], crawl: CrawlFn = url => crawlUrl(url)): Promise<ExtractionResult[]> {
  const results: ExtractionResult[] = [];

  for (const [i, url] of urls.entries()) {
    console.error(`[Crawler] (${i + 1}/${urls.length}) Crawling ${url} ...`);
    try {
      const res = await crawl(url);
      results.push(res);
      console.error(
        `[Crawler] ${url}: ${res.emails.length} emails, ${res.phones.length} phones, ${res.socials.length} socials`
      );
    } catch (e) {
      console.error(`[Crawler] Error crawling ${url}: ${errorMessage(e)}`);
      results.push(emptyResult(url, [`crawl failed: ${errorMessage(e)}`]));
    }
  }
  return results;
}
