export { loadPage, visibleText } from "./crawl/page.js";
export { extractContacts, emptyResult, type ExtractOptions } from "./crawl/extract/index.js";
export { fetchHtml, type FetchResult } from "./crawl/fetch.js";
export { crawlUrl } from "./crawl/crawlUrl.js";
export { crawlUrls } from "./crawl/batch.js";
export { readUrls } from "./input/readUrls.js";
export { toContactRecord, toJson, toCsv, writeResults, type ExportOptions } from "./export/results.js";
export type { ContactRecord, ExtractionResult, NameCandidate, Page, PhoneNumber } from "./types.js";
