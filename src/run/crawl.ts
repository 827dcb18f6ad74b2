#!/usr/bin/env node
import { crawlUrls } from "../crawl/batch.js";
import { toUrl } from "../crawl/utils.js";
import { writeResults } from "../export/results.js";
import { readUrls } from "../input/readUrls.js";
import { parseArgs, USAGE } from "./args.js";

async function main() {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return;
  }

  const urls = [...(args.input ? await readUrls(args.input) : []), ...args.urls.map(toUrl)];
  if (!urls.length) throw new Error(`No URLs provided\n${USAGE}`);

  const results = await crawlUrls(urls);
  writeResults(results, { output: args.output, format: args.format, phoneDetails: args.phoneDetails });
}

main().catch(e => { console.error(e); process.exit(1); });
