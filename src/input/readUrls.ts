import fs from "fs";
import path from "path";
import csv from "csv-parser";
import { toUrl } from "../crawl/utils.js";

// First matching header wins.
const URL_COLUMNS = ["url", "website", "domain", "site"];

export function parseUrlLines(text: string): string[] {
  return (text || "")
    .split(/\r?\n/)
    .map(l => l.trim())
    .filter(l => l && !l.startsWith("#"))
    .map(toUrl);
}

function readCsvUrls(filePath: string): Promise<string[]> {
  const out: string[] = [];

  return new Promise<string[]>((resolve, reject) => {
    const stream = fs
      .createReadStream(filePath)
      .pipe(csv({ mapHeaders: ({ header }) => header.replace(/^\uFEFF/, "").trim().toLowerCase() }));

    stream.on("data", (row: Record<string, string>) => {
      const column = URL_COLUMNS.find(c => (row[c] || "").trim());
      if (!column) return;
      out.push(toUrl(row[column]));
    });
    stream.on("end", () => resolve(out));
    stream.on("error", (err: Error) => reject(err));
  });
}

/** URLs from a text file (one per line, # comments) or a CSV with a url/website/domain column. */
export async function readUrls(filePath: string): Promise<string[]> {
  const absPath = path.resolve(filePath);
  if (!fs.existsSync(absPath)) throw new Error(`Input file not found: ${absPath}`);
  if (fs.statSync(absPath).isDirectory()) throw new Error(`Input path is a directory, not a file: ${absPath}`);

  if (path.extname(absPath).toLowerCase() === ".csv") return readCsvUrls(absPath);
  return parseUrlLines(fs.readFileSync(absPath, "utf8"));
}
