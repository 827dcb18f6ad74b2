import fs from "fs";
import path from "path";
import type { ContactRecord, ExtractionResult, OutputFormat } from "../types.js";

export type ExportOptions = {
  phoneDetails?: boolean;
};

export function toContactRecord(r: ExtractionResult, opts: ExportOptions = {}): ContactRecord {
  const record: ContactRecord = {
    url: r.url,
    socials: [...r.socials],
    emails: [...r.emails],
    phones: r.phones.map(p => p.normalized),
    name_candidates: r.name_candidates.map(c => ({ value: c.value, confidence: c.confidence, source: [...c.source] })),
    notes: [...r.notes]
  };
  if (opts.phoneDetails) record.phone_details = r.phones.map(p => ({ display: p.display, normalized: p.normalized }));
  return record;
}

export function toJson(results: readonly ExtractionResult[], opts: ExportOptions = {}): string {
  return JSON.stringify(results.map(r => toContactRecord(r, opts)), null, 2) + "\n";
}

function csvCell(v: string): string {
  return `"${v.replace(/"/g, '""')}"`;
}

const CSV_HEADERS = ["URL", "Socials", "Emails", "Phones", "Name Candidates", "Notes"];

/** One row per URL; multi-valued cells joined with "; ". */
export function toCsv(results: readonly ExtractionResult[]): string {
  const lines: string[] = [CSV_HEADERS.join(",")];

  for (const r of results) {
    const phones = r.phones.map(p => (p.display === p.normalized ? p.normalized : `${p.normalized} (${p.display})`));
    const names = r.name_candidates.map(c => `${c.value} (${c.confidence})`);

    const row = [
      r.url,
      r.socials.join("; "),
      r.emails.join("; "),
      phones.join("; "),
      names.join("; "),
      r.notes.join("; ")
    ];
    lines.push(row.map(csvCell).join(","));
  }
  return lines.join("\n") + "\n";
}

export function formatResults(
  results: readonly ExtractionResult[],
  format: OutputFormat,
  opts: ExportOptions = {}
): string {
  return format === "csv" ? toCsv(results) : toJson(results, opts);
}

/** Writes to `output` (creating its directory) or to stdout when no path is given. */
export function writeResults(
  results: readonly ExtractionResult[],
  opts: { output?: string; format: OutputFormat } & ExportOptions
): void {
  const body = formatResults(results, opts.format, opts);

  if (!opts.output) {
    process.stdout.write(body);
    return;
  }

  const outPath = path.resolve(opts.output);
  fs.mkdirSync(path.dirname(outPath), { recursive: true });
  fs.writeFileSync(outPath, body, "utf8");
  console.error(`[Export] Saved ${results.length} records to ${outPath}`);
}
