import type { OutputFormat } from "../types.js";

export const USAGE = "Usage: contact-crawler [urls...] [--input|-i urls.txt] [--output|-o results.json] [--format json|csv] [--phone-details]";

export type CliArgs = {
  urls: string[];
  input?: string;
  output?: string;
  format: OutputFormat;
  phoneDetails: boolean;
  help: boolean;
};

const VALUE_FLAGS: Record<string, "input" | "output" | "format"> = {
  "--input": "input",
  "-i": "input",
  "--output": "output",
  "-o": "output",
  "--format": "format",
  "-f": "format"
};

function parseFormat(v: string): OutputFormat {
  const f = v.toLowerCase();
  if (f === "json" || f === "csv") return f;
  throw new Error(`Unsupported format: ${v} (expected json or csv)`);
}

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { urls: [], format: "json", phoneDetails: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === "--") continue;
    if (a === "--help" || a === "-h") {
      args.help = true;
      continue;
    }
    if (a === "--phone-details") {
      args.phoneDetails = true;
      continue;
    }

    const eq = a.startsWith("--") ? a.indexOf("=") : -1;
    const flag = eq === -1 ? a : a.slice(0, eq);
    const key = VALUE_FLAGS[flag];

    if (key) {
      const value = eq === -1 ? argv[++i] : a.slice(eq + 1);
      if (value === undefined || value === "") throw new Error(`Missing value for ${flag}\n${USAGE}`);
      if (key === "format") args.format = parseFormat(value);
      else args[key] = value;
      continue;
    }

    if (a.startsWith("-")) throw new Error(`Unknown option: ${a}\n${USAGE}`);
    args.urls.push(a);
  }
  return args;
}
