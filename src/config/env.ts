import dotenv from "dotenv";
import { getCountries, type CountryCode } from "libphonenumber-js";
dotenv.config();

function region(value: string | undefined): CountryCode | undefined {
  const code = (value || "US").trim().toUpperCase();
  // "NONE" disables the default region: only +country numbers parse to E.164.
  if (code === "NONE") return undefined;
  const match = getCountries().find(c => c === code);
  if (!match) throw new Error(`Unsupported DEFAULT_PHONE_REGION: ${code}`);
  return match;
}

export function positiveInt(value: string | undefined, fallback: number): number {
  const n = parseInt(value || "", 10);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

export const env = {
  CRAWL_TIMEOUT_MS: positiveInt(process.env.CRAWL_TIMEOUT_MS, 15000),
  USER_AGENT: process.env.USER_AGENT || "ContactCrawler/1.0 (+contact@example.com)",
  // Region assumed for numbers written without a +country prefix.
  DEFAULT_PHONE_REGION: region(process.env.DEFAULT_PHONE_REGION),
  MAX_RESULTS_PER_CATEGORY: positiveInt(process.env.MAX_RESULTS_PER_CATEGORY, 50)
};
