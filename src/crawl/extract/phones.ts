import { parsePhoneNumberFromString, type CountryCode } from "libphonenumber-js";
import { MAX_PHONE_DIGITS, MIN_PHONE_DIGITS } from "../../domain/rules.js";
import type { Page, PhoneNumber } from "../../types.js";

// Optional +country, optional (area), then digits with single space/dot/dash separators.
const PHONE_RE = /(?<![\w+])(?:\+\d{1,3}[ .-]?)?(?:\(\d{1,4}\)[ .-]?)?\d(?:[ .-]?\d)+(?!\w)/g;

function digitCount(s: string): number {
  return s.replace(/\D/g, "").length;
}

export function normalizePhone(display: string, defaultRegion?: CountryCode): string {
  const s = display.trim();
  const parsed = parsePhoneNumberFromString(s, defaultRegion);
  if (parsed && parsed.isPossible()) return parsed.number;

  const digits = s.replace(/\D/g, "");
  return s.startsWith("+") ? `+${digits}` : digits;
}

// A run of digits longer than any phone is usually several numbers separated
// by spaces; cut it at whitespace once a piece could stand on its own.
export function splitRun(match: string): string[] {
  if (digitCount(match) <= MAX_PHONE_DIGITS) return [match];

  const out: string[] = [];
  let current = "";
  for (const token of match.split(/\s+/).filter(Boolean)) {
    const startsNumber = token.startsWith("+") || token.startsWith("(");
    const full = digitCount(current) >= MIN_PHONE_DIGITS;
    const overflow = digitCount(current) + digitCount(token) > MAX_PHONE_DIGITS;
    if (current && (startsNumber || full || overflow)) {
      out.push(current);
      current = "";
    }
    current = current ? `${current} ${token}` : token;
  }
  if (current) out.push(current);
  return out;
}

function telTargets(page: Page): string[] {
  const { $ } = page;
  const out: string[] = [];

  for (const a of $("a[href], area[href]").toArray()) {
    const href = ($(a).attr("href") || "").trim();
    if (!/^tel:/i.test(href)) continue;
    const raw = href.slice("tel:".length).split(/[?;]/)[0];
    try {
      out.push(decodeURIComponent(raw).trim());
    } catch {
      out.push(raw.trim());
    }
  }
  return out;
}

export function extractPhones(page: Page, defaultRegion?: CountryCode): PhoneNumber[] {
  const seen = new Set<string>();
  const out: PhoneNumber[] = [];

  const textMatches = (page.text.match(PHONE_RE) || []).flatMap(splitRun);
  const candidates = [...telTargets(page), ...textMatches];
  for (const raw of candidates) {
    const display = raw.trim();
    const n = digitCount(display);
    if (n < MIN_PHONE_DIGITS || n > MAX_PHONE_DIGITS) continue;

    const normalized = normalizePhone(display, defaultRegion);
    if (seen.has(normalized)) continue;
    seen.add(normalized);
    out.push({ display, normalized });
  }
  return out;
}
