import type { CountryCode } from "libphonenumber-js";
import type { ExtractionResult, NameCandidate, Page, PhoneNumber } from "../../types.js";
import { errorMessage } from "../utils.js";
import { extractEmails } from "./emails.js";
import { AUTHOR_META_SOURCE, extractNameCandidates } from "./names.js";
import { extractPhones } from "./phones.js";
import { extractSocialLinks } from "./social.js";

export type ExtractOptions = {
  defaultRegion?: CountryCode;
  maxPerCategory?: number;
};

const DEFAULT_REGION: CountryCode = "US";
const DEFAULT_MAX_PER_CATEGORY = 50;

export function freezeResult(r: {
  url: string;
  socials: string[];
  emails: string[];
  phones: PhoneNumber[];
  name_candidates: NameCandidate[];
  notes: string[];
}): ExtractionResult {
  return Object.freeze({
    url: r.url,
    socials: Object.freeze([...r.socials]),
    emails: Object.freeze([...r.emails]),
    phones: Object.freeze(r.phones.map(p => Object.freeze({ ...p }))),
    name_candidates: Object.freeze(
      r.name_candidates.map(c => Object.freeze({ ...c, source: [...c.source] }))
    ),
    notes: Object.freeze([...r.notes])
  });
}

/** Record with no extraction fields, used when the page never got parsed. */
export function emptyResult(url: string, notes: string[]): ExtractionResult {
  return freezeResult({ url, socials: [], emails: [], phones: [], name_candidates: [], notes });
}

/**
 * Pure function from a filtered page to its contact record. Never throws:
 * a failing step yields an empty category and a note.
 */
export function extractContacts(page: Page, options: ExtractOptions = {}): ExtractionResult {
  const max = options.maxPerCategory;
  const limit = max !== undefined && Number.isInteger(max) && max > 0 ? max : DEFAULT_MAX_PER_CATEGORY;
  // An explicit undefined region means "+country numbers only".
  const region = "defaultRegion" in options ? options.defaultRegion : DEFAULT_REGION;
  const notes = [...page.notes];

  function attempt<T>(label: string, fn: () => T[]): T[] {
    try {
      const all = fn();
      if (all.length > limit) notes.push(`${label} results truncated to ${limit} of ${all.length}`);
      return all.slice(0, limit);
    } catch (e) {
      notes.push(`${label} extraction failed: ${errorMessage(e)}`);
      return [];
    }
  }

  const socials = attempt("social link", () => extractSocialLinks(page));
  const emails = attempt("email", () => extractEmails(page));
  const phones = attempt("phone", () => extractPhones(page, region));
  const nameCandidates = attempt("name", () => extractNameCandidates(page));

  if (!socials.length) notes.push("no social links found");
  if (!emails.length) notes.push("no emails found");
  if (!phones.length) notes.push("no phone numbers found");
  if (!nameCandidates.length) notes.push("no name candidates found");
  if (!nameCandidates.some(c => c.source.includes(AUTHOR_META_SOURCE))) notes.push("no author meta found");
  if (!socials.length && !emails.length && !phones.length) {
    notes.push("no contact items found (page may be JS-heavy or require interaction)");
  }

  return freezeResult({
    url: page.url,
    socials,
    emails,
    phones,
    name_candidates: nameCandidates,
    notes
  });
}
