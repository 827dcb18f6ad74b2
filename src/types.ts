import type { CheerioAPI } from "cheerio";

/** A parsed document with every non-rendered subtree already removed. */
export type Page = {
  url: string;
  // Base for resolving relative hrefs; differs from url after a redirect.
  baseUrl: string;
  $: CheerioAPI;
  // Newline-joined text nodes under <body>.
  text: string;
  notes: string[];
};

export type PhoneNumber = {
  display: string;
  normalized: string;
};

export type NameCandidate = {
  value: string;
  confidence: number;
  source: string[];
};

export type ExtractionResult = {
  readonly url: string;
  readonly socials: readonly string[];
  readonly emails: readonly string[];
  readonly phones: readonly Readonly<PhoneNumber>[];
  readonly name_candidates: readonly Readonly<NameCandidate>[];
  readonly notes: readonly string[];
};

/** JSON shape written for each processed URL. */
export type ContactRecord = {
  url: string;
  socials: string[];
  emails: string[];
  phones: string[];
  name_candidates: NameCandidate[];
  notes: string[];
  // Only with the phone-details option: display form next to each normalized phone.
  phone_details?: PhoneNumber[];
};

export type OutputFormat = "json" | "csv";
