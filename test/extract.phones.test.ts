import { describe, expect, it } from "vitest";
import { loadPage } from "../src/crawl/page.js";
import { extractPhones, normalizePhone, splitRun } from "../src/crawl/extract/phones.js";

const URL = "https://example.com/";
const body = (inner: string) => loadPage(`<html><body>${inner}</body></html>`, URL);

describe("extractPhones", () => {
  it("normalizes to E.164 and keeps the display form", () => {
    const page = body(`<p>Call (415) 555-0134 for info</p>`);
    expect(extractPhones(page, "US")).toEqual([{ display: "(415) 555-0134", normalized: "+14155550134" }]);
  });

  it("deduplicates on the normalized form, keeping the first display", () => {
    const page = body(`<p>Call (415) 555-0134 or 415.555.0134</p>`);
    expect(extractPhones(page, "US")).toEqual([{ display: "(415) 555-0134", normalized: "+14155550134" }]);
  });

  it("accepts a country-code prefix", () => {
    const page = body(`<p>Office: +1 (415) 555-0134</p>`);
    expect(extractPhones(page, "US")).toEqual([{ display: "+1 (415) 555-0134", normalized: "+14155550134" }]);
  });

  it("reads tel: links before text matches", () => {
    const page = body(`<a href="tel:+442079460958">Call London</a><p>(415) 555-0134</p>`);
    expect(extractPhones(page, "US")).toEqual([
      { display: "+442079460958", normalized: "+442079460958" },
      { display: "(415) 555-0134", normalized: "+14155550134" }
    ]);
  });

  it("separates numbers listed one after another", () => {
    const page = body(`<p>Phones: 415-555-0134 415-555-0199</p>`);
    expect(extractPhones(page, "US")).toEqual([
      { display: "415-555-0134", normalized: "+14155550134" },
      { display: "415-555-0199", normalized: "+14155550199" }
    ]);
  });

  it("discards numbers below the digit threshold", () => {
    const page = body(`<p>Room 555-0134, updated 2024-01-15</p>`);
    expect(extractPhones(page, "US")).toEqual([]);
  });

  it("ignores numbers inside hidden elements", () => {
    const page = body(`<p style="display:none">(415) 555-0134</p><a hidden href="tel:+14155550199">x</a>`);
    expect(extractPhones(page, "US")).toEqual([]);
  });
});

describe("splitRun", () => {
  it("leaves phone-length matches alone", () => {
    expect(splitRun("+1 415 555 0134")).toEqual(["+1 415 555 0134"]);
  });

  it("cuts before a new country code", () => {
    expect(splitRun("+1 415 555 0134 +44 20 7946 0958")).toEqual(["+1 415 555 0134", "+44 20 7946 0958"]);
  });
});

describe("normalizePhone", () => {
  it("falls back to digits when no region applies", () => {
    expect(normalizePhone("(415) 555-0134")).toBe("4155550134");
  });

  it("uses the country code when present", () => {
    expect(normalizePhone("+1 (415) 555-0134")).toBe("+14155550134");
  });

  it("falls back to digits for numbers that are not possible", () => {
    expect(normalizePhone("1234-5678-9012-34", "US")).toBe("12345678901234");
  });
});
