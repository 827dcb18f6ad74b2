import { describe, expect, it } from "vitest";
import { loadPage } from "../src/crawl/page.js";
import { cleanEmail, extractEmails, unfoldObfuscation } from "../src/crawl/extract/emails.js";

const URL = "https://example.com/";
const body = (inner: string) => loadPage(`<html><body>${inner}</body></html>`, URL);

describe("extractEmails", () => {
  it("lowercases and deduplicates matches", () => {
    const page = body(`<p>Contact: jane@example.com or JANE@EXAMPLE.COM</p>`);
    expect(extractEmails(page)).toEqual(["jane@example.com"]);
  });

  it("reads mailto targets, dropping the query and splitting lists", () => {
    const page = body(`<a href="mailto:Sales@Example.com,support@example.com?subject=Hi">Email us</a>`);
    expect(extractEmails(page)).toEqual(["sales@example.com", "support@example.com"]);
  });

  it("decodes percent-encoded mailto targets", () => {
    const page = body(`<a href="mailto:jane%2Bnews@example.com">Email</a>`);
    expect(extractEmails(page)).toEqual(["jane+news@example.com"]);
  });

  it("unfolds bracketed obfuscation", () => {
    const page = body(`<p>Write to jane [at] example [dot] org</p>`);
    expect(extractEmails(page)).toEqual(["jane@example.org"]);
  });

  it("drops trailing punctuation", () => {
    const page = body(`<p>Write to info@example.com.</p>`);
    expect(extractEmails(page)).toEqual(["info@example.com"]);
  });

  it("discards asset filenames that look like addresses", () => {
    const page = body(`<p>logo@2x.png</p>`);
    expect(extractEmails(page)).toEqual([]);
  });

  it("ignores hidden text, hidden mailto links and scripts", () => {
    const page = body(
      `<div hidden><a href="mailto:secret@example.com">x</a></div>` +
        `<p style="display: none">hidden@example.com</p>` +
        `<script>const e = "script@example.com";</script>`
    );
    expect(extractEmails(page)).toEqual([]);
  });
});

describe("email helpers", () => {
  it("cleanEmail strips mailto, query and case", () => {
    expect(cleanEmail(" mailto:Jane@Example.com?cc=x ")).toBe("jane@example.com");
  });

  it("unfoldObfuscation handles parenthesized forms", () => {
    expect(unfoldObfuscation("jane (at) example (dot) com")).toBe("jane@example.com");
  });
});
