import { describe, expect, it } from "vitest";
import { loadPage } from "../src/crawl/page.js";
import { extractNameCandidates, isGenericTitle } from "../src/crawl/extract/names.js";

const URL = "https://example.com/";

describe("extractNameCandidates", () => {
  it("merges a value found by several sources at its highest tier", () => {
    const page = loadPage(
      `<html><head><meta name="author" content="Jane Doe"></head><body><h1>Jane Doe</h1></body></html>`,
      URL
    );
    expect(extractNameCandidates(page)).toEqual([
      { value: "Jane Doe", confidence: 0.9, source: ["meta[name=author]", "h1"] }
    ]);
  });

  it("orders candidates by tier", () => {
    const page = loadPage(
      `<html><head><title>John Roe | Studio</title><meta name="Author" content=" Jane   Doe "></head><body>
        <span class="author-name">Sam Lee</span>
        <h1>Alex Poe</h1>
        <h2>jane doe</h2>
      </body></html>`,
      URL
    );
    expect(extractNameCandidates(page)).toEqual([
      { value: "Jane Doe", confidence: 0.9, source: ["meta[name=author]", "h2"] },
      { value: "John Roe", confidence: 0.7, source: ["title"] },
      { value: "Alex Poe", confidence: 0.6, source: ["h1"] },
      { value: "Sam Lee", confidence: 0.4, source: ["class*=name"] }
    ]);
  });

  it("breaks confidence ties by discovery order", () => {
    const page = loadPage(`<html><body><h1>Beta Person</h1><h1>Alpha Person</h1></body></html>`, URL);
    expect(extractNameCandidates(page).map(c => c.value)).toEqual(["Beta Person", "Alpha Person"]);
  });

  it("labels id matches and collapses whitespace", () => {
    const page = loadPage(`<html><body><div id="post-author">  Jane
      Doe </div></body></html>`, URL);
    expect(extractNameCandidates(page)).toEqual([{ value: "Jane Doe", confidence: 0.4, source: ["id*=author"] }]);
  });

  it("separates text nodes inside headings and name wrappers", () => {
    const page = loadPage(
      `<html><body>
        <h1>Jane<br>Doe</h1>
        <div class="author-card"><span class="author-name">Sam Lee</span><span>Editor</span></div>
      </body></html>`,
      URL
    );
    expect(extractNameCandidates(page)).toEqual([
      { value: "Jane Doe", confidence: 0.6, source: ["h1"] },
      { value: "Sam Lee Editor", confidence: 0.4, source: ["class*=author"] },
      { value: "Sam Lee", confidence: 0.4, source: ["class*=name"] }
    ]);
  });

  it("skips generic titles", () => {
    const page = loadPage(`<html><head><title>Welcome to Acme Online</title></head><body></body></html>`, URL);
    expect(extractNameCandidates(page)).toEqual([]);
  });

  it("drops overlong, letterless and hidden values", () => {
    const long = "A".repeat(61);
    const page = loadPage(
      `<html><body><h1>${long}</h1><h1>2024</h1><h1 hidden>Secret Name</h1><div style="display:none"><h2>Also Secret</h2></div></body></html>`,
      URL
    );
    expect(extractNameCandidates(page)).toEqual([]);
  });
});

describe("isGenericTitle", () => {
  it("accepts short personal titles", () => {
    expect(isGenericTitle("Jane Doe")).toBe(false);
    expect(isGenericTitle("Mary-Jane Watson")).toBe(false);
  });

  it("rejects boilerplate words and long titles", () => {
    expect(isGenericTitle("Acme Official Website")).toBe(true);
    expect(isGenericTitle("Home")).toBe(true);
    expect(isGenericTitle("One Two Three Four Five")).toBe(true);
  });
});
