import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import { hasChildren, isTag, isText, type AnyNode, type Element } from "domhandler";
import { EXCLUDED_TAGS } from "../domain/rules.js";
import type { Page } from "../types.js";
import { errorMessage } from "./utils.js";

const EXCLUDED = new Set(EXCLUDED_TAGS);

export function isHiddenElement(el: Element): boolean {
  if (EXCLUDED.has(el.name.toLowerCase())) return true;

  const style = (el.attribs.style || "").replace(/\s+/g, "").toLowerCase();
  if (style.includes("display:none")) return true;

  if ((el.attribs["aria-hidden"] || "").trim().toLowerCase() === "true") return true;
  return "hidden" in el.attribs;
}

// Removes hidden subtrees in place; returns how many subtree roots were dropped.
function prune($: CheerioAPI, node: AnyNode): number {
  if (!hasChildren(node)) return 0;
  let removed = 0;

  for (const child of [...node.children]) {
    if (!isTag(child)) continue;
    if (isHiddenElement(child)) {
      $(child).remove();
      removed++;
      continue;
    }
    removed += prune($, child);
  }
  return removed;
}

function collectText(node: AnyNode, out: string[]): void {
  if (isText(node)) {
    const t = node.data.trim();
    if (t) out.push(t);
    return;
  }
  if (!hasChildren(node)) return;
  for (const child of node.children) collectText(child, out);
}

// Text of one element, with its text nodes separated by spaces ("Jane<br>Doe" -> "Jane Doe").
export function nodeText(node: AnyNode): string {
  const out: string[] = [];
  collectText(node, out);
  return out.join(" ");
}

export function visibleText($: CheerioAPI): string {
  const out: string[] = [];
  for (const body of $("body").toArray()) collectText(body, out);
  return out.join("\n");
}

/**
 * Parses html and applies the visibility filter. Never throws: a parser
 * failure yields an empty page plus a note.
 */
export function loadPage(html: string, url: string, baseUrl: string = url): Page {
  const source = html || "";
  const notes: string[] = [];

  let $: CheerioAPI;
  try {
    $ = cheerio.load(source);
  } catch (e) {
    notes.push(`failed to parse html: ${errorMessage(e)}`);
    $ = cheerio.load("");
  }

  if (!source.trim()) {
    notes.push("empty document");
  } else if (!/<html[\s>]/i.test(source) || !/<body[\s>]/i.test(source)) {
    notes.push("markup had no <html> or <body> element; parser synthesized the document structure");
  }

  let removed = 0;
  for (const root of $.root().toArray()) removed += prune($, root);
  if (removed > 0) {
    notes.push(`skipped ${removed} hidden or non-rendered element${removed === 1 ? "" : "s"}`);
  }

  return { url, baseUrl, $, text: visibleText($), notes };
}
