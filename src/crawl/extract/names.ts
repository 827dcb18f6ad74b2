import type { CheerioAPI } from "cheerio";
import { collapseWhitespace } from "../../domain/normalize.js";
import {
  GENERIC_TITLE_WORDS,
  MAX_NAME_LENGTH,
  MAX_TITLE_TOKENS,
  NAME_ATTRIBUTE_KEYWORDS,
  NAME_CONFIDENCE,
  NAME_HEADING_TAGS,
  type NameTier
} from "../../domain/rules.js";
import type { NameCandidate, Page } from "../../types.js";
import { nodeText } from "../page.js";

export const AUTHOR_META_SOURCE = "meta[name=author]";

// Splits "Jane Doe | Acme" or "Jane Doe - Portfolio"; a bare hyphen stays (Mary-Jane).
const TITLE_SEPARATOR_RE = /\s+[-–—]\s+|\s*[|:·•]\s*/;

function isUsableName(value: string): boolean {
  return value.length > 0 && value.length <= MAX_NAME_LENGTH && /\p{L}/u.test(value);
}

export function isGenericTitle(segment: string): boolean {
  const tokens = segment.split(" ").filter(Boolean);
  if (tokens.length === 0 || tokens.length > MAX_TITLE_TOKENS) return true;
  return tokens.some(t => GENERIC_TITLE_WORDS.has(t.toLowerCase().replace(/[^\p{L}\p{N}]/gu, "")));
}

function authorMeta($: CheerioAPI): string[] {
  return $("meta[name]")
    .toArray()
    .filter(el => ($(el).attr("name") || "").trim().toLowerCase() === "author")
    .map(el => $(el).attr("content") || "");
}

function titleSegment($: CheerioAPI): string {
  const title = collapseWhitespace($("title").first().text());
  if (!title) return "";
  return collapseWhitespace(title.split(TITLE_SEPARATOR_RE)[0] || "");
}

function attributeLabel(cls: string, id: string): string | undefined {
  for (const kw of NAME_ATTRIBUTE_KEYWORDS) {
    if (cls.toLowerCase().includes(kw)) return `class*=${kw}`;
    if (id.toLowerCase().includes(kw)) return `id*=${kw}`;
  }
  return undefined;
}

/**
 * Name candidates from author meta, title, headings and name-ish class/id
 * attributes. Values found by several sources are merged: the highest tier
 * wins and every source is kept. Sorted by confidence, then discovery order.
 */
export function extractNameCandidates(page: Page): NameCandidate[] {
  const { $ } = page;
  const found = new Map<string, NameCandidate>();

  const add = (raw: string, tier: NameTier, source: string) => {
    const value = collapseWhitespace(raw);
    if (!isUsableName(value)) return;

    const confidence = NAME_CONFIDENCE[tier];
    const key = value.toLowerCase();
    const existing = found.get(key);
    if (!existing) {
      found.set(key, { value, confidence, source: [source] });
      return;
    }
    existing.confidence = Math.max(existing.confidence, confidence);
    if (!existing.source.includes(source)) existing.source.push(source);
  };

  for (const content of authorMeta($)) add(content, "author", AUTHOR_META_SOURCE);

  const title = titleSegment($);
  if (title && !isGenericTitle(title)) add(title, "title", "title");

  for (const tag of NAME_HEADING_TAGS) {
    $(`body ${tag}`).each((_, el) => {
      add(nodeText(el), "heading", tag);
    });
  }

  $("body [class], body [id]").each((_, el) => {
    const label = attributeLabel($(el).attr("class") || "", $(el).attr("id") || "");
    if (!label) return;
    add(nodeText(el), "attribute", label);
  });

  return Array.from(found.values()).sort((a, b) => b.confidence - a.confidence);
}
