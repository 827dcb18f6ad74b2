// Static heuristics for contact extraction. Extend these lists rather than
// adding literals to the extractors.

// Hosts that count as social profiles (matched on the href host, subdomains included).
export const SOCIAL_DOMAINS = new Set([
  "linkedin.com",
  "facebook.com",
  "instagram.com",
  "twitter.com",
  "x.com",
  "youtube.com",
  "github.com",
  "behance.net",
  "t.me",
  "wa.me",
  "tiktok.com",
  "pinterest.com"
]);

// Containers whose content is never rendered as page text.
export const EXCLUDED_TAGS = [
  "script",
  "style",
  "template",
  "noscript",
  "iframe",
  "object",
  "embed",
  "svg",
  "canvas"
];

// Matched case-insensitively as substrings of an element's class or id.
export const NAME_ATTRIBUTE_KEYWORDS = ["name", "author"];

export const NAME_HEADING_TAGS = ["h1", "h2"];

// A title segment holding any of these reads as a site/brand title, not a person.
export const GENERIC_TITLE_WORDS = new Set([
  "home", "homepage", "welcome", "official", "website", "site", "web",
  "blog", "news", "contact", "about", "page", "shop", "store", "online",
  "services", "solutions", "company", "group", "inc", "llc", "ltd",
  "limited", "corp", "corporation", "login", "404", "error", "not", "found"
]);

export const MAX_TITLE_TOKENS = 4;
export const MAX_NAME_LENGTH = 60;

export const NAME_CONFIDENCE = {
  author: 0.9,
  title: 0.7,
  heading: 0.6,
  attribute: 0.4
} as const;

export type NameTier = keyof typeof NAME_CONFIDENCE;

// Bounds on digit count for a phone match; E.164 caps numbers at 15 digits.
export const MIN_PHONE_DIGITS = 10;
export const MAX_PHONE_DIGITS = 15;

// "Emails" ending in these are asset filenames like logo@2x.png.
export const ASSET_TLDS = new Set([
  "png", "jpg", "jpeg", "webp", "gif", "svg", "ico",
  "css", "js", "mjs", "cjs", "json", "xml",
  "pdf", "zip", "rar", "7z", "gz",
  "mp3", "mp4", "wav", "m4a",
  "woff", "woff2", "ttf", "eot"
]);
