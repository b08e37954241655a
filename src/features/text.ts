function unescapeScraped(text: string): string {
  return text
    .replace(/[\r\n]/g, " ")
    .replace(/\\(['"`])/g, "$1")
    .replace(/\\([^\w])/g, "$1");
}

/** Blurb-style text: line breaks flattened, scraper escapes removed. */
export function cleanShortText(value: unknown): string {
  if (typeof value !== "string" || !value) {
    return "";
  }
  return unescapeScraped(value).trim();
}

/**
 * Description and risk sections. Scraped pages sometimes repeat the lead
 * sentence (teaser + body); only the last occurrence onward is kept.
 */
export function cleanLongText(value: unknown): string {
  if (typeof value !== "string" || !value) {
    return "";
  }
  const text = unescapeScraped(value);
  const dot = text.indexOf(".");
  const leadSentence = dot >= 0 ? text.slice(0, dot + 1) : text.trim();
  if (!leadSentence) {
    return text.trim();
  }
  const lastIndex = text.trimEnd().lastIndexOf(leadSentence);
  if (lastIndex > 0) {
    return text.slice(lastIndex).trim();
  }
  return text.trim();
}

export function wordCount(text: string): number {
  const trimmed = text.trim();
  if (!trimmed) {
    return 0;
  }
  return trimmed.split(/\s+/).length;
}

export function tokenize(text: string): string[] {
  const trimmed = text.toLowerCase().trim();
  if (!trimmed) {
    return [];
  }
  return trimmed.split(/\s+/);
}

/** `technology/3d-printing` → `3d printing`; a bare slug is used whole. */
export function subcategoryText(slug: string): string {
  const trimmed = slug.trim();
  const slash = trimmed.lastIndexOf("/");
  const leaf = slash >= 0 ? trimmed.slice(slash + 1) : trimmed;
  return leaf.replace(/-/g, " ");
}
