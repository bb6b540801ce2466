import stopwordList from "./stopwords.json" with { type: "json" };

const stopwords: ReadonlySet<string> = new Set(stopwordList);

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length > 0);
}

/** Lower-cased tokens with stopwords removed, in order of appearance. */
export function contentTerms(text: string): string[] {
  return tokenize(text).filter((token) => !stopwords.has(token));
}

export function termSet(text: string): Set<string> {
  return new Set(contentTerms(text));
}

export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 && b.size === 0) {
    return 0;
  }
  let shared = 0;
  for (const term of a) {
    if (b.has(term)) {
      shared += 1;
    }
  }
  return shared / (a.size + b.size - shared);
}

/** Share of `inner` terms that also occur in `outer`. */
export function containment(inner: ReadonlySet<string>, outer: ReadonlySet<string>): number {
  if (inner.size === 0) {
    return 0;
  }
  let shared = 0;
  for (const term of inner) {
    if (outer.has(term)) {
      shared += 1;
    }
  }
  return shared / inner.size;
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter((word) => word.length > 0).length;
}

export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}
