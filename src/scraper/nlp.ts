export const DEFAULT_STOPWORDS: ReadonlySet<string> = new Set([
  "a","an","and","are","as","at","be","by","for","from","has","he","in","is","it","its","of","on","that","the","to","was","were","with"
]);

// Two or more ASCII letters; anything else separates tokens.
const TOKEN_RE = /[A-Za-z]{2,}/g;

export function toStopWordSet(words: Iterable<string>): ReadonlySet<string> {
  const set = new Set<string>();
  for (const w of words) {
    const clean = w.trim().toLowerCase();
    if (clean) set.add(clean);
  }
  return set;
}

export function tokenize(text: string, stopWords: ReadonlySet<string> = DEFAULT_STOPWORDS) {
  const tokens: string[] = [];
  for (const match of text.matchAll(TOKEN_RE)) {
    const token = match[0].toLowerCase();
    if (!stopWords.has(token)) tokens.push(token);
  }
  return tokens;
}

/** Parse a stop-word list: one word per line, blank lines and `#` comments skipped. */
export function parseStopWordList(contents: string) {
  return toStopWordSet(
    contents
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line && !line.startsWith("#"))
  );
}
