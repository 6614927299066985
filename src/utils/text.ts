/**
 * Keyword matching and tokenizing for mixed English/Korean questions.
 */

const ASCII_WORD_CHAR = /[A-Za-z0-9]/;
const HANGUL_RUN = /[가-힣]+/g;

const STOP_WORDS = new Set([
  'get',
  'show',
  'list',
  'all',
  'the',
  'and',
  'for',
  'who',
  'what',
  'which',
  'are',
  'was',
  'were',
  'is',
  'me',
  'my',
  'tell',
  'about',
  'with',
]);

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Regex for one keyword. ASCII edges get word boundaries so that "era"
 * never matches inside "generally"; Hangul edges do not, because Korean
 * particles attach directly to the noun.
 */
export function keywordPattern(keyword: string, caseSensitive = false): RegExp {
  const first = keyword.charAt(0);
  const last = keyword.charAt(keyword.length - 1);
  const left = ASCII_WORD_CHAR.test(first) ? '(?<![A-Za-z0-9])' : '';
  const right = ASCII_WORD_CHAR.test(last) ? '(?![A-Za-z0-9])' : '';
  return new RegExp(`${left}${escapeRegExp(keyword)}${right}`, caseSensitive ? 'g' : 'gi');
}

/**
 * A fixed keyword list compiled once.
 */
export class KeywordSet {
  private readonly patterns: ReadonlyArray<{ keyword: string; pattern: RegExp }>;

  constructor(keywords: readonly string[]) {
    this.patterns = keywords
      .filter((keyword) => keyword.trim() !== '')
      .map((keyword) => ({ keyword, pattern: keywordPattern(keyword) }));
  }

  matches(text: string): boolean {
    return this.patterns.some(({ pattern }) => text.search(pattern) >= 0);
  }

  /** Keywords of the set found in the text. */
  found(text: string): string[] {
    return this.patterns
      .filter(({ pattern }) => text.search(pattern) >= 0)
      .map(({ keyword }) => keyword);
  }
}

export interface SpanMatch<T> {
  readonly value: T;
  readonly text: string;
  readonly start: number;
}

/**
 * Match entries in order, skipping any hit that overlaps an earlier one.
 * Callers sort entries longest first so that a long alias or name masks
 * the shorter strings inside it. Hits come back in text order.
 */
export function matchLongestFirst<T>(
  text: string,
  entries: ReadonlyArray<{ pattern: RegExp; value: T }>
): SpanMatch<T>[] {
  const taken: Array<{ start: number; end: number }> = [];
  const hits: SpanMatch<T>[] = [];

  for (const entry of entries) {
    for (const match of text.matchAll(entry.pattern)) {
      const start = match.index ?? 0;
      const end = start + match[0].length;
      if (taken.some((span) => start < span.end && end > span.start)) continue;
      taken.push({ start, end });
      hits.push({ value: entry.value, text: match[0], start });
    }
  }

  return hits.sort((a, b) => a.start - b.start);
}

/**
 * Bag-of-features tokenizer: ASCII words longer than two characters
 * minus stop words, plus character bigrams of every Hangul run.
 */
export function tokenize(text: string): string[] {
  const tokens: string[] = [];

  const words = text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
  for (const word of words) {
    if (word.length > 2 && !STOP_WORDS.has(word)) tokens.push(word);
  }

  for (const run of text.match(HANGUL_RUN) ?? []) {
    if (run.length === 1) {
      tokens.push(run);
      continue;
    }
    for (let i = 0; i < run.length - 1; i++) {
      tokens.push(run.slice(i, i + 2));
    }
  }

  return tokens;
}
