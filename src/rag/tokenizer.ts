import stopWordList from '../../data/stopwords.json';

const TOKEN_PATTERN = /\b\w\w+\b/g;

export const STOP_WORDS: ReadonlySet<string> = new Set(stopWordList);

export function tokenize(input: string): string[] {
  const matches = input.toLowerCase().match(TOKEN_PATTERN);
  if (!matches) return [];
  return matches.filter((token) => !STOP_WORDS.has(token));
}

/**
 * Unigrams followed by bigrams of the stop-word-filtered token stream.
 */
export function extractTerms(input: string): string[] {
  const tokens = tokenize(input);
  const terms = [...tokens];
  for (let i = 0; i + 1 < tokens.length; i++) {
    terms.push(`${tokens[i]} ${tokens[i + 1]}`);
  }
  return terms;
}

export function countTerms(terms: string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const term of terms) counts.set(term, (counts.get(term) ?? 0) + 1);
  return counts;
}
