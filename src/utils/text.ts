const WORD_REGEX = /[\p{L}\p{N}]+/gu;

export function tokenize(text: string): string[] {
  const words = text.toLowerCase().match(WORD_REGEX) ?? [];
  return [...new Set(words.flatMap(expandTokenVariants))];
}

/** True when every query token (or its singular form) occurs in the target. */
export function matchesAllTokens(query: string, target: string): boolean {
  const queryWords = [...new Set(query.toLowerCase().match(WORD_REGEX) ?? [])];
  if (queryWords.length === 0) {
    return false;
  }

  const targetTokens = new Set(tokenize(target));
  return queryWords.every((word) =>
    expandTokenVariants(word).some((variant) => targetTokens.has(variant)),
  );
}

function expandTokenVariants(word: string): string[] {
  if (word.length >= 4 && word.endsWith("s") && !word.endsWith("ss")) {
    return [word, word.slice(0, -1)];
  }
  return [word];
}
