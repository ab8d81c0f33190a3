const TOKEN_REGEX = /[\p{L}\p{N}_]+/gu

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(TOKEN_REGEX) ?? []
}

export function uniqueTokens(text: string): Set<string> {
  return new Set(tokenize(text))
}

/** Fraction of the query's distinct tokens that appear as tokens of `content`. */
export function tokenOverlap(query: string, content: string): number {
  const queryTokens = uniqueTokens(query)
  if (queryTokens.size === 0) return 0
  const contentTokens = uniqueTokens(content)
  let matched = 0
  for (const token of queryTokens) {
    if (contentTokens.has(token)) matched++
  }
  return matched / queryTokens.size
}

/**
 * Case-insensitive keyword relevance: 1 when the whole query occurs as a
 * substring of the content, otherwise the token overlap.
 */
export function keywordScore(query: string, content: string): number {
  const needle = query.trim().toLowerCase()
  if (!needle) return 0
  if (content.toLowerCase().includes(needle)) return 1
  return tokenOverlap(needle, content)
}
