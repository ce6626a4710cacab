/**
 * Strips "nothing found" boilerplate that language models emit when a paper or a merge
 * has no usable content, so such text never reaches the synthesis.
 */

const INVALID_PATTERNS: RegExp[] = [
  /no\s+(matching|relevant|appropriate|corresponding)\b.*?\b(information|data|content|results?)/i,
  /not\s+able\s+to\s+find.*?(matching|relevant|appropriate|corresponding)\b.*?\b(results?|data|content)/i,
  /could\s+not\s+find.*?(matching|relevant|appropriate|corresponding)\b.*?\b(records?|results?|data)/i,
  /did\s+not\s+return\s+any\s+(results?|data|records?|match(es)?)/i,
  /returned\s+no\s+(results?|data|records?|match(es)?)/i,
  /search\s+results?\s+(are|is)\s+empty/i,
  /no\s+results?\s+found/i,
  /nothing\s+found/i,
  /there\s+is\s+no\s+(data|result|record|match)/i,
  /currently\s+no\s+(data|results?|records?|match(es)?)/i,
  /no\s+available\s+(data|information|content)/i,
  /unable\s+to\s+retrieve\s+(data|information|content)/i,
  /no\s+matching\s+entries\s+found/i,
  /no\s+entries\s+match\s+your\s+criteria/i,
];

export interface FilterOptions {
  /** Fraction of sentences that may be boilerplate before the whole text is dropped (default: 0.5) */
  maxInvalidRatio?: number;
  /** Minimum meaningful characters left after filtering (default: 50) */
  minLength?: number;
}

/**
 * Returns the cleaned text, or '' when the content is empty, mostly boilerplate, or too short.
 */
export function filterInvalidContent(content: string, options: FilterOptions = {}): string {
  const { maxInvalidRatio = 0.5, minLength = 50 } = options;

  if (!content || !content.trim()) {
    return '';
  }

  const invalidCount = INVALID_PATTERNS.filter(pattern => pattern.test(content)).length;
  const totalSentences = content.split(/[。！？.!?\n]/).length;
  if (invalidCount > totalSentences * maxInvalidRatio) {
    return '';
  }

  let filtered = content;
  for (const pattern of INVALID_PATTERNS) {
    filtered = filtered.replace(new RegExp(`${pattern.source}[.!?]*`, 'gi'), '');
  }
  filtered = filtered.trim().replace(/\n\s*\n/g, '\n\n');

  if (filtered.length < minLength) {
    return '';
  }

  return filtered;
}
