import { SELECTION_KEYWORDS } from './keywords.js';

const VERSION_MARK = '_v';

/** Member name without its `_vN` suffix */
export function baseName(name: string): string {
  return name.split(VERSION_MARK)[0];
}

/**
 * N for a `<base>_vN` name, null otherwise.
 */
export function versionOf(name: string): number | null {
  if (!name.includes(VERSION_MARK)) return null;
  const parts = name.split(VERSION_MARK);
  const tail = parts[parts.length - 1];
  return /^\d+$/.test(tail) ? Number(tail) : null;
}

/** How many of the keywords occur in the intent */
export function keywordMatches(intent: string, keywords: readonly string[]): number {
  const haystack = intent.toLowerCase();
  return keywords.filter(keyword => haystack.includes(keyword)).length;
}

/**
 * Score of one pool member for an intent:
 * 2 per matched keyword, 1 per intent word found in the name,
 * 3 × success rate, 0.5 × version.
 */
export function scoreMember(pool: string, name: string, intent: string, successRate: number): number {
  const table = SELECTION_KEYWORDS[pool] ?? {};
  const keywords = table[baseName(name)] ?? table[name] ?? [];

  let score = keywordMatches(intent, keywords) * 2;

  const lowerName = name.toLowerCase();
  for (const word of intent.toLowerCase().split(/\s+/)) {
    if (word && lowerName.includes(word)) score += 1;
  }

  score += successRate * 3;

  const version = versionOf(name);
  if (version !== null) score += version * 0.5;

  return score;
}

/**
 * Highest scorer; the first seen wins a tie. Null for no candidates.
 */
export function pickBest(scored: ReadonlyArray<{ name: string; score: number }>): string | null {
  let best: string | null = null;
  let bestScore = -1;
  for (const { name, score } of scored) {
    if (score > bestScore) {
      bestScore = score;
      best = name;
    }
  }
  return best;
}
