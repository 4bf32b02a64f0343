/**
 * Rule promotion: which patterns are corroborated enough by past corrections
 * to become rules.
 */

import type { Correction } from '../../core/domain';
import { normalizeSender, PROMOTION_MIN_AGREEMENT, PROMOTION_MIN_CORRECTIONS } from '../../core/domain';

const KEYWORD_MIN_LENGTH = 5;
const KEYWORDS_PER_CORRECTION = 5;

/** `"Jane <jane@shop.example>"` → `"@shop.example"` */
export function domainKey(sender: string): string | null {
  const address = normalizeSender(sender);
  const at = address.indexOf('@');
  if (at === -1 || at === address.length - 1) return null;
  return '@' + address.slice(at + 1);
}

/** Candidate subject keywords: the first few words longer than four characters */
export function subjectWords(subject: string): string[] {
  return subject
    .toLowerCase()
    .split(/\s+/)
    .filter(w => w.length >= KEYWORD_MIN_LENGTH)
    .slice(0, KEYWORDS_PER_CORRECTION);
}

/**
 * The category a rule should point to, given every correction the pattern
 * matches: null unless there are enough of them and one category holds a
 * strict majority above the agreement threshold.
 */
export function dominantCategory(
  corrections: readonly Correction[],
  matches: (c: Correction) => boolean
): string | null {
  const matching = corrections.filter(matches);
  if (matching.length < PROMOTION_MIN_CORRECTIONS) return null;

  const counts = new Map<string, number>();
  for (const c of matching) {
    counts.set(c.correctCategory, (counts.get(c.correctCategory) ?? 0) + 1);
  }

  for (const [category, count] of counts) {
    if (count / matching.length > PROMOTION_MIN_AGREEMENT) return category;
  }
  return null;
}
