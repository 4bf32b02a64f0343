/**
 * Keyword Scorer
 *
 * Static heuristic: for each category, how many of its keywords appear in
 * the subject or body. No I/O, no learning.
 */

import type { KeywordScorer } from '../../core/ports';
import type { CategoryTable, KeywordScore } from '../../core/domain';
import { UNKNOWN_CATEGORY } from '../../core/domain';

export const DEFAULT_KEYWORD_WEIGHT = 0.8;
const MAX_KEYWORD_CONFIDENCE = 0.99;

export function createKeywordScorer(categories: CategoryTable, options: { weight?: number } = {}): KeywordScorer {
  const weight = options.weight ?? DEFAULT_KEYWORD_WEIGHT;

  const candidates = [...categories.values()]
    .filter(c => c.name !== UNKNOWN_CATEGORY && c.keywords.length > 0)
    .map(c => ({
      name: c.name,
      priority: c.priority,
      keywords: c.keywords.map(k => k.toLowerCase()).filter(k => k.length > 0),
    }))
    .filter(c => c.keywords.length > 0);

  return {
    score(subject: string, body: string): KeywordScore | null {
      const content = `${subject} ${body}`.toLowerCase();
      let best: (KeywordScore & { priority: number }) | null = null;

      for (const category of candidates) {
        const matches = category.keywords.filter(k => content.includes(k)).length;
        if (matches === 0) continue;

        const confidence = Math.min(MAX_KEYWORD_CONFIDENCE, (matches / category.keywords.length) * weight);
        const better =
          !best ||
          confidence > best.confidence ||
          (confidence === best.confidence && category.priority > best.priority) ||
          (confidence === best.confidence && category.priority === best.priority && category.name < best.category);

        if (better) {
          best = { category: category.name, confidence, matches, keywordCount: category.keywords.length, priority: category.priority };
        }
      }

      if (!best) return null;
      return { category: best.category, confidence: best.confidence, matches: best.matches, keywordCount: best.keywordCount };
    },
  };
}
