/**
 * Rules Use Cases
 *
 * What the sorter has learned, and ways to take it elsewhere:
 * - Server-side Sieve filters from cache hits and domain rules
 * - New categories for user folders nobody mapped yet
 * - Statistics and the decision history behind them
 */

import type { Deps, DecisionRecord, DecisionStats } from '../ports';
import type { Category, LearningStats } from '../domain';
import {
  isSystemFolder,
  toIdentity,
  isTrashLikeFolder,
  isUnderRoot,
  lastSegment,
} from '../domain';

export const DEFAULT_FILTER_MIN_OCCURRENCES = 5;

// ============================================
// Sieve Export
// ============================================

function sieveString(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

function sieveRule(domain: string, folder: string, comment: string): string[] {
  return [
    `# ${comment}`,
    `if header :contains "From" ${sieveString(domain)} {`,
    `    fileinto ${sieveString(folder)};`,
    '    stop;',
    '}',
    '',
  ];
}

export const exportFilters = (deps: Pick<Deps, 'cache' | 'rules' | 'categories'>) =>
  (minOccurrences = DEFAULT_FILTER_MIN_OCCURRENCES, now: Date = new Date()): string => {
    const hitsByDomain = new Map<string, Map<string, number>>();
    for (const pattern of deps.cache.entries()) {
      if (pattern.hitCount < minOccurrences) continue;
      if (!pattern.sourceDomain || pattern.sourceDomain === 'unknown') continue;

      const counts = hitsByDomain.get(pattern.sourceDomain) ?? new Map<string, number>();
      counts.set(pattern.category, (counts.get(pattern.category) ?? 0) + pattern.hitCount);
      hitsByDomain.set(pattern.sourceDomain, counts);
    }

    const lines = ['require ["fileinto"];', '', '# Generated by mail-sorter', `# Date: ${now.toISOString()}`, ''];
    const covered = new Set<string>();

    for (const domain of [...hitsByDomain.keys()].sort()) {
      const counts = hitsByDomain.get(domain);
      if (!counts) continue;

      const [category, hits] = [...counts.entries()].sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))[0];
      const folder = deps.categories.get(category)?.folder;
      if (hits < minOccurrences || !folder) continue;

      lines.push(...sieveRule(domain, folder, `${domain} -> ${category} (${hits} messages)`));
      covered.add(domain);
    }

    const domainRules = deps.rules.rules().domains;
    for (const key of Object.keys(domainRules).sort()) {
      const domain = key.replace(/^@/, '');
      const category = domainRules[key];
      const folder = deps.categories.get(category)?.folder;
      if (covered.has(domain) || !folder) continue;

      lines.push(...sieveRule(domain, folder, `${domain} -> ${category} (learned from corrections)`));
      covered.add(domain);
    }

    return lines.join('\n');
  };

// ============================================
// Folder Discovery
// ============================================

const NOT_A_CATEGORY = new Set(['inbox', 'archive', 'archives', 'sent', 'drafts', 'outbox', 'starred']);

export function categoryKeyForFolder(path: string): string {
  return path.toUpperCase().replace(/[/\s-]/g, '_');
}

/**
 * Proposes a category for every user folder that is not a destination yet.
 * The caller decides whether to persist them.
 */
export const discoverFolderCategories = (deps: Pick<Deps, 'mailStore' | 'categories' | 'config'>) =>
  async (): Promise<Category[]> => {
    const destinations = [...deps.categories.values()]
      .map(c => c.folder)
      .filter((f): f is string => f !== null);
    const taken = new Set(deps.categories.keys());
    const proposals: Category[] = [];

    for (const folder of await deps.mailStore.list()) {
      const path = folder.path;
      if (folder.flags.some(flag => flag.toLowerCase() === '\\noselect')) continue;
      if (folder.specialUse) continue;
      if (isSystemFolder(path) || isTrashLikeFolder(path)) continue;
      if (NOT_A_CATEGORY.has(lastSegment(path).toLowerCase())) continue;
      if (isUnderRoot(path, deps.config.feedbackRoot) || path.startsWith('Training')) continue;
      // Already a destination, or a parent of one
      if (destinations.some(d => d === path || d.startsWith(`${path}/`))) continue;

      let name = categoryKeyForFolder(path);
      if (taken.has(name)) name = `${name}_AUTO`;
      if (taken.has(name)) continue;
      taken.add(name);

      proposals.push({
        name,
        folder: path,
        keywords: [],
        confidenceThreshold: 0.7,
        priority: 2,
        description: `Folder discovered on the server: ${path}`,
      });
    }

    return proposals;
  };

// ============================================
// Statistics
// ============================================

// How far back, in decisions, to look for messages worth surfacing
const IMPORTANT_WINDOW = 200;
const IMPORTANT_SHOWN = 10;

export type SorterStats = {
  learning: LearningStats;
  cacheEntries: number;
  processedMessages: number;
  decisions: DecisionStats;
  /** Newest first, anything above the low level */
  recentImportant: DecisionRecord[];
};

export const getStats = (deps: Pick<Deps, 'rules' | 'cache' | 'checkpoint' | 'decisionLog'>) =>
  async (): Promise<SorterStats> => {
    const recent = await deps.decisionLog.findRecent(IMPORTANT_WINDOW);
    return {
      learning: deps.rules.stats(),
      cacheEntries: deps.cache.size(),
      processedMessages: deps.checkpoint.processedCount(),
      decisions: await deps.decisionLog.stats(),
      recentImportant: recent.filter(r => r.importanceLevel !== 'low').slice(0, IMPORTANT_SHOWN),
    };
  };

// ============================================
// Decision History
// ============================================

/** Every decision taken for one message, newest first */
export const explainMessage = (deps: Pick<Deps, 'decisionLog'>) =>
  async (folder: string, uid: string): Promise<DecisionRecord[]> =>
    deps.decisionLog.findByIdentity(toIdentity(folder, uid));
