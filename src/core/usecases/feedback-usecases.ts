/**
 * Feedback Use Cases
 *
 * Users teach the sorter by dropping messages into `<feedbackRoot>/<CATEGORY>`.
 * Each message there becomes a correction, then leaves the feedback folder.
 *
 * Folders the user already sorted by hand teach it too: a sample of each is
 * read as corrections and left where it is.
 */

import type { Deps } from '../ports';
import type { CategoryTable, FeedbackReport, FolderDescriptor } from '../domain';
import {
  identityKey,
  isKnownCategory,
  isSystemFolder,
  isTrashLikeFolder,
  isUnderRoot,
  toIdentity,
  lastSegment,
  BODY_PREVIEW_LENGTH,
  DELETED_FLAG,
} from '../domain';
import { computeFingerprint } from '../fingerprint';

export type FeedbackDeps = Pick<Deps, 'mailStore' | 'decoder' | 'rules' | 'cache' | 'categories' | 'config'>;

const errorMessage = (err: unknown) => (err instanceof Error ? err.message : String(err));

type FeedbackFolder = {
  path: string;
  category: string;
};

export function feedbackFolders(deps: Pick<Deps, 'categories' | 'config'>, folders: FolderDescriptor[]): FeedbackFolder[] {
  const root = deps.config.feedbackRoot;
  const found: FeedbackFolder[] = [];

  for (const folder of folders) {
    const prefix = `${root}${folder.delimiter || '/'}`;
    if (!folder.path.startsWith(prefix)) continue;

    const name = folder.path.slice(prefix.length);
    // Only direct children name a category
    if (!name || name.includes(folder.delimiter || '/')) continue;

    const category = lastSegment(name).toUpperCase();
    if (!isKnownCategory(deps.categories, category)) {
      console.warn(`[feedback] ${folder.path} does not name a configured category, skipping`);
      continue;
    }
    found.push({ path: folder.path, category });
  }
  return found;
}

async function ingestFolder(deps: FeedbackDeps, folder: FeedbackFolder, signal?: AbortSignal): Promise<{ learned: number; failed: number }> {
  let learned = 0;
  let failed = 0;
  let flagged = 0;

  try {
    await deps.mailStore.select(folder.path);
  } catch (err) {
    console.warn(`[feedback] Cannot open ${folder.path}: ${errorMessage(err)}`);
    return { learned, failed };
  }

  const uids = await deps.mailStore.search('ALL');
  for (const uid of uids) {
    if (signal?.aborted) break;
    const key = identityKey(toIdentity(folder.path, uid));

    try {
      const source = await deps.mailStore.fetchSource(uid);
      if (!source) throw new Error('empty message source');
      const message = await deps.decoder.decode(source);

      const outcome = await deps.rules.learnFromCorrection({
        messageId: key,
        sender: message.sender,
        subject: message.subject,
        bodyPreview: message.body.slice(0, BODY_PREVIEW_LENGTH),
        wrongCategory: null,
        correctCategory: folder.category,
      });

      // A duplicate is a replay of a message whose removal failed; only the cleanup is left
      if (!outcome.duplicate) {
        // A stale cached pattern would shadow the rule just learned
        deps.cache.forget(computeFingerprint(message));
        learned++;
      }
    } catch (err) {
      failed++;
      console.warn(`[feedback] ${key} not absorbed: ${errorMessage(err)}`);
      continue;
    }

    try {
      await deps.mailStore.store(uid, { add: [DELETED_FLAG] });
      flagged++;
    } catch (err) {
      console.warn(`[feedback] ${key} learned but left in place: ${errorMessage(err)}`);
    }
  }

  if (flagged > 0) {
    try {
      await deps.mailStore.expunge();
    } catch (err) {
      console.warn(`[feedback] Expunge failed in ${folder.path}: ${errorMessage(err)}`);
    }
  }
  return { learned, failed };
}

export const ingestFeedback = (deps: FeedbackDeps) =>
  async (signal?: AbortSignal): Promise<FeedbackReport> => {
    const report: FeedbackReport = { folders: [], learned: 0, failed: 0 };
    const folders = feedbackFolders(deps, await deps.mailStore.list());

    for (const folder of folders) {
      if (signal?.aborted) break;

      try {
        const { learned, failed } = await ingestFolder(deps, folder, signal);
        report.folders.push(folder.path);
        report.learned += learned;
        report.failed += failed;
        if (learned > 0) {
          console.log(`[feedback] ${folder.path}: learned ${learned} correction(s) for ${folder.category}`);
        }
      } catch (err) {
        console.warn(`[feedback] Pass over ${folder.path} failed: ${errorMessage(err)}`);
      }
    }

    if (report.learned > 0) {
      await deps.cache.save();
    }
    return report;
  };

// ============================================
// Learning From Sorted Folders
// ============================================

export const DEFAULT_LEARNING_SAMPLE = 10;

/** Words in a folder path that hint at a category, checked in order */
const FOLDER_HINTS: readonly (readonly [string, string])[] = [
  ['travail', 'PRO'],
  ['work', 'PRO'],
  ['professionnel', 'PRO'],
  ['banque', 'BANQUE'],
  ['bank', 'BANQUE'],
  ['finance', 'BANQUE'],
  ['achats', 'VENTE'],
  ['shopping', 'VENTE'],
  ['newsletter', 'NEWSLETTER'],
  ['social', 'SOCIAL'],
  ['réseaux', 'SOCIAL'],
  ['voyage', 'VOYAGES'],
  ['travel', 'VOYAGES'],
  ['urgent', 'URGENT'],
  ['traiter', 'URGENT'],
];

export type FolderLearningReport = {
  folders: { path: string; category: string; learned: number }[];
  learned: number;
  failed: number;
};

/** The category whose destination is this folder, else one its name hints at */
export function inferFolderCategory(categories: CategoryTable, folder: FolderDescriptor): string | null {
  const path = folder.path.split(folder.delimiter || '/').join('/');
  for (const category of categories.values()) {
    if (category.folder === path) return category.name;
  }

  const lower = path.toLowerCase();
  const hint = FOLDER_HINTS.find(([word, name]) => lower.includes(word) && isKnownCategory(categories, name));
  return hint ? hint[1] : null;
}

function isSortedByHand(deps: Pick<Deps, 'config'>, folder: FolderDescriptor): boolean {
  if (folder.flags.some(flag => flag.toLowerCase() === '\\noselect')) return false;
  if (folder.specialUse) return false;
  if (isSystemFolder(folder.path) || isTrashLikeFolder(folder.path)) return false;
  if (isUnderRoot(folder.path, deps.config.feedbackRoot)) return false;
  return lastSegment(folder.path).toLowerCase() !== 'inbox';
}

async function sampleFolder(
  deps: FeedbackDeps,
  path: string,
  category: string,
  sampleSize: number,
  signal?: AbortSignal
): Promise<{ learned: number; failed: number }> {
  let learned = 0;
  let failed = 0;

  await deps.mailStore.select(path);
  const uids = await deps.mailStore.search('ALL');
  // Highest UIDs are the most recently delivered
  const sample = [...uids].sort((a, b) => Number(a) - Number(b)).slice(-sampleSize);

  for (const uid of sample) {
    if (signal?.aborted) break;
    const key = identityKey(toIdentity(path, uid));

    try {
      const source = await deps.mailStore.fetchSource(uid);
      if (!source) throw new Error('empty message source');
      const message = await deps.decoder.decode(source);

      const outcome = await deps.rules.learnFromCorrection({
        messageId: key,
        sender: message.sender,
        subject: message.subject,
        bodyPreview: message.body.slice(0, BODY_PREVIEW_LENGTH),
        wrongCategory: null,
        correctCategory: category,
      });
      if (!outcome.duplicate) {
        deps.cache.forget(computeFingerprint(message));
        learned++;
      }
    } catch (err) {
      failed++;
      console.warn(`[folders] ${key} not learned: ${errorMessage(err)}`);
    }
  }
  return { learned, failed };
}

/**
 * Reads the newest `sampleSize` messages of every hand-sorted folder that
 * maps to a category. Messages already learned count once; nothing moves.
 */
export const learnFromFolders = (deps: FeedbackDeps) =>
  async (sampleSize = DEFAULT_LEARNING_SAMPLE, signal?: AbortSignal): Promise<FolderLearningReport> => {
    const report: FolderLearningReport = { folders: [], learned: 0, failed: 0 };

    for (const folder of await deps.mailStore.list()) {
      if (signal?.aborted) break;
      if (!isSortedByHand(deps, folder)) continue;

      const category = inferFolderCategory(deps.categories, folder);
      if (!category) continue;

      try {
        const { learned, failed } = await sampleFolder(deps, folder.path, category, sampleSize, signal);
        report.folders.push({ path: folder.path, category, learned });
        report.learned += learned;
        report.failed += failed;
        console.log(`[folders] ${folder.path}: learned ${learned} message(s) as ${category}`);
      } catch (err) {
        console.warn(`[folders] Skipping ${folder.path}: ${errorMessage(err)}`);
      }
    }

    if (report.learned > 0) {
      await deps.cache.save();
    }
    return report;
  };
