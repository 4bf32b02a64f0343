/**
 * Scan Use Cases
 *
 * Per-folder pass: select → search → classify → route → purge. Every
 * routed message is logged with its importance score.
 * Per-cycle pass: every eligible folder in turn, then persist progress.
 *
 * A message lands in the checkpoint only once its routing settled, so a
 * failure anywhere leaves it eligible for the next cycle.
 */

import type { Deps } from '../ports';
import type {
  ClassificationResult,
  CycleReport,
  FolderScanReport,
  Importance,
  MailMessage,
  RoutingOutcome,
  SearchScope,
} from '../domain';
import {
  identityKey,
  isSystemFolder,
  isTrashLikeFolder,
  isUnderRoot,
  lastSegment,
  toIdentity,
  UNKNOWN_CATEGORY,
} from '../domain';
import { scoreImportance } from '../importance';
import { classifyBatch, type ClassifierDeps } from './classification-usecases';

export type ScanDeps = ClassifierDeps &
  Pick<Deps, 'mailStore' | 'decoder' | 'checkpoint' | 'router' | 'decisionLog' | 'workers'>;

const EXCLUDED_SPECIAL_USE = new Set(['\\all', '\\sent', '\\drafts']);

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function emptyReport(folder: string): FolderScanReport {
  return { folder, skipped: false, candidates: 0, selected: 0, classified: 0, moved: 0, kept: 0, failed: 0 };
}

// ============================================
// Candidate Selection
// ============================================

export function searchScope(deps: Pick<Deps, 'checkpoint' | 'config'>): SearchScope {
  if (!deps.checkpoint.initialScanDone()) return 'ALL';
  return deps.config.unseenOnly ? 'UNSEEN' : 'ALL';
}

export function folderCap(deps: Pick<Deps, 'config'>, folder: string): number {
  return isTrashLikeFolder(folder) ? deps.config.trashFolderCap : deps.config.folderCap;
}

/**
 * Keeps the `cap` most recently dated UIDs. Undated messages sort last;
 * ties fall back to the higher UID.
 */
export const selectMostRecent = (deps: Pick<Deps, 'mailStore'>) =>
  async (uids: string[], cap: number): Promise<string[]> => {
    if (uids.length <= cap) return uids;

    const dates = await deps.mailStore.fetchInternalDates(uids);
    const ranked = uids.map(uid => ({ uid, time: dates.get(uid)?.getTime() ?? Number.NEGATIVE_INFINITY }));
    ranked.sort((a, b) => {
      if (b.time !== a.time) return b.time > a.time ? 1 : -1;
      return Number(b.uid) - Number(a.uid);
    });
    return ranked.slice(0, cap).map(r => r.uid);
  };

export const resolveScanFolders = (deps: Pick<Deps, 'mailStore' | 'config'>) =>
  async (): Promise<string[]> => {
    if (deps.config.scanFolders && deps.config.scanFolders.length > 0) {
      return deps.config.scanFolders;
    }

    const folders = await deps.mailStore.list();
    return folders
      .filter(f => !f.flags.some(flag => flag.toLowerCase() === '\\noselect'))
      .filter(f => !f.specialUse || !EXCLUDED_SPECIAL_USE.has(f.specialUse.toLowerCase()))
      .map(f => f.path)
      .filter(path => !isSystemFolder(path))
      .filter(path => !isUnderRoot(path, deps.config.feedbackRoot))
      .filter(path => !path.startsWith('Training') && !lastSegment(path).startsWith('Training'));
  };

// ============================================
// Routing
// ============================================

async function route(deps: ScanDeps, result: ClassificationResult): Promise<{ outcome: RoutingOutcome; destination: string | null }> {
  const { identity } = result;
  const destination = result.category === UNKNOWN_CATEGORY ? null : deps.router.resolveDestination(result.category);

  // Nothing to do, but remember it so it is not reclassified every cycle
  if (!destination || destination === identity.folder) {
    deps.checkpoint.markProcessed(identity);
    return { outcome: 'kept', destination };
  }

  if (deps.config.dryRun) {
    console.log(`[scan] [dry-run] Would move ${identityKey(identity)} to ${destination}`);
    deps.checkpoint.markProcessed(identity);
    return { outcome: 'dry-run', destination };
  }

  if (!(await deps.router.ensureFolderExists(destination))) {
    console.warn(`[scan] Destination ${destination} unavailable, ${identityKey(identity)} left for next cycle`);
    return { outcome: 'failed', destination };
  }

  if (!(await deps.router.move(identity, destination))) {
    return { outcome: 'failed', destination };
  }

  deps.checkpoint.markProcessed(identity);
  return { outcome: 'moved', destination };
}

async function recordDecision(
  deps: ScanDeps,
  result: ClassificationResult,
  destination: string | null,
  outcome: RoutingOutcome,
  importance: Importance
): Promise<void> {
  try {
    await deps.decisionLog.record({ result, destination, outcome, importance });
  } catch (err) {
    console.warn(`[scan] Could not record decision for ${identityKey(result.identity)}: ${errorMessage(err)}`);
  }
}

// ============================================
// Folder Pass
// ============================================

async function fetchMessages(deps: ScanDeps, folder: string, uids: string[], signal?: AbortSignal): Promise<{ messages: MailMessage[]; failed: number }> {
  const outcomes = await deps.workers.run(
    uids,
    async (uid): Promise<MailMessage> => {
      const source = await deps.mailStore.fetchSource(uid);
      if (!source) throw new Error('empty message source');
      const decoded = await deps.decoder.decode(source);
      return { identity: toIdentity(folder, uid), ...decoded };
    },
    signal
  );

  const messages: MailMessage[] = [];
  let failed = 0;
  outcomes.forEach((outcome, i) => {
    if (outcome.status === 'fulfilled') {
      messages.push(outcome.value);
    } else if (outcome.status === 'rejected') {
      failed++;
      console.warn(`[scan] Skipping ${folder}:${uids[i]}: ${outcome.reason}`);
    }
  });
  return { messages, failed };
}

export const scanFolder = (deps: ScanDeps) =>
  async (folder: string, signal?: AbortSignal): Promise<FolderScanReport> => {
    const report = emptyReport(folder);

    try {
      try {
        await deps.mailStore.select(folder);
      } catch (err) {
        console.warn(`[scan] Skipping ${folder}: select failed: ${errorMessage(err)}`);
        return { ...report, skipped: true, reason: `select failed: ${errorMessage(err)}` };
      }

      let uids: string[];
      try {
        uids = await deps.mailStore.search(searchScope(deps));
      } catch (err) {
        console.warn(`[scan] Skipping ${folder}: search failed: ${errorMessage(err)}`);
        return { ...report, skipped: true, reason: `search failed: ${errorMessage(err)}` };
      }

      const candidates = uids.map(String).filter(uid => !deps.checkpoint.isProcessed(toIdentity(folder, uid)));
      report.candidates = candidates.length;
      if (candidates.length === 0) return report;

      const cap = folderCap(deps, folder);
      let selected = candidates;
      if (candidates.length > cap) {
        try {
          selected = await selectMostRecent(deps)(candidates, cap);
        } catch (err) {
          // Highest UIDs are the most recently delivered
          console.warn(`[scan] Date fetch failed in ${folder}, keeping highest UIDs: ${errorMessage(err)}`);
          selected = [...candidates].sort((a, b) => Number(b) - Number(a)).slice(0, cap);
        }
        console.log(`[scan] ${folder}: ${candidates.length} candidates, capped to ${cap} most recent`);
      }
      report.selected = selected.length;

      const { messages, failed } = await fetchMessages(deps, folder, selected, signal);
      report.failed += failed;

      let results: Map<string, ClassificationResult>;
      try {
        results = await classifyBatch(deps)(messages);
      } catch (err) {
        console.error(`[scan] Classification failed in ${folder}: ${errorMessage(err)}`);
        report.failed += messages.length;
        return report;
      }
      report.classified = results.size;

      for (const message of messages) {
        if (signal?.aborted) {
          console.log(`[scan] Shutdown requested, leaving the rest of ${folder} for later`);
          break;
        }

        const result = results.get(identityKey(message.identity));
        if (!result) continue;

        let routed: { outcome: RoutingOutcome; destination: string | null };
        try {
          routed = await route(deps, result);
        } catch (err) {
          console.error(`[scan] Routing ${identityKey(message.identity)} failed: ${errorMessage(err)}`);
          routed = { outcome: 'failed', destination: null };
        }

        if (routed.outcome === 'moved') report.moved++;
        else if (routed.outcome === 'failed') report.failed++;
        else report.kept++;

        const importance = scoreImportance(deps.config.importance, message, result.category);
        if (importance.level !== 'low') {
          console.log(`[scan] ${identityKey(message.identity)} is ${importance.level} (${importance.score}), follow-up: ${importance.followUp}`);
        }

        await recordDecision(deps, result, routed.destination, routed.outcome, importance);
      }

      if (report.moved > 0) {
        try {
          await deps.mailStore.expunge();
        } catch (err) {
          console.warn(`[scan] Expunge failed in ${folder}: ${errorMessage(err)}`);
        }
      }

      console.log(
        `[scan] ${folder}: ${report.moved} moved, ${report.kept} kept, ${report.failed} failed of ${report.selected}`
      );
      return report;
    } finally {
      deps.checkpoint.recordCheck(folder);
    }
  };

// ============================================
// Cycle
// ============================================

export const runScanCycle = (deps: ScanDeps) =>
  async (signal?: AbortSignal): Promise<CycleReport> => {
    const startedAt = new Date();
    const folders: FolderScanReport[] = [];
    let cancelled = false;

    try {
      const paths = await resolveScanFolders(deps)();
      for (const path of paths) {
        if (signal?.aborted) break;
        folders.push(await scanFolder(deps)(path, signal));
      }
      cancelled = signal?.aborted ?? false;

      if (!cancelled && !deps.checkpoint.initialScanDone()) {
        deps.checkpoint.completeInitialScan();
        console.log('[scan] Initial scan complete, switching to incremental scope');
      }
    } finally {
      await deps.checkpoint.save();
      await deps.cache.save();
    }

    const moved = folders.reduce((n, f) => n + f.moved, 0);
    console.log(`[scan] Cycle done: ${folders.length} folder(s), ${moved} moved${cancelled ? ' (cancelled)' : ''}`);

    return { startedAt, finishedAt: new Date(), cancelled, folders };
  };
