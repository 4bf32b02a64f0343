/**
 * Folder Router
 *
 * Maps categories to destination folders, creates missing folders on the
 * server, and moves messages as copy + \Deleted. The source folder is
 * purged later, once per pass, by the scan.
 */

import type { FolderRouter, MailStore } from '../../core/ports';
import type { CategoryTable, MessageIdentity } from '../../core/domain';
import { DELETED_FLAG, UNKNOWN_CATEGORY, identityKey } from '../../core/domain';
import { sleep as realSleep } from '../concurrency';

export const DEFAULT_SETTLE_DELAY_MS = 500;

export type FolderRouterOptions = {
  /** Pause after a CREATE before trusting the listing */
  settleDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
};

const message = (err: unknown) => (err instanceof Error ? err.message : String(err));

export function createFolderRouter(
  store: MailStore,
  categories: CategoryTable,
  options: FolderRouterOptions = {}
): FolderRouter {
  const settleDelayMs = options.settleDelayMs ?? DEFAULT_SETTLE_DELAY_MS;
  const sleep = options.sleep ?? ((ms: number) => realSleep(ms));

  const known = new Set<string>();
  let delimiter = '/';
  let loaded = false;

  async function refresh(): Promise<void> {
    const folders = await store.list();
    // Merged, not replaced: a folder created here may not be listed yet
    for (const folder of folders) known.add(folder.path);
    if (folders.length > 0) delimiter = folders[0].delimiter || '/';
    loaded = true;
  }

  async function tryRefresh(): Promise<void> {
    try {
      await refresh();
    } catch (err) {
      console.warn('[router] Could not list folders:', message(err));
    }
  }

  /** Category folders are written with `/`; the server may use another delimiter */
  const toServerPath = (path: string) => (delimiter === '/' ? path : path.split('/').join(delimiter));

  return {
    resolveDestination(category) {
      if (category === UNKNOWN_CATEGORY) return null;
      const folder = categories.get(category)?.folder;
      return folder ? toServerPath(folder) : null;
    },

    async ensureFolderExists(path) {
      if (!loaded) await tryRefresh();
      if (known.has(path)) return true;

      const segments = path.split(delimiter);
      for (let i = 0; i < segments.length; i++) {
        const ancestor = segments.slice(0, i + 1).join(delimiter);
        if (known.has(ancestor)) continue;

        try {
          await store.create(ancestor);
          console.log(`[router] Created folder ${ancestor}`);
        } catch (err) {
          // Another client may have created it in the meantime
          await tryRefresh();
          if (known.has(ancestor)) continue;
          console.error(`[router] Could not create ${ancestor}:`, message(err));
          return false;
        }

        await sleep(settleDelayMs);
        await tryRefresh();
        // Some servers list a new folder late; trust the successful CREATE
        known.add(ancestor);
      }
      return true;
    },

    async move(identity: MessageIdentity, destination) {
      const key = identityKey(identity);
      try {
        await store.copy(identity.uid, destination);
      } catch (err) {
        console.error(`[router] Copy of ${key} to ${destination} failed:`, message(err));
        return false;
      }

      try {
        await store.store(identity.uid, { add: [DELETED_FLAG] });
      } catch (err) {
        // The copy landed; leaving the original behind only duplicates it
        console.warn(`[router] Copied ${key} but could not flag the original:`, message(err));
        return true;
      }

      console.log(`[router] Moved ${key} → ${destination}`);
      return true;
    },

    refresh,
  };
}
