/**
 * Checkpoint
 *
 * Which messages have been handled, when each folder was last checked, and
 * whether the first full pass is done. Kept in memory and written out
 * wholesale on save.
 */

import { z } from 'zod';
import type { Checkpoint } from '../../core/ports';
import type { CheckpointSnapshot, MessageIdentity } from '../../core/domain';
import { identityKey } from '../../core/domain';
import type { DocumentFile } from '../documents';

export const CHECKPOINT_VERSION = 1;

// ============================================
// Document Schema
// ============================================

const currentSchema = z.object({
  version: z.literal(CHECKPOINT_VERSION),
  initial_scan_done: z.boolean(),
  last_check: z.record(z.string()),
  processed: z.array(z.string()),
  last_update: z.string().nullable(),
});

export type CheckpointDocument = z.infer<typeof currentSchema>;

// Unversioned files from earlier releases keyed the processed set differently
const legacySchema = z
  .object({
    initial_scan_done: z.boolean().default(false),
    last_check: z.record(z.string()).default({}),
    processed_emails: z.array(z.union([z.string(), z.number()])).default([]),
    last_update: z.string().nullable().optional(),
  })
  .transform((legacy): CheckpointDocument => ({
    version: CHECKPOINT_VERSION,
    initial_scan_done: legacy.initial_scan_done,
    last_check: legacy.last_check,
    processed: legacy.processed_emails.map(String),
    last_update: legacy.last_update ?? null,
  }));

export const checkpointDocumentSchema = z.union([currentSchema, legacySchema]);

function parseDate(value: string | null): Date | null {
  if (value === null) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

export function fromDocument(doc: CheckpointDocument): CheckpointSnapshot {
  const lastCheck: Record<string, Date> = {};
  for (const [folder, iso] of Object.entries(doc.last_check)) {
    const date = parseDate(iso);
    if (date) lastCheck[folder] = date;
  }
  return {
    initialScanDone: doc.initial_scan_done,
    lastCheck,
    processed: [...new Set(doc.processed)],
    lastUpdate: parseDate(doc.last_update),
  };
}

export function toDocument(snapshot: CheckpointSnapshot): CheckpointDocument {
  const lastCheck: Record<string, string> = {};
  for (const [folder, date] of Object.entries(snapshot.lastCheck)) {
    lastCheck[folder] = date.toISOString();
  }
  return {
    version: CHECKPOINT_VERSION,
    initial_scan_done: snapshot.initialScanDone,
    last_check: lastCheck,
    processed: snapshot.processed,
    last_update: snapshot.lastUpdate ? snapshot.lastUpdate.toISOString() : null,
  };
}

// ============================================
// Checkpoint
// ============================================

export function emptySnapshot(): CheckpointSnapshot {
  return { initialScanDone: false, lastCheck: {}, processed: [], lastUpdate: null };
}

export function createCheckpoint(
  document: DocumentFile<CheckpointDocument>,
  initial: CheckpointSnapshot = emptySnapshot(),
  now: () => Date = () => new Date()
): Checkpoint {
  let initialScanDone = initial.initialScanDone;
  let lastUpdate = initial.lastUpdate;
  const processed = new Set(initial.processed);
  const lastCheck = new Map(Object.entries(initial.lastCheck));

  const snapshot = (): CheckpointSnapshot => ({
    initialScanDone,
    lastCheck: Object.fromEntries(lastCheck),
    processed: [...processed],
    lastUpdate,
  });

  return {
    isProcessed: (identity: MessageIdentity) => processed.has(identityKey(identity)),
    markProcessed: (identity: MessageIdentity) => {
      processed.add(identityKey(identity));
    },
    processedCount: () => processed.size,

    initialScanDone: () => initialScanDone,
    completeInitialScan: () => {
      if (!initialScanDone) {
        initialScanDone = true;
        console.log('[checkpoint] Initial scan complete');
      }
    },

    lastCheck: (folder: string) => lastCheck.get(folder) ?? null,
    recordCheck: (folder: string, at: Date = now()) => {
      lastCheck.set(folder, at);
    },

    snapshot,

    reset: () => {
      initialScanDone = false;
      lastUpdate = null;
      processed.clear();
      lastCheck.clear();
      console.log('[checkpoint] Reset');
    },

    async save() {
      lastUpdate = now();
      try {
        await document.write(toDocument(snapshot()));
        return true;
      } catch (err) {
        console.error(`[checkpoint] Failed to save ${document.location}:`, err instanceof Error ? err.message : err);
        return false;
      }
    },
  };
}

/** Reads the document; a missing or unreadable file yields a fresh checkpoint. */
export async function loadCheckpoint(document: DocumentFile<CheckpointDocument>): Promise<Checkpoint> {
  let initial = emptySnapshot();
  try {
    const doc = await document.read();
    if (doc) {
      initial = fromDocument(doc);
      console.log(`[checkpoint] Loaded ${initial.processed.length} processed message(s) from ${document.location}`);
    }
  } catch (err) {
    console.error('[checkpoint] Starting fresh:', err instanceof Error ? err.message : err);
  }
  return createCheckpoint(document, initial);
}
