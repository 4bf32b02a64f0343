/**
 * Classification Cache
 *
 * Fingerprint → category memo. Entries never expire; they are dropped only
 * when a user correction contradicts them.
 */

import { z } from 'zod';
import type { ClassificationCache } from '../../core/ports';
import type { CachedPattern } from '../../core/domain';
import { clampConfidence } from '../../core/domain';
import type { DocumentFile } from '../documents';

export const CACHE_VERSION = 1;

// ============================================
// Document Schema
// ============================================

const patternSchema = z.object({
  category: z.string().min(1),
  confidence: z.number(),
  hit_count: z.number().int().nonnegative(),
  last_used: z.string(),
  source_domain: z.string().default(''),
});

const currentSchema = z.object({
  version: z.literal(CACHE_VERSION),
  patterns: z.record(patternSchema),
});

export type CacheDocument = z.infer<typeof currentSchema>;

const legacyEntrySchema = z.object({
  email_hash: z.string().optional(),
  category: z.string().min(1),
  confidence: z.number(),
  hit_count: z.number().int().nonnegative().default(1),
  last_used: z.string(),
  from_domain: z.string().default(''),
});

const legacySchema = z.record(legacyEntrySchema).transform(
  (legacy): CacheDocument => ({
    version: CACHE_VERSION,
    patterns: Object.fromEntries(
      Object.entries(legacy).map(([key, entry]) => [
        key,
        {
          category: entry.category,
          confidence: entry.confidence,
          hit_count: entry.hit_count,
          last_used: entry.last_used,
          source_domain: entry.from_domain,
        },
      ])
    ),
  })
);

export const cacheDocumentSchema = z.union([currentSchema, legacySchema]);

export function fromDocument(doc: CacheDocument): CachedPattern[] {
  return Object.entries(doc.patterns).map(([fingerprint, p]) => {
    const lastUsed = new Date(p.last_used);
    return {
      fingerprint,
      category: p.category.toUpperCase(),
      confidence: clampConfidence(p.confidence),
      hitCount: p.hit_count,
      lastUsed: Number.isNaN(lastUsed.getTime()) ? new Date(0) : lastUsed,
      sourceDomain: p.source_domain,
    };
  });
}

export function toDocument(patterns: CachedPattern[]): CacheDocument {
  return {
    version: CACHE_VERSION,
    patterns: Object.fromEntries(
      patterns.map(p => [
        p.fingerprint,
        {
          category: p.category,
          confidence: p.confidence,
          hit_count: p.hitCount,
          last_used: p.lastUsed.toISOString(),
          source_domain: p.sourceDomain,
        },
      ])
    ),
  };
}

// ============================================
// Cache
// ============================================

const copy = (p: CachedPattern): CachedPattern => ({ ...p, lastUsed: new Date(p.lastUsed) });

export function createClassificationCache(
  document: DocumentFile<CacheDocument>,
  initial: CachedPattern[] = []
): ClassificationCache {
  const patterns = new Map(initial.map(p => [p.fingerprint, copy(p)]));
  let dirty = false;

  return {
    hit(fingerprint, now = new Date()) {
      const pattern = patterns.get(fingerprint);
      if (!pattern) return null;

      pattern.hitCount += 1;
      if (now.getTime() > pattern.lastUsed.getTime()) {
        pattern.lastUsed = now;
      }
      dirty = true;
      return copy(pattern);
    },

    get(fingerprint) {
      const pattern = patterns.get(fingerprint);
      return pattern ? copy(pattern) : null;
    },

    remember(entry, now = new Date()) {
      const existing = patterns.get(entry.fingerprint);
      const pattern: CachedPattern = {
        ...entry,
        confidence: clampConfidence(entry.confidence),
        hitCount: existing ? existing.hitCount : 1,
        lastUsed: existing && existing.lastUsed.getTime() > now.getTime() ? existing.lastUsed : now,
      };
      patterns.set(entry.fingerprint, pattern);
      dirty = true;
      return copy(pattern);
    },

    forget(fingerprint) {
      const removed = patterns.delete(fingerprint);
      if (removed) dirty = true;
      return removed;
    },

    entries: () => [...patterns.values()].map(copy),
    size: () => patterns.size,

    async save() {
      if (!dirty) return true;
      try {
        await document.write(toDocument([...patterns.values()]));
        dirty = false;
        return true;
      } catch (err) {
        console.error(`[cache] Failed to save ${document.location}:`, err instanceof Error ? err.message : err);
        return false;
      }
    },
  };
}

export async function loadClassificationCache(document: DocumentFile<CacheDocument>): Promise<ClassificationCache> {
  let initial: CachedPattern[] = [];
  try {
    const doc = await document.read();
    if (doc) {
      initial = fromDocument(doc);
      console.log(`[cache] Loaded ${initial.length} pattern(s) from ${document.location}`);
    }
  } catch (err) {
    console.error('[cache] Starting empty:', err instanceof Error ? err.message : err);
  }
  return createClassificationCache(document, initial);
}
