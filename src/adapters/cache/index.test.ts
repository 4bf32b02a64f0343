import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { createClassificationCache, loadClassificationCache, cacheDocumentSchema, type CacheDocument } from './index';
import { memoryDocument } from '../documents/memory';

const at = (iso: string) => new Date(iso);

describe('ClassificationCache', () => {
  it('misses on unknown fingerprints', () => {
    const cache = createClassificationCache(memoryDocument<CacheDocument>());

    expect(cache.get('nope')).toBeNull();
    expect(cache.hit('nope')).toBeNull();
  });

  it('counts hits and moves lastUsed forward', () => {
    const cache = createClassificationCache(memoryDocument<CacheDocument>());
    cache.remember({ fingerprint: 'f1', category: 'PRO', confidence: 0.9, sourceDomain: 'corp.example' }, at('2024-01-01T00:00:00Z'));

    const hit = cache.hit('f1', at('2024-01-02T00:00:00Z'));

    expect(hit).toEqual({
      fingerprint: 'f1',
      category: 'PRO',
      confidence: 0.9,
      hitCount: 2,
      lastUsed: at('2024-01-02T00:00:00Z'),
      sourceDomain: 'corp.example',
    });
  });

  it('keeps the hit count when a pattern is re-remembered', () => {
    const cache = createClassificationCache(memoryDocument<CacheDocument>());
    cache.remember({ fingerprint: 'f1', category: 'PRO', confidence: 0.9, sourceDomain: '' });
    cache.hit('f1');
    cache.hit('f1');

    const updated = cache.remember({ fingerprint: 'f1', category: 'BANQUE', confidence: 0.8, sourceDomain: '' });

    expect(updated.hitCount).toBe(3);
    expect(updated.category).toBe('BANQUE');
  });

  it('never lets hitCount or lastUsed go backwards', () => {
    const operation = fc.record({
      kind: fc.constantFrom('hit', 'remember'),
      time: fc.integer({ min: 0, max: 10_000_000 }),
    });

    fc.assert(
      fc.property(fc.array(operation, { maxLength: 40 }), ops => {
        const cache = createClassificationCache(memoryDocument<CacheDocument>());
        cache.remember({ fingerprint: 'f', category: 'PRO', confidence: 0.5, sourceDomain: '' }, new Date(0));
        let hits = 1;
        let last = 0;

        for (const op of ops) {
          const when = new Date(op.time);
          const pattern =
            op.kind === 'hit'
              ? cache.hit('f', when)
              : cache.remember({ fingerprint: 'f', category: 'PRO', confidence: 0.5, sourceDomain: '' }, when);
          expect(pattern).not.toBeNull();
          if (!pattern) return;

          expect(pattern.hitCount).toBeGreaterThanOrEqual(hits);
          expect(pattern.lastUsed.getTime()).toBeGreaterThanOrEqual(last);
          hits = pattern.hitCount;
          last = pattern.lastUsed.getTime();
        }
      })
    );
  });

  it('returns copies that do not alias the stored pattern', () => {
    const cache = createClassificationCache(memoryDocument<CacheDocument>());
    cache.remember({ fingerprint: 'f1', category: 'PRO', confidence: 0.9, sourceDomain: '' });

    const copy = cache.get('f1');
    if (copy) copy.hitCount = 99;

    expect(cache.get('f1')?.hitCount).toBe(1);
  });

  it('forgets a pattern', () => {
    const cache = createClassificationCache(memoryDocument<CacheDocument>());
    cache.remember({ fingerprint: 'f1', category: 'PRO', confidence: 0.9, sourceDomain: '' });

    expect(cache.forget('f1')).toBe(true);
    expect(cache.forget('f1')).toBe(false);
    expect(cache.size()).toBe(0);
  });

  it('only writes when something changed', async () => {
    const doc = memoryDocument<CacheDocument>();
    const cache = createClassificationCache(doc);

    await cache.save();
    expect(doc.writes()).toBe(0);

    cache.remember({ fingerprint: 'f1', category: 'PRO', confidence: 0.9, sourceDomain: 'corp.example' }, at('2024-03-01T00:00:00Z'));
    await cache.save();
    await cache.save();

    expect(doc.writes()).toBe(1);
    expect(doc.current()).toEqual({
      version: 1,
      patterns: {
        f1: { category: 'PRO', confidence: 0.9, hit_count: 1, last_used: '2024-03-01T00:00:00.000Z', source_domain: 'corp.example' },
      },
    });
  });

  it('reloads what it saved', async () => {
    const doc = memoryDocument<CacheDocument>();
    const cache = createClassificationCache(doc);
    cache.remember({ fingerprint: 'f1', category: 'PRO', confidence: 0.9, sourceDomain: 'corp.example' });
    await cache.save();

    const reloaded = await loadClassificationCache(doc);

    expect(reloaded.get('f1')?.category).toBe('PRO');
  });
});

describe('cache document schema', () => {
  it('migrates the unversioned flat layout', () => {
    const parsed = cacheDocumentSchema.parse({
      abc123: { email_hash: 'abc123', category: 'banque', confidence: 0.85, last_used: '2024-01-01T00:00:00', from_domain: 'mabanque.example' },
    });

    expect(parsed).toEqual({
      version: 1,
      patterns: {
        abc123: { category: 'banque', confidence: 0.85, hit_count: 1, last_used: '2024-01-01T00:00:00', source_domain: 'mabanque.example' },
      },
    });
  });

  it('uppercases categories when loading', async () => {
    const doc = memoryDocument<CacheDocument>({
      version: 1,
      patterns: { f1: { category: 'banque', confidence: 1.5, hit_count: 4, last_used: 'garbage', source_domain: '' } },
    });

    const cache = await loadClassificationCache(doc);

    expect(cache.get('f1')).toEqual({
      fingerprint: 'f1',
      category: 'BANQUE',
      confidence: 1,
      hitCount: 4,
      lastUsed: new Date(0),
      sourceDomain: '',
    });
  });
});
