/**
 * Classification Use Cases
 *
 * The tiered classification engine:
 * - Cache (fingerprint → last accepted category)
 * - Learned rules (sender → domain → subject keyword)
 * - Keyword heuristics
 * - Remote classifier, batched and rate-limited, for whatever is left
 *
 * Each tier is only consulted when the previous one produced nothing that
 * clears its threshold. Anything still unresolved becomes UNKNOWN.
 */

import type { Deps, RemoteOutcome } from '../ports';
import type { ClassificationMethod, ClassificationResult, MailMessage } from '../domain';
import {
  categoryNames,
  chunk,
  clamp,
  createResult,
  extractDomain,
  fallbackResult,
  identityKey,
  isKnownCategory,
  normalizeSender,
  DEFAULT_BATCH_SIZE,
  MAX_BATCH_SIZE,
} from '../domain';
import { computeFingerprint } from '../fingerprint';

export type ClassifierDeps = Pick<Deps, 'cache' | 'rules' | 'keywords' | 'remote' | 'categories' | 'config'>;

type RemoteMode = 'remote-single' | 'remote-batch';

const FEW_SHOT_EXAMPLES = 5;

// ============================================
// Local Tiers
// ============================================

function fromCache(deps: ClassifierDeps, message: MailMessage, fingerprint: string): ClassificationResult | null {
  const cached = deps.cache.get(fingerprint);
  if (!cached) return null;

  // Category removed from configuration since it was cached
  if (!isKnownCategory(deps.categories, cached.category)) return null;

  const pattern = deps.cache.hit(fingerprint);
  if (!pattern) return null;

  return createResult({
    identity: message.identity,
    category: pattern.category,
    confidence: pattern.confidence,
    method: 'cached',
    explanation: `Cache hit #${pattern.hitCount}`,
  });
}

function fromRules(deps: ClassifierDeps, message: MailMessage): ClassificationResult | null {
  const prediction = deps.rules.predict(normalizeSender(message.sender), message.subject);
  if (!prediction) return null;

  if (!isKnownCategory(deps.categories, prediction.category)) {
    console.warn(`[engine] Ignoring ${prediction.kind} rule "${prediction.pattern}" for unconfigured category ${prediction.category}`);
    return null;
  }
  if (prediction.confidence < deps.config.thresholds.rule) return null;

  return createResult({
    identity: message.identity,
    category: prediction.category,
    confidence: prediction.confidence,
    method: 'rule',
    explanation: `Learned ${prediction.kind} rule: ${prediction.pattern}`,
  });
}

function fromKeywords(deps: ClassifierDeps, message: MailMessage): ClassificationResult | null {
  const score = deps.keywords.score(message.subject, message.body);
  if (!score) return null;
  if (!isKnownCategory(deps.categories, score.category)) return null;
  if (score.confidence < deps.config.thresholds.keyword) return null;

  return createResult({
    identity: message.identity,
    category: score.category,
    confidence: score.confidence,
    method: 'keyword',
    explanation: `${score.matches}/${score.keywordCount} keyword(s) matched`,
  });
}

function remember(deps: ClassifierDeps, message: MailMessage, fingerprint: string, result: ClassificationResult): void {
  deps.cache.remember({
    fingerprint,
    category: result.category,
    confidence: result.confidence,
    sourceDomain: extractDomain(normalizeSender(message.sender)),
  });
}

function logDecision(result: ClassificationResult): void {
  console.log(
    `[engine] ${identityKey(result.identity)} → ${result.category} (${result.method}, ${result.confidence.toFixed(2)})`
  );
}

/**
 * Cache, rules and keywords. Returns null when the message has to go remote.
 */
export function classifyLocally(deps: ClassifierDeps, message: MailMessage): ClassificationResult | null {
  const fingerprint = computeFingerprint(message);

  const cached = fromCache(deps, message, fingerprint);
  if (cached) return cached;

  const local = fromRules(deps, message) ?? fromKeywords(deps, message);
  if (local) {
    remember(deps, message, fingerprint, local);
    return local;
  }

  return null;
}

// ============================================
// Remote Tier
// ============================================

/**
 * A category may demand more certainty than the global remote threshold.
 * Keyword scores are match ratios on another scale, so only the global
 * keyword threshold applies to them.
 */
function remoteFloor(deps: Pick<ClassifierDeps, 'categories' | 'config'>, category: string): number {
  const own = deps.categories.get(category)?.confidenceThreshold ?? 0;
  return Math.max(deps.config.thresholds.remote, own);
}

function resolveRemote(
  deps: ClassifierDeps,
  message: MailMessage,
  outcome: RemoteOutcome,
  method: ClassificationMethod
): ClassificationResult {
  if (!outcome.ok) {
    return fallbackResult(message.identity, `Remote classifier unavailable (${outcome.error})`);
  }

  const verdict = outcome.verdicts.get(identityKey(message.identity));
  if (!verdict) {
    return fallbackResult(message.identity, 'No verdict returned by remote classifier');
  }

  // Out-of-set categories were already normalized to UNKNOWN by the adapter
  if (!isKnownCategory(deps.categories, verdict.category)) {
    return fallbackResult(message.identity, verdict.explanation || `Remote classifier returned ${verdict.category}`);
  }

  const floor = remoteFloor(deps, verdict.category);
  if (verdict.confidence < floor) {
    return fallbackResult(
      message.identity,
      `Remote confidence ${verdict.confidence.toFixed(2)} for ${verdict.category} below ${floor}`
    );
  }

  const result = createResult({
    identity: message.identity,
    category: verdict.category,
    confidence: verdict.confidence,
    method,
    explanation: verdict.explanation,
  });
  remember(deps, message, computeFingerprint(message), result);
  return result;
}

async function classifyRemotely(
  deps: ClassifierDeps,
  messages: MailMessage[],
  method: RemoteMode
): Promise<ClassificationResult[]> {
  const remote = deps.remote;
  if (!remote) {
    return messages.map(m => fallbackResult(m.identity, 'No tier produced a result'));
  }

  const batchSize = clamp(deps.config.batchSize || DEFAULT_BATCH_SIZE, 1, MAX_BATCH_SIZE);
  const valid = categoryNames(deps.categories);
  const context = {
    examples: deps.rules.fewShotExamples(FEW_SHOT_EXAMPLES),
    rules: deps.rules.rules(),
  };

  const results: ClassificationResult[] = [];
  for (const batch of chunk(messages, batchSize)) {
    const outcome = await remote.classifyBatch(
      batch.map(m => ({ id: identityKey(m.identity), sender: m.sender, subject: m.subject, body: m.body })),
      valid,
      context
    );

    if (!outcome.ok) {
      console.warn(`[engine] Remote batch of ${batch.length} failed: ${outcome.error} (${outcome.detail})`);
    }

    for (const message of batch) {
      results.push(resolveRemote(deps, message, outcome, method));
    }
  }
  return results;
}

// ============================================
// Use Cases
// ============================================

async function classifyAll(
  deps: ClassifierDeps,
  messages: MailMessage[],
  method: RemoteMode
): Promise<Map<string, ClassificationResult>> {
  const resolved = new Map<string, ClassificationResult>();
  const residual: MailMessage[] = [];

  for (const message of messages) {
    const local = classifyLocally(deps, message);
    if (local) {
      resolved.set(identityKey(message.identity), local);
    } else {
      residual.push(message);
    }
  }

  if (residual.length > 0) {
    for (const result of await classifyRemotely(deps, residual, method)) {
      resolved.set(identityKey(result.identity), result);
    }
  }

  // Keep input order so callers route in classification order
  const ordered = new Map<string, ClassificationResult>();
  for (const message of messages) {
    const key = identityKey(message.identity);
    const result = resolved.get(key);
    if (result && !ordered.has(key)) {
      logDecision(result);
      ordered.set(key, result);
    }
  }
  return ordered;
}

export const classifyBatch = (deps: ClassifierDeps) =>
  async (messages: MailMessage[]): Promise<Map<string, ClassificationResult>> =>
    classifyAll(deps, messages, 'remote-batch');

export const classifyMessage = (deps: ClassifierDeps) =>
  async (message: MailMessage): Promise<ClassificationResult> => {
    const results = await classifyAll(deps, [message], 'remote-single');
    return results.get(identityKey(message.identity)) ?? fallbackResult(message.identity, 'No tier produced a result');
  };
