/**
 * Composition Root
 *
 * Wires all adapters to ports and creates use cases.
 * This is where dependency injection happens.
 */

import * as fs from 'fs';
import * as path from 'path';

// Core
import { createUseCases, createCategoryTable, type UseCases, type Deps, type RemoteClassifier, type CategoryTable } from '../core';

// Adapters
import { initDb, closeDb, getDb, createDecisionLogRepo } from '../adapters/db';
import { createImapMailStore } from '../adapters/imap';
import { createMessageDecoder } from '../adapters/decoder';
import { loadCategories } from '../adapters/categories';
import { jsonDocument, jsonLinesLog } from '../adapters/documents';
import { loadCheckpoint, checkpointDocumentSchema } from '../adapters/checkpoint';
import { loadClassificationCache, cacheDocumentSchema } from '../adapters/cache';
import { loadRuleStore, rulesDocumentSchema, correctionLineSchema } from '../adapters/learning';
import { createKeywordScorer } from '../adapters/keywords';
import { createRateLimiter } from '../adapters/rate-limiter';
import { createWorkerPool } from '../adapters/concurrency';
import { createFolderRouter } from '../adapters/router';
import { createRemoteClassifier, createAnthropicTransport, createChatCompletionsTransport, type ChatTransport } from '../adapters/llm';
import type { AppConfig } from './config';

// ============================================
// Container Type
// ============================================

export type Container = {
  config: AppConfig;
  deps: Deps;
  useCases: UseCases;
  /** Saves state and closes connections; safe to call more than once */
  shutdown: () => Promise<void>;
};

// ============================================
// Wiring Helpers
// ============================================

/** Built output runs from dist/, sources from src/ */
function resolveSchemaPath(): string {
  const candidates = [
    path.join(__dirname, '../adapters/db/schema.sql'),
    path.join(__dirname, '../../src/adapters/db/schema.sql'),
  ];
  return candidates.find(p => fs.existsSync(p)) ?? candidates[0];
}

function createTransport(config: AppConfig): { transport: ChatTransport; model: string; timeoutMs: number } | null {
  const remote = config.remote;
  switch (remote.provider) {
    case 'none':
      return null;
    case 'anthropic':
      return { transport: createAnthropicTransport({ apiKey: remote.apiKey }), model: remote.model, timeoutMs: remote.timeoutMs };
    case 'chat-completions':
      return {
        transport: createChatCompletionsTransport({ url: remote.url, apiKey: remote.apiKey }),
        model: remote.model,
        timeoutMs: remote.timeoutMs,
      };
  }
}

function createRemote(config: AppConfig, categories: CategoryTable): RemoteClassifier | null {
  const setup = createTransport(config);
  if (!setup) {
    console.log('[main] No remote classifier configured; local tiers only');
    return null;
  }

  const descriptions = Object.fromEntries([...categories.values()].map(c => [c.name, c.description]));
  console.log(`[main] Remote classifier: ${setup.transport.name} (${setup.model})`);

  return createRemoteClassifier({
    transport: setup.transport,
    limiter: createRateLimiter(config.rateLimit),
    model: setup.model,
    timeoutMs: setup.timeoutMs,
    descriptions,
  });
}

// ============================================
// Create Container
// ============================================

export async function createContainer(config: AppConfig): Promise<Container> {
  const dataDir = path.resolve(config.dataDir);
  const inData = (name: string) => path.join(dataDir, name);

  const categories = createCategoryTable(await loadCategories(config.categoriesPath));

  initDb(inData('decisions.db'), resolveSchemaPath(), { checkIntegrity: true });

  const mailStore = createImapMailStore(config.imap);
  const cache = await loadClassificationCache(jsonDocument(inData('classification_cache.json'), cacheDocumentSchema));
  const rules = await loadRuleStore({
    rules: jsonDocument(inData('learned_rules.json'), rulesDocumentSchema),
    corrections: jsonLinesLog(inData('corrections.jsonl'), correctionLineSchema),
  });
  const checkpoint = await loadCheckpoint(jsonDocument(inData('checkpoint.json'), checkpointDocumentSchema));

  const deps: Deps = {
    mailStore,
    decoder: createMessageDecoder(),
    cache,
    rules,
    keywords: createKeywordScorer(categories, { weight: config.keywordWeight }),
    remote: createRemote(config, categories),
    checkpoint,
    router: createFolderRouter(mailStore, categories),
    decisionLog: createDecisionLogRepo(getDb),
    workers: createWorkerPool({ concurrency: config.workers.count, itemTimeoutMs: config.workers.itemTimeoutMs }),
    categories,
    config: config.pipeline,
  };

  let closed = false;

  return {
    config,
    deps,
    useCases: createUseCases(deps),

    async shutdown() {
      if (closed) return;
      closed = true;

      await checkpoint.save();
      await cache.save();
      try {
        await mailStore.close();
      } catch (err) {
        console.warn('[main] Error while closing the mail connection:', err instanceof Error ? err.message : err);
      }
      closeDb();
    },
  };
}
