#!/usr/bin/env node
/**
 * Command-line entry point
 *
 * `mail-sorter [run|once|feedback|learn-folders [count]|stats|explain <folder> <uid>|export-filters [min]|sync-folders|reset-checkpoint]`
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { loadConfig, ConfigError } from './config';
import { createContainer, type Container } from './container';
import { sleep } from '../adapters/concurrency';
import { saveCategories } from '../adapters/categories';
import { checkIntegrity } from '../adapters/db';
import { DEFAULT_FILTER_MIN_OCCURRENCES, DEFAULT_LEARNING_SAMPLE, type CycleReport } from '../core';

// Pause after a failed cycle before trying again
const ERROR_RETRY_MS = 10_000;

const COMMANDS = [
  'run',
  'once',
  'feedback',
  'learn-folders',
  'stats',
  'explain',
  'export-filters',
  'sync-folders',
  'reset-checkpoint',
] as const;
type Command = (typeof COMMANDS)[number];

const USAGE = `Usage: mail-sorter [command]

Commands:
  run                    Poll and sort until interrupted (default)
  once                   One feedback pass and one scan cycle
  feedback               Absorb corrections from the feedback folders
  learn-folders [count]  Learn from the newest messages of hand-sorted folders
  stats                  Print learning and decision statistics
  explain <folder> <uid> Show every decision taken for one message
  export-filters [min]   Write Sieve rules for well-known sender domains
  sync-folders           Add a category for every unmapped server folder
  reset-checkpoint       Forget which messages were processed`;

function parseCommand(arg: string | undefined): Command | null {
  const wanted = arg ?? 'run';
  return COMMANDS.find(c => c === wanted) ?? null;
}

function summarize(report: CycleReport): string {
  const totals = report.folders.reduce(
    (acc, f) => ({
      classified: acc.classified + f.classified,
      moved: acc.moved + f.moved,
      kept: acc.kept + f.kept,
      failed: acc.failed + f.failed,
      skipped: acc.skipped + (f.skipped ? 1 : 0),
    }),
    { classified: 0, moved: 0, kept: 0, failed: 0, skipped: 0 }
  );
  const seconds = ((report.finishedAt.getTime() - report.startedAt.getTime()) / 1000).toFixed(1);
  return (
    `${report.folders.length} folder(s) in ${seconds}s: ${totals.classified} classified, ` +
    `${totals.moved} moved, ${totals.kept} kept, ${totals.failed} failed, ${totals.skipped} folder(s) skipped` +
    (report.cancelled ? ' (cancelled)' : '')
  );
}

// ============================================
// Commands
// ============================================

async function feedbackPass(container: Container, signal: AbortSignal): Promise<void> {
  const report = await container.useCases.ingestFeedback(signal);
  if (report.learned > 0 || report.failed > 0) {
    console.log(`[main] Feedback: ${report.learned} correction(s) learned, ${report.failed} failed`);
  }
}

async function learnFolders(container: Container, arg: string | undefined, signal: AbortSignal): Promise<void> {
  const count = arg === undefined ? DEFAULT_LEARNING_SAMPLE : Number.parseInt(arg, 10);
  if (!Number.isInteger(count) || count < 1) {
    throw new ConfigError(`learn-folders expects a positive integer, got "${arg}"`);
  }

  const report = await container.useCases.learnFromFolders(count, signal);
  console.log(
    `[main] Folder learning: ${report.learned} message(s) learned from ${report.folders.length} folder(s), ${report.failed} failed`
  );
}

async function cycle(container: Container, signal: AbortSignal): Promise<void> {
  await feedbackPass(container, signal);
  if (signal.aborted) return;
  const report = await container.useCases.runScanCycle(signal);
  console.log(`[main] Cycle done: ${summarize(report)}`);
}

async function pollLoop(container: Container, signal: AbortSignal): Promise<void> {
  const interval = container.config.pollIntervalMs;
  console.log(`[main] Polling every ${interval / 1000}s${container.config.pipeline.dryRun ? ' (dry run)' : ''}`);

  while (!signal.aborted) {
    try {
      await cycle(container, signal);
      await sleep(interval, signal);
    } catch (err) {
      console.error('[main] Cycle failed:', err instanceof Error ? err.message : err);
      await container.deps.checkpoint.save();
      await sleep(ERROR_RETRY_MS, signal);
    }
  }
}

async function printStats(container: Container): Promise<void> {
  const stats = await container.useCases.getStats();
  const { learning, decisions } = stats;

  console.log('Learning');
  console.log(`  corrections:        ${learning.totalCorrections}`);
  console.log(`  sender rules:       ${learning.senderRules}`);
  console.log(`  domain rules:       ${learning.domainRules}`);
  console.log(`  keyword rules:      ${learning.keywordRules}`);
  console.log(`  categories learned: ${learning.categoriesLearned}`);
  console.log(`Cache entries:        ${stats.cacheEntries}`);
  console.log(`Processed messages:   ${stats.processedMessages}`);
  console.log(`Decisions:            ${decisions.total} (average confidence ${decisions.averageConfidence.toFixed(2)})`);
  for (const [method, count] of Object.entries(decisions.byMethod)) {
    console.log(`  by method ${method}: ${count}`);
  }
  for (const [category, count] of Object.entries(decisions.byCategory)) {
    console.log(`  by category ${category}: ${count}`);
  }
  for (const [level, count] of Object.entries(decisions.byImportance)) {
    console.log(`  ${level} importance: ${count}`);
  }
  if (stats.recentImportant.length > 0) {
    console.log('Recent important messages');
    for (const record of stats.recentImportant) {
      console.log(`  ${record.folder}:${record.uid} ${record.category} ${record.importanceLevel} (${record.importance}) → ${record.followUp}`);
    }
  }

  const integrity = await checkIntegrity();
  console.log(`Database:             ${integrity.isHealthy ? 'healthy' : `damaged (${integrity.errors.join('; ')})`}`);
}

async function explain(container: Container, folder: string | undefined, uid: string | undefined): Promise<void> {
  if (!folder || !uid) {
    throw new ConfigError('explain expects a folder and a UID');
  }

  const history = await container.useCases.explainMessage(folder, uid);
  if (history.length === 0) {
    console.log(`[main] No decision recorded for ${folder}:${uid}`);
    return;
  }
  for (const record of history) {
    console.log(
      `${record.decidedAt.toISOString()} ${record.category} via ${record.method} (${record.confidence.toFixed(2)}) ` +
        `${record.outcome}${record.destination ? ` → ${record.destination}` : ''}, importance ${record.importance}: ${record.explanation}`
    );
  }
}

async function exportFilters(container: Container, arg: string | undefined): Promise<void> {
  const min = arg === undefined ? DEFAULT_FILTER_MIN_OCCURRENCES : Number.parseInt(arg, 10);
  if (!Number.isInteger(min) || min < 1) {
    throw new ConfigError(`export-filters expects a positive integer, got "${arg}"`);
  }

  const script = container.useCases.exportFilters(min);
  const target = path.join(path.resolve(container.config.dataDir), 'filters.sieve');
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, script + '\n', 'utf-8');

  console.log(script);
  console.log(`[main] Filters written to ${target}`);
}

async function syncFolders(container: Container): Promise<void> {
  const proposals = await container.useCases.discoverFolderCategories();
  if (proposals.length === 0) {
    console.log('[main] Every folder already has a category');
    return;
  }
  for (const category of proposals) {
    console.log(`[main] + ${category.name} → ${category.folder}`);
  }
  await saveCategories(container.config.categoriesPath, [...container.deps.categories.values(), ...proposals]);
}

// ============================================
// Main
// ============================================

export async function main(argv: string[]): Promise<number> {
  const command = parseCommand(argv[0]);
  if (!command) {
    console.error(USAGE);
    return 2;
  }

  const container = await createContainer(loadConfig());
  const controller = new AbortController();

  const onSignal = (signal: NodeJS.Signals) => {
    console.log(`[main] ${signal} received, finishing current work`);
    controller.abort();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    switch (command) {
      case 'run':
        await pollLoop(container, controller.signal);
        break;
      case 'once':
        await cycle(container, controller.signal);
        break;
      case 'feedback':
        await feedbackPass(container, controller.signal);
        break;
      case 'learn-folders':
        await learnFolders(container, argv[1], controller.signal);
        break;
      case 'stats':
        await printStats(container);
        break;
      case 'explain':
        await explain(container, argv[1], argv[2]);
        break;
      case 'export-filters':
        await exportFilters(container, argv[1]);
        break;
      case 'sync-folders':
        await syncFolders(container);
        break;
      case 'reset-checkpoint':
        container.deps.checkpoint.reset();
        break;
    }
    return 0;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    await container.shutdown();
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    code => {
      process.exitCode = code;
    },
    err => {
      if (err instanceof ConfigError) {
        console.error(`[main] ${err.message}`);
      } else {
        console.error('[main] Fatal:', err);
      }
      process.exitCode = 1;
    }
  );
}
