/**
 * Use Cases Factory
 *
 * Creates all use cases with dependencies injected.
 * This is the composition root for use cases.
 */

import type { Deps } from '../ports';

import * as classificationUseCases from './classification-usecases';
import * as scanUseCases from './scan-usecases';
import * as feedbackUseCases from './feedback-usecases';
import * as rulesUseCases from './rules-usecases';

/**
 * Create all use cases with dependencies
 */
export function createUseCases(deps: Deps) {
  return {
    // Classification
    classifyMessage: classificationUseCases.classifyMessage(deps),
    classifyBatch: classificationUseCases.classifyBatch(deps),

    // Scanning
    scanFolder: scanUseCases.scanFolder(deps),
    runScanCycle: scanUseCases.runScanCycle(deps),
    resolveScanFolders: scanUseCases.resolveScanFolders(deps),

    // Feedback
    ingestFeedback: feedbackUseCases.ingestFeedback(deps),
    learnFromFolders: feedbackUseCases.learnFromFolders(deps),

    // Rules
    exportFilters: rulesUseCases.exportFilters(deps),
    discoverFolderCategories: rulesUseCases.discoverFolderCategories(deps),
    getStats: rulesUseCases.getStats(deps),
    explainMessage: rulesUseCases.explainMessage(deps),
  };
}

export type UseCases = ReturnType<typeof createUseCases>;
