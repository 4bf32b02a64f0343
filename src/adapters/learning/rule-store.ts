/**
 * Adaptive Rule Store
 *
 * Learns sender, domain and subject-keyword rules from user corrections and
 * answers rule lookups ahead of the keyword and remote tiers.
 *
 * Sender rules take the latest correction. Domain and keyword rules are
 * re-derived from the whole correction history each time one of their
 * corrections changes, so a rule is dropped again when later corrections
 * stop agreeing with it.
 *
 * A correction is counted once per message id; replaying the same feedback
 * message cannot corroborate itself.
 */

import { z } from 'zod';
import type { RuleStore } from '../../core/ports';
import type {
  Correction,
  CorrectionInput,
  RuleChange,
  RuleKind,
  RulePrediction,
  RuleTable,
} from '../../core/domain';
import { BODY_PREVIEW_LENGTH, normalizeSender, RULE_CONFIDENCE } from '../../core/domain';
import type { AppendLog, DocumentFile } from '../documents';
import { domainKey, dominantCategory, subjectWords } from './promotion';

export const RULES_VERSION = 1;
const DEFAULT_FEW_SHOT = 5;
const FEW_SHOT_PER_CATEGORY = 2;

// ============================================
// Document Schemas
// ============================================

const ruleMap = z.record(z.string());

const currentRulesSchema = z.object({
  version: z.literal(RULES_VERSION),
  sender_rules: ruleMap,
  domain_rules: ruleMap,
  subject_keywords: ruleMap,
});

export type RulesDocument = z.infer<typeof currentRulesSchema>;

const legacyRulesSchema = z
  .object({
    sender_rules: ruleMap.default({}),
    domain_rules: ruleMap.default({}),
    subject_keywords: ruleMap.default({}),
  })
  .transform((legacy): RulesDocument => ({ version: RULES_VERSION, ...legacy }));

export const rulesDocumentSchema = z.union([currentRulesSchema, legacyRulesSchema]);

const correctionFields = {
  sender: z.string().default(''),
  subject: z.string().default(''),
  body_preview: z.string().default(''),
  wrong_category: z.string().nullable().default(null),
  correct_category: z.string().min(1),
  timestamp: z.string(),
};

const currentCorrectionSchema = z.object({ message_id: z.string(), ...correctionFields });

export type CorrectionLine = z.infer<typeof currentCorrectionSchema>;

const legacyCorrectionSchema = z
  .object({ email_id: z.union([z.string(), z.number()]), ...correctionFields })
  .transform(({ email_id, ...rest }): CorrectionLine => ({ message_id: String(email_id), ...rest }));

export const correctionLineSchema = z.union([currentCorrectionSchema, legacyCorrectionSchema]);

// ============================================
// Mapping
// ============================================

export function fromCorrectionLine(line: CorrectionLine): Correction {
  const timestamp = new Date(line.timestamp);
  return {
    messageId: line.message_id,
    sender: line.sender,
    subject: line.subject,
    bodyPreview: line.body_preview,
    wrongCategory: line.wrong_category,
    correctCategory: line.correct_category.toUpperCase(),
    timestamp: Number.isNaN(timestamp.getTime()) ? new Date(0) : timestamp,
  };
}

export function toCorrectionLine(c: Correction): CorrectionLine {
  return {
    message_id: c.messageId,
    sender: c.sender,
    subject: c.subject,
    body_preview: c.bodyPreview,
    wrong_category: c.wrongCategory,
    correct_category: c.correctCategory,
    timestamp: c.timestamp.toISOString(),
  };
}

function fromRulesDocument(doc: RulesDocument): RuleTable {
  return {
    senders: { ...doc.sender_rules },
    domains: { ...doc.domain_rules },
    keywords: { ...doc.subject_keywords },
  };
}

function toRulesDocument(rules: RuleTable): RulesDocument {
  return {
    version: RULES_VERSION,
    sender_rules: { ...rules.senders },
    domain_rules: { ...rules.domains },
    subject_keywords: { ...rules.keywords },
  };
}

export function emptyRuleTable(): RuleTable {
  return { senders: {}, domains: {}, keywords: {} };
}

// Maps, not records: patterns such as "constructor" must not hit Object.prototype
type RuleMaps = Record<RuleKind, Map<string, string>>;

const toMaps = (rules: RuleTable): RuleMaps => ({
  sender: new Map(Object.entries(rules.senders)),
  domain: new Map(Object.entries(rules.domains)),
  keyword: new Map(Object.entries(rules.keywords)),
});

const toTable = (maps: RuleMaps): RuleTable => ({
  senders: Object.fromEntries(maps.sender),
  domains: Object.fromEntries(maps.domain),
  keywords: Object.fromEntries(maps.keyword),
});

// ============================================
// Rule Store
// ============================================

export type RuleStorage = {
  rules: DocumentFile<RulesDocument>;
  corrections: AppendLog<CorrectionLine>;
};

export type RuleStoreState = {
  rules: RuleTable;
  corrections: Correction[];
};

export function createRuleStore(
  storage: RuleStorage,
  initial: RuleStoreState = { rules: emptyRuleTable(), corrections: [] },
  now: () => Date = () => new Date()
): RuleStore {
  const maps = toMaps(initial.rules);
  const corrections: Correction[] = [...initial.corrections];
  const byMessageId = new Map(corrections.map(c => [c.messageId, c]));

  /** Sets or clears one rule; returns the change, or null if nothing moved */
  function apply(kind: RuleKind, pattern: string, category: string | null): RuleChange | null {
    const rules = maps[kind];
    const existing = rules.get(pattern);
    if (category === null) {
      if (existing === undefined) return null;
      rules.delete(pattern);
    } else {
      if (existing === category) return null;
      rules.set(pattern, category);
    }
    return { kind, pattern, category };
  }

  const prediction = (kind: RuleKind, pattern: string, category: string): RulePrediction => ({
    category,
    confidence: RULE_CONFIDENCE[kind],
    kind,
    pattern,
  });

  return {
    predict(sender, subject) {
      const address = normalizeSender(sender);
      const bySender = maps.sender.get(address);
      if (bySender) return prediction('sender', address, bySender);

      const domain = domainKey(address);
      const byDomain = domain ? maps.domain.get(domain) : undefined;
      if (domain && byDomain) return prediction('domain', domain, byDomain);

      const lower = subject.toLowerCase();
      for (const [word, category] of maps.keyword) {
        if (lower.includes(word)) return prediction('keyword', word, category);
      }
      return null;
    },

    async learnFromCorrection(input: CorrectionInput) {
      const known = input.messageId ? byMessageId.get(input.messageId) : undefined;
      if (known) {
        console.log(`[learning] ${input.messageId} already learned, skipping`);
        return { correction: known, changes: [], persisted: true, duplicate: true };
      }

      const correction: Correction = {
        ...input,
        correctCategory: input.correctCategory.toUpperCase(),
        bodyPreview: input.bodyPreview.slice(0, BODY_PREVIEW_LENGTH),
        timestamp: now(),
      };
      corrections.push(correction);
      if (correction.messageId) byMessageId.set(correction.messageId, correction);

      let persisted = true;
      try {
        await storage.corrections.append(toCorrectionLine(correction));
      } catch (err) {
        persisted = false;
        console.error('[learning] Failed to append correction:', err instanceof Error ? err.message : err);
      }

      const changes: RuleChange[] = [];
      const record = (change: RuleChange | null) => {
        if (change) changes.push(change);
      };

      const address = normalizeSender(correction.sender);
      if (address) {
        record(apply('sender', address, correction.correctCategory));
      }

      const domain = domainKey(correction.sender);
      if (domain) {
        record(apply('domain', domain, dominantCategory(corrections, c => domainKey(c.sender) === domain)));
      }

      for (const word of subjectWords(correction.subject)) {
        record(apply('keyword', word, dominantCategory(corrections, c => c.subject.toLowerCase().includes(word))));
      }

      try {
        await storage.rules.write(toRulesDocument(toTable(maps)));
      } catch (err) {
        persisted = false;
        console.error('[learning] Failed to save rules:', err instanceof Error ? err.message : err);
      }

      for (const change of changes) {
        console.log(
          change.category
            ? `[learning] + ${change.kind} rule: ${change.pattern} → ${change.category}`
            : `[learning] - ${change.kind} rule: ${change.pattern}`
        );
      }
      console.log(`[learning] Learned: '${correction.subject.slice(0, 30)}' → ${correction.correctCategory}`);

      return { correction, changes, persisted, duplicate: false };
    },

    fewShotExamples(max = DEFAULT_FEW_SHOT) {
      const newestFirst = corrections
        .map((c, i) => ({ c, i }))
        .sort((a, b) => b.c.timestamp.getTime() - a.c.timestamp.getTime() || b.i - a.i)
        .map(({ c }) => c);

      const perCategory = new Map<string, number>();
      const examples: Correction[] = [];
      for (const c of newestFirst) {
        if (examples.length >= max) break;
        const taken = perCategory.get(c.correctCategory) ?? 0;
        if (taken >= FEW_SHOT_PER_CATEGORY) continue;
        perCategory.set(c.correctCategory, taken + 1);
        examples.push(c);
      }
      return examples;
    },

    rules: () => toTable(maps),

    stats: () => ({
      totalCorrections: corrections.length,
      senderRules: maps.sender.size,
      domainRules: maps.domain.size,
      keywordRules: maps.keyword.size,
      categoriesLearned: new Set(corrections.map(c => c.correctCategory)).size,
    }),
  };
}

export async function loadRuleStore(storage: RuleStorage): Promise<RuleStore> {
  let rules = emptyRuleTable();
  try {
    const doc = await storage.rules.read();
    if (doc) rules = fromRulesDocument(doc);
  } catch (err) {
    console.error('[learning] Starting with no rules:', err instanceof Error ? err.message : err);
  }

  let corrections: Correction[] = [];
  try {
    corrections = (await storage.corrections.readAll()).map(fromCorrectionLine);
  } catch (err) {
    console.error('[learning] Could not read corrections:', err instanceof Error ? err.message : err);
  }

  console.log(
    `[learning] ${corrections.length} correction(s), ${Object.keys(rules.senders).length} sender / ` +
      `${Object.keys(rules.domains).length} domain / ${Object.keys(rules.keywords).length} keyword rule(s)`
  );
  return createRuleStore(storage, { rules, corrections });
}
