/**
 * Core Domain
 *
 * Pure business types and logic. Zero dependencies.
 * This is the heart of the application.
 */

// ============================================
// Constants
// ============================================

/** Reserved category for messages nothing could place. Never has a destination. */
export const UNKNOWN_CATEGORY = 'UNKNOWN';

/** Default cap on messages handled per folder pass */
export const DEFAULT_FOLDER_CAP = 100;

/** Cap for spam/trash-like folders, which tend to be large and low value */
export const DEFAULT_TRASH_FOLDER_CAP = 10;

export const DEFAULT_BATCH_SIZE = 15;
export const MAX_BATCH_SIZE = 50;

export const MIN_WORKERS = 1;
export const MAX_WORKERS = 10;

export const BODY_PREVIEW_LENGTH = 200;

export const DELETED_FLAG = '\\Deleted';

// ============================================
// Errors
// ============================================

/**
 * Raised by a mail store when a command needs a selected folder and none is.
 * Folder-local: the scan skips the folder instead of retrying.
 */
export class ProtocolOrderError extends Error {
  constructor(command: string) {
    super(`${command} issued before any folder was selected`);
    this.name = 'ProtocolOrderError';
  }
}

export class TimeoutError extends Error {
  constructor(label: string, ms: number) {
    super(`${label} timed out after ${ms}ms`);
    this.name = 'TimeoutError';
  }
}

// ============================================
// Categories
// ============================================

export type Category = {
  name: string;
  /** Destination folder path, `/`-separated. Null means "leave in place". */
  folder: string | null;
  keywords: string[];
  confidenceThreshold: number;
  priority: number;
  description: string;
};

export type CategoryTable = ReadonlyMap<string, Category>;

export function createCategoryTable(categories: Category[]): CategoryTable {
  const table = new Map<string, Category>();
  for (const category of categories) {
    const name = category.name.toUpperCase();
    table.set(name, {
      ...category,
      name,
      folder: name === UNKNOWN_CATEGORY ? null : category.folder,
    });
  }
  return table;
}

/** Names a classifier may answer with. UNKNOWN is never offered. */
export function categoryNames(table: CategoryTable): string[] {
  return [...table.keys()].filter(name => name !== UNKNOWN_CATEGORY);
}

export function isKnownCategory(table: CategoryTable, name: string): boolean {
  return name !== UNKNOWN_CATEGORY && table.has(name);
}

// ============================================
// Messages
// ============================================

/**
 * Folder + protocol UID. The UID is always a string so that every producer
 * and consumer of batch results joins on the same key.
 */
export type MessageIdentity = {
  folder: string;
  uid: string;
};

export function toIdentity(folder: string, uid: string | number): MessageIdentity {
  return { folder, uid: String(uid) };
}

export function identityKey(identity: MessageIdentity): string {
  return `${identity.folder}:${identity.uid}`;
}

export type DecodedMessage = {
  sender: string;
  subject: string;
  body: string;
  date: Date | null;
};

export type MailMessage = DecodedMessage & {
  identity: MessageIdentity;
};

// ============================================
// Classification
// ============================================

export type ClassificationMethod =
  | 'cached'
  | 'rule'
  | 'keyword'
  | 'remote-single'
  | 'remote-batch'
  | 'fallback';

export type ClassificationResult = Readonly<{
  identity: Readonly<MessageIdentity>;
  category: string;
  confidence: number;
  method: ClassificationMethod;
  explanation: string;
  timestamp: Date;
}>;

export function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

export function createResult(
  fields: Omit<ClassificationResult, 'timestamp'>,
  now: Date = new Date()
): ClassificationResult {
  return Object.freeze({
    identity: Object.freeze({ ...fields.identity }),
    category: fields.category,
    confidence: clampConfidence(fields.confidence),
    method: fields.method,
    explanation: fields.explanation,
    timestamp: now,
  });
}

export function fallbackResult(identity: MessageIdentity, explanation: string, now?: Date): ClassificationResult {
  return createResult({ identity, category: UNKNOWN_CATEGORY, confidence: 0, method: 'fallback', explanation }, now);
}

export type TierThresholds = {
  rule: number;
  keyword: number;
  remote: number;
};

export type KeywordScore = {
  category: string;
  confidence: number;
  matches: number;
  keywordCount: number;
};

// ============================================
// Cache
// ============================================

export type CachedPattern = {
  fingerprint: string;
  category: string;
  confidence: number;
  hitCount: number;
  lastUsed: Date;
  sourceDomain: string;
};

// ============================================
// Learned Rules
// ============================================

export type RuleKind = 'sender' | 'domain' | 'keyword';

export const RULE_CONFIDENCE: Record<RuleKind, number> = {
  sender: 0.95,
  domain: 0.85,
  keyword: 0.75,
};

/** Corroborating corrections needed before a domain/keyword rule applies */
export const PROMOTION_MIN_CORRECTIONS = 2;

/** Share of those corrections the dominant category must exceed */
export const PROMOTION_MIN_AGREEMENT = 0.7;

export type RuleTable = {
  senders: Record<string, string>;
  domains: Record<string, string>;
  keywords: Record<string, string>;
};

export type RulePrediction = {
  category: string;
  confidence: number;
  kind: RuleKind;
  pattern: string;
};

export type Correction = {
  messageId: string;
  sender: string;
  subject: string;
  bodyPreview: string;
  wrongCategory: string | null;
  correctCategory: string;
  timestamp: Date;
};

export type CorrectionInput = Omit<Correction, 'timestamp'>;

export type RuleChange = {
  kind: RuleKind;
  pattern: string;
  category: string | null;
};

export type LearnOutcome = {
  correction: Correction;
  changes: RuleChange[];
  persisted: boolean;
  /** The message id was already learned; nothing changed */
  duplicate: boolean;
};

export type LearningStats = {
  totalCorrections: number;
  senderRules: number;
  domainRules: number;
  keywordRules: number;
  categoriesLearned: number;
};

// ============================================
// Checkpoint
// ============================================

export type CheckpointSnapshot = {
  initialScanDone: boolean;
  lastCheck: Record<string, Date>;
  processed: string[];
  lastUpdate: Date | null;
};

// ============================================
// Mail Store
// ============================================

export type SearchScope = 'ALL' | 'UNSEEN';

export type FolderDescriptor = {
  path: string;
  delimiter: string;
  flags: string[];
  specialUse?: string;
};

export type FlagDelta = {
  add?: string[];
  remove?: string[];
};

// ============================================
// Scan Reports
// ============================================

export type RoutingOutcome = 'moved' | 'kept' | 'dry-run' | 'failed';

export type FolderScanReport = {
  folder: string;
  skipped: boolean;
  reason?: string;
  candidates: number;
  selected: number;
  classified: number;
  moved: number;
  kept: number;
  failed: number;
};

export type CycleReport = {
  startedAt: Date;
  finishedAt: Date;
  cancelled: boolean;
  folders: FolderScanReport[];
};

export type FeedbackReport = {
  folders: string[];
  learned: number;
  failed: number;
};

// ============================================
// Importance
// ============================================

export type ImportanceLevel = 'urgent' | 'high' | 'medium' | 'low';

export type FollowUp = 'respond' | 'verify' | 'track' | 'review' | 'none';

export type Importance = {
  score: number;
  level: ImportanceLevel;
  followUp: FollowUp;
  /** Points per criterion that contributed */
  criteria: Record<string, number>;
};

/** Senders the user wants surfaced */
export type ImportanceProfile = {
  contacts: string[];
  domains: { domain: string; points: number }[];
};

// ============================================
// Pipeline Configuration
// ============================================

export type PipelineConfig = {
  dryRun: boolean;
  unseenOnly: boolean;
  folderCap: number;
  trashFolderCap: number;
  batchSize: number;
  thresholds: TierThresholds;
  scanFolders: string[] | null;
  feedbackRoot: string;
  importance: ImportanceProfile;
};

// ============================================
// Pure Functions
// ============================================

export function extractDomain(email: string): string {
  return email.split('@')[1] || 'unknown';
}

/** `"Jane <Jane@Example.com>"` → `"jane@example.com"` */
export function normalizeSender(sender: string): string {
  const bracketed = sender.match(/<([^>]*)>/);
  const address = bracketed ? bracketed[1] : sender;
  return address.trim().toLowerCase();
}

const REPLY_PREFIX = /^\s*(re|fwd?|tr)\s*:\s*/i;

export function normalizeSubject(subject: string): string {
  let s = subject;
  while (REPLY_PREFIX.test(s)) {
    s = s.replace(REPLY_PREFIX, '');
  }
  return s
    .replace(/\d+/g, 'N')
    .replace(/\s+/g, ' ')
    .toLowerCase()
    .trim();
}

export function lastSegment(path: string, delimiter = '/'): string {
  const parts = path.split(delimiter);
  return parts[parts.length - 1] || path;
}

const TRASH_MARKERS = ['spam', 'junk', 'trash', 'corbeille', 'pourriel'];

/** Any path containing a trash marker, e.g. "Junk E-mail"; "Bin" only as a whole segment */
export function isTrashLikeFolder(path: string): boolean {
  const lower = path.toLowerCase();
  if (TRASH_MARKERS.some(marker => lower.includes(marker))) return true;
  return lastSegment(lower) === 'bin';
}

const SYSTEM_FOLDERS = new Set([
  'all mail',
  'tous les messages',
  'sent',
  'sent messages',
  'envoyés',
  'drafts',
  'brouillons',
]);

const SYSTEM_PREFIXES = ['[gmail]', '[imap]', '[sent]', '[trash]', '[draft]'];

export function isSystemFolder(path: string): boolean {
  const lower = path.toLowerCase();
  if (SYSTEM_FOLDERS.has(lower)) return true;
  return SYSTEM_PREFIXES.some(prefix => lower.startsWith(prefix));
}

export function isUnderRoot(path: string, root: string): boolean {
  return path === root || path.startsWith(`${root}/`);
}

export function chunk<T>(items: T[], size: number): T[][] {
  const step = Math.max(1, Math.floor(size));
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += step) {
    out.push(items.slice(i, i + step));
  }
  return out;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
