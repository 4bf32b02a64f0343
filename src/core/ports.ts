/**
 * Ports
 *
 * Simple function signatures that adapters must implement.
 * This is dependency inversion without the ceremony.
 */

import type {
  CachedPattern,
  CategoryTable,
  CheckpointSnapshot,
  ClassificationResult,
  Correction,
  CorrectionInput,
  DecodedMessage,
  FlagDelta,
  FolderDescriptor,
  FollowUp,
  Importance,
  ImportanceLevel,
  KeywordScore,
  LearnOutcome,
  LearningStats,
  MessageIdentity,
  PipelineConfig,
  RoutingOutcome,
  RulePrediction,
  RuleTable,
  SearchScope,
} from './domain';

// ============================================
// Mail Store (IMAP)
// ============================================

/**
 * Primitive mailbox commands. Every command but `list`, `create` and `select`
 * applies to the currently selected folder; calling one before `select`
 * rejects with ProtocolOrderError.
 */
export type MailStore = {
  list: () => Promise<FolderDescriptor[]>;
  select: (folder: string) => Promise<{ path: string; exists: number }>;
  search: (scope: SearchScope) => Promise<string[]>;
  fetchSource: (uid: string) => Promise<Buffer | null>;
  fetchInternalDates: (uids: string[]) => Promise<Map<string, Date>>;
  copy: (uid: string, destination: string) => Promise<void>;
  store: (uid: string, delta: FlagDelta) => Promise<void>;
  expunge: () => Promise<void>;
  create: (folder: string) => Promise<void>;
  close: () => Promise<void>;
};

export type MessageDecoder = {
  decode: (source: Buffer) => Promise<DecodedMessage>;
};

// ============================================
// Classification Tiers
// ============================================

export type ClassificationCache = {
  /** Returns the pattern after recording the hit, or null on a miss */
  hit: (fingerprint: string, now?: Date) => CachedPattern | null;
  get: (fingerprint: string) => CachedPattern | null;
  remember: (entry: Omit<CachedPattern, 'hitCount' | 'lastUsed'>, now?: Date) => CachedPattern;
  forget: (fingerprint: string) => boolean;
  entries: () => CachedPattern[];
  size: () => number;
  save: () => Promise<boolean>;
};

export type RuleStore = {
  predict: (sender: string, subject: string) => RulePrediction | null;
  learnFromCorrection: (input: CorrectionInput) => Promise<LearnOutcome>;
  fewShotExamples: (max?: number) => Correction[];
  rules: () => RuleTable;
  stats: () => LearningStats;
};

export type KeywordScorer = {
  score: (subject: string, body: string) => KeywordScore | null;
};

export type RateLimiter = {
  /** Resolves once a call may be made, and records it */
  acquire: () => Promise<void>;
  /** Timestamps (ms) of calls still inside the window */
  recent: () => number[];
};

// ============================================
// Remote Classification
// ============================================

export type RemoteRequestItem = {
  id: string;
  sender: string;
  subject: string;
  body: string;
};

export type RemoteVerdict = {
  category: string;
  confidence: number;
  explanation: string;
};

export type RemoteErrorKind = 'transport' | 'timeout' | 'http-status' | 'malformed-response';

export type RemoteOutcome =
  | { ok: true; verdicts: Map<string, RemoteVerdict> }
  | { ok: false; error: RemoteErrorKind; detail: string };

/** Extra prompt material built from what the learner already knows */
export type PromptContext = {
  examples: Correction[];
  rules: RuleTable;
};

export type RemoteClassifier = {
  classifyBatch: (
    items: RemoteRequestItem[],
    validCategories: string[],
    context?: PromptContext
  ) => Promise<RemoteOutcome>;
};

// ============================================
// Scan State
// ============================================

export type Checkpoint = {
  isProcessed: (identity: MessageIdentity) => boolean;
  markProcessed: (identity: MessageIdentity) => void;
  processedCount: () => number;
  initialScanDone: () => boolean;
  completeInitialScan: () => void;
  lastCheck: (folder: string) => Date | null;
  recordCheck: (folder: string, at?: Date) => void;
  snapshot: () => CheckpointSnapshot;
  reset: () => void;
  save: () => Promise<boolean>;
};

export type FolderRouter = {
  resolveDestination: (category: string) => string | null;
  ensureFolderExists: (path: string) => Promise<boolean>;
  move: (identity: MessageIdentity, destination: string) => Promise<boolean>;
  refresh: () => Promise<void>;
};

// ============================================
// Decision Log
// ============================================

export type DecisionEntry = {
  result: ClassificationResult;
  destination: string | null;
  outcome: RoutingOutcome;
  importance: Importance;
};

export type DecisionRecord = {
  id: number;
  folder: string;
  uid: string;
  category: string;
  confidence: number;
  method: string;
  explanation: string;
  destination: string | null;
  outcome: RoutingOutcome;
  importance: number;
  importanceLevel: ImportanceLevel;
  followUp: FollowUp;
  decidedAt: Date;
};

export type DecisionStats = {
  total: number;
  byMethod: Record<string, number>;
  byCategory: Record<string, number>;
  byImportance: Record<string, number>;
  averageConfidence: number;
};

export type DecisionLog = {
  record: (entry: DecisionEntry) => Promise<void>;
  findByIdentity: (identity: MessageIdentity) => Promise<DecisionRecord[]>;
  findRecent: (limit?: number) => Promise<DecisionRecord[]>;
  stats: () => Promise<DecisionStats>;
};

// ============================================
// Worker Pool
// ============================================

export type PoolOutcome<R> =
  | { status: 'fulfilled'; value: R }
  | { status: 'rejected'; reason: string }
  | { status: 'skipped' };

export type WorkerPool = {
  size: number;
  run: <T, R>(
    items: T[],
    worker: (item: T, index: number) => Promise<R>,
    signal?: AbortSignal
  ) => Promise<PoolOutcome<R>[]>;
};

// ============================================
// All Dependencies
// ============================================

export type Deps = {
  mailStore: MailStore;
  decoder: MessageDecoder;
  cache: ClassificationCache;
  rules: RuleStore;
  keywords: KeywordScorer;
  /** Null when no remote provider is configured */
  remote: RemoteClassifier | null;
  checkpoint: Checkpoint;
  router: FolderRouter;
  decisionLog: DecisionLog;
  workers: WorkerPool;
  categories: CategoryTable;
  config: PipelineConfig;
};
