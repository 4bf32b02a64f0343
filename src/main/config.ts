/**
 * Configuration
 *
 * Environment variables (optionally from a .env file) validated into one
 * immutable config object. The core only ever sees `pipeline`.
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import type { ImportanceProfile, PipelineConfig } from '../core/domain';
import type { ImapConfig } from '../adapters/imap';
import { DEFAULT_ANTHROPIC_MODEL, DEFAULT_CHAT_API_URL, DEFAULT_CHAT_MODEL } from '../adapters/llm';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ============================================
// Environment Schema
// ============================================

const blankToUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

const text = (fallback: string) => z.preprocess(blankToUndefined, z.string().trim().default(fallback));
const optionalText = () => z.preprocess(blankToUndefined, z.string().trim().optional());
const required = () => z.preprocess(blankToUndefined, z.string({ required_error: 'is required' }));
const int = (fallback: number, min = 0) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(min).default(fallback));
const seconds = (fallback: number) => z.preprocess(blankToUndefined, z.coerce.number().positive().default(fallback));
const ratio = (fallback: number) => z.preprocess(blankToUndefined, z.coerce.number().min(0).max(1).default(fallback));

const FLAG_VALUES = ['true', '1', 'yes', 'on', 'false', '0', 'no', 'off'] as const;
const TRUE_VALUES: readonly string[] = ['true', '1', 'yes', 'on'];
const flag = (fallback: boolean) =>
  z.preprocess(
    v => (typeof v === 'string' ? blankToUndefined(v.trim().toLowerCase()) : v),
    z
      .enum(FLAG_VALUES)
      .optional()
      .transform(v => (v === undefined ? fallback : TRUE_VALUES.includes(v)))
  );

const envSchema = z.object({
  IMAP_HOST: text('127.0.0.1'),
  IMAP_PORT: int(1143, 1),
  IMAP_USERNAME: required(),
  IMAP_PASSWORD: required(),
  IMAP_TLS_REJECT_UNAUTHORIZED: flag(false),

  POLL_INTERVAL: seconds(60),
  UNSEEN_ONLY: flag(true),
  DRY_RUN: flag(false),
  MAX_EMAILS_PER_FOLDER: int(100, 1),
  TRASH_FOLDER_CAP: int(10, 1),
  BATCH_SIZE: int(15, 1),
  WORKER_COUNT: int(4, 1),
  ITEM_TIMEOUT_MS: int(60_000, 1),

  RATE_LIMIT_CALLS: int(50, 1),
  RATE_LIMIT_WINDOW_SECONDS: seconds(60),

  RULE_MIN_CONFIDENCE: ratio(0.75),
  KEYWORD_MIN_CONFIDENCE: ratio(0.1),
  REMOTE_MIN_CONFIDENCE: ratio(0.5),
  KEYWORD_WEIGHT: ratio(0.8),

  REMOTE_PROVIDER: z.preprocess(blankToUndefined, z.enum(['none', 'anthropic', 'chat-completions']).default('none')),
  REMOTE_MODEL: optionalText(),
  REMOTE_TIMEOUT_MS: int(30_000, 1),
  ANTHROPIC_API_KEY: optionalText(),
  CHAT_API_URL: z.preprocess(blankToUndefined, z.string().url().default(DEFAULT_CHAT_API_URL)),
  CHAT_API_KEY: optionalText(),

  SCAN_FOLDERS: optionalText(),
  IMPORTANT_CONTACTS: optionalText(),
  IMPORTANT_DOMAINS: optionalText(),
  FEEDBACK_ROOT: text('Feedback'),
  DATA_DIR: text('./data'),
  CATEGORIES_PATH: text('./config/categories.json'),
});

type Env = z.infer<typeof envSchema>;

// ============================================
// App Config
// ============================================

export type RemoteConfig =
  | { provider: 'none' }
  | { provider: 'anthropic'; apiKey: string; model: string; timeoutMs: number }
  | { provider: 'chat-completions'; url: string; apiKey: string; model: string; timeoutMs: number };

export type AppConfig = Readonly<{
  imap: ImapConfig;
  pollIntervalMs: number;
  workers: { count: number; itemTimeoutMs: number };
  rateLimit: { maxCalls: number; windowMs: number };
  keywordWeight: number;
  remote: RemoteConfig;
  dataDir: string;
  categoriesPath: string;
  pipeline: PipelineConfig;
}>;

export type ConfigResult = { success: true; config: AppConfig } | { success: false; error: string };

function remoteConfig(env: Env): RemoteConfig | string {
  switch (env.REMOTE_PROVIDER) {
    case 'none':
      return { provider: 'none' };
    case 'anthropic':
      if (!env.ANTHROPIC_API_KEY) return 'ANTHROPIC_API_KEY is required when REMOTE_PROVIDER=anthropic';
      return {
        provider: 'anthropic',
        apiKey: env.ANTHROPIC_API_KEY,
        model: env.REMOTE_MODEL ?? DEFAULT_ANTHROPIC_MODEL,
        timeoutMs: env.REMOTE_TIMEOUT_MS,
      };
    case 'chat-completions':
      if (!env.CHAT_API_KEY) return 'CHAT_API_KEY is required when REMOTE_PROVIDER=chat-completions';
      return {
        provider: 'chat-completions',
        url: env.CHAT_API_URL,
        apiKey: env.CHAT_API_KEY,
        model: env.REMOTE_MODEL ?? DEFAULT_CHAT_MODEL,
        timeoutMs: env.REMOTE_TIMEOUT_MS,
      };
  }
}

function splitList(value: string | undefined): string[] | null {
  if (!value) return null;
  const items = value
    .split(',')
    .map(s => s.trim())
    .filter(Boolean);
  return items.length > 0 ? items : null;
}

const DOMAIN_POINTS = /^([^\s:@]+\.[^\s:@]+):(\d+)$/;

/** `"corp.example:20, partner.example:15"` */
function domainPoints(value: string | undefined): ImportanceProfile['domains'] | string {
  const parsed: ImportanceProfile['domains'] = [];
  for (const item of splitList(value) ?? []) {
    const match = item.match(DOMAIN_POINTS);
    if (!match) return `IMPORTANT_DOMAINS entry "${item}" must look like domain:points`;
    parsed.push({ domain: match[1].toLowerCase(), points: Number(match[2]) });
  }
  return parsed;
}

export function parseConfig(source: Record<string, string | undefined>): ConfigResult {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const error = parsed.error.issues.map(issue => `${issue.path.join('.')} ${issue.message}`).join('; ');
    return { success: false, error };
  }
  const env = parsed.data;

  const remote = remoteConfig(env);
  if (typeof remote === 'string') return { success: false, error: remote };

  const domains = domainPoints(env.IMPORTANT_DOMAINS);
  if (typeof domains === 'string') return { success: false, error: domains };

  const pipeline: PipelineConfig = Object.freeze({
    dryRun: env.DRY_RUN,
    unseenOnly: env.UNSEEN_ONLY,
    folderCap: env.MAX_EMAILS_PER_FOLDER,
    trashFolderCap: env.TRASH_FOLDER_CAP,
    batchSize: env.BATCH_SIZE,
    thresholds: Object.freeze({
      rule: env.RULE_MIN_CONFIDENCE,
      keyword: env.KEYWORD_MIN_CONFIDENCE,
      remote: env.REMOTE_MIN_CONFIDENCE,
    }),
    scanFolders: splitList(env.SCAN_FOLDERS),
    feedbackRoot: env.FEEDBACK_ROOT,
    importance: Object.freeze({
      contacts: (splitList(env.IMPORTANT_CONTACTS) ?? []).map(c => c.toLowerCase()),
      domains,
    }),
  });

  return {
    success: true,
    config: Object.freeze({
      imap: {
        host: env.IMAP_HOST,
        port: env.IMAP_PORT,
        username: env.IMAP_USERNAME,
        password: env.IMAP_PASSWORD,
        rejectUnauthorized: env.IMAP_TLS_REJECT_UNAUTHORIZED,
      },
      pollIntervalMs: env.POLL_INTERVAL * 1000,
      workers: { count: env.WORKER_COUNT, itemTimeoutMs: env.ITEM_TIMEOUT_MS },
      rateLimit: { maxCalls: env.RATE_LIMIT_CALLS, windowMs: env.RATE_LIMIT_WINDOW_SECONDS * 1000 },
      keywordWeight: env.KEYWORD_WEIGHT,
      remote,
      dataDir: env.DATA_DIR,
      categoriesPath: env.CATEGORIES_PATH,
      pipeline,
    }),
  };
}

/** Reads .env (if present) into process.env, then validates it */
export function loadConfig(): AppConfig {
  dotenv.config();
  const result = parseConfig(process.env);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${result.error}`);
  }
  return result.config;
}
