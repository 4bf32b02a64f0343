import { describe, it, expect } from 'vitest';
import { parseConfig, type AppConfig } from './config';

const base = { IMAP_USERNAME: 'me@example.com', IMAP_PASSWORD: 'test-secret' };

function ok(source: Record<string, string | undefined>): AppConfig {
  const result = parseConfig(source);
  if (!result.success) throw new Error(result.error);
  return result.config;
}

describe('parseConfig', () => {
  it('fills every default from two credentials', () => {
    expect(ok(base)).toEqual({
      imap: {
        host: '127.0.0.1',
        port: 1143,
        username: 'me@example.com',
        password: 'test-secret',
        rejectUnauthorized: false,
      },
      pollIntervalMs: 60_000,
      workers: { count: 4, itemTimeoutMs: 60_000 },
      rateLimit: { maxCalls: 50, windowMs: 60_000 },
      keywordWeight: 0.8,
      remote: { provider: 'none' },
      dataDir: './data',
      categoriesPath: './config/categories.json',
      pipeline: {
        dryRun: false,
        unseenOnly: true,
        folderCap: 100,
        trashFolderCap: 10,
        batchSize: 15,
        thresholds: { rule: 0.75, keyword: 0.1, remote: 0.5 },
        scanFolders: null,
        feedbackRoot: 'Feedback',
        importance: { contacts: [], domains: [] },
      },
    });
  });

  it('requires the IMAP credentials', () => {
    expect(parseConfig({ IMAP_USERNAME: 'me@example.com' })).toEqual({
      success: false,
      error: 'IMAP_PASSWORD is required',
    });
  });

  it('treats blank values as unset', () => {
    expect(ok({ ...base, IMAP_HOST: '  ', BATCH_SIZE: '' }).imap.host).toBe('127.0.0.1');
  });

  it('reads flags, numbers and folder lists', () => {
    const config = ok({
      ...base,
      DRY_RUN: 'YES',
      UNSEEN_ONLY: 'off',
      POLL_INTERVAL: '2.5',
      MAX_EMAILS_PER_FOLDER: '250',
      SCAN_FOLDERS: ' INBOX, Archive ,, ',
    });

    expect(config.pipeline.dryRun).toBe(true);
    expect(config.pipeline.unseenOnly).toBe(false);
    expect(config.pollIntervalMs).toBe(2500);
    expect(config.pipeline.folderCap).toBe(250);
    expect(config.pipeline.scanFolders).toEqual(['INBOX', 'Archive']);
  });

  it('rejects values out of range', () => {
    const flag = parseConfig({ ...base, DRY_RUN: 'maybe' });
    const ratio = parseConfig({ ...base, RULE_MIN_CONFIDENCE: '1.5' });

    expect(flag.success).toBe(false);
    if (!flag.success) expect(flag.error.startsWith('DRY_RUN ')).toBe(true);
    expect(ratio.success).toBe(false);
    if (!ratio.success) expect(ratio.error.startsWith('RULE_MIN_CONFIDENCE ')).toBe(true);
  });

  it('needs a key for the chosen remote provider', () => {
    expect(parseConfig({ ...base, REMOTE_PROVIDER: 'anthropic' })).toEqual({
      success: false,
      error: 'ANTHROPIC_API_KEY is required when REMOTE_PROVIDER=anthropic',
    });

    expect(ok({ ...base, REMOTE_PROVIDER: 'chat-completions', CHAT_API_KEY: 'test-secret' }).remote).toEqual({
      provider: 'chat-completions',
      url: 'https://api.perplexity.ai/chat/completions',
      apiKey: 'test-secret',
      model: 'sonar-pro',
      timeoutMs: 30_000,
    });
  });

  it('reads the contacts and domains that raise importance', () => {
    const config = ok({
      ...base,
      IMPORTANT_CONTACTS: 'Boss@Corp.example, partner@firm.example',
      IMPORTANT_DOMAINS: 'Corp.example:20, firm.example:15',
    });

    expect(config.pipeline.importance).toEqual({
      contacts: ['boss@corp.example', 'partner@firm.example'],
      domains: [
        { domain: 'corp.example', points: 20 },
        { domain: 'firm.example', points: 15 },
      ],
    });
    expect(parseConfig({ ...base, IMPORTANT_DOMAINS: 'corp.example=20' })).toEqual({
      success: false,
      error: 'IMPORTANT_DOMAINS entry "corp.example=20" must look like domain:points',
    });
  });

  it('freezes the pipeline settings', () => {
    const config = ok(base);

    expect(Object.isFrozen(config.pipeline)).toBe(true);
    expect(Object.isFrozen(config.pipeline.thresholds)).toBe(true);
  });
});
