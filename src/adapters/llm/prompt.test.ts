import { describe, it, expect } from 'vitest';
import { sanitize, buildBatchPrompt, extractJson, parseBatchResponse } from './prompt';
import type { RemoteRequestItem } from '../../core/ports';

const item = (id: string, subject = 'Hello', sender = 'a@corp.example', body = ''): RemoteRequestItem => ({
  id,
  sender,
  subject,
  body,
});

describe('sanitize', () => {
  it('strips quotes and folds line breaks', () => {
    expect(sanitize('  "Hello"\n\tWorld  ', 100)).toBe('Hello World');
    expect(sanitize('It’s «fine»', 100)).toBe('Its fine');
  });

  it('truncates to the limit', () => {
    expect(sanitize('abcdef', 3)).toBe('abc');
  });
});

describe('buildBatchPrompt', () => {
  it('lists categories and numbers the batch from zero', () => {
    const prompt = buildBatchPrompt(
      [item('INBOX:1', 'Q3 "plan"', 'Boss <boss@corp.example>', 'Line one\nLine two')],
      ['PRO', 'SPAM'],
      { PRO: 'Work mail' }
    );

    expect(prompt.system).toBe(
      'You are an email classifier. Classify each email into EXACTLY ONE of these categories: PRO, SPAM. ' +
        'Never invent a category. Output ONLY valid JSON.'
    );
    expect(prompt.user).toBe(
      [
        'Categories:',
        '- PRO: Work mail',
        '- SPAM',
        '',
        'Classify these 1 emails:',
        '',
        'Email 0:',
        'From: Boss <boss@corp.example>',
        'Subject: Q3 plan',
        'Body: Line one Line two',
        '',
        'Return ONLY a JSON array with one object per email:',
        '[{"email_index": 0, "category": "CATEGORY_NAME", "confidence": 0.85, "explanation": "brief reason"}]',
      ].join('\n')
    );
  });

  it('adds past corrections and at most three rules of each kind', () => {
    const prompt = buildBatchPrompt([item('INBOX:1')], ['PRO', 'BANQUE', 'NEWSLETTER'], {}, {
      examples: [
        {
          messageId: 'Feedback/NEWSLETTER:1',
          sender: 'news@list.example',
          subject: 'Weekly "digest" of news from the team',
          bodyPreview: '',
          wrongCategory: null,
          correctCategory: 'NEWSLETTER',
          timestamp: new Date(0),
        },
      ],
      rules: {
        senders: { 'a@x.example': 'PRO', 'b@x.example': 'PRO', 'c@x.example': 'PRO', 'd@x.example': 'PRO' },
        domains: { '@bank.example': 'BANQUE' },
        keywords: { digest: 'NEWSLETTER' },
      },
    });

    expect(prompt.user).toContain(
      [
        'Past user corrections to learn from:',
        'Example 1: Subject=Weekly digest of news from the team, From=news@list.example, Correct Category=NEWSLETTER',
        '',
        'Rules learned from user behavior:',
        '- Emails from a@x.example should be categorized as PRO',
        '- Emails from b@x.example should be categorized as PRO',
        '- Emails from c@x.example should be categorized as PRO',
        '- Emails from @bank.example should be categorized as BANQUE',
        '',
        'Classify these 1 emails:',
      ].join('\n')
    );
    expect(prompt.user).not.toContain('d@x.example');
  });
});

describe('extractJson', () => {
  it('reads fenced, bare and prose-wrapped replies', () => {
    expect(extractJson('```json\n[{"a": 1}]\n```')).toEqual([{ a: 1 }]);
    expect(extractJson('{"x": 1}')).toEqual({ x: 1 });
    expect(extractJson('Here you go: [1, 2] hope it helps')).toEqual([1, 2]);
  });

  it('gives up on text without JSON', () => {
    expect(extractJson('no json here')).toBeUndefined();
    expect(extractJson('[not json]')).toBeUndefined();
  });
});

describe('parseBatchResponse', () => {
  const items = [item('INBOX:1'), item('INBOX:2'), item('INBOX:3')];
  const valid = ['PRO', 'SPAM'];

  it('joins verdicts by index or id and keeps the first one per message', () => {
    const reply = JSON.stringify([
      { email_index: 0, category: ' pro ', confidence: '0.9', explanation: 'work' },
      { email_id: 'INBOX:2', category: 'MARKETING', confidence: 0.8 },
      { email_index: 0, category: 'SPAM', confidence: 1 },
      { email_index: 7, category: 'PRO' },
      { email_index: 1 },
      { email_index: 2, category: 'spam', confidence: 1.7 },
    ]);

    expect(parseBatchResponse(reply, items, valid)).toEqual(
      new Map([
        ['INBOX:1', { category: 'PRO', confidence: 0.9, explanation: 'work' }],
        [
          'INBOX:2',
          { category: 'UNKNOWN', confidence: 0, explanation: 'Invalid category "MARKETING" returned by remote classifier' },
        ],
        ['INBOX:3', { category: 'SPAM', confidence: 1, explanation: '' }],
      ])
    );
  });

  it('returns null when the reply is not an array', () => {
    expect(parseBatchResponse('{"category": "PRO"}', items, valid)).toBeNull();
    expect(parseBatchResponse('sorry, I cannot help', items, valid)).toBeNull();
  });

  it('turns an invented category into UNKNOWN with zero confidence', () => {
    const verdicts = parseBatchResponse(
      '[{"email_index": 0, "category": "MARKETING", "confidence": 0.95}]',
      [item('INBOX:3', 'Hello', 'unknown@example.com')],
      ['SPAM', 'BANQUE', 'PRO', 'NEWSLETTER']
    );

    expect(verdicts?.get('INBOX:3')).toEqual({
      category: 'UNKNOWN',
      confidence: 0,
      explanation: 'Invalid category "MARKETING" returned by remote classifier',
    });
  });
});
