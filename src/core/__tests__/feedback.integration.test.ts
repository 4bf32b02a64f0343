import { describe, it, expect } from 'vitest';
import { ingestFeedback, feedbackFolders, scanFolder, learnFromFolders, inferFolderCategory } from '../usecases';
import { computeFingerprint } from '../fingerprint';
import { createCategoryTable } from '../domain';
import { createTestSetup, testCategories, type SeedMessage } from './fakes';

const fromAlice: SeedMessage = {
  uid: 1,
  sender: 'alice@newcorp.example',
  subject: 'Budget review',
  body: 'Numbers attached.',
};

const fromBob: SeedMessage = {
  uid: 2,
  sender: 'bob@newcorp.example',
  subject: 'Planning session',
  body: 'Room 4 at ten.',
};

describe('ingestFeedback', () => {
  it('learns a domain rule when two corrections from the same domain agree', async () => {
    const { deps, mailbox } = createTestSetup({
      seed: { INBOX: [], Feedback: [], 'Feedback/PRO': [fromAlice, fromBob] },
    });

    const report = await ingestFeedback(deps)();

    expect(report).toEqual({ folders: ['Feedback/PRO'], learned: 2, failed: 0 });
    expect(deps.rules.rules()).toEqual({
      senders: { 'alice@newcorp.example': 'PRO', 'bob@newcorp.example': 'PRO' },
      domains: { '@newcorp.example': 'PRO' },
      keywords: {},
    });
    expect(mailbox.uids('Feedback/PRO')).toEqual([]);
    expect(mailbox.counts.expunge).toBe(1);
  });

  it('learns no domain rule when the corrections disagree', async () => {
    const { deps } = createTestSetup({
      seed: { INBOX: [], 'Feedback/PRO': [fromAlice], 'Feedback/BANQUE': [fromBob] },
    });

    const report = await ingestFeedback(deps)();

    expect(report.learned).toBe(2);
    expect(deps.rules.rules().domains).toEqual({});
    expect(deps.rules.predict('carol@newcorp.example', 'Hello')).toBeNull();
  });

  it('records each correction against the message it came from', async () => {
    const { deps, documents } = createTestSetup({ seed: { INBOX: [], 'Feedback/PRO': [fromAlice] } });

    await ingestFeedback(deps)();

    expect(documents.corrections.entries()).toEqual([
      expect.objectContaining({
        message_id: 'Feedback/PRO:1',
        sender: 'alice@newcorp.example',
        subject: 'Budget review',
        body_preview: 'Numbers attached.',
        wrong_category: null,
        correct_category: 'PRO',
      }),
    ]);
    expect(documents.rules.current()?.sender_rules).toEqual({ 'alice@newcorp.example': 'PRO' });
  });

  it('drops a cached classification the correction contradicts', async () => {
    const { deps } = createTestSetup({ seed: { INBOX: [], 'Feedback/PRO': [fromAlice] } });
    const fingerprint = computeFingerprint({ sender: 'alice@newcorp.example', subject: 'Budget review' });
    deps.cache.remember({ fingerprint, category: 'BANQUE', confidence: 0.9, sourceDomain: 'newcorp.example' });

    await ingestFeedback(deps)();

    expect(deps.cache.get(fingerprint)).toBeNull();
  });

  it('does not promote a domain rule when a failed expunge replays the same message', async () => {
    const { deps, mailbox } = createTestSetup({
      seed: { INBOX: [], 'Feedback/PRO': [{ ...fromAlice, sender: 'alice@solo.example' }] },
    });
    let expunges = 0;
    mailbox.failures.expunge = () => expunges++ === 0;

    const first = await ingestFeedback(deps)();
    expect(mailbox.uids('Feedback/PRO')).toEqual(['1']);
    const second = await ingestFeedback(deps)();

    expect(first).toEqual({ folders: ['Feedback/PRO'], learned: 1, failed: 0 });
    expect(second).toEqual({ folders: ['Feedback/PRO'], learned: 0, failed: 0 });
    expect(deps.rules.rules().domains).toEqual({});
    expect(deps.rules.stats().totalCorrections).toBe(1);
    expect(mailbox.uids('Feedback/PRO')).toEqual([]);
  });

  it('keeps a learned message whose delete flag failed and removes it on the next pass', async () => {
    const { deps, mailbox, documents } = createTestSetup({ seed: { INBOX: [], 'Feedback/PRO': [fromAlice] } });
    mailbox.failures.store = () => true;

    const first = await ingestFeedback(deps)();
    expect(mailbox.counts.expunge).toBe(0);
    mailbox.failures.store = undefined;
    await ingestFeedback(deps)();

    expect(first.learned).toBe(1);
    expect(documents.corrections.entries()).toHaveLength(1);
    expect(mailbox.uids('Feedback/PRO')).toEqual([]);
  });

  it('counts a message it cannot fetch as failed and leaves it for later', async () => {
    const { deps, mailbox } = createTestSetup({ seed: { INBOX: [], 'Feedback/PRO': [fromAlice, fromBob] } });
    mailbox.failures.fetchSource = uid => uid === '1';

    const report = await ingestFeedback(deps)();

    expect(report).toEqual({ folders: ['Feedback/PRO'], learned: 1, failed: 1 });
    expect(mailbox.uids('Feedback/PRO')).toEqual(['1']);
  });

  it('applies what it learned on the next scan', async () => {
    const { deps, mailbox, decisions } = createTestSetup({
      seed: {
        INBOX: [{ uid: 9, sender: 'Carol <carol@newcorp.example>', subject: 'Quarterly plan', body: 'Draft inside.' }],
        'Feedback/PRO': [fromAlice, fromBob],
      },
    });

    await ingestFeedback(deps)();
    const report = await scanFolder(deps)('INBOX');

    expect(report.moved).toBe(1);
    expect(decisions.entries[0].result.method).toBe('rule');
    expect(decisions.entries[0].result.explanation).toBe('Learned domain rule: @newcorp.example');
    expect(mailbox.subjects('Travail')).toEqual(['Quarterly plan']);
  });
});

describe('feedbackFolders', () => {
  it('maps direct children of the feedback root to configured categories', () => {
    const { deps } = createTestSetup();
    const folder = (path: string) => ({ path, delimiter: '/', flags: [] });

    const found = feedbackFolders(deps, [
      folder('INBOX'),
      folder('Feedback'),
      folder('Feedback/pro'),
      folder('Feedback/MISC'),
      folder('Feedback/PRO/Old'),
      folder('FeedbackExtra/PRO'),
    ]);

    expect(found).toEqual([{ path: 'Feedback/pro', category: 'PRO' }]);
  });
});

describe('learnFromFolders', () => {
  const sortedByHand = {
    INBOX: [{ uid: 1, sender: 'someone@else.example' }],
    Travail: [
      { uid: 1, sender: 'alice@corp.example', subject: 'Sprint' },
      { uid: 2, sender: 'Bob <bob@corp.example>', subject: 'Retro' },
    ],
    'Administratif/Banque': [{ uid: 5, sender: 'Ma Banque <billing@mabanque.example>', subject: 'Relevé' }],
    'Clients/Work': [{ uid: 3, sender: 'carol@client.example', subject: 'Brief' }],
    Projects: [{ uid: 1, sender: 'dave@corp.example' }],
    Spam: [{ uid: 1, sender: 'offers@spam.example' }],
    Feedback: [],
    'Feedback/PRO': [{ uid: 1, sender: 'eve@corp.example' }],
  };

  it('learns from folders that map to a category and leaves the messages in place', async () => {
    const { deps, mailbox } = createTestSetup({ seed: sortedByHand });

    const report = await learnFromFolders(deps)();

    expect(report).toEqual({
      folders: [
        { path: 'Travail', category: 'PRO', learned: 2 },
        { path: 'Administratif/Banque', category: 'BANQUE', learned: 1 },
        { path: 'Clients/Work', category: 'PRO', learned: 1 },
      ],
      learned: 4,
      failed: 0,
    });
    expect(deps.rules.rules()).toEqual({
      senders: {
        'alice@corp.example': 'PRO',
        'bob@corp.example': 'PRO',
        'billing@mabanque.example': 'BANQUE',
        'carol@client.example': 'PRO',
      },
      domains: { '@corp.example': 'PRO' },
      keywords: {},
    });
    expect(mailbox.uids('Travail')).toEqual(['1', '2']);
    expect(mailbox.uids('Feedback/PRO')).toEqual(['1']);
    expect(mailbox.counts.expunge).toBe(0);
  });

  it('counts each message once across runs', async () => {
    const { deps } = createTestSetup({ seed: sortedByHand });

    await learnFromFolders(deps)();
    const again = await learnFromFolders(deps)();

    expect(again.learned).toBe(0);
    expect(deps.rules.stats().totalCorrections).toBe(4);
  });

  it('samples only the newest messages of a folder', async () => {
    const { deps, documents } = createTestSetup({
      seed: {
        Travail: [1, 2, 3, 4, 5].map(uid => ({ uid, sender: `dev${uid}@corp.example`, subject: `Ticket ${uid}` })),
      },
    });

    const report = await learnFromFolders(deps)(2);

    expect(report.learned).toBe(2);
    expect(documents.corrections.entries().map(c => c.message_id)).toEqual(['Travail:4', 'Travail:5']);
  });

  it('counts a message it cannot read as failed and goes on', async () => {
    const { deps, mailbox } = createTestSetup({ seed: { Travail: sortedByHand.Travail } });
    mailbox.failures.fetchSource = uid => uid === '1';

    const report = await learnFromFolders(deps)();

    expect(report).toEqual({ folders: [{ path: 'Travail', category: 'PRO', learned: 1 }], learned: 1, failed: 1 });
  });
});

describe('inferFolderCategory', () => {
  const categories = createCategoryTable(testCategories);
  const folder = (path: string, delimiter = '/') => ({ path, delimiter, flags: [] });

  it('prefers the category whose destination is the folder', () => {
    expect(inferFolderCategory(categories, folder('Administratif.Banque', '.'))).toBe('BANQUE');
    expect(inferFolderCategory(categories, folder('Newsletters'))).toBe('NEWSLETTER');
  });

  it('falls back to words in the folder name, for configured categories only', () => {
    expect(inferFolderCategory(categories, folder('Archive/Bank statements'))).toBe('BANQUE');
    expect(inferFolderCategory(categories, folder('Shopping'))).toBeNull();
    expect(inferFolderCategory(categories, folder('Projects'))).toBeNull();
  });
});
