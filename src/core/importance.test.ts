import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { importanceLevel, scoreImportance } from './importance';
import type { ImportanceProfile } from './domain';

const nobody: ImportanceProfile = { contacts: [], domains: [] };

const profile: ImportanceProfile = {
  contacts: ['boss@corp.example'],
  domains: [{ domain: 'partner.example', points: 20 }],
};

const message = (sender: string, subject: string, body = '') => ({ sender, subject, body });

describe('scoreImportance', () => {
  it('scores work mail by category alone', () => {
    expect(scoreImportance(nobody, message('colleague@corp.example', 'Minutes'), 'PRO')).toEqual({
      score: 30,
      level: 'medium',
      followUp: 'review',
      criteria: { category_PRO: 30 },
    });
  });

  it('asks for a reply to urgent work mail from a key contact', () => {
    const importance = scoreImportance(profile, message('Boss <Boss@Corp.example>', 'Action required', 'Before noon'), 'PRO');

    expect(importance).toEqual({
      score: 65,
      level: 'high',
      followUp: 'respond',
      criteria: { category_PRO: 30, important_contact: 20, urgent_keywords: 15 },
    });
  });

  it('adds the points configured for the sender domain', () => {
    const importance = scoreImportance(profile, message('billing@partner.example', 'Invoice', 'ASAP please'), 'BANQUE');

    expect(importance.criteria).toEqual({ category_BANQUE: 25, 'domain_partner.example': 20, urgent_keywords: 15 });
    expect(importance.score).toBe(60);
    expect(importance.followUp).toBe('verify');
  });

  it('reaches urgent when every criterion applies', () => {
    const wide: ImportanceProfile = {
      contacts: ['ceo@corp.example'],
      domains: [{ domain: 'corp.example', points: 25 }],
    };

    const importance = scoreImportance(wide, message('ceo@corp.example', 'Urgent: board deck'), 'PRO');

    expect(importance.score).toBe(90);
    expect(importance.level).toBe('urgent');
  });

  it('never scores spam, whatever it says', () => {
    expect(scoreImportance(profile, message('boss@corp.example', 'URGENT deadline'), 'SPAM')).toEqual({
      score: 0,
      level: 'low',
      followUp: 'none',
      criteria: {},
    });
  });

  it('leaves unknown and unscored categories at zero without urgent words', () => {
    expect(scoreImportance(nobody, message('a@b.example', 'Hello'), 'UNKNOWN').score).toBe(0);
    expect(scoreImportance(nobody, message('a@b.example', 'Weekly digest'), 'NEWSLETTER').followUp).toBe('none');
  });
});

describe('importanceLevel', () => {
  it('maps score boundaries to levels', () => {
    expect([29, 30, 49, 50, 84, 85].map(importanceLevel)).toEqual(['low', 'medium', 'medium', 'high', 'high', 'urgent']);
  });

  it('never ranks a higher score below a lower one', () => {
    const rank = { low: 0, medium: 1, high: 2, urgent: 3 } as const;
    fc.assert(
      fc.property(fc.integer({ min: -100, max: 200 }), fc.integer({ min: 0, max: 100 }), (score, extra) => {
        expect(rank[importanceLevel(score + extra)]).toBeGreaterThanOrEqual(rank[importanceLevel(score)]);
      })
    );
  });
});
