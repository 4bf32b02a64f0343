/**
 * Importance Scoring
 *
 * Points for the category, urgent wording and senders the user cares
 * about, so a decision can say how much a message deserves attention.
 * Spam never scores.
 */

import type { FollowUp, Importance, ImportanceLevel, ImportanceProfile } from './domain';
import { extractDomain, normalizeSender } from './domain';

const CATEGORY_POINTS: ReadonlyMap<string, number> = new Map([
  ['PRO', 30],
  ['BANQUE', 25],
  ['VENTE', 5],
]);

const SPAM_CATEGORY = 'SPAM';

export const URGENT_KEYWORDS = ['urgent', 'important', 'action required', 'asap', 'deadline'];

const URGENT_POINTS = 15;
const CONTACT_POINTS = 20;

/** Lower bounds, checked from the top */
export const IMPORTANCE_LEVELS: readonly { level: ImportanceLevel; min: number }[] = [
  { level: 'urgent', min: 85 },
  { level: 'high', min: 50 },
  { level: 'medium', min: 30 },
];

export type ScoredMessage = {
  sender: string;
  subject: string;
  body: string;
};

export function importanceLevel(score: number): ImportanceLevel {
  return IMPORTANCE_LEVELS.find(l => score >= l.min)?.level ?? 'low';
}

function followUpFor(category: string, urgent: boolean): FollowUp {
  switch (category) {
    case 'PRO':
      return urgent ? 'respond' : 'review';
    case 'BANQUE':
      return 'verify';
    case 'VENTE':
      return 'track';
    default:
      return 'none';
  }
}

export function scoreImportance(profile: ImportanceProfile, message: ScoredMessage, category: string): Importance {
  if (category === SPAM_CATEGORY) {
    return { score: 0, level: 'low', followUp: 'none', criteria: {} };
  }

  const criteria: Record<string, number> = {};

  const categoryPoints = CATEGORY_POINTS.get(category);
  if (categoryPoints !== undefined) criteria[`category_${category}`] = categoryPoints;

  const address = normalizeSender(message.sender);
  if (profile.contacts.some(contact => contact.toLowerCase() === address)) {
    criteria.important_contact = CONTACT_POINTS;
  }

  const domain = extractDomain(address);
  const domainEntry = profile.domains.find(d => d.domain.toLowerCase() === domain);
  if (domainEntry) criteria[`domain_${domainEntry.domain.toLowerCase()}`] = domainEntry.points;

  const text = `${message.subject} ${message.body}`.toLowerCase();
  const urgent = URGENT_KEYWORDS.some(keyword => text.includes(keyword));
  if (urgent) criteria.urgent_keywords = URGENT_POINTS;

  const score = Object.values(criteria).reduce((sum, points) => sum + points, 0);
  return { score, level: importanceLevel(score), followUp: followUpFor(category, urgent), criteria };
}
