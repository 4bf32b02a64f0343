/**
 * Batch prompt construction and response parsing for the remote classifier.
 */

import { z } from 'zod';
import type { PromptContext, RemoteRequestItem, RemoteVerdict } from '../../core/ports';
import { UNKNOWN_CATEGORY, clampConfidence } from '../../core/domain';

export const SUBJECT_LIMIT = 100;
export const BODY_LIMIT = 300;
export const SENDER_LIMIT = 100;

const MAX_PROMPT_RULES = 3;

// ============================================
// Sanitization
// ============================================

// Straight, typographic and angle quotes plus backticks
const QUOTES = /["'`‘’‚‛“”„‟«»]/g;

export function sanitize(text: string, limit: number): string {
  return text
    .replace(QUOTES, '')
    .replace(/[\r\n\t]+/g, ' ')
    .trim()
    .slice(0, limit);
}

// ============================================
// Prompt
// ============================================

export type BatchPrompt = {
  system: string;
  user: string;
};

export function buildBatchPrompt(
  items: RemoteRequestItem[],
  validCategories: string[],
  descriptions: Readonly<Record<string, string>> = {},
  context?: PromptContext
): BatchPrompt {
  const system =
    `You are an email classifier. Classify each email into EXACTLY ONE of these categories: ` +
    `${validCategories.join(', ')}. Never invent a category. Output ONLY valid JSON.`;

  const parts: string[] = ['Categories:'];
  for (const name of validCategories) {
    parts.push(descriptions[name] ? `- ${name}: ${descriptions[name]}` : `- ${name}`);
  }
  parts.push('');

  if (context && context.examples.length > 0) {
    parts.push('Past user corrections to learn from:');
    context.examples.forEach((example, i) => {
      parts.push(
        `Example ${i + 1}: Subject=${sanitize(example.subject, 50)}, ` +
          `From=${sanitize(example.sender, SENDER_LIMIT)}, Correct Category=${example.correctCategory}`
      );
    });
    parts.push('');
  }

  const senderRules = context ? Object.entries(context.rules.senders).slice(0, MAX_PROMPT_RULES) : [];
  const domainRules = context ? Object.entries(context.rules.domains).slice(0, MAX_PROMPT_RULES) : [];
  if (senderRules.length > 0 || domainRules.length > 0) {
    parts.push('Rules learned from user behavior:');
    for (const [pattern, category] of [...senderRules, ...domainRules]) {
      parts.push(`- Emails from ${pattern} should be categorized as ${category}`);
    }
    parts.push('');
  }

  parts.push(`Classify these ${items.length} emails:`);
  items.forEach((item, index) => {
    parts.push(
      '',
      `Email ${index}:`,
      `From: ${sanitize(item.sender, SENDER_LIMIT)}`,
      `Subject: ${sanitize(item.subject, SUBJECT_LIMIT)}`,
      `Body: ${sanitize(item.body, BODY_LIMIT)}`
    );
  });

  parts.push(
    '',
    'Return ONLY a JSON array with one object per email:',
    '[{"email_index": 0, "category": "CATEGORY_NAME", "confidence": 0.85, "explanation": "brief reason"}]'
  );

  return { system, user: parts.join('\n') };
}

// ============================================
// Response
// ============================================

const FENCED = /```(?:json)?\s*([\s\S]*?)```/i;

/** The JSON value in a reply, tolerating code fences and surrounding prose */
export function extractJson(content: string): unknown {
  const fenced = content.match(FENCED);
  const text = (fenced ? fenced[1] : content).trim();

  try {
    return JSON.parse(text);
  } catch {
    const start = text.indexOf('[');
    const end = text.lastIndexOf(']');
    if (start === -1 || end <= start) return undefined;
    try {
      return JSON.parse(text.slice(start, end + 1));
    } catch {
      return undefined;
    }
  }
}

const verdictEntrySchema = z.object({
  email_index: z.number().int().optional(),
  email_id: z.union([z.string(), z.number()]).optional(),
  category: z.string(),
  confidence: z.union([z.number(), z.string()]).transform(Number).default(0),
  explanation: z.string().default(''),
});

/**
 * Verdicts keyed by request item id, or null when the reply is not a JSON
 * array at all. Entries that fail validation or point outside the batch are
 * dropped; a category outside `validCategories` becomes UNKNOWN.
 */
export function parseBatchResponse(
  content: string,
  items: RemoteRequestItem[],
  validCategories: string[]
): Map<string, RemoteVerdict> | null {
  const json = extractJson(content);
  if (!Array.isArray(json)) return null;

  const allowed = new Set(validCategories);
  const ids = new Set(items.map(item => item.id));
  const verdicts = new Map<string, RemoteVerdict>();

  for (const raw of json) {
    const parsed = verdictEntrySchema.safeParse(raw);
    if (!parsed.success) continue;
    const entry = parsed.data;

    let id: string | null = null;
    if (entry.email_index !== undefined && entry.email_index >= 0 && entry.email_index < items.length) {
      id = items[entry.email_index].id;
    } else if (entry.email_id !== undefined && ids.has(String(entry.email_id))) {
      id = String(entry.email_id);
    }
    if (id === null || verdicts.has(id)) continue;

    const returned = entry.category.trim();
    const category = returned.toUpperCase();
    if (!allowed.has(category) || category === UNKNOWN_CATEGORY) {
      console.warn(`[remote] Invalid category "${returned}" for ${id}`);
      verdicts.set(id, {
        category: UNKNOWN_CATEGORY,
        confidence: 0,
        explanation: `Invalid category "${returned}" returned by remote classifier`,
      });
      continue;
    }

    verdicts.set(id, {
      category,
      confidence: clampConfidence(entry.confidence),
      explanation: entry.explanation,
    });
  }

  return verdicts;
}
