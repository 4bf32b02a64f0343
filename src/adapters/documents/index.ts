/**
 * Persisted Documents
 *
 * Whole-file JSON documents and append-only JSON Lines logs, validated with
 * zod on the way in. Documents are rewritten through a temp file + rename so
 * a crash mid-write never leaves a truncated file behind.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { z } from 'zod';

export type DocumentFile<T> = {
  /** Where the document lives, for log messages */
  location: string;
  /** Null when the document does not exist yet */
  read: () => Promise<T | null>;
  write: (value: T) => Promise<void>;
};

export type AppendLog<T> = {
  location: string;
  readAll: () => Promise<T[]>;
  append: (entry: T) => Promise<void>;
};

export class DocumentError extends Error {
  constructor(location: string, detail: string) {
    super(`Invalid document ${location}: ${detail}`);
    this.name = 'DocumentError';
  }
}

function isMissingFile(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

async function readIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    if (isMissingFile(err)) return null;
    throw err;
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 3)
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

// ============================================
// JSON Document
// ============================================

export function jsonDocument<T>(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): DocumentFile<T> {
  return {
    location: filePath,

    async read() {
      const text = await readIfExists(filePath);
      if (text === null) return null;

      let raw: unknown;
      try {
        raw = JSON.parse(text);
      } catch (err) {
        throw new DocumentError(filePath, err instanceof Error ? err.message : String(err));
      }

      const parsed = schema.safeParse(raw);
      if (!parsed.success) {
        throw new DocumentError(filePath, describeIssues(parsed.error));
      }
      return parsed.data;
    },

    async write(value) {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      const tmp = `${filePath}.${process.pid}.tmp`;
      await fs.writeFile(tmp, JSON.stringify(value, null, 2) + '\n', 'utf-8');
      await fs.rename(tmp, filePath);
    },
  };
}

// ============================================
// JSON Lines Log
// ============================================

export function jsonLinesLog<T>(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): AppendLog<T> {
  return {
    location: filePath,

    async readAll() {
      const text = await readIfExists(filePath);
      if (text === null) return [];

      const entries: T[] = [];
      text.split('\n').forEach((line, i) => {
        if (!line.trim()) return;
        try {
          const parsed = schema.safeParse(JSON.parse(line));
          if (parsed.success) {
            entries.push(parsed.data);
          } else {
            console.warn(`[documents] ${filePath}:${i + 1} skipped: ${describeIssues(parsed.error)}`);
          }
        } catch (err) {
          console.warn(`[documents] ${filePath}:${i + 1} is not JSON: ${err instanceof Error ? err.message : String(err)}`);
        }
      });
      return entries;
    },

    async append(entry) {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.appendFile(filePath, JSON.stringify(entry) + '\n', 'utf-8');
    },
  };
}
