/**
 * In-memory document handles, for tests and for running without a data dir.
 */

import type { AppendLog, DocumentFile } from './index';

export type MemoryDocument<T> = DocumentFile<T> & {
  current: () => T | null;
  writes: () => number;
};

export function memoryDocument<T>(initial: T | null = null): MemoryDocument<T> {
  let value = initial;
  let writes = 0;

  return {
    location: 'memory',
    async read() {
      return value;
    },
    async write(next) {
      // Round-trip so callers cannot mutate what was "persisted"
      value = JSON.parse(JSON.stringify(next));
      writes++;
    },
    current: () => value,
    writes: () => writes,
  };
}

export type MemoryLog<T> = AppendLog<T> & {
  entries: () => T[];
};

export function memoryLog<T>(initial: T[] = []): MemoryLog<T> {
  const entries = [...initial];

  return {
    location: 'memory',
    async readAll() {
      return [...entries];
    },
    async append(entry) {
      entries.push(entry);
    },
    entries: () => [...entries],
  };
}
