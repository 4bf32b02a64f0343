/**
 * Category Configuration
 *
 * Reads and writes the category table file: a JSON object keyed by category
 * name, with snake_case fields.
 */

import { z } from 'zod';
import type { Category } from '../../core/domain';
import { jsonDocument } from '../documents';

const categoryEntrySchema = z.object({
  name: z.string().min(1).optional(),
  folder: z.string().min(1).nullable().default(null),
  keywords: z.array(z.string()).default([]),
  confidence_threshold: z.number().min(0).max(1).default(0.7),
  priority: z.number().int().default(0),
  description: z.string().default(''),
});

const categoryFileSchema = z.record(z.string().min(1), categoryEntrySchema);

export type CategoryFile = z.infer<typeof categoryFileSchema>;

export function toCategories(file: CategoryFile): Category[] {
  return Object.entries(file).map(([key, entry]) => ({
    name: (entry.name ?? key).toUpperCase(),
    folder: entry.folder,
    keywords: entry.keywords,
    confidenceThreshold: entry.confidence_threshold,
    priority: entry.priority,
    description: entry.description,
  }));
}

export function toCategoryFile(categories: Category[]): CategoryFile {
  const file: CategoryFile = {};
  for (const c of categories) {
    file[c.name] = {
      name: c.name,
      folder: c.folder,
      keywords: c.keywords,
      confidence_threshold: c.confidenceThreshold,
      priority: c.priority,
      description: c.description,
    };
  }
  return file;
}

export async function loadCategories(filePath: string): Promise<Category[]> {
  const file = await jsonDocument(filePath, categoryFileSchema).read();
  if (!file) {
    throw new Error(`Category file not found: ${filePath}`);
  }
  const categories = toCategories(file);
  console.log(`[categories] Loaded ${categories.length} categories from ${filePath}`);
  return categories;
}

export async function saveCategories(filePath: string, categories: Category[]): Promise<void> {
  await jsonDocument(filePath, categoryFileSchema).write(toCategoryFile(categories));
  console.log(`[categories] Wrote ${categories.length} categories to ${filePath}`);
}
