import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { loadCategories, saveCategories, toCategories } from './index';

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'categories-'));
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe('toCategories', () => {
  it('fills defaults and names entries by their key', () => {
    expect(toCategories({ perso: { folder: null, keywords: [], confidence_threshold: 0.7, priority: 0, description: '' } })).toEqual([
      { name: 'PERSO', folder: null, keywords: [], confidenceThreshold: 0.7, priority: 0, description: '' },
    ]);
  });
});

describe('loadCategories', () => {
  it('reads a snake_case category file', async () => {
    const file = path.join(dir, 'categories.json');
    await fs.writeFile(
      file,
      JSON.stringify({
        BANQUE: { folder: 'Administratif/Banque', keywords: ['facture'], confidence_threshold: 0.8, priority: 3 },
        misc: {},
      }),
      'utf-8'
    );

    expect(await loadCategories(file)).toEqual([
      {
        name: 'BANQUE',
        folder: 'Administratif/Banque',
        keywords: ['facture'],
        confidenceThreshold: 0.8,
        priority: 3,
        description: '',
      },
      { name: 'MISC', folder: null, keywords: [], confidenceThreshold: 0.7, priority: 0, description: '' },
    ]);
  });

  it('refuses to start without a category file', async () => {
    const file = path.join(dir, 'absent.json');

    await expect(loadCategories(file)).rejects.toThrow(`Category file not found: ${file}`);
  });

  it('rejects thresholds outside [0, 1]', async () => {
    const file = path.join(dir, 'categories.json');
    await fs.writeFile(file, JSON.stringify({ PRO: { confidence_threshold: 2 } }), 'utf-8');

    await expect(loadCategories(file)).rejects.toThrow(/PRO\.confidence_threshold/);
  });

  it('loads what saveCategories wrote', async () => {
    const file = path.join(dir, 'categories.json');
    const categories = [
      { name: 'PRO', folder: 'Travail', keywords: ['projet'], confidenceThreshold: 0.7, priority: 4, description: 'Work' },
    ];

    await saveCategories(file, categories);

    expect(await loadCategories(file)).toEqual(categories);
  });
});
