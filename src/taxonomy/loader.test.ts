import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  getDefaultRegistry,
  loadTaxonomy,
  loadTaxonomyDefinition,
  parseTaxonomyDefinition,
} from './loader.js';
import { InvalidCategoryError } from './registry.js';
import { miniDefinition } from '../__fixtures__/engine-fixtures.js';

describe('shipped taxonomy', () => {
  it('holds 23 categories split 4/5/14 across tiers', async () => {
    const registry = await loadTaxonomy();

    expect(registry.size).toBe(23);
    expect(registry.policy).toEqual({ high: 4, medium: 5, low: 14 });
    expect(registry.byTier('high').map((c) => c.id)).toEqual(['1.1.1', '1.1.2', '1.1.3', '1.2.1']);
    expect(registry.byTier('medium')).toHaveLength(5);
    expect(registry.byTier('low')).toHaveLength(14);
  });

  it('gives every category a weighted top phrase and four keywords', async () => {
    const registry = await loadTaxonomy();
    for (const category of registry.categories()) {
      expect(category.match_features.map((f) => f.weight)).toEqual([5, 1, 1, 1, 1]);
    }
  });

  it('shares one default registry per process', async () => {
    const first = await getDefaultRegistry();
    const second = await getDefaultRegistry();
    expect(second).toBe(first);
  });
});

describe('parseTaxonomyDefinition', () => {
  it('defaults the version to 1', () => {
    const { version, ...rest } = miniDefinition();
    expect(version).toBe(1);
    expect(parseTaxonomyDefinition(rest).version).toBe(1);
  });

  it('reports schema failures as path: message lines', () => {
    const raw = miniDefinition();
    const broken = {
      ...raw,
      categories: [{ ...raw.categories[0], priority_tier: 'urgent' }],
    };

    expect(() => parseTaxonomyDefinition(broken)).toThrow(InvalidCategoryError);
    expect(() => parseTaxonomyDefinition(broken)).toThrow(/categories\.0\.priority_tier: /);
  });
});

describe('loadTaxonomyDefinition', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'taxonomy-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads a definition file from disk', async () => {
    const path = join(dir, 'taxonomy.json');
    await writeFile(path, JSON.stringify(miniDefinition()));

    const registry = await loadTaxonomy(path, { expectedSize: null });
    expect(registry.ids()).toEqual(['A1', 'B1', 'C1']);
  });

  it('rejects invalid JSON', async () => {
    const path = join(dir, 'broken.json');
    await writeFile(path, '{ not json');

    await expect(loadTaxonomyDefinition(path)).rejects.toThrow(
      `Invalid JSON in taxonomy file: ${path}`,
    );
  });
});
