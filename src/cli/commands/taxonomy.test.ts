import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('@clack/prompts', () => ({
  log: {
    message: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    success: vi.fn(),
    info: vi.fn(),
  },
  intro: vi.fn(),
  outro: vi.fn(),
}));

vi.mock('picocolors', () => {
  const plain = (s: string) => s;
  return {
    default: { green: plain, red: plain, yellow: plain, dim: plain, bold: plain, cyan: plain, bgCyan: plain, black: plain },
  };
});

import * as p from '@clack/prompts';
import { taxonomyCommand } from './taxonomy.js';

interface TaxonomyOutput {
  version: number;
  tier_policy: Record<string, number>;
  categories: Array<{ id: string; priority_tier: string }>;
}

function isTaxonomyOutput(value: unknown): value is TaxonomyOutput {
  return typeof value === 'object' && value !== null && 'categories' in value && Array.isArray(value.categories);
}

describe('taxonomyCommand', () => {
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  function printed(): TaxonomyOutput {
    const value: unknown = JSON.parse(String(consoleLogSpy.mock.calls.at(-1)?.[0]));
    if (!isTaxonomyOutput(value)) throw new Error('unexpected output');
    return value;
  }

  beforeEach(() => {
    vi.clearAllMocks();
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
  });

  it('lists every category as JSON', async () => {
    expect(await taxonomyCommand(['--json'])).toBe(0);

    const output = printed();
    expect(output.version).toBe(1);
    expect(output.tier_policy).toEqual({ high: 4, medium: 5, low: 14 });
    expect(output.categories).toHaveLength(23);
    expect(output.categories[0]?.id).toBe('1.1.1');
  });

  it('filters by tier', async () => {
    await taxonomyCommand(['--tier=high', '--json']);

    const output = printed();
    expect(output.categories).toHaveLength(4);
    expect(output.categories.every((c) => c.priority_tier === 'high')).toBe(true);
  });

  it('rejects an unknown tier', async () => {
    expect(await taxonomyCommand(['--tier=urgent'])).toBe(1);
    expect(p.log.error).toHaveBeenCalledWith('Unknown tier "urgent" (expected high, medium or low)');
  });

  it('prints the tier summary', async () => {
    expect(await taxonomyCommand([])).toBe(0);
    expect(p.log.message).toHaveBeenNthCalledWith(1, 'Taxonomy v1: 23 categories (4 high, 5 medium, 14 low)');
  });
});
