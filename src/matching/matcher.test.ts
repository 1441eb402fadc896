import { describe, it, expect } from 'vitest';
import { Matcher, roundScore, scoreText } from './matcher.js';
import { makeDocument, miniRegistry } from '../__fixtures__/engine-fixtures.js';
import { loadTaxonomy } from '../taxonomy/loader.js';

describe('Matcher', () => {
  const registry = miniRegistry();
  const anticoag = registry.get('A1');
  const staging = registry.get('B1');
  const matcher = new Matcher();

  it('scores the weighted share of features present', () => {
    const score = matcher.score(makeDocument('d', 'Start anticoagulation today.'), anticoag);

    expect(score.category_id).toBe('A1');
    expect(score.score).toBe(0.75);
    expect(score.matched_features).toEqual(['anticoagulation']);
    expect(score.rationale).toBe('1/2 features matched (3/4 weight)');
  });

  it('matches phrases case-insensitively', () => {
    const score = matcher.score(makeDocument('d', 'WARFARIN dose review'), anticoag);
    expect(score.score).toBe(0.25);
    expect(score.matched_features).toEqual(['warfarin']);
  });

  it('counts a repeated phrase once', () => {
    const score = matcher.score(
      makeDocument('d', 'anticoagulation, anticoagulation and more anticoagulation'),
      anticoag,
    );
    expect(score.score).toBe(0.75);
  });

  it('reaches 1.0 when every feature is present', () => {
    const score = matcher.score(makeDocument('d', 'Staging scan or PET-CT.'), staging);
    expect(score.score).toBe(1);
    expect(score.matched_features).toEqual(['staging scan', 'pet-ct']);
  });

  it('scores empty and whitespace-only text as zero', () => {
    for (const text of ['', '   \n\t ']) {
      const score = matcher.score(makeDocument('d', text), anticoag);
      expect(score.score).toBe(0);
      expect(score.matched_features).toEqual([]);
      expect(score.rationale).toBe('empty document');
    }
  });

  it('returns frozen scores', () => {
    const score = matcher.score(makeDocument('d', 'warfarin'), anticoag);
    expect(Object.isFrozen(score)).toBe(true);
    expect(Object.isFrozen(score.matched_features)).toBe(true);
  });

  it('is deterministic and bounded for every shipped category', async () => {
    const shipped = await loadTaxonomy();
    const doc = makeDocument(
      'mixed',
      'Differential diagnosis and first-line therapy; monitor patients for drug interactions. ' +
        'Refer to guideline and coordinate care. Risk score, genetic testing, public health report.',
    );

    for (const category of shipped.categories()) {
      const first = matcher.score(doc, category);
      const second = matcher.score(doc, category);
      expect(second).toEqual(first);
      expect(first.score).toBeGreaterThanOrEqual(0);
      expect(first.score).toBeLessThanOrEqual(1);
    }
  });
});

describe('scoreText', () => {
  it('expects already-lowercased text', () => {
    const registry = miniRegistry();
    expect(scoreText('warfarin', registry.get('A1')).score).toBe(0.25);
    expect(scoreText('reminder', registry.get('C1')).score).toBe(1);
  });
});

describe('roundScore', () => {
  it('keeps four decimal places', () => {
    expect(roundScore(1 / 3)).toBe(0.3333);
    expect(roundScore(5 / 9)).toBe(0.5556);
    expect(roundScore(0.5)).toBe(0.5);
  });
});
