import { describe, it, expect } from 'vitest';
import { fieldSimilarity, scoreResponses, type ResponseMap } from '../../src/matching/scorer.js';
import { booleanField, catalogOf, choiceField, scaleField } from '../mocks/fixtures.js';

function answers(values: Record<string, number | string | boolean>): ResponseMap {
  return new Map(Object.entries(values));
}

describe('scoreResponses', () => {
  const weighted = catalogOf(
    scaleField('q1', { weight: 1 }),
    scaleField('q2', { weight: 1 }),
    scaleField('q3', { weight: 2 })
  );

  it('should compute the weighted mean of field similarities', () => {
    // Similarities 0.8, 0.6 and 1.0 with weights 1, 1, 2.
    const score = scoreResponses(
      weighted,
      answers({ q1: 3, q2: 2, q3: 7 }),
      answers({ q1: 5, q2: 6, q3: 7 })
    );

    expect(score.overall).toBe(0.85);
    expect(score.fieldCount).toBe(3);
    expect(score.coverage).toBe(1);
    expect(score.insufficientData).toBe(false);
    expect(score.catalogVersion).toBe(weighted.version);
  });

  it('should be symmetric', () => {
    const a = answers({ q1: 1, q2: 9, q3: 4 });
    const b = answers({ q1: 6, q2: 2, q3: 10 });

    expect(scoreResponses(weighted, a, b)).toEqual(scoreResponses(weighted, b, a));
  });

  it('should be deterministic across calls', () => {
    const a = answers({ q1: 1, q2: 3 });
    const b = answers({ q1: 2, q3: 8 });

    const first = JSON.stringify(scoreResponses(weighted, a, b));
    const second = JSON.stringify(scoreResponses(weighted, a, b));
    expect(second).toBe(first);
  });

  it('should only count fields both users answered', () => {
    const score = scoreResponses(
      weighted,
      answers({ q1: 4, q2: 0 }),
      answers({ q1: 4, q3: 10 })
    );

    expect(score.overall).toBe(1);
    expect(score.fieldCount).toBe(1);
    expect(score.coverage).toBe(0.333333);
  });

  it('should flag insufficient data when no field is shared', () => {
    const score = scoreResponses(weighted, answers({ q1: 1 }), answers({ q2: 1 }));

    expect(score.overall).toBe(0);
    expect(score.insufficientData).toBe(true);
    expect(score.fieldCount).toBe(0);
    expect(score.categories).toEqual({});
  });

  it('should stay within [0, 1] at the extremes', () => {
    const opposite = scoreResponses(
      weighted,
      answers({ q1: 0, q2: 0, q3: 0 }),
      answers({ q1: 10, q2: 10, q3: 10 })
    );

    expect(opposite.overall).toBe(0);
  });

  it('should break the score down by category', () => {
    const catalog = catalogOf(
      scaleField('q1', { category: 'values', weight: 2 }),
      booleanField('smokes', { category: 'lifestyle' })
    );

    const score = scoreResponses(
      catalog,
      answers({ q1: 5, smokes: true }),
      answers({ q1: 10, smokes: true })
    );

    expect(score.categories).toEqual({
      lifestyle: { score: 1, fieldCount: 1, weight: 1 },
      values: { score: 0.5, fieldCount: 1, weight: 2 },
    });
    // (2 * 0.5 + 1 * 1) / 3
    expect(score.overall).toBe(0.666667);
  });

  it('should report deal breakers without changing the overall score', () => {
    const catalog = catalogOf(
      booleanField('smokes', { dealBreaker: true }),
      scaleField('q1')
    );

    const score = scoreResponses(
      catalog,
      answers({ smokes: true, q1: 10 }),
      answers({ smokes: false, q1: 10 })
    );

    expect(score.dealBreakers).toEqual(['smokes']);
    expect(score.overall).toBe(0.5);
  });

  it('should skip answers that do not fit their field', () => {
    const score = scoreResponses(weighted, answers({ q1: 'high' }), answers({ q1: 5 }));

    expect(score.insufficientData).toBe(true);
  });
});

describe('fieldSimilarity', () => {
  it('should use 1 - |a - b| / range for scale similarity', () => {
    const field = scaleField('q1', { scale: { min: 1, max: 5 } });

    expect(fieldSimilarity(field, 1, 5)).toBe(0);
    expect(fieldSimilarity(field, 2, 3)).toBe(0.75);
  });

  it('should use equality for exact_match scale fields', () => {
    const field = scaleField('q1', { comparisonRule: 'exact_match' });

    expect(fieldSimilarity(field, 4, 4)).toBe(1);
    expect(fieldSimilarity(field, 4, 5)).toBe(0);
  });

  it('should read the compatibility table in either direction', () => {
    const field = choiceField('pace', ['slow', 'medium', 'fast'], {
      comparisonRule: 'similarity',
      compatibility: { slow: { medium: 0.5 }, medium: { fast: 0.7 } },
    });

    expect(fieldSimilarity(field, 'slow', 'medium')).toBe(0.5);
    expect(fieldSimilarity(field, 'medium', 'slow')).toBe(0.5);
    expect(fieldSimilarity(field, 'fast', 'medium')).toBe(0.7);
  });

  it('should fall back to equality for pairs missing from the table', () => {
    const field = choiceField('pace', ['slow', 'medium', 'fast'], {
      comparisonRule: 'similarity',
      compatibility: { slow: { medium: 0.5 } },
    });

    expect(fieldSimilarity(field, 'fast', 'fast')).toBe(1);
    expect(fieldSimilarity(field, 'slow', 'fast')).toBe(0);
  });

  it('should return null for mismatched value types', () => {
    expect(fieldSimilarity(booleanField('smokes'), true, 'yes')).toBeNull();
  });
});
