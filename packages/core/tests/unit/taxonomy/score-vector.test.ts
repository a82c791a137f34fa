import { describe, expect, it } from 'vitest';
import { buildScores, maxScore, rankScores, sanitizeScores, scoreOf, zeroScores } from '../../../src';
import { TEST_TAXONOMY } from '../../fixtures';

describe('scoreOf', () => {
  it('reads finite non-negative values', () => {
    expect(scoreOf({ alpha: 0.5 }, 'alpha')).toBe(0.5);
  });

  it('treats missing, NaN, infinite and negative values as 0', () => {
    expect(scoreOf({}, 'alpha')).toBe(0);
    expect(scoreOf(undefined, 'alpha')).toBe(0);
    expect(scoreOf({ alpha: Number.NaN }, 'alpha')).toBe(0);
    expect(scoreOf({ alpha: Number.POSITIVE_INFINITY }, 'alpha')).toBe(0);
    expect(scoreOf({ alpha: -0.2 }, 'alpha')).toBe(0);
  });
});

describe('zeroScores / buildScores', () => {
  it('covers every category', () => {
    expect(zeroScores(TEST_TAXONOMY)).toEqual({ alpha: 0, beta: 0, gamma: 0 });
  });

  it('replaces invalid computed values with 0', () => {
    const scores = buildScores(TEST_TAXONOMY, (id) => (id === 'alpha' ? 0.7 : id === 'beta' ? Number.NaN : -1));
    expect(scores).toEqual({ alpha: 0.7, beta: 0, gamma: 0 });
    expect(Object.isFrozen(scores)).toBe(true);
  });
});

describe('sanitizeScores', () => {
  it('drops unknown keys and zeroes unusable values', () => {
    const scores = sanitizeScores(TEST_TAXONOMY, { alpha: '0.5', beta: -1, gamma: 'high', delta: 0.9 });
    expect(scores).toEqual({ alpha: 0.5, beta: 0, gamma: 0 });
  });

  it('clamps to 1 when asked', () => {
    expect(sanitizeScores(TEST_TAXONOMY, { alpha: 2 }, { clampToUnit: true })).toEqual({ alpha: 1, beta: 0, gamma: 0 });
    expect(sanitizeScores(TEST_TAXONOMY, { alpha: 2 })).toEqual({ alpha: 2, beta: 0, gamma: 0 });
  });

  it('returns zeros for non-object input', () => {
    expect(sanitizeScores(TEST_TAXONOMY, null)).toEqual({ alpha: 0, beta: 0, gamma: 0 });
    expect(sanitizeScores(TEST_TAXONOMY, [0.4, 0.5])).toEqual({ alpha: 0, beta: 0, gamma: 0 });
    expect(sanitizeScores(TEST_TAXONOMY, 'alpha')).toEqual({ alpha: 0, beta: 0, gamma: 0 });
  });
});

describe('maxScore / rankScores', () => {
  it('finds the largest value', () => {
    expect(maxScore({ alpha: 0.2, beta: 0.9, gamma: 0.4 })).toBe(0.9);
    expect(maxScore({})).toBe(0);
  });

  it('ranks best first, keeping taxonomy order for ties', () => {
    expect(rankScores(TEST_TAXONOMY, { alpha: 0.2, beta: 0.5, gamma: 0.5 })).toEqual([
      ['beta', 0.5],
      ['gamma', 0.5],
      ['alpha', 0.2],
    ]);
  });
});
