import { describe, expect, it } from 'vitest';
import { TextCategorizer } from '../../../src';
import { TEST_TAXONOMY } from '../../fixtures';

describe('TextCategorizer', () => {
  const categorizer = new TextCategorizer(TEST_TAXONOMY);

  it('exposes every signal beside the fused result', () => {
    const result = categorizer.categorize({
      text: 'ocean temperature and climate records',
      keywords: ['climate', 'ocean'],
      modelScores: { beta: 0.8, unknown: 1 },
    });

    expect(result.signals.model).toEqual({ alpha: 0, beta: 0.8, gamma: 0 });
    expect(result.signals.keyword).toEqual({ alpha: 0, beta: 1, gamma: 0 });
    expect(result.signals.similarity.beta).toBeGreaterThan(0);
    expect(result.primaryCategory).toBe('beta');
    expect(Object.isFrozen(result)).toBe(true);
  });

  it('runs without model scores', () => {
    const result = categorizer.categorize({ text: 'market price inflation', keywords: ['market'] });
    expect(result.signals.model).toEqual({ alpha: 0, beta: 0, gamma: 0 });
    // keyword signal alone contributes 0.3
    expect(result.scores.gamma).toBeGreaterThanOrEqual(0.3);
    expect(result.primaryCategory).toBe('gamma');
  });

  it('is uncategorized for text about nothing in the taxonomy', () => {
    const result = categorizer.categorize({ text: 'poetry sculpture painting', keywords: ['poetry'] });
    expect(result.primaryCategory).toBe('uncategorized');
  });

  it('honours a custom threshold', () => {
    const strict = new TextCategorizer(TEST_TAXONOMY, { threshold: 0.95 });
    const result = strict.categorize({ text: 'market price', keywords: ['market'] });
    expect(result.primaryCategory).toBe('uncategorized');
  });

  it('summarizes categories best first', () => {
    expect(categorizer.categorySummary({ alpha: 0.1, gamma: 0.6 })).toEqual([
      ['gamma', 0.6],
      ['alpha', 0.1],
      ['beta', 0],
    ]);
  });
});
