import { describe, expect, it } from 'vitest';
import { preprocessText, tokenize } from '../../../src';

describe('preprocessText', () => {
  it('lowercases and blanks out non-letters', () => {
    expect(preprocessText('  Deep-Learning, 2024!\n\tModels ')).toBe(`deep learning${' '.repeat(8)}models`);
  });

  it('returns an empty string for whitespace', () => {
    expect(preprocessText(' \n\t ')).toBe('');
  });
});

describe('tokenize', () => {
  it('keeps tokens of two or more word characters', () => {
    expect(tokenize('Hi a B2 x_y')).toEqual(['hi', 'b2', 'x_y']);
  });
});
