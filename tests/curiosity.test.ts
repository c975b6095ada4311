/**
 * @file tests/curiosity.test.ts
 * @description Curiosity ranking score.
 */

import { describe, expect, it } from 'vitest';
import { curiosityScore } from '../src/lib/curiosity';

const names = (count: number) => Array.from({ length: count }, (_, index) => `c${index}`);

describe('curiosityScore', () => {
  it('adds keywords and a high-confidence bonus to the base', () => {
    expect(
      curiosityScore({
        title: 'Abandoned secret bunker',
        description: 'A mysterious site',
        categories: [],
        country_confidence: 0.9,
      }),
    ).toBe(9);
  });

  it('rewards category breadth', () => {
    expect(curiosityScore({ categories: names(6) })).toBe(6);
    expect(curiosityScore({ categories: names(11) })).toBe(7);
  });

  it('caps at 10', () => {
    expect(
      curiosityScore({
        title: 'Strange bizarre weird peculiar hoax',
        description: 'An unexplained phenomenon',
        country_confidence: 1,
      }),
    ).toBe(10);
  });
});
