import { describe, expect, it } from 'vitest';
import { ConfigError } from '../errors.js';
import {
  buildCategoryTable,
  categorize,
  categoryRank,
  clampScore,
  DEFAULT_THRESHOLDS,
  thresholdFor,
} from './categories.js';

describe('buildCategoryTable', () => {
  it('appends the catch-all to the default thresholds', () => {
    expect(buildCategoryTable()).toEqual([
      { min: 85, category: 'Highly Relevant' },
      { min: 60, category: 'Moderately Relevant' },
      { min: 30, category: 'Somewhat Relevant' },
      { min: -Infinity, category: 'Low Relevance' },
    ]);
  });

  it('sorts thresholds highest first', () => {
    const table = buildCategoryTable([
      { min: 40, category: 'Somewhat Relevant' },
      { min: 90, category: 'Highly Relevant' },
    ]);
    expect(table.map((t) => t.min)).toEqual([90, 40, -Infinity]);
  });

  it('accepts an explicit catch-all and does not duplicate it', () => {
    const table = buildCategoryTable([...DEFAULT_THRESHOLDS, { min: -Infinity, category: 'Low Relevance' }]);
    expect(table).toHaveLength(4);
  });

  it('rejects thresholds that are not monotone with their categories', () => {
    const build = () => buildCategoryTable([
      { min: 80, category: 'Somewhat Relevant' },
      { min: 50, category: 'Highly Relevant' },
    ]);
    expect(build).toThrow(ConfigError);
    expect(build).toThrow('Category thresholds are not monotone: "Somewhat Relevant" (≥80) ranks at or below "Highly Relevant" (≥50)');
  });

  it('rejects the same category at two thresholds', () => {
    expect(() => buildCategoryTable([
      { min: 90, category: 'Highly Relevant' },
      { min: 80, category: 'Highly Relevant' },
    ])).toThrow(ConfigError);
  });

  it('rejects duplicate thresholds', () => {
    expect(() => buildCategoryTable([
      { min: 60, category: 'Highly Relevant' },
      { min: 60, category: 'Moderately Relevant' },
    ])).toThrow('Duplicate threshold 60 for "Highly Relevant" and "Moderately Relevant"');
  });

  it('rejects a finite threshold on the catch-all', () => {
    expect(() => buildCategoryTable([{ min: 10, category: 'Low Relevance' }]))
      .toThrow('"Low Relevance" is the catch-all category and takes no threshold (got 10)');
  });

  it('rejects NaN', () => {
    expect(() => buildCategoryTable([{ min: Number.NaN, category: 'Highly Relevant' }]))
      .toThrow('Threshold for "Highly Relevant" is not a number');
  });
});

describe('categorize', () => {
  const table = buildCategoryTable();

  it('uses inclusive lower bounds', () => {
    expect(categorize(85, table)).toBe('Highly Relevant');
    expect(categorize(84.99, table)).toBe('Moderately Relevant');
    expect(categorize(60, table)).toBe('Moderately Relevant');
    expect(categorize(30, table)).toBe('Somewhat Relevant');
    expect(categorize(29.99, table)).toBe('Low Relevance');
  });

  it('handles scores outside [0, 100]', () => {
    expect(categorize(-12, table)).toBe('Low Relevance');
    expect(categorize(100.0000001, table)).toBe('Highly Relevant');
  });

  it('never ranks a higher score in a lower category', () => {
    let previous = -1;
    for (let score = -20; score <= 120; score += 0.25) {
      const rank = categoryRank(categorize(score, table));
      expect(rank).toBeGreaterThanOrEqual(previous);
      previous = rank;
    }
  });
});

describe('thresholdFor', () => {
  it('returns the lower bound of a category', () => {
    const table = buildCategoryTable();
    expect(thresholdFor('Moderately Relevant', table)).toBe(60);
    expect(thresholdFor('Low Relevance', table)).toBe(-Infinity);
  });
});

describe('clampScore', () => {
  it('clamps to [0, 100]', () => {
    expect(clampScore(-3)).toBe(0);
    expect(clampScore(104)).toBe(100);
    expect(clampScore(42.5)).toBe(42.5);
    expect(clampScore(Number.NaN)).toBe(0);
  });
});
