import { ConfigError } from '../errors.js';
import type { CategoryThreshold, RelevanceCategory } from '../types.js';

export const CATCH_ALL_CATEGORY: RelevanceCategory = 'Low Relevance';

const CATEGORY_RANK: Record<RelevanceCategory, number> = {
  'Low Relevance': 0,
  'Somewhat Relevant': 1,
  'Moderately Relevant': 2,
  'Highly Relevant': 3,
};

/** Thresholds ordered highest first, always ending in the catch-all. */
export type CategoryTable = readonly CategoryThreshold[];

export const DEFAULT_THRESHOLDS: readonly CategoryThreshold[] = [
  { min: 85, category: 'Highly Relevant' },
  { min: 60, category: 'Moderately Relevant' },
  { min: 30, category: 'Somewhat Relevant' },
];

export function categoryRank(category: RelevanceCategory): number {
  return CATEGORY_RANK[category];
}

/**
 * Normalise configured thresholds into a lookup table: sort highest first,
 * append `(-Infinity, Low Relevance)` and reject tables where a higher
 * threshold maps to a lower category (that would break monotonicity).
 */
export function buildCategoryTable(thresholds: readonly CategoryThreshold[] = DEFAULT_THRESHOLDS): CategoryTable {
  for (const t of thresholds) {
    if (Number.isNaN(t.min)) throw new ConfigError(`Threshold for "${t.category}" is not a number`);
    if (t.category === CATCH_ALL_CATEGORY && t.min !== -Infinity) {
      throw new ConfigError(`"${CATCH_ALL_CATEGORY}" is the catch-all category and takes no threshold (got ${t.min})`);
    }
  }

  const sorted = thresholds
    .filter((t) => t.category !== CATCH_ALL_CATEGORY)
    .slice()
    .sort((a, b) => b.min - a.min);

  const table: CategoryThreshold[] = [...sorted, { min: -Infinity, category: CATCH_ALL_CATEGORY }];

  for (let i = 1; i < table.length; i++) {
    const prev = table[i - 1];
    const cur = table[i];
    if (!prev || !cur) continue;
    if (prev.min === cur.min) {
      throw new ConfigError(`Duplicate threshold ${cur.min} for "${prev.category}" and "${cur.category}"`);
    }
    if (categoryRank(cur.category) >= categoryRank(prev.category)) {
      throw new ConfigError(
        `Category thresholds are not monotone: "${prev.category}" (≥${prev.min}) ranks at or below "${cur.category}" (≥${cur.min})`,
      );
    }
  }

  return table;
}

export function categorize(score: number, table: CategoryTable): RelevanceCategory {
  for (const t of table) {
    if (score >= t.min) return t.category;
  }
  return CATCH_ALL_CATEGORY;
}

export function thresholdFor(category: RelevanceCategory, table: CategoryTable): number {
  return table.find((t) => t.category === category)?.min ?? -Infinity;
}

/** Presentation clamp; raw scores may drift outside [0, 100]. */
export function clampScore(raw: number): number {
  if (Number.isNaN(raw)) return 0;
  return Math.min(100, Math.max(0, raw));
}
