import { assertUnitInterval, InvalidInputException } from '../common/invalid-input.exception';
import { SIMILARITY_CATEGORIES, SimilarityCategory } from '../types/trademark.types';

// Inclusive lower bounds, strongest first. Part of the public contract; not configurable.
const CATEGORY_FLOORS: ReadonlyArray<readonly [number, SimilarityCategory]> = [
  [0.8, 'identical'],
  [0.6, 'high'],
  [0.4, 'moderate'],
  [0.2, 'low'],
];

export function scoreToCategory(score: number): SimilarityCategory {
  assertUnitInterval(score, 'score');
  for (const [floor, category] of CATEGORY_FLOORS) {
    if (score >= floor) {
      return category;
    }
  }
  return 'dissimilar';
}

export function categoryRank(category: SimilarityCategory): number {
  return SIMILARITY_CATEGORIES.indexOf(category);
}

export function compareCategories(a: SimilarityCategory, b: SimilarityCategory): number {
  return categoryRank(a) - categoryRank(b);
}

export function isSimilarityCategory(value: unknown): value is SimilarityCategory {
  return typeof value === 'string' && SIMILARITY_CATEGORIES.some((category) => category === value);
}

export function parseCategory(value: unknown, field: string): SimilarityCategory {
  if (!isSimilarityCategory(value)) {
    throw new InvalidInputException(
      `expected one of ${SIMILARITY_CATEGORIES.join(', ')}, received ${String(value)}`,
      field,
    );
  }
  return value;
}
