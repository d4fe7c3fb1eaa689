import type { CategoricalDistribution, NamingConvention, QuoteStyle } from '../types';

export const EMPTY_NAMING: Readonly<Record<NamingConvention, number>> = {
  snake_case: 0,
  camelCase: 0,
  PascalCase: 0,
  mixed: 0,
};

export const EMPTY_QUOTES: Readonly<Record<QuoteStyle, number>> = {
  single: 0,
  double: 0,
  mixed: 0,
};

/**
 * Reduces classified tokens to shares of the total. The dominant category
 * is the plurality; ties go to the category seen first.
 */
export function buildDistribution<C extends string>(
  empty: Readonly<Record<C, number>>,
  tokens: readonly C[],
): CategoricalDistribution<C> {
  const counts: Record<C, number> = { ...empty };
  const seen: C[] = [];
  for (const token of tokens) {
    if (!seen.includes(token)) seen.push(token);
    counts[token] += 1;
  }

  const distribution: Record<C, number> = { ...empty };
  let dominant: C | null = null;
  for (const category of seen) {
    distribution[category] = counts[category] / tokens.length;
    if (dominant === null || counts[category] > counts[dominant]) dominant = category;
  }
  return { distribution, dominant, samples: tokens.length, observations: tokens.length > 0 ? 1 : 0 };
}

/** Largest share in `order`; earlier categories win ties, and an all-zero distribution has none. */
export function dominantOf<C extends string>(distribution: Record<C, number>, order: readonly C[]): C | null {
  let dominant: C | null = null;
  for (const category of order) {
    const share = distribution[category];
    if (share > 0 && (dominant === null || share > distribution[dominant])) dominant = category;
  }
  return dominant;
}
