import { SIGNAL_CATEGORIES } from './types.js';
import type { CategoryEntropy, EntropyPolicy, SignalCategory, WeightSet } from './types.js';

export type SignalVectors = Record<SignalCategory, number[]>;

export interface EntropyWeighting {
  weights: WeightSet;
  entropy: CategoryEntropy[];
  /** Every category had zero entropy and equal weights were used. */
  fallback: boolean;
}

const BOOLEAN_BINS = 2;

/** Equal-width bin over [0, 1]; 1.0 lands in the last bin. */
export function binIndex(value: number, bins: number): number {
  return Math.min(bins - 1, Math.max(0, Math.floor(value * bins)));
}

export function shannonEntropy(counts: number[]): number {
  const total = counts.reduce((sum, c) => sum + c, 0);
  if (total === 0) return 0;
  let h = 0;
  for (const count of counts) {
    if (count === 0) continue;
    const p = count / total;
    h -= p * Math.log2(p);
  }
  return h;
}

export function measureCategory(category: SignalCategory, values: number[], bins: number): CategoryEntropy {
  const binCount = category === 'exploited' ? BOOLEAN_BINS : bins;
  const counts = new Array<number>(binCount).fill(0);
  for (const value of values) {
    const idx = category === 'exploited' ? (value > 0 ? 1 : 0) : binIndex(value, binCount);
    counts[idx] += 1;
  }
  const entropy = shannonEntropy(counts);
  return {
    category,
    bins: binCount,
    entropy,
    normalizedEntropy: entropy / Math.log2(binCount)
  };
}

export function equalWeights(): WeightSet {
  const share = 1 / SIGNAL_CATEGORIES.length;
  return { topology: share, exploitProbability: share, exploited: share, severity: share };
}

/**
 * Weights each signal category by how much its distribution across the inventory
 * discriminates between components. A category whose values all fall in one bin gets weight 0.
 */
export function computeEntropyWeights(vectors: SignalVectors, policy: EntropyPolicy): EntropyWeighting {
  const entropy = SIGNAL_CATEGORIES.map((category) => measureCategory(category, vectors[category], policy.bins));
  const total = entropy.reduce((sum, e) => sum + e.normalizedEntropy, 0);

  if (total === 0) {
    return { weights: equalWeights(), entropy, fallback: true };
  }

  const weights = equalWeights();
  for (const e of entropy) {
    weights[e.category] = e.normalizedEntropy / total;
  }
  return { weights, entropy, fallback: false };
}
