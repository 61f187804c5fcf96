import { InvalidOptionsError } from './errors.js';
import type { PrioritizeOptions, PrioritizeOverrides } from './types.js';

const WEIGHT_TOLERANCE = 1e-9;

export const DEFAULT_OPTIONS: PrioritizeOptions = {
  topology: { depthWeight: 0.5, centralityWeight: 0.5, hubThreshold: 0.7 },
  entropy: { bins: 10 },
  ranking: { exploitedOverride: true },
  severityScale: 10
};

export function resolveOptions(overrides: PrioritizeOverrides = {}): PrioritizeOptions {
  const options: PrioritizeOptions = {
    topology: { ...DEFAULT_OPTIONS.topology, ...overrides.topology },
    entropy: { ...DEFAULT_OPTIONS.entropy, ...overrides.entropy },
    ranking: { ...DEFAULT_OPTIONS.ranking, ...overrides.ranking },
    severityScale: overrides.severityScale ?? DEFAULT_OPTIONS.severityScale
  };

  const { depthWeight, centralityWeight, hubThreshold } = options.topology;
  if (!isNonNegative(depthWeight)) throw new InvalidOptionsError('topology.depthWeight', 'must be a number >= 0');
  if (!isNonNegative(centralityWeight)) {
    throw new InvalidOptionsError('topology.centralityWeight', 'must be a number >= 0');
  }
  if (Math.abs(depthWeight + centralityWeight - 1) > WEIGHT_TOLERANCE) {
    throw new InvalidOptionsError(
      'topology',
      `depthWeight + centralityWeight must equal 1 (got ${depthWeight + centralityWeight})`
    );
  }
  if (!Number.isFinite(hubThreshold) || hubThreshold < 0 || hubThreshold > 1) {
    throw new InvalidOptionsError('topology.hubThreshold', 'must be within [0, 1]');
  }
  if (!Number.isInteger(options.entropy.bins) || options.entropy.bins < 2) {
    throw new InvalidOptionsError('entropy.bins', 'must be an integer >= 2');
  }
  if (!Number.isFinite(options.severityScale) || options.severityScale <= 0) {
    throw new InvalidOptionsError('severityScale', 'must be a number > 0');
  }

  return options;
}

function isNonNegative(n: number): boolean {
  return Number.isFinite(n) && n >= 0;
}
