import { InvalidOptionsError } from './errors.js';
import type { SignalCollection, SignalFailure, ThreatLookupResult, ThreatSignal } from './types.js';
import { absent, clamp, mapWithConcurrency, present } from './utils.js';

const DEFAULT_CONCURRENCY = 6;
const DEFAULT_TIMEOUT_MS = 15000;

export type ThreatLookup = (vulnerabilityId: string, signal: AbortSignal) => Promise<ThreatLookupResult | null>;

export interface CollectOptions {
  concurrency?: number;
  timeoutMs?: number;
}

class LookupTimeoutError extends Error {}

interface CollectedEntry {
  signal: ThreatSignal;
  failure: SignalFailure | null;
}

/**
 * Feeds the engine from a threat-intel collaborator. Each advisory is looked up at most
 * `concurrency` at a time; a lookup that throws, times out or finds nothing yields an absent
 * probability and a failure entry, and the rest of the batch carries on.
 */
export async function collectThreatSignals(
  vulnerabilityIds: string[],
  lookup: ThreatLookup,
  options: CollectOptions = {}
): Promise<SignalCollection> {
  const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new InvalidOptionsError('concurrency', 'must be an integer >= 1');
  }
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new InvalidOptionsError('timeoutMs', 'must be a number > 0');
  }
  const ids = [...new Set(vulnerabilityIds)];

  const entries = await mapWithConcurrency(ids, concurrency, async (id): Promise<CollectedEntry> => {
    try {
      const result = await withTimeout(id, lookup, timeoutMs);
      if (!result) {
        return { signal: missingSignal(id), failure: { vulnerabilityId: id, reason: 'not_found' } };
      }
      return { signal: toSignal(id, result), failure: null };
    } catch (error) {
      const failure: SignalFailure =
        error instanceof LookupTimeoutError
          ? { vulnerabilityId: id, reason: 'timeout', message: error.message }
          : { vulnerabilityId: id, reason: 'lookup_failed', message: error instanceof Error ? error.message : String(error) };
      return { signal: missingSignal(id), failure };
    }
  });

  return {
    signals: entries.map((e) => e.signal),
    failures: entries.flatMap((e) => (e.failure ? [e.failure] : []))
  };
}

async function withTimeout(id: string, lookup: ThreatLookup, timeoutMs: number): Promise<ThreatLookupResult | null> {
  const controller = new AbortController();
  let timeout: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_, reject) => {
    timeout = setTimeout(() => {
      controller.abort();
      reject(new LookupTimeoutError(`lookup for ${id} exceeded ${timeoutMs}ms`));
    }, timeoutMs);
  });
  try {
    return await Promise.race([lookup(id, controller.signal), expired]);
  } finally {
    clearTimeout(timeout);
  }
}

function toSignal(id: string, result: ThreatLookupResult): ThreatSignal {
  const probability = result.exploitProbability;
  return {
    vulnerabilityId: id,
    exploitProbability:
      typeof probability === 'number' && Number.isFinite(probability) ? present(clamp(probability, 0, 1)) : absent(),
    exploited: result.exploited ?? false
  };
}

function missingSignal(id: string): ThreatSignal {
  return { vulnerabilityId: id, exploitProbability: absent(), exploited: false };
}
