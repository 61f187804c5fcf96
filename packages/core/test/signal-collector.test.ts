import assert from 'node:assert/strict';
import test from 'node:test';
import { InvalidOptionsError } from '../src/errors.js';
import { collectThreatSignals } from '../src/signal-collector.js';
import type { CollectOptions } from '../src/signal-collector.js';
import type { ThreatLookupResult } from '../src/types.js';
import { absent, present } from '../src/utils.js';

test('collects one signal per unique advisory in input order', async () => {
  const seen: string[] = [];
  const collection = await collectThreatSignals(['CVE-1', 'CVE-2', 'CVE-1'], async (id) => {
    seen.push(id);
    return id === 'CVE-1' ? { exploitProbability: 0.4, exploited: true } : { exploitProbability: 0.1 };
  });

  assert.deepEqual(seen.sort(), ['CVE-1', 'CVE-2']);
  assert.deepEqual(collection, {
    signals: [
      { vulnerabilityId: 'CVE-1', exploitProbability: present(0.4), exploited: true },
      { vulnerabilityId: 'CVE-2', exploitProbability: present(0.1), exploited: false }
    ],
    failures: []
  });
});

test('never runs more lookups at once than the concurrency limit', async () => {
  let active = 0;
  let peak = 0;
  const ids = Array.from({ length: 9 }, (_, i) => `CVE-${i}`);

  await collectThreatSignals(
    ids,
    async () => {
      active += 1;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 5));
      active -= 1;
      return { exploitProbability: 0.5 };
    },
    { concurrency: 3 }
  );

  assert.equal(peak, 3);
});

test('timed out lookups are aborted and reported without failing the batch', async () => {
  let aborted = false;
  const collection = await collectThreatSignals(
    ['CVE-SLOW', 'CVE-FAST'],
    (id, signal) => {
      if (id === 'CVE-FAST') return Promise.resolve({ exploitProbability: 0.2 });
      return new Promise<null>(() => {
        signal.addEventListener('abort', () => {
          aborted = true;
        });
      });
    },
    { timeoutMs: 10 }
  );

  assert.equal(aborted, true);
  assert.deepEqual(collection.signals[0], { vulnerabilityId: 'CVE-SLOW', exploitProbability: absent(), exploited: false });
  assert.deepEqual(collection.signals[1]?.exploitProbability, present(0.2));
  assert.deepEqual(collection.failures, [
    { vulnerabilityId: 'CVE-SLOW', reason: 'timeout', message: 'lookup for CVE-SLOW exceeded 10ms' }
  ]);
});

test('lookup errors and empty answers become absent signals with a failure reason', async () => {
  const collection = await collectThreatSignals(['CVE-ERR', 'CVE-NONE'], async (id) => {
    if (id === 'CVE-ERR') throw new Error('feed unavailable');
    return null;
  });

  assert.deepEqual(
    collection.signals.map((s) => s.exploitProbability),
    [absent(), absent()]
  );
  assert.deepEqual(collection.failures, [
    { vulnerabilityId: 'CVE-ERR', reason: 'lookup_failed', message: 'feed unavailable' },
    { vulnerabilityId: 'CVE-NONE', reason: 'not_found' }
  ]);
});

test('out-of-range probabilities are clamped and non-numbers treated as absent', async () => {
  const answers = new Map<string, ThreatLookupResult>([
    ['CVE-HIGH', { exploitProbability: 1.7 }],
    ['CVE-NULL', { exploitProbability: null, exploited: true }],
    ['CVE-NAN', { exploitProbability: Number.NaN }]
  ]);
  const collection = await collectThreatSignals([...answers.keys()], async (id) => answers.get(id) ?? null);

  assert.deepEqual(collection.signals, [
    { vulnerabilityId: 'CVE-HIGH', exploitProbability: present(1), exploited: false },
    { vulnerabilityId: 'CVE-NULL', exploitProbability: absent(), exploited: true },
    { vulnerabilityId: 'CVE-NAN', exploitProbability: absent(), exploited: false }
  ]);
  assert.deepEqual(collection.failures, []);
});

test('invalid concurrency or timeout is rejected before any lookup runs', async () => {
  let calls = 0;
  const lookup = async () => {
    calls += 1;
    return { exploitProbability: 0.5 };
  };

  const invalid: Array<[CollectOptions, string]> = [
    [{ concurrency: Number.NaN }, 'concurrency'],
    [{ concurrency: 0 }, 'concurrency'],
    [{ concurrency: 1.5 }, 'concurrency'],
    [{ timeoutMs: 0 }, 'timeoutMs'],
    [{ timeoutMs: Number.POSITIVE_INFINITY }, 'timeoutMs']
  ];
  for (const [options, option] of invalid) {
    await assert.rejects(
      collectThreatSignals(['CVE-1'], lookup, options),
      (error: unknown) => error instanceof InvalidOptionsError && error.option === option
    );
  }
  assert.equal(calls, 0);
});
