import type { ComponentGraph } from './graph.js';
import { normalizeSeverity } from './threat-signals.js';
import type { VulnerabilitySignals } from './threat-signals.js';
import { SIGNAL_CATEGORIES } from './types.js';
import type {
  PriorityTier,
  RankingPolicy,
  ScoreRecord,
  SignalCategory,
  TopologyScore,
  WeightSet
} from './types.js';
import { clamp, compareStrings, percentile, valueOr } from './utils.js';

export type UnrankedRecord = Omit<ScoreRecord, 'rank' | 'priority'>;

export interface FusionInput {
  graph: ComponentGraph;
  topology: TopologyScore[];
  vulnerabilities: VulnerabilitySignals[];
  weights: WeightSet;
  severityScale: number;
  ranking: RankingPolicy;
}

export interface PriorityThresholds {
  critical: number;
  high: number;
}

const CRITICAL_FLOOR = 0.7;
const HIGH_FLOOR = 0.4;

export function compositeScore(values: Record<SignalCategory, number>, weights: WeightSet): number {
  let score = 0;
  for (const category of SIGNAL_CATEGORIES) {
    score += weights[category] * values[category];
  }
  return clamp(score, 0, 1);
}

export function buildRecords(input: FusionInput): UnrankedRecord[] {
  const records: UnrankedRecord[] = [];
  for (const { vulnerability, exploitProbability: measured, exploited } of input.vulnerabilities) {
    const exploitProbability = valueOr(measured, 0);
    const severity = normalizeSeverity(vulnerability.severity, input.severityScale);
    const rawSeverity = vulnerability.severity.kind === 'present' ? vulnerability.severity.value : null;

    for (const componentId of vulnerability.componentIds) {
      const idx = input.graph.indexOf(componentId);
      if (idx === undefined) continue;
      const tcs = input.topology[idx].tcs;
      if (tcs === 0 && exploitProbability === 0 && !exploited && severity === 0) continue;

      const composite = compositeScore(
        { topology: tcs, exploitProbability, exploited: exploited ? 1 : 0, severity },
        input.weights
      );
      records.push({
        componentId,
        vulnerabilityId: vulnerability.id,
        composite,
        tcs,
        exploitProbability,
        exploited,
        severity,
        rawSeverity
      });
    }
  }
  return records;
}

export function compareRecords(policy: RankingPolicy): (a: UnrankedRecord, b: UnrankedRecord) => number {
  const byExploited = (a: UnrankedRecord, b: UnrankedRecord) => Number(b.exploited) - Number(a.exploited);
  const byComposite = (a: UnrankedRecord, b: UnrankedRecord) => b.composite - a.composite;
  const leading = policy.exploitedOverride ? [byExploited, byComposite] : [byComposite, byExploited];

  return (a, b) => {
    for (const compare of leading) {
      const diff = compare(a, b);
      if (diff !== 0) return diff;
    }
    const severityDiff = (b.rawSeverity ?? -Infinity) - (a.rawSeverity ?? -Infinity);
    if (severityDiff !== 0 && !Number.isNaN(severityDiff)) return severityDiff;
    return compareStrings(a.vulnerabilityId, b.vulnerabilityId) || compareStrings(a.componentId, b.componentId);
  };
}

/** Thresholds follow the spread of positive composites, with fixed floors so a calm inventory is not all critical. */
export function priorityThresholds(composites: number[]): PriorityThresholds {
  const positive = composites.filter((c) => c > 0);
  if (positive.length === 0) return { critical: CRITICAL_FLOOR, high: HIGH_FLOOR };
  return {
    critical: Math.max(percentile(positive, 90), CRITICAL_FLOOR),
    high: Math.max(percentile(positive, 70), HIGH_FLOOR)
  };
}

export function priorityFor(composite: number, thresholds: PriorityThresholds): PriorityTier {
  if (composite <= 0) return 'low';
  if (composite >= thresholds.critical) return 'critical';
  if (composite >= thresholds.high) return 'high';
  return 'medium';
}

export function fuseAndRank(input: FusionInput): ScoreRecord[] {
  const records = buildRecords(input).sort(compareRecords(input.ranking));
  const thresholds = priorityThresholds(records.map((r) => r.composite));
  return records.map((record, idx) => ({
    rank: idx + 1,
    ...record,
    priority: priorityFor(record.composite, thresholds)
  }));
}
