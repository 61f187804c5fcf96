import { computeEntropyWeights } from './entropy.js';
import type { SignalVectors } from './entropy.js';
import { fuseAndRank } from './fusion.js';
import { ComponentGraph, computeTopology } from './graph.js';
import { resolveOptions } from './options.js';
import { indexThreatSignals, mergeVulnerabilities, normalizeThreatSignals } from './threat-signals.js';
import type {
  CategoryEntropy,
  DegenerateInputNotice,
  Inventory,
  PrioritizationResult,
  PrioritizationSummary,
  PrioritizeOverrides,
  PriorityTier,
  ScoreRecord,
  WeightSet
} from './types.js';

/**
 * Runs the whole fusion pipeline over one assembled inventory. Throws `IntegrityError` when the
 * inventory references components it does not declare; incomplete and degenerate data are
 * reported in `warnings` and `notices` instead.
 */
export function prioritize(inventory: Inventory, overrides: PrioritizeOverrides = {}): PrioritizationResult {
  const options = resolveOptions(overrides);
  const graph = ComponentGraph.build(inventory.components, inventory.dependencies, inventory.roots);
  const topology = computeTopology(graph, options.topology);
  const vulnerabilities = mergeVulnerabilities(inventory.vulnerabilities);
  const normalized = normalizeThreatSignals(
    graph,
    vulnerabilities,
    indexThreatSignals(inventory.threatSignals),
    options.severityScale
  );

  const notices: DegenerateInputNotice[] = [];
  let weights: WeightSet | null = null;
  let entropy: CategoryEntropy[] = [];
  let records: ScoreRecord[] = [];

  if (vulnerabilities.length === 0) {
    notices.push({
      kind: 'degenerate-input',
      reason: 'no-vulnerabilities',
      message: 'Inventory has no vulnerabilities; nothing to rank.'
    });
  } else {
    const vectors: SignalVectors = {
      topology: topology.scores.map((s) => s.tcs),
      exploitProbability: normalized.components.map((c) => c.exploitProbability),
      exploited: normalized.components.map((c) => (c.exploited ? 1 : 0)),
      severity: normalized.components.map((c) => c.severity)
    };
    const weighting = computeEntropyWeights(vectors, options.entropy);
    weights = weighting.weights;
    entropy = weighting.entropy;

    if (graph.size === 1) {
      notices.push({
        kind: 'degenerate-input',
        reason: 'single-component',
        message: 'Inventory has a single component; signal entropy is undefined, using equal weights.'
      });
    } else if (weighting.fallback) {
      notices.push({
        kind: 'degenerate-input',
        reason: 'uniform-signals',
        message: 'Every signal is constant across the inventory; using equal weights.'
      });
    }

    records = fuseAndRank({
      graph,
      topology: topology.scores,
      vulnerabilities: normalized.vulnerabilities,
      weights,
      severityScale: options.severityScale,
      ranking: options.ranking
    });
  }

  const summary: PrioritizationSummary = {
    componentCount: graph.size,
    vulnerabilityCount: vulnerabilities.length,
    recordCount: records.length,
    byPriority: countByPriority(records),
    hubComponents: topology.hubComponents,
    maxDepth: topology.maxDepth,
    incompleteCount: normalized.warnings.length
  };

  return {
    records,
    weights,
    entropy,
    topology: topology.scores,
    componentSignals: normalized.components,
    warnings: normalized.warnings,
    notices,
    summary
  };
}

function countByPriority(records: ScoreRecord[]): Record<PriorityTier, number> {
  const out: Record<PriorityTier, number> = {
    critical: 0,
    high: 0,
    medium: 0,
    low: 0
  };
  for (const r of records) out[r.priority] += 1;
  return out;
}
