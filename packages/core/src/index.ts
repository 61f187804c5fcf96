export * from './types.js';
export * from './errors.js';
export { DEFAULT_OPTIONS, resolveOptions } from './options.js';
export { ComponentGraph, computeTopology } from './graph.js';
export type { TopologyReport } from './graph.js';
export { indexThreatSignals, mergeVulnerabilities, normalizeSeverity, normalizeThreatSignals } from './threat-signals.js';
export type { NormalizedSignals, VulnerabilitySignals } from './threat-signals.js';
export { binIndex, computeEntropyWeights, equalWeights, measureCategory, shannonEntropy } from './entropy.js';
export type { EntropyWeighting, SignalVectors } from './entropy.js';
export { buildRecords, compareRecords, compositeScore, fuseAndRank, priorityFor, priorityThresholds } from './fusion.js';
export type { FusionInput, PriorityThresholds, UnrankedRecord } from './fusion.js';
export { prioritize } from './prioritize.js';
export { collectThreatSignals } from './signal-collector.js';
export type { CollectOptions, ThreatLookup } from './signal-collector.js';
export { inventorySchema, loadInventory, parseInventory } from './inventory.js';
export type { InventoryDocument } from './inventory.js';
export { absent, parsePackageUrl, present, shouldFail, valueOr } from './utils.js';
export type { PackageUrl } from './utils.js';
