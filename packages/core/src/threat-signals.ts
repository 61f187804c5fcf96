import { IntegrityError } from './errors.js';
import type { ComponentGraph } from './graph.js';
import type { ComponentSignals, IncompleteSignalWarning, Measured, MissingSignal, ThreatSignal, Vulnerability } from './types.js';
import { absent, clamp, present, valueOr } from './utils.js';

export interface VulnerabilitySignals {
  vulnerability: Vulnerability;
  exploitProbability: Measured<number>;
  exploited: boolean;
}

export interface NormalizedSignals {
  /** One entry per component, in graph order. */
  components: ComponentSignals[];
  vulnerabilities: VulnerabilitySignals[];
  warnings: IncompleteSignalWarning[];
}

/**
 * Collapses repeated advisories into one vulnerability. Lookup collaborators report the same
 * advisory once per affected component; the merged record affects the union of components
 * and keeps the highest severity seen.
 */
export function mergeVulnerabilities(vulnerabilities: Vulnerability[]): Vulnerability[] {
  const map = new Map<string, Vulnerability>();
  for (const vuln of vulnerabilities) {
    const existing = map.get(vuln.id);
    if (!existing) {
      map.set(vuln.id, { id: vuln.id, severity: vuln.severity, componentIds: [...new Set(vuln.componentIds)] });
      continue;
    }
    const componentIds = [...new Set([...existing.componentIds, ...vuln.componentIds])];
    map.set(vuln.id, { id: vuln.id, severity: maxMeasured(existing.severity, vuln.severity), componentIds });
  }
  return [...map.values()];
}

export function indexThreatSignals(signals: ThreatSignal[]): Map<string, ThreatSignal> {
  const map = new Map<string, ThreatSignal>();
  for (const signal of signals) {
    const probability = sanitizeProbability(signal.exploitProbability);
    const existing = map.get(signal.vulnerabilityId);
    map.set(signal.vulnerabilityId, {
      vulnerabilityId: signal.vulnerabilityId,
      exploitProbability: existing ? maxMeasured(existing.exploitProbability, probability) : probability,
      exploited: (existing?.exploited ?? false) || signal.exploited
    });
  }
  return map;
}

export function normalizeThreatSignals(
  graph: ComponentGraph,
  vulnerabilities: Vulnerability[],
  signals: Map<string, ThreatSignal>,
  severityScale: number
): NormalizedSignals {
  const components = graph.components.map(
    (component): ComponentSignals => ({
      componentId: component.id,
      exploitProbability: 0,
      exploited: false,
      severity: 0,
      vulnerabilityIds: [],
      incomplete: false
    })
  );
  const resolved: VulnerabilitySignals[] = [];
  const warnings: IncompleteSignalWarning[] = [];

  for (const vulnerability of vulnerabilities) {
    if (vulnerability.componentIds.length === 0) {
      throw new IntegrityError(
        '',
        `vulnerability ${vulnerability.id}`,
        `Vulnerability "${vulnerability.id}" names no affected component`
      );
    }
    const indices = vulnerability.componentIds.map((componentId) => {
      const idx = graph.indexOf(componentId);
      if (idx === undefined) throw new IntegrityError(componentId, `vulnerability ${vulnerability.id}`);
      return idx;
    });

    const signal = signals.get(vulnerability.id);
    const exploitProbability = signal ? signal.exploitProbability : absent<number>();
    const exploited = signal?.exploited ?? false;
    const severity = normalizeSeverity(vulnerability.severity, severityScale);

    const missing: MissingSignal[] = [];
    if (exploitProbability.kind === 'absent') missing.push('exploitProbability');
    if (vulnerability.severity.kind === 'absent') missing.push('severity');
    if (missing.length > 0) {
      warnings.push({
        kind: 'incomplete-signal',
        vulnerabilityId: vulnerability.id,
        componentIds: [...vulnerability.componentIds],
        missing
      });
    }

    for (const idx of indices) {
      const entry = components[idx];
      entry.exploitProbability = Math.max(entry.exploitProbability, valueOr(exploitProbability, 0));
      entry.exploited = entry.exploited || exploited;
      entry.severity = Math.max(entry.severity, severity);
      entry.vulnerabilityIds.push(vulnerability.id);
      entry.incomplete = entry.incomplete || missing.length > 0;
    }
    resolved.push({ vulnerability, exploitProbability, exploited });
  }

  return { components, vulnerabilities: resolved, warnings };
}

export function normalizeSeverity(severity: Measured<number>, scale: number): number {
  if (severity.kind === 'absent' || !Number.isFinite(severity.value)) return 0;
  return clamp(severity.value / scale, 0, 1);
}

function sanitizeProbability(probability: Measured<number>): Measured<number> {
  if (probability.kind === 'absent') return probability;
  if (!Number.isFinite(probability.value)) return absent();
  return present(clamp(probability.value, 0, 1));
}

function maxMeasured(a: Measured<number>, b: Measured<number>): Measured<number> {
  if (a.kind === 'absent') return b;
  if (b.kind === 'absent') return a;
  return present(Math.max(a.value, b.value));
}
