import assert from 'node:assert/strict';
import type { Component, DependencyEdge, Inventory, ThreatSignal, Vulnerability } from '../src/types.js';
import { absent, present } from '../src/utils.js';

export function component(name: string, version = '1.0.0'): Component {
  return { id: `pkg:npm/${name}@${version}`, name, version, ecosystem: 'npm' };
}

export function edge(parent: Component, child: Component): DependencyEdge {
  return { parent: parent.id, child: child.id };
}

export function vuln(id: string, severity: number | null, ...components: Component[]): Vulnerability {
  return {
    id,
    severity: severity === null ? absent() : present(severity),
    componentIds: components.map((c) => c.id)
  };
}

export function signal(vulnerabilityId: string, probability: number | null, exploited = false): ThreatSignal {
  return {
    vulnerabilityId,
    exploitProbability: probability === null ? absent() : present(probability),
    exploited
  };
}

export function inventory(partial: Partial<Inventory> & Pick<Inventory, 'components'>): Inventory {
  return {
    dependencies: [],
    roots: [],
    vulnerabilities: [],
    threatSignals: [],
    ...partial
  };
}

export function assertClose(actual: number | undefined, expected: number, epsilon = 1e-9): void {
  assert.equal(typeof actual, 'number');
  assert.ok(
    Math.abs((actual ?? Number.NaN) - expected) <= epsilon,
    `expected ${String(actual)} to be within ${epsilon} of ${expected}`
  );
}
