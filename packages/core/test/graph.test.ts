import assert from 'node:assert/strict';
import test from 'node:test';
import { IntegrityError } from '../src/errors.js';
import { ComponentGraph, computeTopology } from '../src/graph.js';
import { DEFAULT_OPTIONS } from '../src/options.js';
import type { DependencyEdge, TopologyScore } from '../src/types.js';
import { assertClose, component, edge } from './fixtures.js';

const policy = DEFAULT_OPTIONS.topology;

function byId(scores: TopologyScore[]): Map<string, TopologyScore> {
  return new Map(scores.map((s) => [s.componentId, s]));
}

test('linear chain gets BFS depths, ancestor centrality and equal-weight TCS', () => {
  const [a, b, c] = [component('a'), component('b'), component('c')];
  const graph = ComponentGraph.build([a, b, c], [edge(a, b), edge(b, c)], [a.id]);
  const report = computeTopology(graph, policy);
  const scores = byId(report.scores);

  assert.deepEqual(
    [a, b, c].map((x) => scores.get(x.id)?.depth),
    [0, 1, 2]
  );
  assert.deepEqual(
    [a, b, c].map((x) => scores.get(x.id)?.normalizedDepth),
    [0, 0.5, 1]
  );
  assert.deepEqual(
    [a, b, c].map((x) => scores.get(x.id)?.centrality),
    [0, 0.5, 1]
  );
  assert.deepEqual(
    [a, b, c].map((x) => scores.get(x.id)?.tcs),
    [0.5, 0.5, 0.5]
  );
  assert.equal(report.maxDepth, 2);
});

test('cycle without roots terminates and every member shares the same centrality', () => {
  const [a, b, c] = [component('a'), component('b'), component('c')];
  const graph = ComponentGraph.build([a, b, c], [edge(a, b), edge(b, c), edge(c, a)]);
  const scores = computeTopology(graph, policy).scores;

  assert.deepEqual(graph.roots, []);
  for (const score of scores) {
    assert.equal(score.reachable, false);
    assert.equal(score.depth, 1);
    assert.equal(score.normalizedDepth, 1);
    assert.equal(score.dependents, 2);
    assert.equal(score.centrality, 1);
    assert.equal(score.tcs, 0.5);
  }
});

test('cycle reached from a root keeps identical centrality for its members', () => {
  const [r, a, b, c] = [component('r'), component('a'), component('b'), component('c')];
  const graph = ComponentGraph.build([r, a, b, c], [edge(r, a), edge(a, b), edge(b, c), edge(c, a)]);
  const scores = byId(computeTopology(graph, policy).scores);

  assert.deepEqual(
    [r, a, b, c].map((x) => scores.get(x.id)?.depth),
    [0, 1, 2, 3]
  );
  assert.deepEqual(
    [a, b, c].map((x) => scores.get(x.id)?.centrality),
    [1, 1, 1]
  );
  assert.equal(scores.get(r.id)?.centrality, 0);
});

test('component outside the supplied root set is treated as maximally deep', () => {
  const [a, b, x] = [component('a'), component('b'), component('x')];
  const graph = ComponentGraph.build([a, b, x], [edge(a, b)], [a.id]);
  const report = computeTopology(graph, policy);
  const scores = byId(report.scores);

  assert.equal(scores.get(x.id)?.reachable, false);
  assert.equal(scores.get(x.id)?.depth, 2);
  assert.equal(scores.get(x.id)?.normalizedDepth, 1);
  assert.equal(scores.get(x.id)?.centrality, 0);
  assert.equal(scores.get(x.id)?.tcs, 0);
  assert.equal(scores.get(b.id)?.normalizedDepth, 0.5);
  assert.equal(report.maxDepth, 1);
});

test('isolated component becomes a root when no roots are supplied', () => {
  const [a, b, x] = [component('a'), component('b'), component('x')];
  const graph = ComponentGraph.build([a, b, x], [edge(a, b)]);
  const scores = byId(computeTopology(graph, policy).scores);

  assert.deepEqual(
    graph.roots.map((idx) => graph.components[idx].id),
    [a.id, x.id]
  );
  assert.equal(scores.get(x.id)?.depth, 0);
  assert.equal(scores.get(x.id)?.tcs, 0.5);
  assert.equal(scores.get(b.id)?.normalizedDepth, 1);
});

test('single component scores zero depth and zero centrality', () => {
  const a = component('a');
  const scores = computeTopology(ComponentGraph.build([a], []), policy).scores;
  assert.deepEqual(scores, [
    { componentId: a.id, depth: 0, normalizedDepth: 0, centrality: 0, dependents: 0, reachable: true, tcs: 0.5 }
  ]);
});

test('duplicate edges and self-loops collapse', () => {
  const [a, b] = [component('a'), component('b')];
  const graph = ComponentGraph.build([a, b], [edge(a, b), edge(a, b), edge(a, a)]);
  assert.equal(graph.edgeCount, 1);
  assert.deepEqual(graph.children[0], [1]);
  assert.deepEqual(graph.parents[0], []);
});

test('policy weights shift TCS between inverted depth and centrality', () => {
  const [a, b, c] = [component('a'), component('b'), component('c')];
  const graph = ComponentGraph.build([a, b, c], [edge(a, b), edge(b, c)], [a.id]);

  const depthOnly = computeTopology(graph, { ...policy, depthWeight: 1, centralityWeight: 0 }).scores;
  assert.deepEqual(
    depthOnly.map((s) => s.tcs),
    [1, 0.5, 0]
  );

  const centralityOnly = computeTopology(graph, { ...policy, depthWeight: 0, centralityWeight: 1 }).scores;
  assert.deepEqual(
    centralityOnly.map((s) => s.tcs),
    [0, 0.5, 1]
  );
});

test('diamond counts shared dependents once and reports hubs above the threshold', () => {
  const [a, b, c, d] = [component('a'), component('b'), component('c'), component('d')];
  const graph = ComponentGraph.build([a, b, c, d], [edge(a, b), edge(a, c), edge(b, d), edge(c, d)], [a.id]);
  const report = computeTopology(graph, { ...policy, hubThreshold: 0.45 });
  const scores = byId(report.scores);

  assert.equal(scores.get(d.id)?.dependents, 3);
  assert.equal(scores.get(d.id)?.centrality, 1);
  assertClose(scores.get(b.id)?.tcs, 0.25 + 0.5 / 3);
  assert.equal(report.hubComponents, 2);
  assert.equal(computeTopology(graph, policy).hubComponents, 0);
});

test('edges to unknown components raise IntegrityError naming the component', () => {
  const a = component('a');
  assert.throws(
    () => ComponentGraph.build([a], [{ parent: a.id, child: 'pkg:npm/ghost@1.0.0' }]),
    (error: unknown) =>
      error instanceof IntegrityError &&
      error.code === 'INTEGRITY' &&
      error.componentId === 'pkg:npm/ghost@1.0.0' &&
      /ghost/.test(error.message)
  );
});

test('unknown roots and duplicate component ids raise IntegrityError', () => {
  const a = component('a');
  assert.throws(() => ComponentGraph.build([a], [], ['pkg:npm/nope@1.0.0']), IntegrityError);
  assert.throws(() => ComponentGraph.build([a, component('a')], []), /Duplicate component "pkg:npm\/a@1.0.0"/);
});

test('normalized depth and centrality stay within [0, 1] on a generated graph', () => {
  const components = Array.from({ length: 40 }, (_, i) => component(`n${i}`));
  const edges: DependencyEdge[] = [];
  let seed = 7;
  const next = () => {
    seed = (seed * 1103515245 + 12345) % 2147483648;
    return seed;
  };
  for (let i = 0; i < 120; i += 1) {
    edges.push(edge(components[next() % 40], components[next() % 40]));
  }
  const graph = ComponentGraph.build(components, edges, [components[0].id]);
  for (const score of computeTopology(graph, policy).scores) {
    assert.ok(score.normalizedDepth >= 0 && score.normalizedDepth <= 1);
    assert.ok(score.centrality >= 0 && score.centrality <= 1);
    assert.ok(score.tcs >= 0 && score.tcs <= 1);
  }
});
