/**
 * @fileoverview Unit tests for the hierarchical layout engine
 *
 * Tests cover:
 * - Longest-path level assignment
 * - Cycle detection and the reported cycle path
 * - Column grouping and coordinate formula
 */

import { suite, test } from 'mocha';
import * as assert from 'assert';
import { JobGraph } from '../../../graph/jobGraph';
import {
  computeLevels,
  groupByLevel,
  hierarchicalLayout,
  DEFAULT_X_SPACING,
  DEFAULT_Y_SPACING,
} from '../../../graph/layout';
import { CyclicGraphError } from '../../../core/errors';

function graphOf(edges: Array<[string, string]>, isolated: string[] = []): JobGraph {
  const graph = new JobGraph();
  for (const name of isolated) graph.addNode(name);
  for (const [source, target] of edges) graph.addEdge(source, target);
  return graph;
}

suite('computeLevels', () => {
  test('assigns increasing levels along a chain', () => {
    const levels = computeLevels(graphOf([['A', 'B'], ['B', 'C']]));

    assert.deepStrictEqual([...levels], [['A', 0], ['B', 1], ['C', 2]]);
  });

  test('uses the longest path into a node', () => {
    const levels = computeLevels(graphOf([['A', 'B'], ['B', 'C'], ['A', 'C']]));

    assert.strictEqual(levels.get('C'), 2);
  });

  test('gives isolated nodes level 0', () => {
    const levels = computeLevels(graphOf([], ['Solo']));

    assert.deepStrictEqual([...levels], [['Solo', 0]]);
  });

  test('returns an empty map for an empty graph', () => {
    assert.strictEqual(computeLevels(new JobGraph()).size, 0);
  });

  test('every edge goes to a strictly higher level', () => {
    const edges: Array<[string, string]> = [];
    for (let i = 0; i < 30; i++) {
      for (let j = i + 1; j < 30; j++) {
        if ((i * 7 + j * 3) % 5 === 0) edges.push([`job${i}`, `job${j}`]);
      }
    }
    const graph = graphOf(edges);

    const levels = computeLevels(graph);

    assert.strictEqual(levels.size, graph.nodeCount);
    for (const { source, target } of graph.edges()) {
      assert.ok((levels.get(source) ?? -1) < (levels.get(target) ?? -1), `${source} -> ${target}`);
    }
    for (const node of graph.nodes()) {
      const preds = graph.predecessors(node);
      const expected = preds.length === 0 ? 0 : Math.max(...preds.map(p => (levels.get(p) ?? 0) + 1));
      assert.strictEqual(levels.get(node), expected, node);
    }
  });

  test('handles very deep chains without recursion limits', () => {
    const graph = new JobGraph();
    // Deepest node first, so the walk has to descend the whole chain at once.
    for (let i = 9999; i >= 0; i--) graph.addNode(`n${i}`);
    for (let i = 0; i < 9999; i++) graph.addEdge(`n${i}`, `n${i + 1}`);

    const levels = computeLevels(graph);

    assert.strictEqual(levels.get('n9999'), 9999);
    assert.strictEqual(levels.get('n0'), 0);
  });

  suite('cycles', () => {
    test('rejects a two-node cycle with the cycle path', () => {
      assert.throws(
        () => computeLevels(graphOf([['A', 'B'], ['B', 'A']])),
        (err: unknown) => {
          assert.ok(err instanceof CyclicGraphError);
          assert.strictEqual(err.kind, 'cyclic-graph');
          assert.deepStrictEqual(err.cycle, ['A', 'B', 'A']);
          assert.strictEqual(err.message, 'Circular trigger chain detected: A -> B -> A');
          return true;
        }
      );
    });

    test('reports a longer cycle in trigger direction', () => {
      assert.throws(
        () => computeLevels(graphOf([['A', 'B'], ['B', 'C'], ['C', 'A']])),
        (err: unknown) => err instanceof CyclicGraphError && err.cycle.join(',') === 'A,B,C,A'
      );
    });

    test('rejects a self-loop', () => {
      assert.throws(
        () => computeLevels(graphOf([['A', 'A']])),
        (err: unknown) => err instanceof CyclicGraphError && err.cycle.join(',') === 'A,A'
      );
    });

    test('rejects a cycle reachable only downstream of acyclic nodes', () => {
      assert.throws(
        () => computeLevels(graphOf([['Root', 'X'], ['X', 'Y'], ['Y', 'X']])),
        CyclicGraphError
      );
    });
  });
});

suite('groupByLevel', () => {
  test('groups by level in ascending order, keeping walk order inside a column', () => {
    const graph = graphOf([['Y', 'X'], ['W', 'X']], ['Z']);

    const levels = computeLevels(graph);
    const groups = groupByLevel(levels);

    assert.deepStrictEqual([...levels.keys()], ['Z', 'Y', 'W', 'X']);
    assert.deepStrictEqual([...groups], [[0, ['Z', 'Y', 'W']], [1, ['X']]]);
  });

  test('sorts columns even when levels arrive out of order', () => {
    const groups = groupByLevel(new Map([['C', 2], ['A', 0], ['B', 1]]));

    assert.deepStrictEqual([...groups.keys()], [0, 1, 2]);
  });
});

suite('hierarchicalLayout', () => {
  test('exposes the default spacing', () => {
    assert.strictEqual(DEFAULT_X_SPACING, 200);
    assert.strictEqual(DEFAULT_Y_SPACING, 100);
  });

  test('places a chain along y = 0', () => {
    const positions = hierarchicalLayout(graphOf([['A', 'B'], ['B', 'C']]));

    assert.deepStrictEqual(positions.get('A'), { x: 0, y: 0 });
    assert.deepStrictEqual(positions.get('B'), { x: 200, y: 0 });
    assert.deepStrictEqual(positions.get('C'), { x: 400, y: 0 });
  });

  test('centres a column of two around y = 0', () => {
    const positions = hierarchicalLayout(graphOf([], ['A', 'B']));

    assert.deepStrictEqual(positions.get('A'), { x: 0, y: -50 });
    assert.deepStrictEqual(positions.get('B'), { x: 0, y: 50 });
  });

  test('spreads a column of three one spacing apart', () => {
    const positions = hierarchicalLayout(graphOf([['Y', 'X'], ['W', 'X']], ['Z']));

    assert.deepStrictEqual(positions.get('Z'), { x: 0, y: -100 });
    assert.deepStrictEqual(positions.get('Y'), { x: 0, y: 0 });
    assert.deepStrictEqual(positions.get('W'), { x: 0, y: 100 });
    assert.deepStrictEqual(positions.get('X'), { x: 200, y: 0 });
  });

  test('honours custom spacing', () => {
    const positions = hierarchicalLayout(graphOf([['A', 'B']], ['C']), { xSpacing: 50, ySpacing: 10 });

    assert.deepStrictEqual(positions.get('C'), { x: 0, y: -5 });
    assert.deepStrictEqual(positions.get('A'), { x: 0, y: 5 });
    assert.deepStrictEqual(positions.get('B'), { x: 50, y: 0 });
  });

  test('positions every node, implicit ones included', () => {
    const graph = graphOf([['A', 'Ghost']]);

    assert.strictEqual(hierarchicalLayout(graph).size, graph.nodeCount);
  });

  test('returns an empty map for an empty graph', () => {
    assert.strictEqual(hierarchicalLayout(new JobGraph()).size, 0);
  });

  test('raises CyclicGraphError on a cycle', () => {
    assert.throws(() => hierarchicalLayout(graphOf([['A', 'B'], ['B', 'A']])), CyclicGraphError);
  });
});
