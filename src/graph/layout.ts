/**
 * @fileoverview Hierarchical Layout Engine
 *
 * Longest-path layering for left-to-right display: a node's level is 0
 * when nothing triggers it, otherwise one more than the highest level
 * among its predecessors. Levels become x coordinates; nodes sharing a
 * level are spread vertically around y = 0.
 *
 * @module graph/layout
 */

import { CyclicGraphError } from '../core/errors';
import { Logger } from '../core/logger';
import type { JobGraph } from './jobGraph';

const log = Logger.for('layout');

export const DEFAULT_X_SPACING = 200;
export const DEFAULT_Y_SPACING = 100;

export interface Point {
  x: number;
  y: number;
}

export interface LayoutOptions {
  xSpacing?: number;
  ySpacing?: number;
}

interface Frame {
  node: string;
  predecessors: string[];
  next: number;
}

/**
 * Assign every node its longest-path level.
 *
 * Iterative depth-first walk over predecessors, so deep chains do not
 * grow the call stack. Each level is computed once. The map's insertion
 * order is the order in which the walk finishes nodes, starting from
 * graph node order.
 *
 * @throws CyclicGraphError when a node is reached again while still on the walk
 */
export function computeLevels(graph: JobGraph): Map<string, number> {
  const levels = new Map<string, number>();
  const visiting = new Set<string>();

  for (const start of graph.nodes()) {
    if (levels.has(start)) continue;

    const path: string[] = [start];
    const stack: Frame[] = [{ node: start, predecessors: graph.predecessors(start), next: 0 }];
    visiting.add(start);

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];

      if (frame.next < frame.predecessors.length) {
        const pred = frame.predecessors[frame.next++];
        if (levels.has(pred)) continue;
        if (visiting.has(pred)) {
          // path runs against edge direction; flip the tail to read as triggers
          const cycle = [pred, ...path.slice(path.indexOf(pred) + 1).reverse(), pred];
          throw new CyclicGraphError(cycle);
        }
        visiting.add(pred);
        path.push(pred);
        stack.push({ node: pred, predecessors: graph.predecessors(pred), next: 0 });
        continue;
      }

      let level = 0;
      for (const pred of frame.predecessors) {
        level = Math.max(level, (levels.get(pred) ?? 0) + 1);
      }
      levels.set(frame.node, level);
      visiting.delete(frame.node);
      path.pop();
      stack.pop();
    }
  }

  return levels;
}

/**
 * Group nodes into level columns, keeping the order of `levels` within each
 * column. Columns come back in ascending level order.
 */
export function groupByLevel(levels: Map<string, number>): Map<number, string[]> {
  const groups = new Map<number, string[]>();
  for (const [node, level] of levels) {
    const group = groups.get(level);
    if (group) {
      group.push(node);
    } else {
      groups.set(level, [node]);
    }
  }
  return new Map([...groups.entries()].sort(([a], [b]) => a - b));
}

/**
 * Compute display coordinates for every node.
 *
 * x = level × xSpacing; y = (index − count/2 + 0.5) × ySpacing, which
 * centres each column on y = 0.
 *
 * @throws CyclicGraphError when the graph has a cycle
 */
export function hierarchicalLayout(graph: JobGraph, options: LayoutOptions = {}): Map<string, Point> {
  const xSpacing = options.xSpacing ?? DEFAULT_X_SPACING;
  const ySpacing = options.ySpacing ?? DEFAULT_Y_SPACING;
  const positions = new Map<string, Point>();

  const groups = groupByLevel(computeLevels(graph));
  for (const [level, nodes] of groups) {
    const x = level * xSpacing;
    nodes.forEach((node, i) => {
      positions.set(node, { x, y: (i - nodes.length / 2 + 0.5) * ySpacing });
    });
  }

  log.debug(`Laid out ${positions.size} nodes in ${groups.size} levels`);
  return positions;
}
