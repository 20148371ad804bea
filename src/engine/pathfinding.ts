import type { RouteGraph } from '../data/routeGraph';
import { PriorityQueue } from './priorityQueue';

export interface ShortestPathTree {
  /** Shortest known distance for every reachable location */
  distances: Map<string, number>;
  /** Previous location on the shortest path; absent for the start */
  predecessors: Map<string, string>;
}

/**
 * Dijkstra's single-source shortest paths.
 * Stops early once `stopAt` is settled. Unknown start yields empty maps.
 */
export function computeShortestDistances(
  graph: RouteGraph,
  start: string,
  stopAt?: string,
): ShortestPathTree {
  const distances = new Map<string, number>();
  const predecessors = new Map<string, string>();
  if (!graph.hasLocation(start)) return { distances, predecessors };

  const visited = new Set<string>();
  const frontier = new PriorityQueue<string>();
  distances.set(start, 0);
  frontier.enqueue(start, 0);

  while (!frontier.isEmpty()) {
    const current = frontier.dequeue();
    if (current === undefined) break;
    // Stale entries stay in the heap and are filtered here
    if (visited.has(current)) continue;
    visited.add(current);
    if (current === stopAt) break;

    const base = distances.get(current) ?? 0;
    for (const [neighbor, weight] of graph.neighborsOf(current)) {
      if (visited.has(neighbor)) continue;
      const newDist = base + weight;
      // Costs past the safe integer range are treated as unreachable
      if (!Number.isSafeInteger(newDist)) continue;
      const known = distances.get(neighbor);
      if (known === undefined || newDist < known) {
        distances.set(neighbor, newDist);
        predecessors.set(neighbor, current);
        frontier.enqueue(neighbor, newDist);
      }
    }
  }

  return { distances, predecessors };
}

/**
 * Shortest path from `start` to `end`, inclusive of both.
 * Returns [] when either location is unknown or `end` is unreachable.
 * When several paths tie, any one of them may be returned.
 */
export function shortestPath(graph: RouteGraph, start: string, end: string): string[] {
  if (!graph.hasLocation(start) || !graph.hasLocation(end)) return [];

  const { distances, predecessors } = computeShortestDistances(graph, start, end);
  if (!distances.has(end)) return [];

  const path: string[] = [end];
  let cur = end;
  // A consistent chain is never longer than the graph
  while (cur !== start && path.length <= graph.size) {
    const prev = predecessors.get(cur);
    if (prev === undefined) break;
    path.push(prev);
    cur = prev;
  }

  if (cur !== start) return [];
  return path.reverse();
}

/**
 * Sum of route distances along a path.
 * 0 for paths of fewer than two locations, null if any hop is not a route
 * or the sum leaves the safe integer range.
 */
export function pathDistance(graph: RouteGraph, path: readonly string[]): number | null {
  let total = 0;
  for (let i = 0; i < path.length - 1; i++) {
    const hop = graph.distanceBetween(path[i], path[i + 1]);
    if (hop === null) return null;
    total += hop;
    if (!Number.isSafeInteger(total)) return null;
  }
  return total;
}

/**
 * Find all locations reachable from a given location.
 * Returns a map of location → shortest distance.
 */
export function findReachable(graph: RouteGraph, from: string): Record<string, number> {
  const { distances } = computeShortestDistances(graph, from);
  const reachable: Record<string, number> = {};
  for (const [name, d] of distances) {
    reachable[name] = d;
  }
  return reachable;
}
