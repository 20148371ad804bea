import type { AddLocationResult, Network } from '../types/delivery';
import { InvalidDistanceError, UnknownLocationError } from '../engine/errors';
import networkData from './network.json';

export type Neighbors = ReadonlyMap<string, number>;

export interface RouteGraph {
  /** Number of locations */
  readonly size: number;
  addLocation(name: string): AddLocationResult;
  /** Adds or overwrites a bidirectional route. Throws if either end is unknown. */
  addRoute(start: string, end: string, distance: number): 'added';
  hasLocation(name: string): boolean;
  /** Empty for unknown locations */
  neighborsOf(name: string): Neighbors;
  /** Distance of the direct route between two locations, or null if not connected */
  distanceBetween(from: string, to: string): number | null;
  /** Location names in insertion order */
  locations(): string[];
}

const NO_NEIGHBORS: Neighbors = new Map();

export function createRouteGraph(): RouteGraph {
  const adjacency = new Map<string, Map<string, number>>();

  return {
    get size() {
      return adjacency.size;
    },

    addLocation(name) {
      if (adjacency.has(name)) return 'exists';
      adjacency.set(name, new Map());
      return 'added';
    },

    addRoute(start, end, distance) {
      const from = adjacency.get(start);
      const to = adjacency.get(end);
      if (!from || !to) {
        throw new UnknownLocationError([start, end].filter((name) => !adjacency.has(name)));
      }
      if (!Number.isSafeInteger(distance) || distance < 0) {
        throw new InvalidDistanceError(distance);
      }
      from.set(end, distance);
      to.set(start, distance);
      return 'added';
    },

    hasLocation(name) {
      return adjacency.has(name);
    },

    neighborsOf(name) {
      return adjacency.get(name) ?? NO_NEIGHBORS;
    },

    distanceBetween(from, to) {
      return adjacency.get(from)?.get(to) ?? null;
    },

    locations() {
      return [...adjacency.keys()];
    },
  };
}

/** Build a graph from a network description. Routes must reference listed locations. */
export function buildRouteGraph(network: Network): RouteGraph {
  const graph = createRouteGraph();
  for (const name of network.locations) {
    graph.addLocation(name);
  }
  for (const r of network.routes) {
    graph.addRoute(r.start, r.end, r.distance);
  }
  return graph;
}

/** The bundled sample network: a depot, a few restaurants, and an isolated airport */
export function buildSampleGraph(): RouteGraph {
  return buildRouteGraph(networkData);
}
