import type { RouteGraph } from '../data/routeGraph';
import type { RoutableOrder, RoutePlan, RouteSegment } from '../types/delivery';
import { MissingDepotError } from './errors';
import { pathDistance, shortestPath } from './pathfinding';

export const DEFAULT_DEPOT = 'Depot';

function planSegment(graph: RouteGraph, from: string, to: string): RouteSegment {
  const path = shortestPath(graph, from, to);
  // An empty path means no route, not a zero-length trip
  const distance = path.length === 0 ? null : pathDistance(graph, path);
  return { from, to, path, distance };
}

/**
 * Plan the agent's trip for an order: depot → pickup, then pickup → dropoff.
 * Reads the graph only.
 */
export function optimizeRoute(
  graph: RouteGraph,
  order: RoutableOrder,
  depot: string = DEFAULT_DEPOT,
): RoutePlan {
  if (!graph.hasLocation(depot)) {
    throw new MissingDepotError(depot);
  }

  const toPickup = planSegment(graph, depot, order.pickup);
  const toDropoff = planSegment(graph, order.pickup, order.dropoff);
  const sum =
    toPickup.distance === null || toDropoff.distance === null
      ? null
      : toPickup.distance + toDropoff.distance;
  const total = sum !== null && Number.isSafeInteger(sum) ? sum : null;

  return { depot, toPickup, toDropoff, total };
}

function describeSegment(label: string, segment: RouteSegment): string[] {
  if (segment.distance === null) {
    return [`${label} - Total Distance: N/A (route not found)`];
  }
  return [`${label} - Total Distance: ${segment.distance} km`, segment.path.join(' -> ')];
}

export function formatRoutePlan(plan: RoutePlan): string[] {
  return [
    ...describeSegment(`1. Agent Path (${plan.toPickup.from} to ${plan.toPickup.to})`, plan.toPickup),
    ...describeSegment(`2. Delivery Path (${plan.toDropoff.from} to ${plan.toDropoff.to})`, plan.toDropoff),
    plan.total === null
      ? 'Total Estimated Delivery Distance: cannot be calculated (missing route)'
      : `Total Estimated Delivery Distance: ${plan.total} km`,
  ];
}
