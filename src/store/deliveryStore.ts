import { createStore } from 'zustand/vanilla';
import type { AddLocationResult, Order, OrderRequest, RoutePlan } from '../types/delivery';
import { createRouteGraph, type RouteGraph } from '../data/routeGraph';
import {
  createOrderDesk,
  findOrder,
  placeOrder,
  processNextOrder,
  revertLastDelivery,
  type OrderDesk,
} from '../engine/orderDesk';
import { DEFAULT_DEPOT, formatRoutePlan, optimizeRoute } from '../engine/routeOptimizer';
import { OrderNotFoundError } from '../engine/errors';
import { logger } from '../engine/logger';

export interface SystemStatus {
  pendingOrders: number;
  completedDeliveries: number;
  nextOrderId: number;
  locationCount: number;
  locations: string[];
}

export interface DeliveryStore {
  depot: string;
  graph: RouteGraph;
  /** Bumped on every graph mutation so subscribers see a change */
  graphVersion: number;
  desk: OrderDesk;

  // Actions
  addLocation: (name: string) => AddLocationResult;
  addRoute: (start: string, end: string, distance: number) => void;
  placeOrder: (request: OrderRequest) => Order;
  processNextOrder: () => Order;
  revertLastDelivery: () => Order;
  optimizeOrderRoute: (orderId: number) => RoutePlan;
  getStatus: () => SystemStatus;
}

export interface DeliveryStoreOptions {
  depot?: string;
  graph?: RouteGraph;
}

export function createDeliveryStore(options: DeliveryStoreOptions = {}) {
  return createStore<DeliveryStore>()((set, get) => ({
    depot: options.depot ?? DEFAULT_DEPOT,
    graph: options.graph ?? createRouteGraph(),
    graphVersion: 0,
    desk: createOrderDesk(),

    addLocation: (name) => {
      const result = get().graph.addLocation(name);
      if (result === 'added') {
        set((s) => ({ graphVersion: s.graphVersion + 1 }));
        logger.info('deliveryStore', `Location added: ${name}`);
      } else {
        logger.debug('deliveryStore', `Location ${name} already exists`);
      }
      return result;
    },

    addRoute: (start, end, distance) => {
      get().graph.addRoute(start, end, distance);
      set((s) => ({ graphVersion: s.graphVersion + 1 }));
      logger.info('deliveryStore', `Route added: ${start} <-> ${end} (${distance} km)`);
    },

    placeOrder: (request) => {
      const { desk, order } = placeOrder(get().desk, get().graph, request);
      set({ desk });
      logger.info('deliveryStore', `Order ${order.id} placed: ${order.restaurant} -> ${order.destination}`);
      return order;
    },

    processNextOrder: () => {
      const { desk, order } = processNextOrder(get().desk);
      set({ desk });
      logger.info('deliveryStore', `Order ${order.id} delivered`);
      return order;
    },

    revertLastDelivery: () => {
      const { desk, order } = revertLastDelivery(get().desk);
      set({ desk });
      logger.warn('deliveryStore', `Reverted delivery ${order.id}, back in the pending queue`);
      return order;
    },

    optimizeOrderRoute: (orderId) => {
      const { desk, graph, depot } = get();
      const order = findOrder(desk, orderId);
      if (order === null) {
        throw new OrderNotFoundError(orderId);
      }
      const plan = optimizeRoute(graph, { pickup: order.restaurant, dropoff: order.destination }, depot);
      logger.debug('deliveryStore', `Route plan for order ${orderId}`, formatRoutePlan(plan));
      return plan;
    },

    getStatus: () => {
      const { desk, graph } = get();
      return {
        pendingOrders: desk.pending.length,
        completedDeliveries: desk.completed.length,
        nextOrderId: desk.nextOrderId,
        locationCount: graph.size,
        locations: graph.locations(),
      };
    },
  }));
}

export type DeliveryStoreApi = ReturnType<typeof createDeliveryStore>;
