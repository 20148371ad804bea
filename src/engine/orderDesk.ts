import type { RouteGraph } from '../data/routeGraph';
import type { Order, OrderRequest, OrderStatus } from '../types/delivery';
import { EmptyQueueError, InvalidPriceError, UnknownLocationError } from './errors';

export const FIRST_ORDER_ID = 1001;

export interface OrderDesk {
  /** Oldest first */
  pending: Order[];
  /** Most recent delivery last */
  completed: Order[];
  /** Every order ever placed, keyed by ID */
  orders: Record<number, Order>;
  nextOrderId: number;
}

export interface DeskUpdate {
  desk: OrderDesk;
  order: Order;
}

export function createOrderDesk(firstId: number = FIRST_ORDER_ID): OrderDesk {
  return { pending: [], completed: [], orders: {}, nextOrderId: firstId };
}

export function placeOrder(desk: OrderDesk, graph: RouteGraph, request: OrderRequest): DeskUpdate {
  const missing = [request.restaurant, request.destination].filter((name) => !graph.hasLocation(name));
  if (missing.length > 0) {
    throw new UnknownLocationError(missing);
  }
  if (!Number.isFinite(request.price) || request.price < 0) {
    throw new InvalidPriceError(request.price);
  }

  const order: Order = { id: desk.nextOrderId, ...request };
  return {
    desk: {
      pending: [...desk.pending, order],
      completed: desk.completed,
      orders: { ...desk.orders, [order.id]: order },
      nextOrderId: desk.nextOrderId + 1,
    },
    order,
  };
}

/** Deliver the oldest pending order. */
export function processNextOrder(desk: OrderDesk): DeskUpdate {
  const [order, ...rest] = desk.pending;
  if (order === undefined) {
    throw new EmptyQueueError('No pending orders in the queue');
  }
  return {
    desk: { ...desk, pending: rest, completed: [...desk.completed, order] },
    order,
  };
}

/** Put the most recent delivery back at the end of the pending queue. */
export function revertLastDelivery(desk: OrderDesk): DeskUpdate {
  const order = lastDelivery(desk);
  if (order === null) {
    throw new EmptyQueueError('No completed deliveries to revert');
  }
  return {
    desk: {
      ...desk,
      pending: [...desk.pending, order],
      completed: desk.completed.slice(0, -1),
    },
    order,
  };
}

export function lastDelivery(desk: OrderDesk): Order | null {
  return desk.completed[desk.completed.length - 1] ?? null;
}

export function pendingOrders(desk: OrderDesk): Order[] {
  return [...desk.pending];
}

export function findOrder(desk: OrderDesk, id: number): Order | null {
  return desk.orders[id] ?? null;
}

export function orderStatus(desk: OrderDesk, id: number): OrderStatus | null {
  if (findOrder(desk, id) === null) return null;
  return desk.completed.some((o) => o.id === id) ? 'delivered' : 'pending';
}
