export interface Route {
  start: string;
  end: string;
  /** Distance in km */
  distance: number;
}

/** Seed description of a delivery network */
export interface Network {
  locations: string[];
  routes: Route[];
}

export type AddLocationResult = 'added' | 'exists';

export interface OrderRequest {
  restaurant: string;
  destination: string;
  price: number;
}

export interface Order extends OrderRequest {
  id: number;
}

export type OrderStatus = 'pending' | 'delivered';

/** Anything with a pickup and a dropoff can be routed from the depot */
export interface RoutableOrder {
  pickup: string;
  dropoff: string;
}

export interface RouteSegment {
  from: string;
  to: string;
  path: string[];
  /** null when no route connects the two locations */
  distance: number | null;
}

export interface RoutePlan {
  depot: string;
  toPickup: RouteSegment;
  toDropoff: RouteSegment;
  /** null when either segment is unreachable */
  total: number | null;
}
