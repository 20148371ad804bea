export type DeliveryErrorCode =
  | 'UNKNOWN_LOCATION'
  | 'MISSING_DEPOT'
  | 'INVALID_DISTANCE'
  | 'INVALID_PRICE'
  | 'ORDER_NOT_FOUND'
  | 'EMPTY_QUEUE';

export class DeliveryError extends Error {
  readonly code: DeliveryErrorCode;

  constructor(code: DeliveryErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class UnknownLocationError extends DeliveryError {
  readonly missing: string[];

  constructor(missing: string[]) {
    super('UNKNOWN_LOCATION', `Unknown location(s): ${missing.join(', ')}. Add them first.`);
    this.missing = missing;
  }
}

export class MissingDepotError extends DeliveryError {
  readonly depot: string;

  constructor(depot: string) {
    super('MISSING_DEPOT', `Depot location "${depot}" is missing`);
    this.depot = depot;
  }
}

export class InvalidDistanceError extends DeliveryError {
  constructor(distance: number) {
    super('INVALID_DISTANCE', `Distance must be a non-negative safe integer (got ${distance})`);
  }
}

export class InvalidPriceError extends DeliveryError {
  constructor(price: number) {
    super('INVALID_PRICE', `Price must be a non-negative number (got ${price})`);
  }
}

export class OrderNotFoundError extends DeliveryError {
  readonly orderId: number;

  constructor(orderId: number) {
    super('ORDER_NOT_FOUND', `Order ID ${orderId} not found`);
    this.orderId = orderId;
  }
}

export class EmptyQueueError extends DeliveryError {
  constructor(message: string) {
    super('EMPTY_QUEUE', message);
  }
}
