import express, { type NextFunction, type Request, type Response } from "express";
import rateLimit from "express-rate-limit";
import { z, ZodError } from "zod";
import type { DeliveryStoreApi } from "../src/store/deliveryStore";
import { DeliveryError, type DeliveryErrorCode } from "../src/engine/errors";
import { lastDelivery, pendingOrders } from "../src/engine/orderDesk";
import { pathDistance, shortestPath } from "../src/engine/pathfinding";
import { formatRoutePlan } from "../src/engine/routeOptimizer";
import { logger } from "../src/engine/logger";

export interface AppOptions {
  /** Requests per minute per client on /api */
  rateLimitMax?: number;
}

const ERROR_STATUS: Record<DeliveryErrorCode, number> = {
  UNKNOWN_LOCATION: 404,
  ORDER_NOT_FOUND: 404,
  MISSING_DEPOT: 409,
  EMPTY_QUEUE: 409,
  INVALID_DISTANCE: 400,
  INVALID_PRICE: 400,
};

const locationName = z.string().trim().min(1);

const locationBody = z.object({ name: locationName });

const routeBody = z.object({
  start: locationName,
  end: locationName,
  distance: z.number().int().nonnegative().safe(),
});

const orderBody = z.object({
  restaurant: locationName,
  destination: locationName,
  price: z.number().nonnegative(),
});

const pathQuery = z.object({
  from: locationName,
  to: locationName,
});

/** Client errors raised by express middleware (http-errors shape) */
function clientErrorOf(err: unknown): { status: number; message: string } | null {
  if (!(err instanceof Error) || !("status" in err)) return null;
  const { status } = err;
  if (typeof status !== "number" || status < 400 || status >= 500) return null;
  const exposed = "expose" in err && err.expose === true;
  return { status, message: exposed ? err.message : "Bad request" };
}

const orderIdParam = z.coerce.number().int().positive();

export function createApp(store: DeliveryStoreApi, options: AppOptions = {}) {
  const app = express();

  app.use(express.json({ limit: "100kb" }));

  const apiLimiter = rateLimit({
    windowMs: 60_000,
    limit: options.rateLimitMax ?? 60,
    standardHeaders: true,
    legacyHeaders: false,
  });

  app.use("/api", apiLimiter);

  app.get("/api/status", (_req, res) => {
    res.json(store.getState().getStatus());
  });

  app.post("/api/locations", (req, res) => {
    const { name } = locationBody.parse(req.body);
    const result = store.getState().addLocation(name);
    res.status(result === "added" ? 201 : 200).json({ result });
  });

  app.get("/api/locations/:name/neighbors", (req, res) => {
    const name = locationName.parse(req.params.name);
    const neighbors = store.getState().graph.neighborsOf(name);
    res.json({ location: name, neighbors: Object.fromEntries(neighbors) });
  });

  app.post("/api/routes", (req, res) => {
    const { start, end, distance } = routeBody.parse(req.body);
    store.getState().addRoute(start, end, distance);
    res.status(201).json({ result: "added" });
  });

  app.get("/api/paths", (req, res) => {
    const { from, to } = pathQuery.parse(req.query);
    const { graph } = store.getState();
    const path = shortestPath(graph, from, to);
    res.json({ path, distance: path.length === 0 ? null : pathDistance(graph, path) });
  });

  app.post("/api/orders", (req, res) => {
    const order = store.getState().placeOrder(orderBody.parse(req.body));
    res.status(201).json(order);
  });

  app.get("/api/orders/pending", (_req, res) => {
    res.json(pendingOrders(store.getState().desk));
  });

  app.post("/api/orders/process", (_req, res) => {
    res.json(store.getState().processNextOrder());
  });

  app.get("/api/orders/last", (_req, res) => {
    res.json({ order: lastDelivery(store.getState().desk) });
  });

  app.post("/api/orders/revert", (_req, res) => {
    res.json(store.getState().revertLastDelivery());
  });

  app.get("/api/orders/:id/route", (req, res) => {
    const plan = store.getState().optimizeOrderRoute(orderIdParam.parse(req.params.id));
    res.json({ plan, report: formatRoutePlan(plan) });
  });

  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: "Malformed JSON body" });
      return;
    }
    if (err instanceof ZodError) {
      res.status(400).json({ error: "Invalid request", issues: err.issues });
      return;
    }
    if (err instanceof DeliveryError) {
      res.status(ERROR_STATUS[err.code]).json({ error: err.message, code: err.code });
      return;
    }
    const clientError = clientErrorOf(err);
    if (clientError) {
      res.status(clientError.status).json({ error: clientError.message });
      return;
    }
    logger.error("server", "Unhandled request error", err);
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
}
