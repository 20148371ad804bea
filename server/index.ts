import { createApp } from "./app";
import { loadConfig } from "./config";
import { buildSampleGraph, createRouteGraph } from "../src/data/routeGraph";
import { createDeliveryStore } from "../src/store/deliveryStore";
import { logger } from "../src/engine/logger";

const config = loadConfig();
logger.setLevel(config.logLevel);

const graph = config.seedNetwork ? buildSampleGraph() : createRouteGraph();
const store = createDeliveryStore({ depot: config.depot, graph });
// The agent always starts from the depot
store.getState().addLocation(config.depot);

const app = createApp(store, { rateLimitMax: config.rateLimitMax });

app.listen(config.port, () => {
  logger.info("server", `Delivery router listening on port ${config.port}`, {
    depot: config.depot,
    locations: graph.size,
  });
});
