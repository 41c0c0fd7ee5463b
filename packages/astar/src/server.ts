#!/usr/bin/env node
/**
 * MCP server for shortest-path queries over a loaded graph.
 */

import { createLogger, runServer, setLogLevel } from "@waypoint/core";
import { loadConfig } from "./config.js";
import { PathService } from "./PathService.js";
import { registerAllTools, type Services } from "./tools/index.js";

const loaded = loadConfig();
if (!loaded.ok) {
  createLogger("waypoint").error(loaded.error);
  process.exit(1);
}
const config = loaded.value;
setLogLevel(config.logLevel);

runServer<Services>({
  config: {
    name: "waypoint",
    version: "0.1.0",
  },
  createServices: (logger) => ({
    paths: new PathService({ costs: config.costs, weightAttribute: config.weightAttribute }, logger.child("paths")),
  }),
  registerTools: registerAllTools,
  onStartup: (services, logger) => {
    if (!config.graphFile) {
      logger.info("No WAYPOINT_GRAPH_FILE set; waiting for graph_load");
      return;
    }

    const loaded = services.paths.loadGraphFile(config.graphFile);
    if (!loaded.ok) {
      logger.warn(`Could not preload graph: ${loaded.error}`);
      logger.warn("Graph will not be available until loaded with graph_load.");
    }
  },
});
