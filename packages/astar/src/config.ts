/**
 * Server configuration from environment variables.
 */

import * as z from "zod/v4";
import { type Result, Ok, Err, type LogLevel, LOG_LEVELS } from "@waypoint/core";
import { COST_MODELS, DEFAULT_WEIGHT_ATTRIBUTE, type CostModelName } from "./core/costs.js";

const EnvSchema = z.object({
  WAYPOINT_GRAPH_FILE: z.string().min(1).optional(),
  WAYPOINT_WEIGHT_ATTRIBUTE: z.string().min(1).default(DEFAULT_WEIGHT_ATTRIBUTE),
  WAYPOINT_COSTS: z.enum(COST_MODELS).default("weighted"),
  WAYPOINT_LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

export interface WaypointConfig {
  /** Graph document loaded at startup */
  graphFile?: string;
  weightAttribute: string;
  costs: CostModelName;
  logLevel: LogLevel;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): Result<WaypointConfig, string> {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    return Err(`Invalid configuration: ${z.prettifyError(parsed.error)}`);
  }

  const values = parsed.data;
  return Ok({
    graphFile: values.WAYPOINT_GRAPH_FILE,
    weightAttribute: values.WAYPOINT_WEIGHT_ATTRIBUTE,
    costs: values.WAYPOINT_COSTS,
    logLevel: values.WAYPOINT_LOG_LEVEL,
  });
}
