export {
  type Result,
  Ok,
  Err,
  isOk,
  isErr,
  map,
  andThen,
  unwrapOr,
  unwrap,
  errorMessage,
  tryCatch,
} from "./result.js";

export {
  type TextContent,
  type ToolResponse,
  textResponse,
  errorResponse,
  resultToStructuredResponse,
} from "./mcp.js";

export {
  type LogLevel,
  type Logger,
  type LogSink,
  LOG_LEVELS,
  createLogger,
  parseLogLevel,
  setLogLevel,
  getLogLevel,
} from "./logger.js";

export {
  type ServerConfig,
  type ServerBootstrapOptions,
  createServer,
  bootstrapServer,
  runServer,
  McpServer,
} from "./server.js";
