export {
  type Result,
  Ok,
  Err,
  toError,
} from "./result.js";

export {
  type TextContent,
  type ToolResponse,
  type Failure,
  type FailureContent,
  errorResponse,
  describeFailure,
  resultToStructuredResponse,
} from "./mcp.js";

export {
  type ServerConfig,
  type ServerBootstrapOptions,
  bootstrapServer,
  runServer,
  McpServer,
} from "./server.js";
