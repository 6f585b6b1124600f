/**
 * @testbridge/server - request-to-command compiler and its collaborators
 */

export { parseLocation, formatLocation } from "./compiler/locator.js";
export {
  validateLocation,
  validateSpecLocation,
  validateCypressLocation,
  RSPEC_CONVENTION,
  CYPRESS_CONVENTION,
  type NamingConvention,
} from "./compiler/validator.js";
export {
  compileCommand,
  splitBaseCommand,
  renderCommand,
} from "./compiler/command.js";
export {
  dispatch,
  describeValidationError,
  RequestDispatcher,
} from "./compiler/dispatcher.js";
export {
  ChildProcessRunner,
  ProcessLaunchError,
  type ProcessResult,
  type ProcessRunner,
  type ProcessRunnerOptions,
} from "./harness/process-runner.js";
export { McpToolHandler, type McpHandlerDeps } from "./endpoints/mcp.js";
export { listTools, toRunnerRequest } from "./tools/definitions.js";
export { formatRunReport } from "./tools/report.js";
export { loadConfig, ConfigError, type ConfigOverrides } from "./config/load.js";
export { createLogger } from "./logger.js";
