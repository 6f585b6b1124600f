/**
 * Shared constants
 */

export const VERSION = "0.1.0";

export const SERVER_NAME = "testbridge";

export const MCP_PROTOCOL_VERSION = "2024-11-05";

/**
 * Raw location syntax: PATH(:LINE)*
 */
export const LOCATION_SEPARATOR = ":";

/**
 * RSpec line filter flag, repeated once per line number
 */
export const LINE_NUMBER_FLAG = "-l";

/**
 * File naming conventions
 */
export const SPEC_SUFFIXES = {
  RSPEC: ["_spec.rb"],
  CYPRESS: [".cy.js", ".cy.ts", ".cy.jsx", ".cy.tsx"],
} as const;

export const CYPRESS_FLAGS = {
  SPEC: "--spec",
  REPORTER: "--reporter",
  REPORTER_JSON: "json",
} as const;

/**
 * Tool names exposed over MCP
 */
export const TOOL_NAMES = {
  RUN_RSPEC: "run_rspec",
  RUN_CARGO_TESTS: "run_cargo_tests",
  RUN_CYPRESS: "run_cypress",
} as const;

/**
 * JSON-RPC error codes
 */
export const JSON_RPC_ERRORS = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL: -32603,
} as const;

export const CONFIG_FILENAME = "testbridge.config.json";

/**
 * Environment overrides, applied over the config file
 */
export const ENV_VARS = {
  RSPEC_BASE: "TESTBRIDGE_RSPEC_BASE",
  CARGO_BASE: "TESTBRIDGE_CARGO_BASE",
  CYPRESS_BASE: "TESTBRIDGE_CYPRESS_BASE",
  WORKDIR: "TESTBRIDGE_WORKDIR",
  MAX_OUTPUT_BYTES: "TESTBRIDGE_MAX_OUTPUT_BYTES",
  LOG_LEVEL: "LOG_LEVEL",
} as const;
