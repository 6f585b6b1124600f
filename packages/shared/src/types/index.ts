export * from "./config.js";
export * from "./errors.js";
export * from "./mcp.js";
export * from "./result.js";
export * from "./runner.js";
