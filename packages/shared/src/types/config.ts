/**
 * Configuration types - testbridge.config.json
 */

import type { BaseCommands } from "./runner.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface BridgeConfig extends BaseCommands {
  workdir: string;
  maxOutputBytes: number;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: BridgeConfig = {
  rspecBase: "bundle exec rspec",
  cargoBase: "cargo test",
  cypressBase: "npx cypress run",
  workdir: ".",
  maxOutputBytes: 1024 * 1024, // 1MB per stream
  logLevel: "info",
};
