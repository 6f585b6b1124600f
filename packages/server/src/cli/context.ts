/**
 * Per-invocation context built from global CLI options
 */

import { InvalidArgumentError, type Command } from "commander";
import type { Logger } from "pino";
import type { BridgeConfig, LogLevel } from "@testbridge/shared";
import { RequestDispatcher } from "../compiler/dispatcher.js";
import { LogLevelZ, loadConfig, type ConfigOverrides } from "../config/load.js";
import { createLogger } from "../logger.js";

export interface GlobalOptions {
  config?: string;
  rspecBase?: string;
  cargoBase?: string;
  cypressBase?: string;
  workdir?: string;
  maxOutputBytes?: number;
  logLevel?: LogLevel;
}

export interface CliContext {
  config: BridgeConfig;
  logger: Logger;
  dispatcher: RequestDispatcher;
}

export function parseLogLevel(value: string): LogLevel {
  const level = LogLevelZ.safeParse(value);
  if (!level.success) {
    throw new InvalidArgumentError("Expected one of debug, info, warn, error.");
  }
  return level.data;
}

export function parseByteCount(value: string): number {
  const bytes = Number(value);
  if (!/^[0-9]+$/.test(value) || !Number.isSafeInteger(bytes) || bytes < 1) {
    throw new InvalidArgumentError("Expected a positive whole number of bytes.");
  }
  return bytes;
}

export function toOverrides(opts: GlobalOptions): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  if (opts.rspecBase !== undefined) overrides.rspecBase = opts.rspecBase;
  if (opts.cargoBase !== undefined) overrides.cargoBase = opts.cargoBase;
  if (opts.cypressBase !== undefined) overrides.cypressBase = opts.cypressBase;
  if (opts.workdir !== undefined) overrides.workdir = opts.workdir;
  if (opts.maxOutputBytes !== undefined) {
    overrides.maxOutputBytes = opts.maxOutputBytes;
  }
  if (opts.logLevel !== undefined) overrides.logLevel = opts.logLevel;
  return overrides;
}

export async function createContext(command: Command): Promise<CliContext> {
  const opts = command.optsWithGlobals<GlobalOptions>();
  const config = await loadConfig({
    configPath: opts.config,
    overrides: toOverrides(opts),
  });
  const logger = createLogger({ level: config.logLevel });
  logger.debug({ config }, "Configuration loaded");

  return {
    config,
    logger,
    dispatcher: new RequestDispatcher(config),
  };
}
