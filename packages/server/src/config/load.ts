/**
 * Configuration loading - defaults, then testbridge.config.json, then
 * environment, then CLI flags (later wins)
 */

import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { z } from "zod";
import {
  CONFIG_FILENAME,
  DEFAULT_CONFIG,
  ENV_VARS,
  type BridgeConfig,
} from "@testbridge/shared";

export const LogLevelZ = z.enum(["debug", "info", "warn", "error"]);

export const BridgeConfigZ = z
  .object({
    rspecBase: z.string(),
    cargoBase: z.string(),
    cypressBase: z.string(),
    workdir: z.string(),
    maxOutputBytes: z.number().int().positive(),
    logLevel: LogLevelZ,
  })
  .partial()
  .strict();

export type ConfigOverrides = z.infer<typeof BridgeConfigZ>;

export class ConfigError extends Error {
  constructor(
    public readonly path: string,
    reason: string
  ) {
    super(`Invalid config ${path}: ${reason}`);
    this.name = "ConfigError";
  }
}

export interface LoadConfigOptions {
  /** Explicit config path; when given the file must exist. */
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
}

function isMissingFile(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

async function readConfigFile(
  path: string,
  required: boolean
): Promise<ConfigOverrides> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    if (!required && isMissingFile(error)) {
      return {};
    }
    throw new ConfigError(
      path,
      error instanceof Error ? error.message : String(error)
    );
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(
      path,
      error instanceof Error ? error.message : String(error)
    );
  }

  const parsed = BridgeConfigZ.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    throw new ConfigError(path, issues.join("; "));
  }
  return parsed.data;
}

export function readEnvOverrides(env: NodeJS.ProcessEnv): ConfigOverrides {
  const overrides: ConfigOverrides = {};

  if (env[ENV_VARS.RSPEC_BASE]) {
    overrides.rspecBase = env[ENV_VARS.RSPEC_BASE];
  }
  if (env[ENV_VARS.CARGO_BASE]) {
    overrides.cargoBase = env[ENV_VARS.CARGO_BASE];
  }
  if (env[ENV_VARS.CYPRESS_BASE]) {
    overrides.cypressBase = env[ENV_VARS.CYPRESS_BASE];
  }
  if (env[ENV_VARS.WORKDIR]) {
    overrides.workdir = env[ENV_VARS.WORKDIR];
  }

  const maxOutput = env[ENV_VARS.MAX_OUTPUT_BYTES];
  if (maxOutput) {
    const bytes = Number.parseInt(maxOutput, 10);
    if (Number.isSafeInteger(bytes) && bytes > 0) {
      overrides.maxOutputBytes = bytes;
    }
  }

  const level = LogLevelZ.safeParse(env[ENV_VARS.LOG_LEVEL]);
  if (level.success) {
    overrides.logLevel = level.data;
  }

  return overrides;
}

function applyLayer(
  base: BridgeConfig,
  layer: ConfigOverrides
): BridgeConfig {
  return {
    rspecBase: layer.rspecBase ?? base.rspecBase,
    cargoBase: layer.cargoBase ?? base.cargoBase,
    cypressBase: layer.cypressBase ?? base.cypressBase,
    workdir: layer.workdir ?? base.workdir,
    maxOutputBytes: layer.maxOutputBytes ?? base.maxOutputBytes,
    logLevel: layer.logLevel ?? base.logLevel,
  };
}

export async function loadConfig(
  options: LoadConfigOptions = {}
): Promise<BridgeConfig> {
  const cwd = options.cwd ?? process.cwd();
  const required = options.configPath !== undefined;
  const configPath = resolve(cwd, options.configPath ?? CONFIG_FILENAME);

  const fromFile = await readConfigFile(configPath, required);
  const fromEnv = readEnvOverrides(options.env ?? process.env);

  return [fromFile, fromEnv, options.overrides ?? {}].reduce(
    applyLayer,
    DEFAULT_CONFIG
  );
}
