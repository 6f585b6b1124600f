#!/usr/bin/env node
/**
 * CLI entry point
 */

import { Command } from "commander";
import kleur from "kleur";
import { VERSION } from "@testbridge/shared";
import { compileCommand } from "./commands/compile.js";
import { initCommand } from "./commands/init.js";
import { rpcCommand } from "./commands/rpc.js";
import { runCommand } from "./commands/run.js";
import { toolsCommand } from "./commands/tools.js";
import { parseByteCount, parseLogLevel } from "./context.js";
import { addRequestSubcommands } from "./requests.js";

const program = new Command();

program
  .name("testbridge")
  .description("Compile and run RSpec, Cargo and Cypress test requests for MCP clients")
  .version(VERSION)
  .option("-c, --config <path>", "Config file path (default: testbridge.config.json if present)")
  .option("--rspec-base <command>", "Base command for RSpec runs")
  .option("--cargo-base <command>", "Base command for Cargo runs")
  .option("--cypress-base <command>", "Base command for Cypress runs")
  .option("--workdir <dir>", "Working directory for test commands")
  .option("--max-output-bytes <bytes>", "Per-stream cap on captured output", parseByteCount)
  .option("--log-level <level>", "Log level (debug|info|warn|error)", parseLogLevel);

program
  .command("init")
  .description(`Initialize testbridge.config.json`)
  .option("--dir <path>", "Project directory", ".")
  .action((options: { dir: string }) => initCommand(options.dir));

addRequestSubcommands(
  program
    .command("compile")
    .description("Print the command a request compiles to")
    .option("--json", "Print program and arguments as JSON"),
  compileCommand
);

addRequestSubcommands(
  program.command("run").description("Compile a request, run it and print the report"),
  runCommand
);

program
  .command("tools")
  .description("Print the MCP tool definitions as JSON")
  .action((_options: unknown, command: Command) => toolsCommand(command));

program
  .command("rpc")
  .description("Handle one MCP JSON-RPC message (argument or stdin) and print the response")
  .argument("[message]", "JSON-RPC message; read from stdin when omitted")
  .action((message: string | undefined, _options: unknown, command: Command) =>
    rpcCommand(message, command)
  );

program.parseAsync().catch((error: unknown) => {
  console.error(kleur.red(`✗ ${error instanceof Error ? error.message : String(error)}`));
  process.exitCode = 1;
});
