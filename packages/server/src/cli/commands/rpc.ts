/**
 * rpc command - handles a single JSON-RPC message from the argument or stdin
 */

import type { Command } from "commander";
import { JSON_RPC_ERRORS, type JsonRpcResponse } from "@testbridge/shared";
import { McpToolHandler } from "../../endpoints/mcp.js";
import { ChildProcessRunner } from "../../harness/process-runner.js";
import { createContext } from "../context.js";

async function readAll(input: AsyncIterable<unknown>): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of input) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf-8");
}

export async function rpcCommand(
  message: string | undefined,
  command: Command,
  input: AsyncIterable<unknown> = process.stdin
): Promise<void> {
  const { config, logger, dispatcher } = await createContext(command);
  const text = message ?? (await readAll(input));

  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch (error) {
    logger.warn({ err: error }, "Unparseable JSON-RPC message");
    const response: JsonRpcResponse = {
      jsonrpc: "2.0",
      id: null,
      error: { code: JSON_RPC_ERRORS.PARSE_ERROR, message: "Parse error" },
    };
    console.log(JSON.stringify(response));
    process.exitCode = 1;
    return;
  }

  const handler = new McpToolHandler({
    dispatcher,
    runner: new ChildProcessRunner(
      { workdir: config.workdir, maxOutputBytes: config.maxOutputBytes },
      logger
    ),
    logger,
  });

  const response = await handler.handle(body);
  if (response) {
    console.log(JSON.stringify(response));
  }
}
