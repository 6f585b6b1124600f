/**
 * MCP protocol handler - one JSON-RPC message in, one response (or none) out.
 * Transport-agnostic: framing and listening belong to the caller.
 */

import { nanoid } from "nanoid";
import type { Logger } from "pino";
import { z } from "zod";
import {
  JSON_RPC_ERRORS,
  MCP_PROTOCOL_VERSION,
  SERVER_NAME,
  VERSION,
  type JsonRpcErrorObject,
  type JsonRpcId,
  type JsonRpcResponse,
  type ToolCallResult,
} from "@testbridge/shared";
import type { RequestDispatcher } from "../compiler/dispatcher.js";
import {
  ProcessLaunchError,
  type ProcessRunner,
} from "../harness/process-runner.js";
import { listTools, toRunnerRequest } from "../tools/definitions.js";
import { formatRunReport } from "../tools/report.js";

const JsonRpcRequestZ = z.object({
  jsonrpc: z.literal("2.0"),
  id: z.union([z.string(), z.number(), z.null()]).optional(),
  method: z.string(),
  params: z.unknown().optional(),
});

const ToolCallParamsZ = z.object({
  name: z.string(),
  arguments: z.unknown().optional(),
});

export interface McpHandlerDeps {
  dispatcher: RequestDispatcher;
  runner: ProcessRunner;
  logger: Logger;
}

function success(id: JsonRpcId, result: unknown): JsonRpcResponse {
  return { jsonrpc: "2.0", id, result };
}

function failure(id: JsonRpcId, error: JsonRpcErrorObject): JsonRpcResponse {
  return { jsonrpc: "2.0", id, error };
}

function textResult(text: string, isError: boolean): ToolCallResult {
  return { content: [{ type: "text", text }], isError };
}

/** Best-effort id recovery so malformed requests still get a correlated reply. */
function idOf(message: unknown): JsonRpcId {
  if (typeof message === "object" && message !== null && "id" in message) {
    const { id } = message;
    if (typeof id === "string" || typeof id === "number") {
      return id;
    }
  }
  return null;
}

export class McpToolHandler {
  private readonly log: Logger;

  constructor(private deps: McpHandlerDeps) {
    this.log = deps.logger.child({ component: "mcp" });
  }

  async handle(message: unknown): Promise<JsonRpcResponse | null> {
    const parsed = JsonRpcRequestZ.safeParse(message);
    if (!parsed.success) {
      return failure(idOf(message), {
        code: JSON_RPC_ERRORS.INVALID_REQUEST,
        message: "Invalid Request",
      });
    }

    const { id, method, params } = parsed.data;

    // A message without an id is a notification and gets no response
    if (id === undefined) {
      this.log.debug({ method }, "Notification received");
      return null;
    }

    switch (method) {
      case "initialize":
        return success(id, {
          protocolVersion: MCP_PROTOCOL_VERSION,
          capabilities: {
            tools: {},
          },
          serverInfo: {
            name: SERVER_NAME,
            version: VERSION,
          },
          instructions: `Test runner bridge. Tools: run_rspec (RSpec spec file, optional :LINE filters), run_cargo_tests (Cargo tests by pattern), run_cypress (one Cypress spec).`,
        });
      case "ping":
        return success(id, {});
      case "tools/list":
        return success(id, { tools: listTools(this.deps.dispatcher.config) });
      case "tools/call":
        return this.callTool(id, params);
      default:
        return failure(id, {
          code: JSON_RPC_ERRORS.METHOD_NOT_FOUND,
          message: "Method not found",
        });
    }
  }

  private async callTool(
    id: JsonRpcId,
    params: unknown
  ): Promise<JsonRpcResponse> {
    const call = ToolCallParamsZ.safeParse(params);
    if (!call.success) {
      return failure(id, {
        code: JSON_RPC_ERRORS.INVALID_PARAMS,
        message: "tools/call requires a tool name",
      });
    }

    const { name } = call.data;
    const runId = nanoid(10);
    const log = this.log.child({ runId, tool: name });

    const request = toRunnerRequest(name, call.data.arguments);
    if (!request.ok) {
      const error = request.error;
      log.warn({ kind: error.kind }, "Rejected tool call");
      return failure(id, {
        code: JSON_RPC_ERRORS.INVALID_PARAMS,
        message:
          error.kind === "UnknownTool"
            ? `Unknown tool: ${error.tool}`
            : `Invalid arguments for ${error.tool}:\n- ${error.issues.join("\n- ")}`,
      });
    }

    const compiled = this.deps.dispatcher.dispatch(request.value);
    if (!compiled.ok) {
      const { kind, message } = compiled.error;
      log.info({ kind }, "Request rejected before spawn");
      return success(id, textResult(`${kind}: ${message}`, true));
    }

    const command = compiled.value;
    log.info(
      { program: command.program, argsCount: command.args.length },
      "Running test command"
    );

    try {
      const result = await this.deps.runner.run(command);
      log.info(
        { exitCode: result.exitCode, wallMs: result.wallMs },
        "Tool call complete"
      );
      return success(
        id,
        textResult(
          formatRunReport(request.value, command, result),
          result.exitCode !== 0
        )
      );
    } catch (error) {
      log.error({ err: error }, "Tool call failed");
      if (error instanceof ProcessLaunchError) {
        return failure(id, {
          code: JSON_RPC_ERRORS.INTERNAL,
          message: `Command failed: ${error.message}`,
        });
      }
      throw error;
    }
  }
}
