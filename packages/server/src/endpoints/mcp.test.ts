import pino from "pino";
import { beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import type { BaseCommands } from "@testbridge/shared";
import { RequestDispatcher } from "../compiler/dispatcher.js";
import {
  ProcessLaunchError,
  type ProcessResult,
  type ProcessRunner,
} from "../harness/process-runner.js";
import { McpToolHandler } from "./mcp.js";

const baseCommands: BaseCommands = {
  rspecBase: "bundle exec rspec",
  cargoBase: "cargo test",
  cypressBase: "npx cypress run",
};

const finished: ProcessResult = {
  exitCode: 0,
  signal: null,
  stdout: "2 examples, 0 failures",
  stderr: "",
  truncated: false,
  wallMs: 40,
};

let run: Mock<ProcessRunner["run"]>;
let handler: McpToolHandler;

beforeEach(() => {
  run = vi.fn<ProcessRunner["run"]>().mockResolvedValue(finished);
  handler = new McpToolHandler({
    dispatcher: new RequestDispatcher(baseCommands),
    runner: { run },
    logger: pino({ level: "silent" }),
  });
});

function call(name: string, args: unknown) {
  return handler.handle({
    jsonrpc: "2.0",
    id: 7,
    method: "tools/call",
    params: { name, arguments: args },
  });
}

describe("McpToolHandler", () => {
  it("answers initialize with server info and tool capability", async () => {
    const response = await handler.handle({
      jsonrpc: "2.0",
      id: 1,
      method: "initialize",
      params: {},
    });
    expect(response).toMatchObject({
      jsonrpc: "2.0",
      id: 1,
      result: {
        protocolVersion: "2024-11-05",
        capabilities: { tools: {} },
        serverInfo: { name: "testbridge", version: "0.1.0" },
      },
    });
  });

  it("does not answer notifications", async () => {
    expect(
      await handler.handle({ jsonrpc: "2.0", method: "notifications/initialized" })
    ).toBeNull();
  });

  it("treats any message without an id as a notification", async () => {
    expect(await handler.handle({ jsonrpc: "2.0", method: "ping" })).toBeNull();
    expect(
      await handler.handle({
        jsonrpc: "2.0",
        method: "tools/call",
        params: { name: "run_rspec", arguments: { file: "a_spec.rb" } },
      })
    ).toBeNull();
    expect(run).not.toHaveBeenCalled();
  });

  it("answers ping", async () => {
    expect(
      await handler.handle({ jsonrpc: "2.0", id: "p", method: "ping" })
    ).toEqual({ jsonrpc: "2.0", id: "p", result: {} });
  });

  it("lists the tools", async () => {
    const response = await handler.handle({
      jsonrpc: "2.0",
      id: 2,
      method: "tools/list",
    });
    expect(response).toMatchObject({
      id: 2,
      result: {
        tools: [
          { name: "run_rspec" },
          { name: "run_cargo_tests" },
          { name: "run_cypress" },
        ],
      },
    });
  });

  it("advertises the base commands the dispatcher runs", async () => {
    const custom = new McpToolHandler({
      dispatcher: new RequestDispatcher({ ...baseCommands, rspecBase: "bin/rspec" }),
      runner: { run },
      logger: pino({ level: "silent" }),
    });
    const response = await custom.handle({
      jsonrpc: "2.0",
      id: 3,
      method: "tools/list",
    });
    expect(JSON.stringify(response)).toContain("Run an RSpec spec file with `bin/rspec`.");
  });

  it("runs the compiled command and returns the report", async () => {
    const response = await call("run_rspec", { file: "./spec/a_spec.rb:12" });

    expect(run).toHaveBeenCalledWith({
      program: "bundle",
      args: ["exec", "rspec", "spec/a_spec.rb", "-l", "12"],
    });
    expect(response).toEqual({
      jsonrpc: "2.0",
      id: 7,
      result: {
        content: [
          {
            type: "text",
            text: [
              "RSpec Test Results for: ./spec/a_spec.rb:12",
              "Command: bundle exec rspec spec/a_spec.rb -l 12",
              "Exit Code: 0",
              "",
              "Output:",
              "2 examples, 0 failures",
              "",
              "Errors:",
              "",
            ].join("\n"),
          },
        ],
        isError: false,
      },
    });
  });

  it("flags a failing test run as an error result", async () => {
    run.mockResolvedValue({ ...finished, exitCode: 101, stdout: "1 failed" });
    const response = await call("run_cargo_tests", {
      pattern: "test_foo",
      args: ["--nocapture"],
    });

    expect(run).toHaveBeenCalledWith({
      program: "cargo",
      args: ["test", "test_foo", "--nocapture"],
    });
    expect(response).toMatchObject({ id: 7, result: { isError: true } });
  });

  it("rejects an invalid location without spawning anything", async () => {
    const response = await call("run_rspec", { file: "spec/user.rb" });

    expect(run).not.toHaveBeenCalled();
    expect(response).toEqual({
      jsonrpc: "2.0",
      id: 7,
      result: {
        content: [
          {
            type: "text",
            text: 'InvalidSpecSuffix: Invalid spec file "spec/user.rb": path must end in _spec.rb',
          },
        ],
        isError: true,
      },
    });
  });

  it("returns invalid params for unknown tools and bad arguments", async () => {
    expect(await call("run_jest", {})).toEqual({
      jsonrpc: "2.0",
      id: 7,
      error: { code: -32602, message: "Unknown tool: run_jest" },
    });
    expect(await call("run_rspec", {})).toEqual({
      jsonrpc: "2.0",
      id: 7,
      error: {
        code: -32602,
        message: "Invalid arguments for run_rspec:\n- file: Required",
      },
    });
    expect(
      await handler.handle({ jsonrpc: "2.0", id: 8, method: "tools/call", params: {} })
    ).toEqual({
      jsonrpc: "2.0",
      id: 8,
      error: { code: -32602, message: "tools/call requires a tool name" },
    });
    expect(run).not.toHaveBeenCalled();
  });

  it("maps a launch failure to an internal error", async () => {
    run.mockImplementation((command) =>
      Promise.reject(
        new ProcessLaunchError(command, new Error("spawn bundle ENOENT"))
      )
    );
    expect(await call("run_rspec", { file: "a_spec.rb" })).toEqual({
      jsonrpc: "2.0",
      id: 7,
      error: {
        code: -32603,
        message: "Command failed: Failed to launch bundle: spawn bundle ENOENT",
      },
    });
  });

  it("rejects malformed messages and unknown methods", async () => {
    expect(await handler.handle({ id: 4, method: 3 })).toEqual({
      jsonrpc: "2.0",
      id: 4,
      error: { code: -32600, message: "Invalid Request" },
    });
    expect(await handler.handle("hello")).toEqual({
      jsonrpc: "2.0",
      id: null,
      error: { code: -32600, message: "Invalid Request" },
    });
    expect(
      await handler.handle({ jsonrpc: "2.0", id: 5, method: "resources/list" })
    ).toEqual({
      jsonrpc: "2.0",
      id: 5,
      error: { code: -32601, message: "Method not found" },
    });
  });
});
