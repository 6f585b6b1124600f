/**
 * Renders a finished run as the text body of a tool response
 */

import type { CompiledCommand, TestRunnerRequest } from "@testbridge/shared";
import { renderCommand } from "../compiler/command.js";
import type { ProcessResult } from "../harness/process-runner.js";
import { summarizeCypressOutput } from "./cypress-results.js";

export function reportHeading(request: TestRunnerRequest): string {
  switch (request.kind) {
    case "run-spec-file":
      return `RSpec Test Results for: ${request.rawLocation}`;
    case "run-cargo-tests":
      return `Cargo Test Results for: ${request.pattern ?? "all tests"}`;
    case "run-cypress-spec":
      return `Cypress Test Results for: ${request.rawLocation}`;
    default: {
      const unreachable: never = request;
      return unreachable;
    }
  }
}

export function formatRunReport(
  request: TestRunnerRequest,
  command: CompiledCommand,
  result: ProcessResult
): string {
  const output =
    request.kind === "run-cypress-spec"
      ? (summarizeCypressOutput(result.stdout) ?? result.stdout)
      : result.stdout;

  const lines = [
    reportHeading(request),
    `Command: ${renderCommand(command)}`,
    `Exit Code: ${result.exitCode ?? -1}`,
  ];
  if (result.truncated) {
    lines.push("(output truncated)");
  }
  lines.push("", "Output:", output, "", "Errors:", result.stderr);

  return lines.join("\n");
}
