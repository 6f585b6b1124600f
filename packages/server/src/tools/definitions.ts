/**
 * Tool definitions exposed over MCP and the mapping from tool arguments to
 * test-run requests
 */

import { z } from "zod";
import {
  TOOL_NAMES,
  err,
  ok,
  type BaseCommands,
  type Result,
  type TestRunnerRequest,
  type ToolDefinition,
} from "@testbridge/shared";

export const RunRspecParamsZ = z
  .object({
    file: z.string(),
  })
  .strict();

export const RunCargoTestsParamsZ = z
  .object({
    pattern: z.string().optional(),
    args: z.array(z.string()).default([]),
  })
  .strict();

export const RunCypressParamsZ = z
  .object({
    spec: z.string(),
  })
  .strict();

export type ToolRequestError =
  | { kind: "UnknownTool"; tool: string }
  | { kind: "InvalidArguments"; tool: string; issues: string[] };

export function listTools(config: Readonly<BaseCommands>): ToolDefinition[] {
  return [
    {
      name: TOOL_NAMES.RUN_RSPEC,
      description: `Run an RSpec spec file with \`${config.rspecBase}\`. Accepts "path/to/file_spec.rb" optionally followed by ":LINE" markers (e.g. "spec/models/user_spec.rb:37:87") to run only the examples at those lines.`,
      inputSchema: {
        type: "object",
        properties: {
          file: {
            type: "string",
            description:
              'Spec file to run, ending in _spec.rb, with optional ":LINE" suffixes',
          },
        },
        required: ["file"],
        additionalProperties: false,
      },
    },
    {
      name: TOOL_NAMES.RUN_CARGO_TESTS,
      description: `Run Cargo tests with \`${config.cargoBase}\`. An optional name pattern selects tests; extra arguments are passed through unchanged.`,
      inputSchema: {
        type: "object",
        properties: {
          pattern: {
            type: "string",
            description: "Test name filter (optional)",
          },
          args: {
            type: "array",
            items: { type: "string" },
            description:
              'Additional arguments, e.g. ["--", "--nocapture"] (optional)',
          },
        },
        additionalProperties: false,
      },
    },
    {
      name: TOOL_NAMES.RUN_CYPRESS,
      description: `Run one Cypress spec file with \`${config.cypressBase}\` and summarize the JSON report.`,
      inputSchema: {
        type: "object",
        properties: {
          spec: {
            type: "string",
            description: "Spec file ending in .cy.js, .cy.ts, .cy.jsx or .cy.tsx",
          },
        },
        required: ["spec"],
        additionalProperties: false,
      },
    },
  ];
}

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map(
    (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
  );
}

export function toRunnerRequest(
  tool: string,
  args: unknown
): Result<TestRunnerRequest, ToolRequestError> {
  // Clients may omit `arguments` entirely for tools without required fields
  const input = args ?? {};

  switch (tool) {
    case TOOL_NAMES.RUN_RSPEC: {
      const parsed = RunRspecParamsZ.safeParse(input);
      if (!parsed.success) {
        return err({ kind: "InvalidArguments", tool, issues: issuesOf(parsed.error) });
      }
      return ok({ kind: "run-spec-file", rawLocation: parsed.data.file });
    }
    case TOOL_NAMES.RUN_CARGO_TESTS: {
      const parsed = RunCargoTestsParamsZ.safeParse(input);
      if (!parsed.success) {
        return err({ kind: "InvalidArguments", tool, issues: issuesOf(parsed.error) });
      }
      return ok({
        kind: "run-cargo-tests",
        pattern: parsed.data.pattern,
        extraArgs: parsed.data.args,
      });
    }
    case TOOL_NAMES.RUN_CYPRESS: {
      const parsed = RunCypressParamsZ.safeParse(input);
      if (!parsed.success) {
        return err({ kind: "InvalidArguments", tool, issues: issuesOf(parsed.error) });
      }
      return ok({ kind: "run-cypress-spec", rawLocation: parsed.data.spec });
    }
    default:
      return err({ kind: "UnknownTool", tool });
  }
}
