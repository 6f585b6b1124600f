import { describe, expect, it } from "vitest";
import type { ProcessResult } from "../harness/process-runner.js";
import { formatRunReport, reportHeading } from "./report.js";

function result(overrides: Partial<ProcessResult> = {}): ProcessResult {
  return {
    exitCode: 0,
    signal: null,
    stdout: "",
    stderr: "",
    truncated: false,
    wallMs: 5,
    ...overrides,
  };
}

describe("reportHeading", () => {
  it("names the request", () => {
    expect(
      reportHeading({ kind: "run-spec-file", rawLocation: "a_spec.rb:3" })
    ).toBe("RSpec Test Results for: a_spec.rb:3");
    expect(
      reportHeading({ kind: "run-cargo-tests", pattern: "parser", extraArgs: [] })
    ).toBe("Cargo Test Results for: parser");
    expect(reportHeading({ kind: "run-cargo-tests", extraArgs: [] })).toBe(
      "Cargo Test Results for: all tests"
    );
    expect(
      reportHeading({ kind: "run-cypress-spec", rawLocation: "login.cy.ts" })
    ).toBe("Cypress Test Results for: login.cy.ts");
  });
});

describe("formatRunReport", () => {
  it("lays out heading, command, exit code and both streams", () => {
    const text = formatRunReport(
      { kind: "run-spec-file", rawLocation: "spec/models/user_spec.rb:37" },
      {
        program: "bundle",
        args: ["exec", "rspec", "spec/models/user_spec.rb", "-l", "37"],
      },
      result({ stdout: "1 example, 0 failures", stderr: "warning: deprecated" })
    );
    expect(text).toBe(
      [
        "RSpec Test Results for: spec/models/user_spec.rb:37",
        "Command: bundle exec rspec spec/models/user_spec.rb -l 37",
        "Exit Code: 0",
        "",
        "Output:",
        "1 example, 0 failures",
        "",
        "Errors:",
        "warning: deprecated",
      ].join("\n")
    );
  });

  it("shows -1 for a missing exit code and marks truncation", () => {
    const text = formatRunReport(
      { kind: "run-cargo-tests", extraArgs: [] },
      { program: "cargo", args: ["test"] },
      result({ exitCode: null, signal: "SIGTERM", truncated: true, stdout: "run" })
    );
    expect(text.split("\n").slice(0, 5)).toEqual([
      "Cargo Test Results for: all tests",
      "Command: cargo test",
      "Exit Code: -1",
      "(output truncated)",
      "",
    ]);
  });

  it("summarizes a Cypress JSON report and keeps raw output otherwise", () => {
    const json = JSON.stringify({
      stats: { suites: 1, tests: 1, passes: 1, pending: 0, failures: 0 },
      tests: [],
      pending: [],
      failures: [],
      passes: [],
    });
    const request = { kind: "run-cypress-spec", rawLocation: "a.cy.ts" } as const;
    const command = { program: "cypress", args: ["run"] };

    const summarized = formatRunReport(
      request,
      command,
      result({ stdout: `noise\n${json}` })
    );
    expect(summarized.split("\n")[5]).toBe(
      "Tests: 1, Passes: 1, Failures: 0, Pending: 0"
    );

    const raw = formatRunReport(
      request,
      command,
      result({ stdout: "No specs found" })
    );
    expect(raw.split("\n")[5]).toBe("No specs found");
  });
});
