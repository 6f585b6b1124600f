/**
 * rspec / cargo / cypress subcommands shared by `compile` and `run`
 */

import type { Command } from "commander";
import type { TestRunnerRequest } from "@testbridge/shared";

export type RequestAction = (
  request: TestRunnerRequest,
  command: Command
) => Promise<void>;

export function addRequestSubcommands(
  parent: Command,
  action: RequestAction
): Command {
  parent
    .command("rspec")
    .description("RSpec spec file, e.g. spec/models/user_spec.rb:37:87")
    .argument("<location>", "spec file with optional :LINE suffixes")
    .action((location: string, _options: unknown, command: Command) =>
      action({ kind: "run-spec-file", rawLocation: location }, command)
    );

  parent
    .command("cargo")
    .description("Cargo tests; put extra arguments after --")
    .option("-p, --pattern <pattern>", "test name filter")
    .argument("[args...]", "arguments passed through unchanged", [])
    .action(
      (args: string[], options: { pattern?: string }, command: Command) =>
        action(
          {
            kind: "run-cargo-tests",
            pattern: options.pattern,
            extraArgs: args,
          },
          command
        )
    );

  parent
    .command("cypress")
    .description("Cypress spec file, e.g. cypress/e2e/login.cy.ts")
    .argument("<spec>", "spec file")
    .action((spec: string, _options: unknown, command: Command) =>
      action({ kind: "run-cypress-spec", rawLocation: spec }, command)
    );

  return parent;
}
