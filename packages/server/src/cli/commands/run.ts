/**
 * run command - compiles a request, runs it and prints the report.
 * Exits with the test command's status.
 */

import type { Command } from "commander";
import kleur from "kleur";
import type { TestRunnerRequest } from "@testbridge/shared";
import {
  ChildProcessRunner,
  ProcessLaunchError,
} from "../../harness/process-runner.js";
import { formatRunReport } from "../../tools/report.js";
import { createContext } from "../context.js";

export async function runCommand(
  request: TestRunnerRequest,
  command: Command
): Promise<void> {
  const { config, logger, dispatcher } = await createContext(command);

  const compiled = dispatcher.dispatch(request);
  if (!compiled.ok) {
    console.error(
      kleur.red(`✗ ${compiled.error.kind}: ${compiled.error.message}`)
    );
    process.exitCode = 1;
    return;
  }

  const runner = new ChildProcessRunner(
    { workdir: config.workdir, maxOutputBytes: config.maxOutputBytes },
    logger
  );

  try {
    const result = await runner.run(compiled.value);
    console.log(formatRunReport(request, compiled.value, result));
    process.exitCode = result.exitCode ?? 1;
  } catch (error) {
    if (error instanceof ProcessLaunchError) {
      console.error(kleur.red(`✗ ${error.message}`));
      process.exitCode = 1;
      return;
    }
    throw error;
  }
}
