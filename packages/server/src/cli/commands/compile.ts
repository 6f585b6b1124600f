/**
 * compile command - prints the command a request compiles to, without running it
 */

import type { Command } from "commander";
import kleur from "kleur";
import type { TestRunnerRequest } from "@testbridge/shared";
import { renderCommand } from "../../compiler/command.js";
import { createContext } from "../context.js";

export async function compileCommand(
  request: TestRunnerRequest,
  command: Command
): Promise<void> {
  const { dispatcher } = await createContext(command);
  const { json } = command.optsWithGlobals<{ json?: boolean }>();

  const compiled = dispatcher.dispatch(request);
  if (!compiled.ok) {
    console.error(
      kleur.red(`✗ ${compiled.error.kind}: ${compiled.error.message}`)
    );
    process.exitCode = 1;
    return;
  }

  if (json) {
    console.log(JSON.stringify(compiled.value, null, 2));
  } else {
    console.log(renderCommand(compiled.value));
  }
}
