/**
 * Command compiler - merges a validated target with the configured base
 * command into the argument vector handed to the process runner
 */

import {
  CYPRESS_FLAGS,
  LINE_NUMBER_FLAG,
  err,
  ok,
  type CompileTarget,
  type CompiledCommand,
  type Result,
  type TestFramework,
  type ValidationError,
} from "@testbridge/shared";

/**
 * Whitespace split, no quoting. Base commands needing an argument with an
 * embedded space cannot be expressed.
 */
export function splitBaseCommand(
  baseCommand: string,
  framework: TestFramework
): Result<CompiledCommand, ValidationError> {
  const [program, ...args] = baseCommand
    .trim()
    .split(/\s+/)
    .filter((token) => token.length > 0);

  if (program === undefined) {
    return err({ kind: "EmptyBaseCommand", input: baseCommand, framework });
  }
  return ok({ program, args });
}

function targetArgs(target: CompileTarget): string[] {
  switch (target.framework) {
    case "rspec":
      return [
        target.path,
        ...target.lines.flatMap((line) => [LINE_NUMBER_FLAG, String(line)]),
      ];
    case "cypress":
      return [
        CYPRESS_FLAGS.SPEC,
        target.path,
        CYPRESS_FLAGS.REPORTER,
        CYPRESS_FLAGS.REPORTER_JSON,
      ];
    case "cargo":
      return [
        ...(target.pattern !== undefined ? [target.pattern] : []),
        ...target.extraArgs,
      ];
    default: {
      const unreachable: never = target;
      return unreachable;
    }
  }
}

export function compileCommand(
  baseCommand: string,
  target: CompileTarget
): Result<CompiledCommand, ValidationError> {
  const base = splitBaseCommand(baseCommand, target.framework);
  if (!base.ok) {
    return base;
  }

  return ok({
    program: base.value.program,
    args: [...base.value.args, ...targetArgs(target)],
  });
}

/** Single-line rendering for logs and reports; not shell-escaped. */
export function renderCommand(command: CompiledCommand): string {
  return [command.program, ...command.args].join(" ");
}
