/**
 * Request dispatcher - routes each request kind to its validator/compiler
 * pair and converts internal rejections into the external error shape
 */

import type {
  BaseCommands,
  CompiledCommand,
  DispatchError,
  ParsedLocation,
  Result,
  TestRunnerRequest,
  ValidatedTarget,
  ValidationError,
} from "@testbridge/shared";
import { compileCommand } from "./command.js";
import { parseLocation } from "./locator.js";
import { validateCypressLocation, validateSpecLocation } from "./validator.js";

type Validate = (
  location: ParsedLocation,
  input: string
) => Result<ValidatedTarget, ValidationError>;

function compileLocation(
  rawLocation: string,
  validate: Validate,
  baseCommand: string
): Result<CompiledCommand, ValidationError> {
  const parsed = parseLocation(rawLocation);
  if (!parsed.ok) {
    return parsed;
  }
  const target = validate(parsed.value, rawLocation);
  if (!target.ok) {
    return target;
  }
  return compileCommand(baseCommand, target.value);
}

function route(
  request: TestRunnerRequest,
  config: Readonly<BaseCommands>
): Result<CompiledCommand, ValidationError> {
  switch (request.kind) {
    case "run-spec-file":
      return compileLocation(
        request.rawLocation,
        validateSpecLocation,
        config.rspecBase
      );
    case "run-cypress-spec":
      return compileLocation(
        request.rawLocation,
        validateCypressLocation,
        config.cypressBase
      );
    case "run-cargo-tests":
      return compileCommand(config.cargoBase, {
        framework: "cargo",
        pattern: request.pattern,
        extraArgs: request.extraArgs,
      });
    default: {
      const unreachable: never = request;
      return unreachable;
    }
  }
}

export function describeValidationError(error: ValidationError): string {
  switch (error.kind) {
    case "MalformedLocation":
      return `Malformed location "${error.input}": segment "${error.segment}" is not a line number`;
    case "EmptyPath":
      return `Empty path in location "${error.input}"`;
    case "InvalidSpecSuffix":
      return `Invalid spec file "${error.path}": path must end in ${error.expected.join(" or ")}`;
    case "InvalidLineNumber":
      return `Invalid line number ${error.line} in "${error.input}": line numbers start at 1`;
    case "UnsupportedLineFilter":
      return `Line filters are not supported for ${error.framework}: "${error.input}"`;
    case "EmptyBaseCommand":
      return `No program in the configured ${error.framework} base command "${error.input}"`;
    default: {
      const unreachable: never = error;
      return unreachable;
    }
  }
}

export function dispatch(
  request: TestRunnerRequest,
  config: Readonly<BaseCommands>
): Result<CompiledCommand, DispatchError> {
  const compiled = route(request, config);
  if (compiled.ok) {
    return compiled;
  }
  return {
    ok: false,
    error: {
      kind: compiled.error.kind,
      message: describeValidationError(compiled.error),
    },
  };
}

export class RequestDispatcher {
  readonly config: Readonly<BaseCommands>;

  constructor(config: BaseCommands) {
    this.config = Object.freeze({ ...config });
  }

  dispatch(request: TestRunnerRequest): Result<CompiledCommand, DispatchError> {
    return dispatch(request, this.config);
  }
}
