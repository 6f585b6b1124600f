/**
 * Rejection taxonomy for the request-to-command compiler
 */

import type { TestFramework } from "./runner.js";

export type ValidationError =
  | { kind: "MalformedLocation"; input: string; segment: string }
  | { kind: "EmptyPath"; input: string }
  | {
      kind: "InvalidSpecSuffix";
      input: string;
      path: string;
      expected: readonly string[];
    }
  | { kind: "InvalidLineNumber"; input: string; line: number }
  | { kind: "UnsupportedLineFilter"; input: string; framework: TestFramework }
  | { kind: "EmptyBaseCommand"; input: string; framework: TestFramework };

export type ValidationErrorKind = ValidationError["kind"];

/** The one error shape callers outside the compiler ever see. */
export interface DispatchError {
  kind: ValidationErrorKind;
  message: string;
}
