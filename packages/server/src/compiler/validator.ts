/**
 * Format validator - applies a framework's file-naming convention to a
 * parsed location. Shape only: the filesystem is never consulted.
 */

import {
  SPEC_SUFFIXES,
  err,
  ok,
  type FileFramework,
  type ParsedLocation,
  type Result,
  type ValidatedTarget,
  type ValidationError,
} from "@testbridge/shared";
import { formatLocation } from "./locator.js";

export interface NamingConvention {
  framework: FileFramework;
  suffixes: readonly string[];
  /** Whether `path:LINE` filters can be passed through to the runner. */
  lineFilters: boolean;
}

export const RSPEC_CONVENTION: NamingConvention = {
  framework: "rspec",
  suffixes: SPEC_SUFFIXES.RSPEC,
  lineFilters: true,
};

export const CYPRESS_CONVENTION: NamingConvention = {
  framework: "cypress",
  suffixes: SPEC_SUFFIXES.CYPRESS,
  lineFilters: false,
};

const CURRENT_DIR_PREFIX = "./";

/**
 * `input` is the text the caller sent, echoed in rejections; it defaults to
 * the location re-rendered.
 */
export function validateLocation(
  location: ParsedLocation,
  convention: NamingConvention,
  input = formatLocation(location)
): Result<ValidatedTarget, ValidationError> {

  if (location.path.length === 0) {
    return err({ kind: "EmptyPath", input });
  }

  const path = location.path.startsWith(CURRENT_DIR_PREFIX)
    ? location.path.slice(CURRENT_DIR_PREFIX.length)
    : location.path;

  if (path.length === 0) {
    return err({ kind: "EmptyPath", input });
  }

  if (!convention.suffixes.some((suffix) => path.endsWith(suffix))) {
    return err({
      kind: "InvalidSpecSuffix",
      input,
      path,
      expected: convention.suffixes,
    });
  }

  if (!convention.lineFilters && location.lines.length > 0) {
    return err({
      kind: "UnsupportedLineFilter",
      input,
      framework: convention.framework,
    });
  }

  const zero = location.lines.find((line) => line < 1);
  if (zero !== undefined) {
    return err({ kind: "InvalidLineNumber", input, line: zero });
  }

  return ok({
    framework: convention.framework,
    path,
    lines: [...location.lines],
  });
}

export function validateSpecLocation(
  location: ParsedLocation,
  input?: string
): Result<ValidatedTarget, ValidationError> {
  return validateLocation(location, RSPEC_CONVENTION, input);
}

export function validateCypressLocation(
  location: ParsedLocation,
  input?: string
): Result<ValidatedTarget, ValidationError> {
  return validateLocation(location, CYPRESS_CONVENTION, input);
}
