/**
 * Path locator - splits "path[:line[:line...]]" into a path and line numbers
 */

import {
  LOCATION_SEPARATOR,
  err,
  ok,
  type ParsedLocation,
  type Result,
  type ValidationError,
} from "@testbridge/shared";

const DIGITS = /^[0-9]+$/;

/**
 * The first segment is always the path, even when empty. Every later segment
 * must be plain decimal digits, or the whole input is rejected.
 */
export function parseLocation(
  raw: string
): Result<ParsedLocation, ValidationError> {
  const [path = "", ...segments] = raw.split(LOCATION_SEPARATOR);
  const lines: number[] = [];

  for (const segment of segments) {
    if (!DIGITS.test(segment)) {
      return err({ kind: "MalformedLocation", input: raw, segment });
    }
    const line = Number.parseInt(segment, 10);
    // Beyond this the decimal text no longer survives the trip through number
    if (!Number.isSafeInteger(line)) {
      return err({ kind: "MalformedLocation", input: raw, segment });
    }
    lines.push(line);
  }

  return ok({ path, lines });
}

export function formatLocation(location: ParsedLocation): string {
  if (location.lines.length === 0) {
    return location.path;
  }
  return [location.path, ...location.lines.map(String)].join(
    LOCATION_SEPARATOR
  );
}
