/**
 * Cypress JSON reporter output - extraction, parsing and summary
 */

import { z } from "zod";
import { err, ok, type Result } from "@testbridge/shared";

const CodeFrameZ = z.object({
  line: z.number().int(),
  column: z.number().int(),
  originalFile: z.string(),
  relativeFile: z.string(),
  absoluteFile: z.string(),
  frame: z.string(),
  language: z.string(),
});

// Passing tests carry an empty `err: {}`
const TestErrorZ = z.object({
  message: z.string().optional(),
  name: z.string().optional(),
  codeFrame: CodeFrameZ.nullish(),
});

const CypressTestZ = z.object({
  title: z.string(),
  fullTitle: z.string(),
  file: z.string().nullish(),
  duration: z.number().nullish(),
  currentRetry: z.number().int(),
  err: TestErrorZ.nullish(),
});

export const CypressResultsZ = z.object({
  stats: z.object({
    suites: z.number().int(),
    tests: z.number().int(),
    passes: z.number().int(),
    pending: z.number().int(),
    failures: z.number().int(),
    start: z.string().optional(),
    end: z.string().optional(),
    duration: z.number().optional(),
  }),
  tests: z.array(CypressTestZ),
  pending: z.array(CypressTestZ),
  failures: z.array(CypressTestZ),
  passes: z.array(CypressTestZ),
});

export type CypressResults = z.infer<typeof CypressResultsZ>;
export type CypressTest = z.infer<typeof CypressTestZ>;

/**
 * Cypress prints browser and dbus warnings ahead of the report; the report
 * starts at the first opening brace.
 */
export function extractJson(output: string): Result<string, string> {
  const start = output.indexOf("{");
  if (start === -1) {
    return err("No JSON found in Cypress output");
  }
  return ok(output.slice(start));
}

export function parseCypressResults(
  json: string
): Result<CypressResults, string> {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (error) {
    return err(
      `Failed to parse Cypress JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const parsed = CypressResultsZ.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    return err(`Unexpected Cypress report shape: ${issues.join("; ")}`);
  }
  return ok(parsed.data);
}

function describeFailure(test: CypressTest): string[] {
  const lines = [`FAIL ${test.fullTitle}`];
  const error = test.err;
  if (error?.message) {
    lines.push(`  ${error.name ?? "Error"}: ${error.message}`);
  }
  if (error?.codeFrame) {
    const frame = error.codeFrame;
    lines.push(`  at ${frame.relativeFile}:${frame.line}:${frame.column}`);
  }
  return lines;
}

export function summarizeCypressResults(results: CypressResults): string {
  const { stats } = results;
  const lines = [
    `Tests: ${stats.tests}, Passes: ${stats.passes}, Failures: ${stats.failures}, Pending: ${stats.pending}`,
  ];
  if (stats.duration !== undefined) {
    lines.push(`Duration: ${stats.duration}ms`);
  }
  for (const failure of results.failures) {
    lines.push("", ...describeFailure(failure));
  }
  return lines.join("\n");
}

/**
 * Summary when stdout holds a readable report, otherwise undefined so the
 * caller can fall back to the raw output.
 */
export function summarizeCypressOutput(stdout: string): string | undefined {
  const json = extractJson(stdout);
  if (!json.ok) {
    return undefined;
  }
  const results = parseCypressResults(json.value);
  return results.ok ? summarizeCypressResults(results.value) : undefined;
}
