import { describe, expect, it } from "vitest";
import {
  extractJson,
  parseCypressResults,
  summarizeCypressOutput,
  summarizeCypressResults,
} from "./cypress-results.js";

const passing = {
  title: "shows the form",
  fullTitle: "login shows the form",
  file: null,
  duration: 300,
  currentRetry: 0,
  err: {},
};

const failing = {
  title: "rejects a bad password",
  fullTitle: "login rejects a bad password",
  file: null,
  duration: 900,
  currentRetry: 0,
  err: {
    message: "expected <div> to contain text 'Invalid'",
    name: "AssertionError",
    codeFrame: {
      line: 12,
      column: 8,
      originalFile: "cypress/e2e/login.cy.ts",
      relativeFile: "cypress/e2e/login.cy.ts",
      absoluteFile: "/work/cypress/e2e/login.cy.ts",
      frame: "  12 | cy.contains('Invalid')",
      language: "ts",
    },
  },
};

const report = {
  stats: {
    suites: 1,
    tests: 2,
    passes: 1,
    pending: 0,
    failures: 1,
    start: "2026-01-05T10:00:00.000Z",
    end: "2026-01-05T10:00:01.200Z",
    duration: 1200,
  },
  tests: [passing, failing],
  pending: [],
  failures: [failing],
  passes: [passing],
};

const expectedSummary = [
  "Tests: 2, Passes: 1, Failures: 1, Pending: 0",
  "Duration: 1200ms",
  "",
  "FAIL login rejects a bad password",
  "  AssertionError: expected <div> to contain text 'Invalid'",
  "  at cypress/e2e/login.cy.ts:12:8",
].join("\n");

describe("extractJson", () => {
  it("skips warnings printed before the report", () => {
    const output = `Warning: browser launch option ignored\n[dbus] no bus\n{\n  "stats": {}\n}`;
    expect(extractJson(output)).toEqual({
      ok: true,
      value: `{\n  "stats": {}\n}`,
    });
  });

  it("fails when there is no opening brace", () => {
    expect(extractJson("Some output without a report")).toEqual({
      ok: false,
      error: "No JSON found in Cypress output",
    });
  });
});

describe("parseCypressResults", () => {
  it("parses a mocha JSON report", () => {
    const result = parseCypressResults(JSON.stringify(report));
    if (!result.ok) throw new Error(result.error);
    expect(result.value.stats.tests).toBe(2);
    expect(result.value.failures[0]?.err?.codeFrame?.line).toBe(12);
    expect(result.value.passes[0]?.title).toBe("shows the form");
  });

  it("reports invalid JSON", () => {
    const result = parseCypressResults("{not json");
    expect(result.ok).toBe(false);
    expect(result.ok ? "" : result.error).toMatch(
      /^Failed to parse Cypress JSON: /
    );
  });

  it("reports a report of the wrong shape", () => {
    const result = parseCypressResults('{"stats":{}}');
    expect(result.ok).toBe(false);
    expect(result.ok ? "" : result.error).toMatch(
      /^Unexpected Cypress report shape: /
    );
  });
});

describe("summarizeCypressResults", () => {
  it("lists counts and each failure", () => {
    const result = parseCypressResults(JSON.stringify(report));
    if (!result.ok) throw new Error(result.error);
    expect(summarizeCypressResults(result.value)).toBe(expectedSummary);
  });

  it("prints only counts for a clean run without timing", () => {
    const clean = {
      ...report,
      stats: { suites: 1, tests: 1, passes: 1, pending: 0, failures: 0 },
      tests: [passing],
      failures: [],
    };
    const result = parseCypressResults(JSON.stringify(clean));
    if (!result.ok) throw new Error(result.error);
    expect(summarizeCypressResults(result.value)).toBe(
      "Tests: 1, Passes: 1, Failures: 0, Pending: 0"
    );
  });
});

describe("summarizeCypressOutput", () => {
  it("summarizes noisy stdout", () => {
    expect(
      summarizeCypressOutput(`DevTools listening\n${JSON.stringify(report)}`)
    ).toBe(expectedSummary);
  });

  it("returns undefined when stdout holds no readable report", () => {
    expect(summarizeCypressOutput("Cypress could not verify the binary")).toBe(
      undefined
    );
    expect(summarizeCypressOutput("{ broken")).toBe(undefined);
  });
});
