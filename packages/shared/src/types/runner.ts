/**
 * Test-run requests and the types each compiler stage produces
 */

export type TestFramework = "rspec" | "cargo" | "cypress";

/** Frameworks whose requests are addressed by a spec file location. */
export type FileFramework = Exclude<TestFramework, "cargo">;

export interface ParsedLocation {
  path: string;
  lines: number[];
}

/**
 * A location that passed the naming rules of `framework`. The path has its
 * leading "./" removed; lines are in caller order.
 */
export interface ValidatedTarget {
  readonly framework: FileFramework;
  readonly path: string;
  readonly lines: readonly number[];
}

export interface CargoRequest {
  readonly framework: "cargo";
  readonly pattern?: string;
  readonly extraArgs: readonly string[];
}

export type CompileTarget = ValidatedTarget | CargoRequest;

export interface RunSpecFileRequest {
  kind: "run-spec-file";
  rawLocation: string;
}

export interface RunCargoTestsRequest {
  kind: "run-cargo-tests";
  pattern?: string;
  extraArgs: string[];
}

export interface RunCypressSpecRequest {
  kind: "run-cypress-spec";
  rawLocation: string;
}

export type TestRunnerRequest =
  | RunSpecFileRequest
  | RunCargoTestsRequest
  | RunCypressSpecRequest;

export interface CompiledCommand {
  readonly program: string;
  readonly args: readonly string[];
}

/** Base command strings, one per framework, fixed at startup. */
export interface BaseCommands {
  rspecBase: string;
  cargoBase: string;
  cypressBase: string;
}
