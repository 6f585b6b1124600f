/**
 * Process runner - launches a compiled command and captures its output.
 * Runs to completion; there is no timeout or kill handling here.
 */

import { spawn } from "node:child_process";
import { resolve } from "node:path";
import type { Logger } from "pino";
import type { CompiledCommand } from "@testbridge/shared";

export interface ProcessResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  truncated: boolean;
  wallMs: number;
}

export interface ProcessRunner {
  run(command: CompiledCommand): Promise<ProcessResult>;
}

export interface ProcessRunnerOptions {
  workdir: string;
  maxOutputBytes: number;
}

export class ProcessLaunchError extends Error {
  constructor(
    public readonly command: CompiledCommand,
    cause: unknown
  ) {
    super(
      `Failed to launch ${command.program}: ${cause instanceof Error ? cause.message : String(cause)}`
    );
    this.name = "ProcessLaunchError";
    this.cause = cause;
  }
}

/**
 * Collects chunks up to a byte limit; anything past it is dropped. The cut
 * never splits a UTF-8 character within a chunk.
 */
class CappedBuffer {
  private chunks: Buffer[] = [];
  private bytes = 0;
  truncated = false;

  constructor(private readonly limit: number) {}

  push(chunk: Buffer): void {
    if (this.truncated) {
      return;
    }
    const room = this.limit - this.bytes;
    if (chunk.byteLength <= room) {
      this.chunks.push(chunk);
      this.bytes += chunk.byteLength;
      return;
    }

    let cut = Math.max(room, 0);
    while (cut > 0 && isContinuationByte(chunk[cut])) {
      cut--;
    }
    this.chunks.push(chunk.subarray(0, cut));
    this.bytes += cut;
    this.truncated = true;
  }

  toString(): string {
    return Buffer.concat(this.chunks).toString("utf8");
  }
}

function isContinuationByte(byte: number | undefined): boolean {
  return byte !== undefined && (byte & 0xc0) === 0x80;
}

export class ChildProcessRunner implements ProcessRunner {
  constructor(
    private options: ProcessRunnerOptions,
    private log: Logger
  ) {}

  run(command: CompiledCommand): Promise<ProcessResult> {
    const startTime = Date.now();
    const cwd = resolve(process.cwd(), this.options.workdir);
    const stdout = new CappedBuffer(this.options.maxOutputBytes);
    const stderr = new CappedBuffer(this.options.maxOutputBytes);

    this.log.debug(
      { program: command.program, argsCount: command.args.length, cwd },
      "Spawning test command"
    );

    return new Promise<ProcessResult>((resolvePromise, reject) => {
      const child = spawn(command.program, [...command.args], {
        cwd,
        env: process.env,
        stdio: ["ignore", "pipe", "pipe"],
      });

      child.stdout?.on("data", (data: Buffer) => stdout.push(data));
      child.stderr?.on("data", (data: Buffer) => stderr.push(data));

      child.on("error", (error) => {
        this.log.error(
          { program: command.program, err: error },
          "Test command failed to start"
        );
        reject(new ProcessLaunchError(command, error));
      });

      child.on("close", (exitCode, signal) => {
        const wallMs = Date.now() - startTime;
        const truncated = stdout.truncated || stderr.truncated;
        this.log.info(
          { program: command.program, exitCode, signal, truncated, wallMs },
          "Test command finished"
        );
        resolvePromise({
          exitCode,
          signal,
          stdout: stdout.toString(),
          stderr: stderr.toString(),
          truncated,
          wallMs,
        });
      });
    });
  }
}
