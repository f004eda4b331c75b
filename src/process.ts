import { spawnSync } from "node:child_process";

export interface ProcessRequest {
  readonly command: string;
  readonly args: readonly string[];
  readonly cwd: string;
  /** Written to the child's stdin, then stdin is closed. */
  readonly input?: string;
}

export interface ProcessResult {
  /** null when the process was killed by a signal or never started */
  readonly status: number | null;
  readonly stdout: string;
  readonly stderr: string;
  readonly signal?: string;
  /** Set when the process could not be spawned at all. */
  readonly spawnError?: string;
}

/**
 * Blocking subprocess call. The generation CLI and git both go through this
 * so tests can substitute an in-process fake.
 */
export type ProcessRunner = (request: ProcessRequest) => ProcessResult;

const MAX_BUFFER = 50 * 1024 * 1024;

export const runProcess: ProcessRunner = (request) => {
  const result = spawnSync(request.command, [...request.args], {
    cwd: request.cwd,
    input: request.input,
    encoding: "utf-8",
    maxBuffer: MAX_BUFFER,
    stdio: ["pipe", "pipe", "pipe"],
  });

  return {
    status: result.status,
    stdout: result.stdout ?? "",
    stderr: result.stderr ?? "",
    signal: result.signal ?? undefined,
    spawnError: result.error?.message,
  };
};

/** Every non-blank line of a diagnostic stream, carriage returns dropped. */
export function diagnosticLines(text: string): string[] {
  return text
    .split("\n")
    .map((line) => line.replace(/\r$/, ""))
    .filter((line) => line.trim().length > 0);
}
