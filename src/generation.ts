import { GenerationError } from "./errors.js";
import type { RunLogger } from "./logger.js";
import { diagnosticLines, runProcess, type ProcessRunner } from "./process.js";
import { DEFAULT_GENERATOR_COMMAND } from "./schemas/run-config.js";

export interface GenerationRequest {
  readonly prompt: string;
  readonly model: string;
  /** Shown in the operator log, e.g. "Initial design". */
  readonly description: string;
}

export interface GenerationClient {
  /**
   * Run the generation service once and return its trimmed output.
   * Throws GenerationError on a failed process or blank output. Never retries.
   */
  generate(request: GenerationRequest): string;
}

export interface CliGenerationOptions {
  readonly cwd: string;
  readonly logger: RunLogger;
  readonly command?: string;
  /** Arguments placed before `--model <model>`. */
  readonly baseArgs?: readonly string[];
  readonly runner?: ProcessRunner;
}

const DEFAULT_BASE_ARGS = ["-p", "--output-format", "text"] as const;

function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes}B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)}KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)}MB`;
}

export function buildGeneratorArgs(
  baseArgs: readonly string[],
  model: string,
): string[] {
  return [...baseArgs, "--model", model];
}

/**
 * GenerationClient backed by a headless CLI that reads the prompt on stdin
 * and writes the result to stdout. stderr is captured and always shown.
 */
export function createCliGenerationClient(
  options: CliGenerationOptions,
): GenerationClient {
  const command = options.command ?? DEFAULT_GENERATOR_COMMAND;
  const baseArgs = options.baseArgs ?? DEFAULT_BASE_ARGS;
  const runner = options.runner ?? runProcess;
  const { logger } = options;

  return {
    generate(request: GenerationRequest): string {
      const promptBytes = Buffer.byteLength(request.prompt, "utf-8");
      logger.info(
        `Generating: ${request.description} (model: ${request.model}, prompt: ${formatBytes(promptBytes)})`,
      );

      const result = runner({
        command,
        args: buildGeneratorArgs(baseArgs, request.model),
        cwd: options.cwd,
        input: request.prompt,
      });

      const stderrLines = diagnosticLines(result.stderr);
      for (const line of stderrLines) {
        logger.plain(`  [${command}] ${line}`);
      }

      if (result.spawnError !== undefined) {
        throw new GenerationError(
          "process_error",
          `Could not run '${command}' for ${request.description}: ${result.spawnError}`,
          result.stderr,
        );
      }

      if (result.status !== 0) {
        const how =
          result.status === null
            ? `was terminated by ${result.signal ?? "a signal"}`
            : `exited with status ${result.status}`;
        const lastLine = stderrLines.at(-1) ?? "";
        const detail = lastLine ? `: ${lastLine}` : "";
        throw new GenerationError(
          "process_error",
          `Generation failed for ${request.description}: '${command}' ${how}${detail}`,
          result.stderr,
        );
      }

      const output = result.stdout.trim();
      if (output.length === 0) {
        throw new GenerationError(
          "empty_output",
          `Generation returned empty output for ${request.description}`,
          result.stderr,
        );
      }

      logger.info(`Received ${formatBytes(Buffer.byteLength(output, "utf-8"))} for ${request.description}`);
      return output;
    },
  };
}
