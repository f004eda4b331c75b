/**
 * Error types for the pipeline. Each carries a `kind` so the step runner and
 * tests can tell failure modes apart without matching on message text.
 */

export class WorkspaceError extends Error {
  readonly kind = "conflict";

  constructor(readonly workspacePath: string) {
    super(
      `Workspace already exists: ${workspacePath} (use --resume to continue a previous run)`,
    );
    this.name = "WorkspaceError";
  }
}

export type GenerationErrorKind = "empty_output" | "process_error";

export class GenerationError extends Error {
  constructor(
    readonly kind: GenerationErrorKind,
    message: string,
    readonly stderr: string = "",
  ) {
    super(message);
    this.name = "GenerationError";
  }
}

export class ExtractionError extends Error {
  readonly kind = "no_artifacts";

  constructor(message: string) {
    super(message);
    this.name = "ExtractionError";
  }
}

/** A step needs a value that neither this run nor the workspace provides. */
export class StepInputError extends Error {
  readonly kind = "missing_input";

  constructor(message: string) {
    super(message);
    this.name = "StepInputError";
  }
}

export class GitError extends Error {
  readonly kind = "git_failed";

  constructor(
    readonly args: readonly string[],
    readonly stderr: string,
    status: number | null,
  ) {
    const detail = stderr.trim() || `exit status ${status ?? "unknown"}`;
    super(`git ${args.join(" ")} failed: ${detail}`);
    this.name = "GitError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
