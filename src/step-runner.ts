import { probeCompletion, type Completion, type StepProbe } from "./artifact-store.js";
import { errorMessage } from "./errors.js";
import type { RunContext } from "./schemas/run-context.js";
import type { PipelineResult, PipelineStatus, StepKind } from "./schemas/step.js";

/**
 * PipelineStep is the contract every step implements. The runner owns the
 * skip/run decision; steps only know how to do their work (`run`) and how to
 * recover their contribution to later steps from disk (`restore`).
 */
export interface PipelineStep {
  readonly index: number;
  readonly name: string;
  readonly kind: StepKind;
  readonly completion: Completion;
  /**
   * False for steps that must execute on every invocation and apply their
   * own resume rule (scaffold-and-commit).
   */
  readonly skippable: boolean;
  run(ctx: RunContext): Promise<void>;
  /** Rebuild this step's bindings from its completion artifacts. */
  restore(ctx: RunContext): void;
}

export function probeStep(step: PipelineStep, ctx: RunContext): StepProbe {
  return probeCompletion(step.completion, ctx.workspace.path);
}

export function resumeHint(index: number): string {
  return `Re-run with --resume to continue from step ${index}.`;
}

/** Collapse a multi-line message onto one line, joining its parts with "; ". */
export function singleLine(message: string): string {
  return message
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .join("; ");
}

export function formatFailure(step: PipelineStep, message: string): string {
  const base = `Step ${step.index} (${step.name}) failed: ${singleLine(message)}`;
  return message.includes("--resume") ? base : `${base} ${resumeHint(step.index)}`;
}

function assertOrdered(steps: readonly PipelineStep[]): void {
  steps.forEach((step, i) => {
    if (step.index !== i + 1) {
      throw new Error(
        `Pipeline steps must be numbered 1..${steps.length} in order; found step ${step.index} at position ${i + 1}`,
      );
    }
  });
}

/** A result for `steps` before any of them has been evaluated. */
export function createPipelineResult(steps: readonly PipelineStep[]): PipelineResult {
  return {
    status: "not_started",
    steps: steps.map((step) => ({
      index: step.index,
      name: step.name,
      kind: step.kind,
      status: "pending",
    })),
  };
}

/**
 * Evaluate steps strictly in order. On resume, a step whose artifacts are
 * complete is skipped and its bindings restored; otherwise it runs and must
 * leave complete artifacts behind. The first failure aborts the pipeline.
 */
export async function runPipeline(
  ctx: RunContext,
  steps: readonly PipelineStep[],
): Promise<PipelineResult> {
  assertOrdered(steps);
  const { logger } = ctx;

  const { steps: records } = createPipelineResult(steps);
  let status: PipelineStatus = "in_progress";

  for (const [i, step] of steps.entries()) {
    const record = records[i];
    if (record === undefined) break;

    try {
      const probe = step.skippable && ctx.resume ? probeStep(step, ctx) : null;

      if (probe?.complete) {
        step.restore(ctx);
        record.status = "skipped";
        record.detail = probe.detail;
        logger.timestamp(`SKIP  Step ${step.index}: ${step.name} — ${probe.detail}`);
        logger.info(`[SKIPPED] Step ${step.index}: ${step.name} — ${probe.detail}`);
        continue;
      }

      record.status = "running";
      logger.step(`Step ${step.index}/${steps.length}: ${step.name}`);
      logger.timestamp(`START Step ${step.index}: ${step.name}`);

      await step.run(ctx);

      const after = probeStep(step, ctx);
      if (!after.complete) {
        throw new Error(`step produced no usable output (${after.detail})`);
      }

      record.status = "completed";
      record.detail = after.detail;
      logger.timestamp(`END   Step ${step.index}: Success`);
    } catch (error) {
      const message = errorMessage(error);
      record.status = "failed";
      record.error = message;
      status = "aborted";

      const diagnostic = formatFailure(step, message);
      logger.timestamp(`FAIL  Step ${step.index}: ${singleLine(message)}`);
      logger.error(diagnostic);
      return { status, steps: records, error: diagnostic };
    }
  }

  status = "completed";
  logger.timestamp("Pipeline completed");
  return { status, steps: records };
}
