import { join } from "node:path";
import { specStatus } from "../artifact-store.js";
import { ExtractionError } from "../errors.js";
import type { RunContext } from "../schemas/run-context.js";
import {
  extractSpecBlocks,
  validateSpecOutput,
  writeSpecArtifacts,
  type SpecValidation,
} from "../spec-extractor.js";
import type { PipelineStep } from "../step-runner.js";
import { buildPrompt } from "../templates.js";
import {
  ARTIFACTS,
  RAW_OUTPUT_ATTEMPT_FILENAME,
  RAW_OUTPUT_FILENAME,
  artifactPath,
  writeFileAtomic,
} from "../workspace.js";
import { requireBinding } from "./documents.js";

export const MIN_SPEC_COUNT = 1;

const STEP_NAME = "Specification files";

function specsDir(ctx: RunContext): string {
  return artifactPath(ctx.workspace, ARTIFACTS.specsDir);
}

function saveRawOutput(ctx: RunContext, filename: string, output: string): string {
  const relative = join(ARTIFACTS.specsDir, filename);
  writeFileAtomic(artifactPath(ctx.workspace, relative), `${output}\n`);
  return relative;
}

function describeValidation(validation: SpecValidation): string {
  return validation.ok
    ? `PASS: ${validation.names.length} spec blocks found: ${validation.names.join(" ")}`
    : `FAIL: ${validation.reason}`;
}

/**
 * Generate the spec document, falling back to one corrective re-prompt when
 * it is not in the fenced format. Returns output that passed validation.
 */
function generateSpecDocument(ctx: RunContext): string {
  const { generator, logger, config } = ctx;
  const prompt = buildPrompt("prompts/specs.md", {
    DESIGN: requireBinding(
      ctx.bindings,
      "designDoc",
      "the design steps have not produced a design document",
    ),
  });

  const output = generator.generate({ prompt, model: config.model, description: STEP_NAME });
  const validation = validateSpecOutput(output);
  if (validation.ok) {
    logger.info(`Spec validation: ${describeValidation(validation)}`);
    return output;
  }

  logger.info(`Spec validation failed: ${describeValidation(validation)}`);
  const firstAttempt = saveRawOutput(ctx, RAW_OUTPUT_ATTEMPT_FILENAME, output);
  logger.info(`Raw output saved to ${firstAttempt}`);

  const fixed = generator.generate({
    prompt: buildPrompt("prompts/spec-fixup.md", {
      VALIDATION: describeValidation(validation),
      RAW_OUTPUT: output,
      ORIGINAL_PROMPT: prompt,
    }),
    model: config.model,
    description: `${STEP_NAME} (fix-up)`,
  });

  const revalidation = validateSpecOutput(fixed);
  if (!revalidation.ok) {
    const lastAttempt = saveRawOutput(ctx, RAW_OUTPUT_FILENAME, fixed);
    throw new ExtractionError(
      `Spec validation failed after fix-up: ${revalidation.reason}. Raw outputs saved to ${firstAttempt} and ${lastAttempt}`,
    );
  }

  logger.info(`Spec validation (fix-up): ${describeValidation(revalidation)}`);
  return fixed;
}

export const specsStep: PipelineStep = {
  index: 6,
  name: STEP_NAME,
  kind: "multi_artifact_generation",
  completion: { type: "specs", dir: ARTIFACTS.specsDir, minCount: MIN_SPEC_COUNT },
  skippable: true,

  async run(ctx: RunContext): Promise<void> {
    const output = generateSpecDocument(ctx);
    const artifacts = extractSpecBlocks(output);

    let count: number;
    try {
      count = writeSpecArtifacts(ctx.workspace.path, specsDir(ctx), artifacts);
    } catch (error) {
      if (error instanceof ExtractionError) {
        const raw = saveRawOutput(ctx, RAW_OUTPUT_FILENAME, output);
        throw new ExtractionError(`${error.message}. Raw output saved to ${raw}`);
      }
      throw error;
    }

    ctx.bindings.specCount = count;
    ctx.logger.info(`Generated: ${count} spec files in ${ARTIFACTS.specsDir}/`);
  },

  restore(ctx: RunContext): void {
    ctx.bindings.specCount = specStatus(specsDir(ctx), MIN_SPEC_COUNT).count;
  },
};
