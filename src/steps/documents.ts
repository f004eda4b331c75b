import { readFileSync } from "node:fs";
import { StepInputError } from "../errors.js";
import { generateChecked } from "../output-check.js";
import type { Bindings, RunContext } from "../schemas/run-context.js";
import type { PipelineStep } from "../step-runner.js";
import { buildPrompt } from "../templates.js";
import { ARTIFACTS, artifactPath, writeFileAtomic } from "../workspace.js";

type TextBinding = "designDoc" | "designReview";
type ModelRole = "design" | "default";

export interface DocumentStepOptions {
  readonly index: number;
  readonly name: string;
  /** Workspace-relative output file; also the step's completion artifact. */
  readonly artifact: string;
  readonly model: ModelRole;
  readonly prompt: (ctx: RunContext) => string;
  /** Binding this document feeds; restored from the artifact on resume. */
  readonly binding?: TextBinding;
}

export interface TemplateStepOptions {
  readonly index: number;
  readonly name: string;
  readonly artifact: string;
  readonly template: string;
  readonly replacements: (ctx: RunContext) => Record<string, string>;
}

/**
 * Generated text is trimmed before use and written with one trailing
 * newline, so trimming the file gives back exactly what a fresh run bound.
 */
export function readArtifactText(path: string): string {
  return readFileSync(path, "utf-8").trimEnd();
}

export function requireBinding(
  bindings: Bindings,
  key: "concept" | TextBinding,
  hint: string,
): string {
  const value = bindings[key];
  if (value === undefined || value.trim().length === 0) {
    throw new StepInputError(`No ${key} available: ${hint}`);
  }
  return value;
}

export function requireConcept(ctx: RunContext): string {
  return requireBinding(
    ctx.bindings,
    "concept",
    `pass a concept file, or keep ${ARTIFACTS.concept} in the workspace when resuming`,
  );
}

function modelFor(ctx: RunContext, role: ModelRole): string {
  return role === "design" ? ctx.config.design_model : ctx.config.model;
}

export function defineDocumentStep(options: DocumentStepOptions): PipelineStep {
  return {
    index: options.index,
    name: options.name,
    kind: "generation",
    completion: { type: "paths", paths: [options.artifact] },
    skippable: true,

    async run(ctx: RunContext): Promise<void> {
      const output = generateChecked(
        ctx.generator,
        {
          prompt: options.prompt(ctx),
          model: modelFor(ctx, options.model),
          description: options.name,
        },
        ctx.logger,
      );

      writeFileAtomic(artifactPath(ctx.workspace, options.artifact), `${output}\n`);
      if (options.binding !== undefined) {
        ctx.bindings[options.binding] = output;
      }
      ctx.logger.info(`Generated: ${options.artifact}`);
    },

    restore(ctx: RunContext): void {
      if (options.binding === undefined) return;
      ctx.bindings[options.binding] = readArtifactText(
        artifactPath(ctx.workspace, options.artifact),
      );
    },
  };
}

/** A document rendered locally from a template; no generation call. */
export function defineTemplateStep(options: TemplateStepOptions): PipelineStep {
  return {
    index: options.index,
    name: options.name,
    kind: "generation",
    completion: { type: "paths", paths: [options.artifact] },
    skippable: true,

    async run(ctx: RunContext): Promise<void> {
      const content = buildPrompt(options.template, options.replacements(ctx));
      writeFileAtomic(artifactPath(ctx.workspace, options.artifact), content);
      ctx.logger.info(`Written: ${options.artifact}`);
    },

    restore(): void {
      // Templates feed no later step.
    },
  };
}

const DESIGN_HINT = "the design steps have not produced a design document";

export const designStep = defineDocumentStep({
  index: 3,
  name: "Initial design",
  artifact: ARTIFACTS.designV1,
  model: "design",
  binding: "designDoc",
  prompt: (ctx) => buildPrompt("prompts/design.md", { CONCEPT: requireConcept(ctx) }),
});

export const reviewStep = defineDocumentStep({
  index: 4,
  name: "Design review",
  artifact: ARTIFACTS.designReview,
  model: "design",
  binding: "designReview",
  prompt: (ctx) =>
    buildPrompt("prompts/review.md", {
      CONCEPT: requireConcept(ctx),
      DESIGN: requireBinding(ctx.bindings, "designDoc", DESIGN_HINT),
    }),
});

export const refineStep = defineDocumentStep({
  index: 5,
  name: "Refined design",
  artifact: ARTIFACTS.design,
  model: "design",
  binding: "designDoc",
  prompt: (ctx) =>
    buildPrompt("prompts/refine.md", {
      CONCEPT: requireConcept(ctx),
      DESIGN: requireBinding(ctx.bindings, "designDoc", DESIGN_HINT),
      REVIEW: requireBinding(
        ctx.bindings,
        "designReview",
        "the design review step has not produced a review",
      ),
    }),
});

export const agentsStep = defineDocumentStep({
  index: 7,
  name: "Agents guide",
  artifact: ARTIFACTS.agents,
  model: "default",
  prompt: (ctx) =>
    buildPrompt("prompts/agents.md", {
      DESIGN: requireBinding(ctx.bindings, "designDoc", DESIGN_HINT),
    }),
});

export const planPromptStep = defineTemplateStep({
  index: 8,
  name: "Planning prompt",
  artifact: ARTIFACTS.planPrompt,
  template: "prompts/plan.md",
  replacements: () => ({}),
});

export const buildPromptStep = defineTemplateStep({
  index: 9,
  name: "Build prompt",
  artifact: ARTIFACTS.buildPrompt,
  template: "prompts/build.md",
  replacements: (ctx) => ({ PACKAGE_NAME: ctx.workspace.packageName }),
});
