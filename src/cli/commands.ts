import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { createCliGenerationClient, type GenerationClient } from "../generation.js";
import { createGitClient, findRepoRoot, type VersionControl } from "../git.js";
import {
  createRunLogger,
  processConsole,
  type ConsoleSink,
  type RunLogger,
} from "../logger.js";
import { runProcess, type ProcessRunner } from "../process.js";
import { RunConfigSchema, type RunConfig } from "../schemas/run-config.js";
import type { RunContext } from "../schemas/run-context.js";
import type { PipelineResult } from "../schemas/step.js";
import { runPipeline, type PipelineStep } from "../step-runner.js";
import { PIPELINE_STEPS } from "../steps/index.js";
import { ARTIFACTS, resolveWorkspace, type Workspace } from "../workspace.js";
import type { InitArgs } from "./parse-args.js";

const RULE = "━".repeat(40);

/** Seams for running `init` without a real terminal, repository or generator. */
export interface InitDeps {
  cwd: string;
  env: NodeJS.ProcessEnv;
  console: ConsoleSink;
  runner: ProcessRunner;
  now?: () => Date;
  steps?: readonly PipelineStep[];
  createGit?: (repoRoot: string, workspace: Workspace) => VersionControl;
  createGenerator?: (
    config: RunConfig,
    workspace: Workspace,
    logger: RunLogger,
  ) => GenerationClient;
}

export function defaultInitDeps(): InitDeps {
  return {
    cwd: process.cwd(),
    env: process.env,
    console: processConsole,
    runner: runProcess,
  };
}

function envValue(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key];
  return value !== undefined && value.length > 0 ? value : undefined;
}

function printBanner(logger: RunLogger, config: RunConfig, workspace: Workspace): void {
  logger.plain(RULE);
  logger.plain("loopforge init");
  logger.plain(`  project:       ${config.project_name}`);
  logger.plain(`  worktree:      ${workspace.path}`);
  logger.plain(`  branch:        ${workspace.branch}`);
  logger.plain(`  model:         ${config.model}`);
  logger.plain(`  design model:  ${config.design_model}`);
  logger.plain(`  mode:          ${config.resume ? "resume" : "fresh"}`);
  logger.plain(RULE);
}

function printSummary(
  logger: RunLogger,
  result: PipelineResult,
  ctx: RunContext,
): void {
  const skipped = result.steps.filter((s) => s.status === "skipped").length;
  const specCount = ctx.bindings.specCount ?? 0;

  logger.plain("");
  logger.plain(RULE);
  logger.plain("✓ loopforge setup complete!");
  logger.plain(RULE);
  logger.plain("");
  if (skipped > 0) {
    logger.plain(`Resumed: ${skipped} of ${result.steps.length} steps were already complete.`);
    logger.plain("");
  }
  logger.plain("Generated files:");
  logger.plain(`  ${ARTIFACTS.designV1.padEnd(20)}Initial design (pre-review)`);
  logger.plain(`  ${ARTIFACTS.designReview.padEnd(20)}Critical review of initial design`);
  logger.plain(`  ${ARTIFACTS.design.padEnd(20)}Refined design (addresses review)`);
  logger.plain(`  ${`${ARTIFACTS.specsDir}/`.padEnd(20)}${specCount} specification files`);
  logger.plain(`  ${ARTIFACTS.agents.padEnd(20)}Operational guide`);
  logger.plain(`  ${ARTIFACTS.planPrompt.padEnd(20)}Planning mode prompt`);
  logger.plain(`  ${ARTIFACTS.buildPrompt.padEnd(20)}Building mode prompt`);
  logger.plain(`  ${ARTIFACTS.loopScript.padEnd(20)}Agent loop script`);
  logger.plain("");
  logger.plain("Next steps:");
  logger.plain(`  1. Review the design evolution: ${ARTIFACTS.designV1} → ${ARTIFACTS.designReview} → ${ARTIFACTS.design}`);
  logger.plain(`     cd ${ctx.workspace.path}`);
  logger.plain(`  2. Review ${ARTIFACTS.specsDir}/ for completeness`);
  logger.plain("  3. Install dev dependencies: uv sync --extra dev");
  logger.plain(`  4. Run the planning phase: ./${ARTIFACTS.loopScript} plan 3`);
  logger.plain(`  5. Review the plan, then start building: ./${ARTIFACTS.loopScript} 10`);
}

/**
 * `loopforge init`. Resolves the repository and configuration, then drives
 * the pipeline. Returns the process exit code.
 */
export async function runInit(
  args: InitArgs,
  deps: InitDeps = defaultInitDeps(),
): Promise<number> {
  const logger = createRunLogger(deps.console, deps.now);

  const repoRoot = findRepoRoot(deps.cwd, deps.runner);
  if (repoRoot === null) {
    logger.error("Not inside a git repository. Run loopforge from the repository the project should branch from.");
    return 1;
  }

  let conceptPath: string | undefined;
  let conceptInput: string | undefined;
  if (args.conceptFile !== undefined) {
    conceptPath = resolve(deps.cwd, args.conceptFile);
    if (!existsSync(conceptPath)) {
      logger.error(`Concept file not found: ${conceptPath}`);
      return 1;
    }
    conceptInput = readFileSync(conceptPath, "utf-8");
  } else if (!args.resume) {
    logger.error("A concept file is required unless --resume is given");
    logger.plain('Run "loopforge init --help" for usage information.');
    return 1;
  }

  const configResult = RunConfigSchema.safeParse({
    project_name: args.projectName,
    concept_path: conceptPath,
    resume: args.resume,
    model: args.model ?? envValue(deps.env, "LOOPFORGE_MODEL"),
    design_model: args.designModel ?? envValue(deps.env, "LOOPFORGE_DESIGN_MODEL"),
    repo_root: repoRoot,
    generator_command: envValue(deps.env, "LOOPFORGE_GENERATOR"),
  });

  if (!configResult.success) {
    logger.error("invalid configuration:");
    for (const issue of configResult.error.issues) {
      logger.plain(`  ${issue.path.join(".")}: ${issue.message}`);
    }
    return 1;
  }

  const config = configResult.data;
  const workspace = resolveWorkspace(config.repo_root, config.project_name);
  printBanner(logger, config, workspace);

  const git = deps.createGit
    ? deps.createGit(config.repo_root, workspace)
    : createGitClient({
        repoRoot: config.repo_root,
        worktreePath: workspace.path,
        runner: deps.runner,
      });
  const generator = deps.createGenerator
    ? deps.createGenerator(config, workspace, logger)
    : createCliGenerationClient({
        cwd: workspace.path,
        logger,
        command: config.generator_command,
        runner: deps.runner,
      });

  const ctx: RunContext = {
    config,
    resume: config.resume,
    workspace,
    bindings: {},
    logger,
    git,
    generator,
    conceptInput,
  };

  const result = await runPipeline(ctx, deps.steps ?? PIPELINE_STEPS);
  if (result.status !== "completed") {
    return 1;
  }

  printSummary(logger, result, ctx);
  return 0;
}
