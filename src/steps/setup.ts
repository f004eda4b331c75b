import { existsSync, mkdirSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { WorkspaceError } from "../errors.js";
import { LOG_FILENAME } from "../logger.js";
import type { RunContext } from "../schemas/run-context.js";
import type { PipelineStep } from "../step-runner.js";
import { ARTIFACTS, artifactPath, writeFileAtomic } from "../workspace.js";

/**
 * Attach the log file and settle the concept once the workspace exists.
 * Runs on both paths into the workspace: fresh creation and resume.
 */
export function enterWorkspace(ctx: RunContext): void {
  const { logger, workspace, config, bindings } = ctx;

  if (logger.logPath === undefined) {
    logger.attach(join(workspace.path, LOG_FILENAME));
  }

  logger.timestamp("loopforge started");
  logger.timestamp(
    `Project: ${workspace.projectName} | Model: ${config.model} | Design Model: ${config.design_model}`,
  );
  logger.timestamp(`Worktree: ${workspace.path} | Branch: ${workspace.branch}`);
  if (ctx.resume) {
    logger.timestamp("Mode: RESUME");
  }

  const conceptPath = artifactPath(workspace, ARTIFACTS.concept);
  if (ctx.conceptInput !== undefined) {
    writeFileAtomic(conceptPath, ctx.conceptInput);
    bindings.concept = ctx.conceptInput;
    logger.info(`Saved concept file as ${ARTIFACTS.concept}`);
  } else if (ctx.resume && existsSync(conceptPath)) {
    bindings.concept = readFileSync(conceptPath, "utf-8");
    logger.info(`Loaded concept from existing ${ARTIFACTS.concept}`);
  }
}

export const workspaceStep: PipelineStep = {
  index: 1,
  name: "Workspace",
  kind: "setup",
  completion: { type: "workspace" },
  skippable: true,

  async run(ctx: RunContext): Promise<void> {
    const { git, workspace, logger } = ctx;

    // Resuming into an existing workspace is a skip, so reaching here with
    // one present means a fresh run would clobber it.
    if (git.worktreeExists(workspace.path)) {
      throw new WorkspaceError(workspace.path);
    }

    if (ctx.resume) {
      logger.warn("No existing workspace found — starting fresh");
      ctx.resume = false;
    }

    git.createWorktree(workspace.path, workspace.branch);
    logger.info(`Created worktree at ${workspace.path}`);
    enterWorkspace(ctx);
  },

  restore(ctx: RunContext): void {
    ctx.logger.info(`Resumed in ${ctx.workspace.path}`);
    enterWorkspace(ctx);
  },
};

const PROJECT_DIRS = [ARTIFACTS.specsDir, ARTIFACTS.srcDir, ARTIFACTS.testsDir];

export const directoriesStep: PipelineStep = {
  index: 2,
  name: "Directory structure",
  kind: "setup",
  completion: { type: "paths", paths: PROJECT_DIRS },
  skippable: true,

  async run(ctx: RunContext): Promise<void> {
    for (const dir of PROJECT_DIRS) {
      mkdirSync(artifactPath(ctx.workspace, dir), { recursive: true });
    }
    ctx.logger.info(`Created: ${PROJECT_DIRS.map((d) => `${d}/`).join(", ")}`);
  },

  restore(): void {
    // Directories carry no bindings.
  },
};
