import { join } from "node:path";
import { isComplete } from "../artifact-store.js";
import { LOG_FILENAME } from "../logger.js";
import type { CommitOutcome, RunContext } from "../schemas/run-context.js";
import type { PipelineStep } from "../step-runner.js";
import { buildPrompt, loadTemplate } from "../templates.js";
import { ARTIFACTS, artifactPath, writeFileAtomic } from "../workspace.js";

export const SCAFFOLD_COMMIT_PREFIX = "loopforge: scaffold";

/** Always-present scaffold files; the package `__init__.py` path depends on the project. */
const SCAFFOLD_MARKERS = [
  ARTIFACTS.gitignore,
  ARTIFACTS.loopScript,
  ARTIFACTS.pyproject,
  join(ARTIFACTS.testsDir, "__init__.py"),
  join(ARTIFACTS.testsDir, "conftest.py"),
];

export interface ScaffoldFile {
  path: string;
  content: () => string;
  mode?: number;
}

export function scaffoldCommitMessage(projectName: string, resumed: boolean): string {
  const subject = `${SCAFFOLD_COMMIT_PREFIX} for ${projectName}${resumed ? " (resumed)" : ""}`;
  return `${subject}

Generated by loopforge:
- ${ARTIFACTS.designV1}: initial design from the concept
- ${ARTIFACTS.designReview}: critical review of the initial design
- ${ARTIFACTS.design}: refined design addressing the review
- ${ARTIFACTS.specsDir}/: individual specifications
- ${ARTIFACTS.agents}: operational guide
- ${ARTIFACTS.planPrompt}: planning mode prompt
- ${ARTIFACTS.buildPrompt}: build mode prompt
- ${ARTIFACTS.loopScript}: agent loop script
- Python project scaffold
`;
}

/**
 * Scaffold files in write order. `.gitignore` comes first so an interrupted
 * write never leaves the log file unignored.
 */
export function scaffoldFiles(ctx: RunContext): ScaffoldFile[] {
  const { workspace, config } = ctx;
  return [
    {
      path: ARTIFACTS.gitignore,
      content: () => buildPrompt("scaffold/gitignore", { LOG_FILENAME }),
    },
    {
      path: ARTIFACTS.loopScript,
      content: () =>
        buildPrompt("scaffold/loop.sh", {
          GENERATOR_COMMAND: config.generator_command,
          MODEL: config.model,
        }),
      mode: 0o755,
    },
    {
      path: ARTIFACTS.pyproject,
      content: () => buildPrompt("scaffold/pyproject.toml", { PROJECT_NAME: workspace.projectName }),
    },
    {
      path: join(ARTIFACTS.srcDir, workspace.packageName, "__init__.py"),
      content: () => `"""${workspace.projectName} package."""\n`,
    },
    {
      path: join(ARTIFACTS.testsDir, "__init__.py"),
      content: () => '"""Test package."""\n',
    },
    {
      path: join(ARTIFACTS.testsDir, "conftest.py"),
      content: () => loadTemplate("scaffold/conftest.py"),
    },
  ];
}

/**
 * Write the scaffold. With `onlyMissing`, files already present are left as
 * they are. Returns the paths written.
 */
export function writeScaffold(ctx: RunContext, onlyMissing = false): string[] {
  const written: string[] = [];
  for (const file of scaffoldFiles(ctx)) {
    const target = artifactPath(ctx.workspace, file.path);
    if (onlyMissing && isComplete([target])) continue;
    writeFileAtomic(target, file.content(), file.mode);
    written.push(file.path);
  }
  return written;
}

/**
 * Stage everything and record it. Nothing staged is a no-op, which is what a
 * fully resumed run hits. A resumed run whose HEAD is an earlier scaffold
 * commit folds its changes into that commit instead of adding another.
 */
export function commitScaffold(ctx: RunContext): CommitOutcome {
  const { git, logger, workspace } = ctx;

  git.stageAll();
  if (!git.hasStagedChanges()) {
    logger.info("No new changes to commit");
    return "nothing_staged";
  }

  const subject = git.lastCommitSubject();
  if (ctx.resume && subject !== null && subject.startsWith(SCAFFOLD_COMMIT_PREFIX)) {
    git.amendCommit(scaffoldCommitMessage(workspace.projectName, true));
    logger.info("Amended previous scaffold commit");
    return "amended";
  }

  git.commit(scaffoldCommitMessage(workspace.projectName, false));
  logger.info("Created initial commit");
  return "committed";
}

export const scaffoldStep: PipelineStep = {
  index: 10,
  name: "Scaffold and commit",
  kind: "scaffold_and_commit",
  completion: { type: "paths", paths: SCAFFOLD_MARKERS },
  // The commit decision has to run on every invocation.
  skippable: false,

  async run(ctx: RunContext): Promise<void> {
    const written = writeScaffold(ctx, ctx.resume);
    if (written.length === 0) {
      ctx.logger.info("[SKIPPED] Scaffold creation — files already exist");
    } else {
      ctx.logger.info(`Created: ${written.join(", ")}`);
    }

    ctx.bindings.commit = commitScaffold(ctx);
  },

  restore(): void {
    // Never skipped.
  },
};
