import { mkdirSync, renameSync, rmSync, writeFileSync, chmodSync } from "node:fs";
import { basename, dirname, join } from "node:path";

/** Well-known artifact paths, relative to the workspace root. */
export const ARTIFACTS = {
  concept: "CONCEPT.md",
  designV1: "DESIGN_v1.md",
  designReview: "DESIGN_REVIEW.md",
  design: "DESIGN.md",
  specsDir: "specs",
  srcDir: "src",
  testsDir: "tests",
  agents: "AGENTS.md",
  planPrompt: "PROMPT_plan.md",
  buildPrompt: "PROMPT_build.md",
  loopScript: "loop.sh",
  pyproject: "pyproject.toml",
  gitignore: ".gitignore",
} as const;

/** Raw generator output kept for the operator when spec parsing fails. */
export const RAW_OUTPUT_FILENAME = "_raw_output.md";
export const RAW_OUTPUT_ATTEMPT_FILENAME = "_raw_output_attempt1.md";
export const RAW_OUTPUT_SENTINELS: readonly string[] = [
  RAW_OUTPUT_FILENAME,
  RAW_OUTPUT_ATTEMPT_FILENAME,
];

export const BRANCH_PREFIX = "loop/";

export interface Workspace {
  /** Absolute path of the worktree. */
  readonly path: string;
  readonly branch: string;
  readonly repoRoot: string;
  readonly projectName: string;
  /** Importable package name derived from the project name. */
  readonly packageName: string;
}

/**
 * The worktree lives beside the repository: `<parent>/<repo>_<project>`,
 * on branch `loop/<project>`.
 */
export function resolveWorkspace(repoRoot: string, projectName: string): Workspace {
  return {
    path: join(dirname(repoRoot), `${basename(repoRoot)}_${projectName}`),
    branch: `${BRANCH_PREFIX}${projectName}`,
    repoRoot,
    projectName,
    packageName: projectName.replace(/-/g, "_"),
  };
}

export function artifactPath(workspace: Workspace, relativePath: string): string {
  return join(workspace.path, relativePath);
}

let tempCounter = 0;

/**
 * Write via a temp file in the target directory and rename over the target,
 * so readers see either the old file, no file, or the complete new content.
 */
export function writeFileAtomic(
  targetPath: string,
  content: string,
  mode?: number,
): void {
  const dir = dirname(targetPath);
  mkdirSync(dir, { recursive: true });

  tempCounter += 1;
  const tempPath = join(dir, `.${basename(targetPath)}.tmp-${process.pid}-${tempCounter}`);

  try {
    writeFileSync(tempPath, content);
    if (mode !== undefined) chmodSync(tempPath, mode);
    renameSync(tempPath, targetPath);
  } catch (error) {
    rmSync(tempPath, { force: true });
    throw error;
  }
}
