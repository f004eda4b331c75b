import { existsSync, statSync } from "node:fs";
import { GitError } from "./errors.js";
import { runProcess, type ProcessRunner } from "./process.js";

/** The slice of version control the pipeline relies on. */
export interface VersionControl {
  worktreeExists(path: string): boolean;
  createWorktree(path: string, branch: string): void;
  /** Stage every change in the worktree. */
  stageAll(): void;
  hasStagedChanges(): boolean;
  commit(message: string): void;
  amendCommit(message: string): void;
  /** Subject line of HEAD in the worktree, or null on an unborn branch. */
  lastCommitSubject(): string | null;
}

export interface GitClientOptions {
  /** Where `git worktree add` runs. */
  readonly repoRoot: string;
  /** Where staging and commits happen. */
  readonly worktreePath: string;
  readonly runner?: ProcessRunner;
}

export function createGitClient(options: GitClientOptions): VersionControl {
  const runner = options.runner ?? runProcess;

  /** Run git and hand back the status; only a failed spawn throws. */
  function git(cwd: string, args: string[]): { status: number | null; stdout: string; stderr: string } {
    const result = runner({ command: "git", args, cwd });
    if (result.spawnError !== undefined) {
      throw new GitError(args, result.spawnError, null);
    }
    return { status: result.status, stdout: result.stdout, stderr: result.stderr };
  }

  function gitOrThrow(cwd: string, args: string[]): string {
    const result = runner({ command: "git", args, cwd });
    if (result.spawnError !== undefined || result.status !== 0) {
      throw new GitError(args, result.spawnError ?? result.stderr, result.status);
    }
    return result.stdout;
  }

  return {
    worktreeExists(path: string): boolean {
      return existsSync(path) && statSync(path).isDirectory();
    },

    createWorktree(path: string, branch: string): void {
      gitOrThrow(options.repoRoot, ["worktree", "add", path, "-b", branch]);
    },

    stageAll(): void {
      gitOrThrow(options.worktreePath, ["add", "-A"]);
    },

    hasStagedChanges(): boolean {
      // `diff --cached --quiet` exits 1 when something is staged.
      const args = ["diff", "--cached", "--quiet"];
      const { status, stderr } = git(options.worktreePath, args);
      if (status === 0) return false;
      if (status === 1) return true;
      throw new GitError(args, stderr, status);
    },

    commit(message: string): void {
      gitOrThrow(options.worktreePath, ["commit", "-m", message]);
    },

    amendCommit(message: string): void {
      gitOrThrow(options.worktreePath, ["commit", "--amend", "-m", message]);
    },

    lastCommitSubject(): string | null {
      const { status, stdout } = git(options.worktreePath, ["log", "-1", "--format=%s"]);
      if (status !== 0) return null;
      const subject = stdout.trim();
      return subject.length > 0 ? subject : null;
    },
  };
}

/** `git rev-parse --show-toplevel` from `cwd`; null outside a repository. */
export function findRepoRoot(
  cwd: string,
  runner: ProcessRunner = runProcess,
): string | null {
  const result = runner({ command: "git", args: ["rev-parse", "--show-toplevel"], cwd });
  if (result.spawnError !== undefined || result.status !== 0) return null;
  const root = result.stdout.trim();
  return root.length > 0 ? root : null;
}
