import { readdirSync, statSync, type Stats } from "node:fs";
import { join, relative } from "node:path";
import { RAW_OUTPUT_SENTINELS } from "./workspace.js";

/** What proves a step has already run. Paths are relative to the workspace. */
export type Completion =
  | { readonly type: "workspace" }
  | { readonly type: "paths"; readonly paths: readonly string[] }
  | { readonly type: "specs"; readonly dir: string; readonly minCount: number };

export interface StepProbe {
  readonly complete: boolean;
  /** Human-readable reason, used in skip/failure log lines. */
  readonly detail: string;
}

export interface SpecStatus {
  readonly complete: boolean;
  readonly count: number;
}

function statOrNull(path: string): Stats | null {
  try {
    return statSync(path);
  } catch {
    // Missing or unreadable paths both mean "not complete".
    return null;
  }
}

/**
 * A file counts when it exists with non-zero size. A directory counts when it
 * exists; directory sizes are filesystem-dependent and carry no meaning here.
 */
export function isPresent(path: string): boolean {
  const stats = statOrNull(path);
  if (stats === null) return false;
  if (stats.isDirectory()) return true;
  return stats.isFile() && stats.size > 0;
}

export function isComplete(paths: readonly string[]): boolean {
  return paths.every(isPresent);
}

/** Non-empty `*.md` files directly in `dir`, raw-output sentinels excluded. */
export function listQualifyingSpecs(dir: string): string[] {
  let entries: string[];
  try {
    entries = readdirSync(dir);
  } catch {
    return [];
  }

  return entries
    .filter((name) => name.endsWith(".md"))
    .filter((name) => !RAW_OUTPUT_SENTINELS.includes(name))
    .filter((name) => {
      const stats = statOrNull(join(dir, name));
      return stats !== null && stats.isFile() && stats.size > 0;
    })
    .sort();
}

export function specStatus(dir: string, minCount: number): SpecStatus {
  const count = listQualifyingSpecs(dir).length;
  return { complete: count >= minCount, count };
}

/**
 * Decide from the filesystem alone whether a completion condition holds.
 * Read-only; never touches the generation service.
 */
export function probeCompletion(
  completion: Completion,
  workspaceRoot: string,
): StepProbe {
  switch (completion.type) {
    case "workspace": {
      const complete = isPresent(workspaceRoot);
      return {
        complete,
        detail: complete
          ? `workspace exists at ${workspaceRoot}`
          : `no workspace at ${workspaceRoot}`,
      };
    }
    case "paths": {
      const missing = completion.paths.filter(
        (p) => !isPresent(join(workspaceRoot, p)),
      );
      return missing.length === 0
        ? { complete: true, detail: "output already exists" }
        : { complete: false, detail: `missing or empty: ${missing.join(", ")}` };
    }
    case "specs": {
      const dir = join(workspaceRoot, completion.dir);
      const status = specStatus(dir, completion.minCount);
      const where = relative(workspaceRoot, dir) || ".";
      return status.complete
        ? { complete: true, detail: `${status.count} specs already exist` }
        : {
            complete: false,
            detail: `${status.count} qualifying specs in ${where}/ (need ${completion.minCount})`,
          };
    }
  }
}
