import { join } from "node:path";
import { listQualifyingSpecs } from "./artifact-store.js";
import { ExtractionError } from "./errors.js";
import { firstContentLine, isConversationalOpener } from "./output-check.js";
import { writeFileAtomic } from "./workspace.js";

/**
 * Fence grammar for the multi-spec document:
 *
 *   open   := ws* "```markdown" ws+ path ws*      path = "specs/" ... ".md"
 *   body   := any line that is not a close
 *   close  := ws* "```" ws*
 *
 * `ws` is a space or tab. One trailing carriage return per line is dropped
 * before matching.
 */
const OPEN_FENCE = /^[ \t]*```markdown[ \t]+(specs\/[^\s`]+\.md)[ \t]*$/;
const CLOSE_FENCE = /^[ \t]*```[ \t]*$/;
const ANY_FENCE = /^[ \t]*```/;

export const MIN_BLOCK_LINES = 3;

export interface NamedArtifact {
  /** Relative to the extraction target directory, e.g. `specs/store.md`. */
  readonly path: string;
  readonly content: string;
}

export type SpecValidation =
  | { ok: true; names: string[] }
  | { ok: false; reason: string };

type FenceToken =
  | { type: "open"; path: string }
  | { type: "close" }
  | { type: "line"; text: string };

function normalizeLines(document: string): string[] {
  return document.split("\n").map((line) => line.replace(/\r$/, ""));
}

function classify(line: string, inBlock: boolean): FenceToken {
  if (inBlock) {
    return CLOSE_FENCE.test(line) ? { type: "close" } : { type: "line", text: line };
  }
  const open = OPEN_FENCE.exec(line);
  return open?.[1] !== undefined ? { type: "open", path: open[1] } : { type: "line", text: line };
}

function isSafeRelativePath(path: string): boolean {
  return !path.split(/[\\/]/).includes("..");
}

interface ScannedBlock {
  readonly path: string;
  readonly lines: string[];
  readonly closed: boolean;
}

function scanBlocks(document: string): ScannedBlock[] {
  const blocks: ScannedBlock[] = [];
  let current: { path: string; lines: string[] } | null = null;

  for (const line of normalizeLines(document)) {
    const token = classify(line, current !== null);
    if (token.type === "open") {
      current = { path: token.path, lines: [] };
    } else if (token.type === "close" && current !== null) {
      blocks.push({ ...current, closed: true });
      current = null;
    } else if (token.type === "line" && current !== null) {
      current.lines.push(token.text);
    }
  }

  if (current !== null) {
    blocks.push({ ...current, closed: false });
  }
  return blocks;
}

/**
 * Split one generated document into its fenced spec files. Unclosed blocks
 * and paths that escape the target directory are dropped.
 */
export function extractSpecBlocks(document: string): NamedArtifact[] {
  return scanBlocks(document)
    .filter((block) => block.closed && isSafeRelativePath(block.path))
    .map((block) => ({
      path: block.path,
      content: block.lines.length > 0 ? `${block.lines.join("\n")}\n` : "",
    }));
}

/**
 * Check a generated spec document before extraction and explain what is
 * wrong with it, so the explanation can be fed back to the generator.
 */
export function validateSpecOutput(document: string): SpecValidation {
  if (document.trim().length === 0) {
    return { ok: false, reason: "empty input" };
  }

  const lines = normalizeLines(document);
  const blocks = scanBlocks(document);

  if (blocks.length === 0) {
    const first = firstContentLine(document);
    if (isConversationalOpener(first)) {
      return {
        ok: false,
        reason: `prose/summary response detected (no fenced spec blocks); first line: '${first.slice(0, 80)}', ${lines.length} lines`,
      };
    }

    const fences = lines.filter((line) => ANY_FENCE.test(line));
    if (fences.length > 0) {
      const found = fences.slice(0, 5).map((f) => `    ${f.trim()}`).join("\n");
      return {
        ok: false,
        reason: `found ${fences.length} code fences but none match the required format\n  Required: \`\`\`markdown specs/FILENAME.md\n  Found fences:\n${found}`,
      };
    }

    return {
      ok: false,
      reason: `no fenced spec blocks found in output (${lines.length} lines); first line: '${first.slice(0, 80)}'`,
    };
  }

  const errors: string[] = [];
  const names: string[] = [];
  blocks.forEach((block, i) => {
    const label = `Block ${i + 1} (${block.path})`;
    if (!block.closed) {
      errors.push(`${label}: unclosed fence (no closing \`\`\`)`);
    } else if (block.lines.length < MIN_BLOCK_LINES) {
      errors.push(
        `${label}: only ${block.lines.length} content lines (minimum ${MIN_BLOCK_LINES})`,
      );
    } else {
      names.push(block.path);
    }
  });

  if (errors.length > 0) {
    const valid = names.length > 0 ? `\n  Valid blocks: ${names.join(" ")}` : "";
    return {
      ok: false,
      reason: `${errors.length} validation error(s) in ${blocks.length} block(s)\n${errors
        .map((e) => `  - ${e}`)
        .join("\n")}${valid}`,
    };
  }

  return { ok: true, names };
}

/**
 * Write extracted artifacts under `targetDir` and return how many qualifying
 * spec files `specsDir` now holds. Throws ExtractionError when nothing usable
 * was produced.
 */
export function writeSpecArtifacts(
  targetDir: string,
  specsDir: string,
  artifacts: readonly NamedArtifact[],
): number {
  if (artifacts.length === 0) {
    throw new ExtractionError("Failed to parse any spec blocks from the generated output");
  }

  for (const artifact of artifacts) {
    if (artifact.content.length === 0) continue;
    writeFileAtomic(join(targetDir, artifact.path), artifact.content);
  }

  const count = listQualifyingSpecs(specsDir).length;
  if (count === 0) {
    throw new ExtractionError(
      `Parsed ${artifacts.length} spec block(s) but none produced a usable spec file`,
    );
  }
  return count;
}
