import { describe, test, expect, afterEach } from "vitest";
import { mkdtempSync, mkdirSync, rmSync, readFileSync, readdirSync, writeFileSync, existsSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { ExtractionError } from "../errors.js";
import {
  extractSpecBlocks,
  validateSpecOutput,
  writeSpecArtifacts,
} from "../spec-extractor.js";

const FOO = { path: "specs/foo.md", content: "# Foo\nA\nB\n" };

describe("extractSpecBlocks", () => {
  test("bare opening fence", () => {
    const doc = "```markdown specs/foo.md\n# Foo\nA\nB\n```\n";
    expect(extractSpecBlocks(doc)).toEqual([FOO]);
  });

  test("trailing spaces on fence lines", () => {
    const doc = "```markdown specs/foo.md   \n# Foo\nA\nB\n```  \n";
    expect(extractSpecBlocks(doc)).toEqual([FOO]);
  });

  test("CRLF line endings", () => {
    const doc = ["```markdown specs/foo.md", "# Foo", "A", "B", "```", ""].join("\r\n");
    expect(extractSpecBlocks(doc)).toEqual([FOO]);
  });

  test("indented fences and surrounding prose", () => {
    const doc = [
      "Some preamble the parser ignores.",
      "  ```markdown specs/foo.md",
      "# Foo",
      "A",
      "B",
      "\t```",
      "Trailing notes.",
    ].join("\n");
    expect(extractSpecBlocks(doc)).toEqual([FOO]);
  });

  test("several blocks keep document order", () => {
    const doc = [
      "```markdown specs/b.md",
      "# B",
      "```",
      "```markdown specs/a.md",
      "# A",
      "```",
    ].join("\n");
    expect(extractSpecBlocks(doc).map((a) => a.path)).toEqual(["specs/b.md", "specs/a.md"]);
  });

  test("an unclosed final block is dropped", () => {
    const doc = [
      "```markdown specs/a.md",
      "# A",
      "```",
      "```markdown specs/b.md",
      "# B",
      "never closed",
    ].join("\n");
    expect(extractSpecBlocks(doc)).toEqual([{ path: "specs/a.md", content: "# A\n" }]);
  });

  test("fences in another language are not spec blocks", () => {
    const doc = ["```python", "print('x')", "```", "```markdown notes.md", "x", "```"].join("\n");
    expect(extractSpecBlocks(doc)).toEqual([]);
  });

  test("paths that climb out of specs/ are dropped", () => {
    const doc = ["```markdown specs/../escape.md", "x", "y", "z", "```"].join("\n");
    expect(extractSpecBlocks(doc)).toEqual([]);
  });

  test("an empty block yields empty content", () => {
    const doc = "```markdown specs/empty.md\n```";
    expect(extractSpecBlocks(doc)).toEqual([{ path: "specs/empty.md", content: "" }]);
  });

  test("nested subdirectories are allowed", () => {
    const doc = "```markdown specs/api/auth.md\n# Auth\n```";
    expect(extractSpecBlocks(doc)).toEqual([{ path: "specs/api/auth.md", content: "# Auth\n" }]);
  });
});

describe("validateSpecOutput", () => {
  test("empty and whitespace-only input", () => {
    expect(validateSpecOutput("")).toEqual({ ok: false, reason: "empty input" });
    expect(validateSpecOutput("  \n\t\n")).toEqual({ ok: false, reason: "empty input" });
  });

  test("a conversational summary instead of blocks", () => {
    expect(validateSpecOutput("Here is the spec.\nIt has parts.")).toEqual({
      ok: false,
      reason:
        "prose/summary response detected (no fenced spec blocks); first line: 'Here is the spec.', 2 lines",
    });
  });

  test("fences in the wrong format are listed", () => {
    const result = validateSpecOutput("```md specs/a.md\nx\n```");
    expect(result).toEqual({
      ok: false,
      reason: [
        "found 2 code fences but none match the required format",
        "  Required: ```markdown specs/FILENAME.md",
        "  Found fences:",
        "    ```md specs/a.md",
        "    ```",
      ].join("\n"),
    });
  });

  test("plain text with no fences", () => {
    expect(validateSpecOutput("Just text\nmore")).toEqual({
      ok: false,
      reason: "no fenced spec blocks found in output (2 lines); first line: 'Just text'",
    });
  });

  test("well-formed blocks pass with their names", () => {
    const doc = [
      "```markdown specs/a.md",
      "# A",
      "",
      "Body.",
      "```",
      "```markdown specs/b.md",
      "# B",
      "",
      "Body.",
      "```",
    ].join("\n");
    expect(validateSpecOutput(doc)).toEqual({ ok: true, names: ["specs/a.md", "specs/b.md"] });
  });

  test("short blocks fail and valid ones are reported", () => {
    const doc = [
      "```markdown specs/a.md",
      "# A",
      "",
      "Body.",
      "```",
      "```markdown specs/b.md",
      "# B",
      "```",
    ].join("\n");
    expect(validateSpecOutput(doc)).toEqual({
      ok: false,
      reason: [
        "1 validation error(s) in 2 block(s)",
        "  - Block 2 (specs/b.md): only 1 content lines (minimum 3)",
        "  Valid blocks: specs/a.md",
      ].join("\n"),
    });
  });

  test("an unclosed block fails", () => {
    const doc = "```markdown specs/a.md\n# A\nx\ny";
    expect(validateSpecOutput(doc)).toEqual({
      ok: false,
      reason: [
        "1 validation error(s) in 1 block(s)",
        "  - Block 1 (specs/a.md): unclosed fence (no closing ```)",
      ].join("\n"),
    });
  });
});

describe("writeSpecArtifacts", () => {
  let tempDir: string;

  afterEach(() => {
    if (tempDir) {
      rmSync(tempDir, { recursive: true, force: true });
    }
  });

  test("no artifacts is an ExtractionError", () => {
    tempDir = mkdtempSync(join(tmpdir(), "extract-test-"));
    const write = () => writeSpecArtifacts(tempDir, join(tempDir, "specs"), []);
    expect(write).toThrow(ExtractionError);
    expect(write).toThrow("Failed to parse any spec blocks from the generated output");
  });

  test("only empty blocks is an ExtractionError and writes nothing", () => {
    tempDir = mkdtempSync(join(tmpdir(), "extract-test-"));
    const specsDir = join(tempDir, "specs");
    mkdirSync(specsDir);

    expect(() =>
      writeSpecArtifacts(tempDir, specsDir, [{ path: "specs/empty.md", content: "" }]),
    ).toThrow("Parsed 1 spec block(s) but none produced a usable spec file");
    expect(readdirSync(specsDir)).toEqual([]);
  });

  test("writes each artifact and returns the qualifying count", () => {
    tempDir = mkdtempSync(join(tmpdir(), "extract-test-"));
    const specsDir = join(tempDir, "specs");

    const count = writeSpecArtifacts(tempDir, specsDir, [
      FOO,
      { path: "specs/bar.md", content: "# Bar\n" },
      { path: "specs/empty.md", content: "" },
    ]);

    expect(count).toBe(2);
    expect(readFileSync(join(specsDir, "foo.md"), "utf-8")).toBe("# Foo\nA\nB\n");
    expect(existsSync(join(specsDir, "empty.md"))).toBe(false);
  });

  test("the count includes specs already on disk", () => {
    tempDir = mkdtempSync(join(tmpdir(), "extract-test-"));
    const specsDir = join(tempDir, "specs");
    mkdirSync(specsDir);
    writeFileSync(join(specsDir, "existing.md"), "# Existing\n");

    expect(writeSpecArtifacts(tempDir, specsDir, [FOO])).toBe(2);
  });
});
