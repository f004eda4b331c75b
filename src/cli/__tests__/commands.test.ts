import { describe, test, expect, afterEach } from "vitest";
import { mkdtempSync, mkdirSync, writeFileSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { runInit, type InitDeps } from "../commands.js";
import type { InitArgs } from "../parse-args.js";
import type { RunConfig } from "../../schemas/run-config.js";
import {
  fakeGenerator,
  fakeGit,
  memorySink,
  pipelineScript,
  recordingRunner,
  type FakeGit,
  type MemorySink,
} from "../../__tests__/fakes.js";

/**
 * Integration tests for `loopforge init`.
 * These exercise the full vertical slice: argument values → config →
 * pipeline → workspace on disk, with git and generation replaced in process.
 */

describe("runInit", () => {
  let tempDir: string;

  afterEach(() => {
    if (tempDir) {
      rmSync(tempDir, { recursive: true, force: true });
    }
  });

  interface Harness {
    deps: InitDeps;
    sink: MemorySink;
    configs: RunConfig[];
    repoRoot: string;
    workspacePath: string;
  }

  function harness(options: { inRepo?: boolean; env?: NodeJS.ProcessEnv; git?: FakeGit } = {}): Harness {
    const repoRoot = join(tempDir, "repo");
    const workspacePath = join(tempDir, "repo_demo");
    const sink = memorySink();
    const configs: RunConfig[] = [];
    const git = options.git ?? fakeGit(workspacePath);
    const runner = recordingRunner(() =>
      options.inRepo === false
        ? { status: 128, stderr: "fatal: not a git repository" }
        : { stdout: `${repoRoot}\n` },
    );

    return {
      sink,
      configs,
      repoRoot,
      workspacePath,
      deps: {
        cwd: tempDir,
        env: options.env ?? {},
        console: sink,
        runner: runner.run,
        now: () => new Date(2024, 6, 4, 8, 30, 0),
        createGit: () => git,
        createGenerator: (config) => {
          configs.push(config);
          return fakeGenerator(pipelineScript);
        },
      },
    };
  }

  function initArgs(overrides: Partial<InitArgs> = {}): InitArgs {
    return { command: "init", projectName: "demo", conceptFile: "concept.md", resume: false, ...overrides };
  }

  function writeConcept(): void {
    writeFileSync(join(tempDir, "concept.md"), "# Demo\n\nA small tool.\n");
  }

  test("creates the workspace and prints the summary", async () => {
    tempDir = mkdtempSync(join(tmpdir(), "cmd-init-"));
    writeConcept();
    const { deps, sink, workspacePath } = harness();

    const code = await runInit(initArgs(), deps);

    expect(code).toBe(0);
    expect(readFileSync(join(workspacePath, "CONCEPT.md"), "utf-8")).toBe("# Demo\n\nA small tool.\n");
    expect(sink.stdout).toContain(`  worktree:      ${workspacePath}`);
    expect(sink.stdout).toContain("  branch:        loop/demo");
    expect(sink.stdout).toContain("  mode:          fresh");
    expect(sink.stdout).toContain("✓ loopforge setup complete!");
    expect(sink.stdout).toContain(`  ${"specs/".padEnd(20)}2 specification files`);
    expect(sink.stdout).toContain(`     cd ${workspacePath}`);
    expect(sink.stderr).toEqual([]);
  });

  test("models come from flags, then environment, then defaults", async () => {
    tempDir = mkdtempSync(join(tmpdir(), "cmd-init-"));
    writeConcept();
    const { deps, configs } = harness({
      env: { LOOPFORGE_MODEL: "haiku", LOOPFORGE_DESIGN_MODEL: "opus", LOOPFORGE_GENERATOR: "gen" },
    });

    await runInit(initArgs({ designModel: "custom" }), deps);

    expect(configs).toHaveLength(1);
    expect(configs[0]?.model).toBe("haiku");
    expect(configs[0]?.design_model).toBe("custom");
    expect(configs[0]?.generator_command).toBe("gen");
  });

  test("empty environment values fall back to defaults", async () => {
    tempDir = mkdtempSync(join(tmpdir(), "cmd-init-"));
    writeConcept();
    const { deps, configs } = harness({ env: { LOOPFORGE_MODEL: "" } });

    await runInit(initArgs(), deps);

    expect(configs[0]?.model).toBe("sonnet");
    expect(configs[0]?.generator_command).toBe("claude");
  });

  test("outside a repository", async () => {
    tempDir = mkdtempSync(join(tmpdir(), "cmd-init-"));
    writeConcept();
    const { deps, sink } = harness({ inRepo: false });

    expect(await runInit(initArgs(), deps)).toBe(1);
    expect(sink.stderr).toEqual([
      "✗ Error: Not inside a git repository. Run loopforge from the repository the project should branch from.",
    ]);
  });

  test("a concept file is required without --resume", async () => {
    tempDir = mkdtempSync(join(tmpdir(), "cmd-init-"));
    const { deps, sink, configs } = harness();

    expect(await runInit(initArgs({ conceptFile: undefined }), deps)).toBe(1);
    expect(sink.stderr).toEqual(["✗ Error: A concept file is required unless --resume is given"]);
    expect(configs).toEqual([]);
  });

  test("a missing concept file", async () => {
    tempDir = mkdtempSync(join(tmpdir(), "cmd-init-"));
    const { deps, sink } = harness();

    expect(await runInit(initArgs({ conceptFile: "missing.md" }), deps)).toBe(1);
    expect(sink.stderr).toEqual([`✗ Error: Concept file not found: ${join(tempDir, "missing.md")}`]);
  });

  test("an invalid project name", async () => {
    tempDir = mkdtempSync(join(tmpdir(), "cmd-init-"));
    writeConcept();
    const { deps, sink } = harness();

    expect(await runInit(initArgs({ projectName: "Bad Name" }), deps)).toBe(1);
    expect(sink.stderr).toEqual(["✗ Error: invalid configuration:"]);
    expect(sink.stdout).toEqual([
      "  project_name: project name must use lowercase letters, digits, '-' or '_' and start with a letter or digit",
    ]);
  });

  test("an aborted pipeline exits 1", async () => {
    tempDir = mkdtempSync(join(tmpdir(), "cmd-init-"));
    writeConcept();
    const { deps, sink, workspacePath } = harness();
    mkdirSync(workspacePath);

    expect(await runInit(initArgs(), deps)).toBe(1);
    expect(sink.stderr).toEqual([
      `✗ Error: Step 1 (Workspace) failed: Workspace already exists: ${workspacePath} (use --resume to continue a previous run)`,
    ]);
    expect(sink.stdout).not.toContain("✓ loopforge setup complete!");
  });

  test("--resume without a concept file reuses the workspace", async () => {
    tempDir = mkdtempSync(join(tmpdir(), "cmd-init-"));
    writeConcept();
    const git = fakeGit(join(tempDir, "repo_demo"));
    expect(await runInit(initArgs(), harness({ git }).deps)).toBe(0);

    const { deps, sink } = harness({ git });
    const code = await runInit(initArgs({ conceptFile: undefined, resume: true }), deps);

    expect(code).toBe(0);
    expect(sink.stdout).toContain("  mode:          resume");
    expect(sink.stdout).toContain("Resumed: 9 of 10 steps were already complete.");
    expect(git.commits).toHaveLength(1);
  });
});
