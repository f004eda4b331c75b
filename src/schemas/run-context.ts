import type { GenerationClient } from "../generation.js";
import type { VersionControl } from "../git.js";
import type { RunLogger } from "../logger.js";
import type { Workspace } from "../workspace.js";
import type { RunConfig } from "./run-config.js";

export type CommitOutcome = "committed" | "amended" | "nothing_staged";

/**
 * Values steps hand to later steps. A fresh run fills them from generation
 * results; a resumed run reads them back from the step's artifacts.
 */
export interface Bindings {
  concept?: string;
  designDoc?: string;
  designReview?: string;
  specCount?: number;
  /** What the final step did with the staged scaffold. */
  commit?: CommitOutcome;
}

/**
 * RunContext is threaded through every step of one invocation. It is never
 * persisted; the artifact files are its durable form.
 */
export interface RunContext {
  readonly config: RunConfig;
  /**
   * Starts as config.resume. Setup turns it off when there was no workspace
   * to resume, so the rest of the run behaves as a fresh one.
   */
  resume: boolean;
  readonly workspace: Workspace;
  readonly bindings: Bindings;
  readonly logger: RunLogger;
  readonly git: VersionControl;
  readonly generator: GenerationClient;
  /** Concept text read from --concept before the workspace exists. */
  readonly conceptInput?: string;
}
