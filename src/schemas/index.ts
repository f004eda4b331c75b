export {
  DEFAULT_GENERATOR_COMMAND,
  DEFAULT_MODEL,
  ProjectNameSchema,
  RunConfigSchema,
  type RunConfig,
} from "./run-config.js";
export {
  StepKindSchema,
  type StepKind,
  StepStatusSchema,
  type StepStatus,
  PipelineStatusSchema,
  type PipelineStatus,
  StepRecordSchema,
  type StepRecord,
  PipelineResultSchema,
  type PipelineResult,
} from "./step.js";
export type { Bindings, CommitOutcome, RunContext } from "./run-context.js";
