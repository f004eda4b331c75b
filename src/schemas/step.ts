import { z } from "zod";

export const StepKindSchema = z.enum([
  "setup",
  "generation",
  "multi_artifact_generation",
  "scaffold_and_commit",
]);

export type StepKind = z.infer<typeof StepKindSchema>;

export const StepStatusSchema = z.enum([
  "pending",
  "skipped",
  "running",
  "completed",
  "failed",
]);

export type StepStatus = z.infer<typeof StepStatusSchema>;

export const PipelineStatusSchema = z.enum([
  "not_started",
  "in_progress",
  "completed",
  "aborted",
]);

export type PipelineStatus = z.infer<typeof PipelineStatusSchema>;

export const StepRecordSchema = z.object({
  index: z.number().int().min(1),
  name: z.string().min(1),
  kind: StepKindSchema,
  status: StepStatusSchema,
  detail: z.string().optional(),
  error: z.string().optional(),
});

export type StepRecord = z.infer<typeof StepRecordSchema>;

export const PipelineResultSchema = z.object({
  status: PipelineStatusSchema,
  steps: z.array(StepRecordSchema),
  error: z.string().optional(),
});

export type PipelineResult = z.infer<typeof PipelineResultSchema>;
