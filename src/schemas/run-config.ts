import { z } from "zod";

export const DEFAULT_MODEL = "sonnet";
export const DEFAULT_GENERATOR_COMMAND = "claude";

export const ProjectNameSchema = z
  .string()
  .min(1)
  .regex(
    /^[a-z0-9][a-z0-9_-]*$/,
    "project name must use lowercase letters, digits, '-' or '_' and start with a letter or digit",
  );

export const RunConfigSchema = z.object({
  project_name: ProjectNameSchema,
  concept_path: z.string().min(1).optional(),
  resume: z.boolean().default(false),
  model: z.string().min(1).default(DEFAULT_MODEL),
  design_model: z.string().min(1).default(DEFAULT_MODEL),
  repo_root: z.string().min(1),
  generator_command: z.string().min(1).default(DEFAULT_GENERATOR_COMMAND),
});

export type RunConfig = z.infer<typeof RunConfigSchema>;
