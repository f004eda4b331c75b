import type { PipelineStep } from "../step-runner.js";
import {
  agentsStep,
  buildPromptStep,
  designStep,
  planPromptStep,
  refineStep,
  reviewStep,
} from "./documents.js";
import { scaffoldStep } from "./scaffold.js";
import { directoriesStep, workspaceStep } from "./setup.js";
import { specsStep } from "./specs.js";

export const PIPELINE_STEPS: readonly PipelineStep[] = [
  workspaceStep,
  directoriesStep,
  designStep,
  reviewStep,
  refineStep,
  specsStep,
  agentsStep,
  planPromptStep,
  buildPromptStep,
  scaffoldStep,
];
