export const MAIN_USAGE = `loopforge — bootstrap an autonomous coding-agent loop for a new project

Usage:
  loopforge <command> [options]

Commands:
  init <project_name> [concept_file]   Create a worktree and generate design, specs and loop files

Options:
  --help, -h               Show this help message

Run "loopforge <command> --help" for command-specific options.`;

export const INIT_USAGE = `loopforge init — generate an agent-loop workspace from a concept

Usage:
  loopforge init <project_name> <concept_file> [options]
  loopforge init <project_name> --resume [concept_file] [options]

Arguments:
  <project_name>           Name for the project, e.g. comment-system
  <concept_file>           Markdown file describing the project's OUTCOMES
                           (optional with --resume once CONCEPT.md is in the workspace)

Options:
  --model <model>          Model for spec and guide generation (default: $LOOPFORGE_MODEL or sonnet)
  --design-model <model>   Model for the design steps (default: $LOOPFORGE_DESIGN_MODEL or sonnet)
  --resume                 Continue a previous run, skipping steps whose output exists
  --help, -h               Show this help message

Environment:
  LOOPFORGE_MODEL          Default model for generation
  LOOPFORGE_DESIGN_MODEL   Default model for the design steps
  LOOPFORGE_GENERATOR      Generation CLI to invoke (default: claude)`;
