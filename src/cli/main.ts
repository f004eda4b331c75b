#!/usr/bin/env node
import { parseArgs } from "./parse-args.js";
import { runInit } from "./commands.js";
import { INIT_USAGE, MAIN_USAGE } from "./help.js";

async function main(): Promise<void> {
  const result = parseArgs(process.argv);

  if (!result.ok) {
    console.error(`Error: ${result.error.error}`);
    if (result.error.usage) {
      console.error(result.error.usage);
    }
    process.exit(1);
  }

  const { args } = result;

  switch (args.command) {
    case "help":
      console.log(args.topic === "init" ? INIT_USAGE : MAIN_USAGE);
      break;
    case "init": {
      const code = await runInit(args);
      if (code !== 0) process.exit(code);
      break;
    }
  }
}

main().catch((err: unknown) => {
  console.error("Fatal error:", err instanceof Error ? err.message : err);
  process.exit(1);
});
