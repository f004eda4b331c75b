export type InitArgs = {
  command: "init";
  projectName: string;
  conceptFile?: string;
  model?: string;
  designModel?: string;
  resume: boolean;
};

export type HelpArgs = {
  command: "help";
  topic?: "init";
};

export type ParsedArgs = InitArgs | HelpArgs;

export type ParseError = {
  error: string;
  usage?: string;
};

export type ParseResult =
  | { ok: true; args: ParsedArgs }
  | { ok: false; error: ParseError };

const INIT_USAGE_HINT = 'Run "loopforge init --help" for usage information.';

type ValueFlag = "--model" | "--design-model";
const VALUE_FLAGS: readonly ValueFlag[] = ["--model", "--design-model"];

function isValueFlag(arg: string): arg is ValueFlag {
  return VALUE_FLAGS.some((flag) => flag === arg);
}

function failure(error: string, usage: string = INIT_USAGE_HINT): ParseResult {
  return { ok: false, error: { error, usage } };
}

function parseInitArgs(args: string[]): ParseResult {
  if (args.includes("--help") || args.includes("-h")) {
    return { ok: true, args: { command: "help", topic: "init" } };
  }

  const values: Partial<Record<ValueFlag, string>> = {};
  const positionals: string[] = [];
  let resume = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;

    if (arg === "--resume") {
      resume = true;
      continue;
    }

    const [, inlineFlag, inlineValue] = /^(--model|--design-model)=(.*)$/.exec(arg) ?? [];
    if (inlineFlag !== undefined && isValueFlag(inlineFlag)) {
      if (!inlineValue) return failure(`Missing value for ${inlineFlag}`);
      values[inlineFlag] = inlineValue;
      continue;
    }

    if (isValueFlag(arg)) {
      const next = args[i + 1];
      if (next === undefined || next.startsWith("-")) {
        return failure(`Missing value for ${arg}`);
      }
      values[arg] = next;
      i++;
      continue;
    }

    if (arg.startsWith("-")) {
      return failure(`Unknown option: ${arg}`);
    }

    positionals.push(arg);
  }

  const [projectName, conceptFile, ...extra] = positionals;
  if (projectName === undefined) {
    return failure("Missing required argument: <project_name>");
  }
  if (extra.length > 0) {
    return failure(`Too many arguments: ${extra.join(" ")}`);
  }

  return {
    ok: true,
    args: {
      command: "init",
      projectName,
      conceptFile,
      model: values["--model"],
      designModel: values["--design-model"],
      resume,
    },
  };
}

export function parseArgs(argv: string[]): ParseResult {
  // argv[0] = node, argv[1] = script path, argv[2+] = user args
  const args = argv.slice(2);

  if (args.length === 0 || args[0] === "--help" || args[0] === "-h" || args[0] === "help") {
    return { ok: true, args: { command: "help" } };
  }

  const command = args[0];

  switch (command) {
    case "init":
      return parseInitArgs(args.slice(1));
    default:
      return failure(`Unknown command: ${command}`, 'Run "loopforge --help" for usage information.');
  }
}
