import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

export const LOG_FILENAME = "loopforge.log";

const RULE = "━".repeat(40);

/** Where console-bound lines go. Swapped out in tests. */
export interface ConsoleSink {
  out(line: string): void;
  err(line: string): void;
}

export interface RunLogger {
  /** Banner marking the start of a pipeline step. */
  step(title: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Unformatted line, e.g. summary tables. */
  plain(message: string): void;
  /** `[YYYY-MM-DD HH:MM:SS] message` */
  timestamp(message: string): void;
  /**
   * Start duplicating every emitted line into `logPath` (append mode).
   * May be called once per logger; the file is never truncated.
   */
  attach(logPath: string): void;
  readonly logPath: string | undefined;
}

export const processConsole: ConsoleSink = {
  out: (line) => process.stdout.write(`${line}\n`),
  err: (line) => process.stderr.write(`${line}\n`),
};

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function createRunLogger(
  sink: ConsoleSink = processConsole,
  now: () => Date = () => new Date(),
): RunLogger {
  let logPath: string | undefined;

  function emit(line: string, stream: "out" | "err"): void {
    if (stream === "err") {
      sink.err(line);
    } else {
      sink.out(line);
    }
    if (logPath !== undefined) {
      appendFileSync(logPath, `${line}\n`);
    }
  }

  return {
    step(title: string): void {
      emit("", "out");
      emit(RULE, "out");
      emit(`▶ ${title}`, "out");
      emit(RULE, "out");
      emit("", "out");
    },
    info(message: string): void {
      emit(`  → ${message}`, "out");
    },
    warn(message: string): void {
      emit(`  ! Warning: ${message}`, "err");
    },
    error(message: string): void {
      emit(`✗ Error: ${message}`, "err");
    },
    plain(message: string): void {
      emit(message, "out");
    },
    timestamp(message: string): void {
      emit(`[${formatTimestamp(now())}] ${message}`, "out");
    },
    attach(path: string): void {
      if (logPath !== undefined) {
        throw new Error(`Logger is already attached to ${logPath}`);
      }
      mkdirSync(dirname(path), { recursive: true });
      // Touch so the file exists even before the first entry.
      appendFileSync(path, "");
      logPath = path;
    },
    get logPath(): string | undefined {
      return logPath;
    },
  };
}
