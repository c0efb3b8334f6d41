import chalk from "chalk";
import type { LogLevel } from "./types.js";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug: (message: string) => void;
  info: (message: string) => void;
  success: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}

/** stdout carries the MCP protocol, so log lines go to stderr */
function writeStderr(line: string): void {
  process.stderr.write(line + "\n");
}

export function createLogger(level: LogLevel = "info", write: (line: string) => void = writeStderr): Logger {
  const enabled = (messageLevel: LogLevel) => LEVEL_ORDER[messageLevel] >= LEVEL_ORDER[level];

  return {
    debug: (message: string) => {
      if (enabled("debug")) write(`${chalk.gray("🔍")} ${message}`);
    },
    info: (message: string) => {
      if (enabled("info")) write(`${chalk.blue("ℹ")} ${message}`);
    },
    success: (message: string) => {
      if (enabled("info")) write(`${chalk.green("✓")} ${message}`);
    },
    warn: (message: string) => {
      if (enabled("warn")) write(`${chalk.yellow("⚠")} ${message}`);
    },
    error: (message: string) => {
      if (enabled("error")) write(`${chalk.red("✗")} ${message}`);
    },
  };
}

export const silentLogger: Logger = createLogger("error", () => {});
