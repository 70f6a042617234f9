import chalk from "chalk";
import { z } from "zod";

const levelSchema = z.enum(["debug", "info", "warn", "error"]);

export type Level = z.infer<typeof levelSchema>;

export type LogSink = (line: string) => void;

const levelOrder: Record<Level, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function resolveLevel(raw: string | undefined): Level {
  const parsed = levelSchema.safeParse(raw?.trim().toLowerCase());
  return parsed.success ? parsed.data : "info";
}

function format(level: Level, message: string, meta?: Record<string, unknown>) {
  const color =
    level === "debug"
      ? chalk.gray
      : level === "info"
        ? chalk.cyan
        : level === "warn"
          ? chalk.yellow
          : chalk.red;
  const ts = new Date().toISOString();
  const base = `${ts} ${color(level.toUpperCase())} ${message}`;
  if (!meta || Object.keys(meta).length === 0) {
    return base;
  }
  return `${base} ${chalk.gray(JSON.stringify(meta))}`;
}

// stdout is reserved for command output
const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

export class Logger {
  constructor(
    private readonly threshold: Level = resolveLevel(process.env.LOG_LEVEL),
    private readonly sink: LogSink = stderrSink
  ) {}

  private shouldLog(level: Level) {
    return levelOrder[level] >= levelOrder[this.threshold];
  }

  log(level: Level, message: string, meta?: Record<string, unknown>) {
    if (!this.shouldLog(level)) return;
    this.sink(format(level, message, meta));
  }

  debug(message: string, meta?: Record<string, unknown>) {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>) {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>) {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>) {
    this.log("error", message, meta);
  }
}

export const logger = new Logger();
